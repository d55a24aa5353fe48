/**
 * SQLite persistence for the network state (better-sqlite3).
 *
 * One database holds one dataset: the gateway position, the node registry in
 * insertion order and the failed connections. Mutations go through
 * `update()`, which runs load -> mutate -> save in a single transaction.
 */

import { mkdirSync } from "node:fs";
import { homedir } from "node:os";
import { dirname, join } from "node:path";
import Database from "better-sqlite3";

import {
  GATEWAY_ID,
  NetworkState,
  type NetworkRepository,
  type NetworkSnapshot,
} from "@lora-planner/planner";

/** Default database location, overridable with PLANNER_DB_PATH */
export const DEFAULT_DB_PATH = join(homedir(), ".lora-planner", "network.sqlite");

const SCHEMA = `
  CREATE TABLE IF NOT EXISTS gateway (
    id INTEGER PRIMARY KEY CHECK (id = 1),
    lat REAL NOT NULL,
    lng REAL NOT NULL
  );
  CREATE TABLE IF NOT EXISTS nodes (
    seq INTEGER PRIMARY KEY,
    id TEXT NOT NULL UNIQUE,
    lat REAL NOT NULL,
    lng REAL NOT NULL,
    gateway_eligible INTEGER NOT NULL
  );
  CREATE TABLE IF NOT EXISTS failed_connections (
    seq INTEGER PRIMARY KEY,
    a TEXT NOT NULL,
    b TEXT NOT NULL,
    UNIQUE (a, b)
  );
`;

interface GatewayRow {
  lat: number;
  lng: number;
}

interface NodeRow {
  id: string;
  lat: number;
  lng: number;
  gateway_eligible: number;
}

interface PairRow {
  a: string;
  b: string;
}

export class SqliteNetworkRepository implements NetworkRepository {
  private readonly db: Database.Database;

  /**
   * @param filePath - Database file, or ":memory:" for a throwaway store
   */
  constructor(filePath: string = process.env["PLANNER_DB_PATH"] ?? DEFAULT_DB_PATH) {
    if (filePath !== ":memory:") {
      mkdirSync(dirname(filePath), { recursive: true });
    }
    this.db = new Database(filePath);
    if (filePath !== ":memory:") {
      this.db.pragma("journal_mode = WAL");
    }
    this.db.exec(SCHEMA);
    console.log(`[store] Opened network store at ${filePath}`);
  }

  load(): NetworkSnapshot {
    const gateway = this.db
      .prepare<[], GatewayRow>("SELECT lat, lng FROM gateway WHERE id = 1")
      .get();
    const nodes = this.db
      .prepare<[], NodeRow>(
        "SELECT id, lat, lng, gateway_eligible FROM nodes ORDER BY seq",
      )
      .all();
    const pairs = this.db
      .prepare<[], PairRow>("SELECT a, b FROM failed_connections ORDER BY seq")
      .all();

    return {
      gateway: gateway
        ? { id: GATEWAY_ID, coordinate: { lat: gateway.lat, lng: gateway.lng } }
        : null,
      nodes: nodes.map((row) => ({
        id: row.id,
        coordinate: { lat: row.lat, lng: row.lng },
        gatewayEligible: row.gateway_eligible !== 0,
      })),
      overrides: pairs.map((row) => ({ a: row.a, b: row.b })),
    };
  }

  /** Replace the stored dataset, keeping the snapshot's order. */
  save(snapshot: NetworkSnapshot): void {
    const insertGateway = this.db.prepare<[number, number]>(
      "INSERT INTO gateway (id, lat, lng) VALUES (1, ?, ?)",
    );
    const insertNode = this.db.prepare<[number, string, number, number, number]>(
      "INSERT INTO nodes (seq, id, lat, lng, gateway_eligible) VALUES (?, ?, ?, ?, ?)",
    );
    const insertPair = this.db.prepare<[number, string, string]>(
      "INSERT INTO failed_connections (seq, a, b) VALUES (?, ?, ?)",
    );

    const replaceAll = this.db.transaction((data: NetworkSnapshot) => {
      this.db.exec("DELETE FROM gateway; DELETE FROM nodes; DELETE FROM failed_connections;");
      if (data.gateway) {
        insertGateway.run(data.gateway.coordinate.lat, data.gateway.coordinate.lng);
      }
      data.nodes.forEach((node, seq) => {
        insertNode.run(
          seq,
          node.id,
          node.coordinate.lat,
          node.coordinate.lng,
          node.gatewayEligible ? 1 : 0,
        );
      });
      data.overrides.forEach((pair, seq) => {
        insertPair.run(seq, pair.a, pair.b);
      });
    });
    replaceAll(snapshot);
  }

  /** Read-only view of the current state. */
  read(): NetworkState {
    return NetworkState.fromSnapshot(this.load());
  }

  /**
   * Load, mutate and save in one transaction. A throwing mutation rolls
   * back and nothing is written.
   */
  update<T>(mutate: (state: NetworkState) => T): T {
    const run = this.db.transaction(() => {
      const state = NetworkState.fromSnapshot(this.load());
      const result = mutate(state);
      this.save(state.toSnapshot());
      return result;
    });
    return run();
  }

  close(): void {
    this.db.close();
  }
}
