import { createApp } from "./app.js";
import { PlanningService } from "./services/planning.service.js";
import { DEFAULT_DB_PATH, SqliteNetworkRepository } from "./services/sqlite-network-repository.js";

const PORT = parseInt(process.env["PORT"] ?? "3000", 10);
const DB_PATH = process.env["PLANNER_DB_PATH"] ?? DEFAULT_DB_PATH;

const app = createApp(new PlanningService(new SqliteNetworkRepository(DB_PATH)));

app.listen(PORT, () => {
  console.log(`\nLoRa planner API server running at http://localhost:${PORT}`);
  console.log(`Network store: ${DB_PATH}\n`);
});
