import { Controller } from "@tsoa/runtime";
import type { Gateway, NetworkSnapshot, RelayNode } from "@lora-planner/planner";
import { parseSetGatewayRequest, parseUpsertNodeRequest } from "../models/requests.js";
import type { PlanningService } from "../services/planning.service.js";

export class NetworkController extends Controller {
  constructor(private readonly service: PlanningService) {
    super();
  }

  /** Gateway, nodes in insertion order, failed connections */
  public async getNetwork(): Promise<NetworkSnapshot> {
    return this.service.getSnapshot();
  }

  public async setGateway(body: unknown): Promise<Gateway> {
    const { coordinate } = parseSetGatewayRequest(body);
    return this.service.setGateway(coordinate);
  }

  /** Add a node, or move an existing one and keep its position in the order */
  public async upsertNode(id: string, body: unknown): Promise<RelayNode> {
    const { coordinate, gatewayEligible } = parseUpsertNodeRequest(body);
    return this.service.upsertNode(id, coordinate, gatewayEligible);
  }

  public async removeNode(id: string): Promise<void> {
    this.service.removeNode(id);
    this.setStatus(204);
  }
}
