import express from "express";
import cors from "cors";
import { createRouter } from "./routes.js";
import { errorHandler } from "./middleware/error-handler.js";
import { PlanningService } from "./services/planning.service.js";
import { SqliteNetworkRepository } from "./services/sqlite-network-repository.js";

export function createApp(
  service: PlanningService = new PlanningService(new SqliteNetworkRepository()),
): express.Express {
  const app = express();

  // Middleware
  app.use(cors());
  app.use(express.json());

  app.use(createRouter(service));

  // Error handler (must be after routes)
  app.use(errorHandler);

  return app;
}
