import type { FastifyInstance } from "fastify";
import { registerAuthRoutes } from "./auth";
import { registerCenterRoutes } from "./centers";
import { registerChallengeRoutes } from "./challenges";
import { registerCollectorRoutes } from "./collectors";
import { registerCreditRoutes } from "./credits";
import { registerInsightRoutes } from "./insights";
import { registerPickupRoutes } from "./pickups";
import { registerProfileRoutes } from "./profile";

export function setupRouteHandlers(app: FastifyInstance) {
  app.get("/health", async () => ({ ok: true }));

  registerCenterRoutes(app);
  registerCreditRoutes(app);
  registerChallengeRoutes(app);
  registerPickupRoutes(app);
  registerAuthRoutes(app);
  registerProfileRoutes(app);
  registerInsightRoutes(app);
  registerCollectorRoutes(app);
}
