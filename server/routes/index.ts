import type { Express } from "express";
import { createServer, type Server } from "http";
import { registerEntityRoutes } from "./entity-routes";
import { registerSettingsRoutes } from "./settings-routes";
import { registerStatusRoutes } from "./status-routes";

export function registerRoutes(app: Express): Server {
  registerStatusRoutes(app);
  registerEntityRoutes(app);
  registerSettingsRoutes(app);

  return createServer(app);
}
