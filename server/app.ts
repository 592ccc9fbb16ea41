import express, { type Express, type Request, type Response, type NextFunction } from "express";
import type { Server } from "http";
import { registerRoutes } from "./routes/index";
import { storage } from "./core/storage";
import { log } from "./core/logger";
import { createApiKeyGuard } from "./core/auth";
import { healthHandler } from "./core/health";
import { errorHandler } from "./core/error-handler";

export interface AppOptions {
  /** Schlüssel für /api; ohne Key ist die API offen */
  apiKey: string | undefined;
}

export function createApp(options: AppOptions): { app: Express; server: Server } {
  const app = express();

  app.use(express.json());
  app.use(express.urlencoded({ extended: false }));

  app.use((req: Request, res: Response, next: NextFunction) => {
    const start = Date.now();
    const path = req.path;

    res.on("finish", () => {
      // HTTP-Logs nur bei TRACE-Level (sehr detailliert)
      if (path.startsWith("/api") && storage.getLogSettings().level === "trace") {
        log("trace", "system", `${req.method} ${path} ${res.statusCode} in ${Date.now() - start}ms`);
      }
    });

    next();
  });

  // Health-Check vor der Authentifizierung (Monitoring-Tools)
  app.get("/api/health", healthHandler);

  app.use("/api", createApiKeyGuard(options.apiKey));

  const server = registerRoutes(app);

  app.use(errorHandler);

  return { app, server };
}
