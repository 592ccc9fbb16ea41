import type { Request, Response } from "express";
import { getBuildInfo } from "./build-info";
import { getIntegration } from "../integration";

const startTime = Date.now();

export interface HealthResponse {
  status: "ok" | "degraded" | "error";
  version: string;
  uptime: number;
  timestamp: string;
}

/**
 * GET /api/health, ohne Authentifizierung (Docker/Monitoring).
 * "degraded" solange die Integration nicht läuft oder das letzte Update fehlschlug.
 */
export function healthHandler(_req: Request, res: Response): void {
  const buildInfo = getBuildInfo();
  const integration = getIntegration();

  const response: HealthResponse = {
    status: integration?.coordinator.lastUpdateSuccess ? "ok" : "degraded",
    version: buildInfo.version,
    uptime: Math.floor((Date.now() - startTime) / 1000),
    timestamp: new Date().toISOString(),
  };

  res.json(response);
}
