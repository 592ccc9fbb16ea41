import type { Express } from "express";
import { storage } from "../core/storage";
import { log } from "../core/logger";
import { getBuildInfo } from "../core/build-info";
import { getIntegration, getSetupError, isDemoMode } from "../integration";

/**
 * Konsolidierter Status: Gerät, Coordinator-Zustand, API-Budget und Build-Info
 * in einem Request.
 */
export function registerStatusRoutes(app: Express): void {
  app.get("/api/status", (_req, res) => {
    try {
      const settings = storage.getSettings();
      const integration = getIntegration();
      const coordinator = integration?.coordinator;

      res.json({
        configured: settings !== null,
        demoMode: settings ? isDemoMode(settings) : false,
        deviceInfo: coordinator?.data?.deviceInfo ?? null,
        coordinator: coordinator
          ? {
              lastUpdateSuccess: coordinator.lastUpdateSuccess,
              authFailed: coordinator.authFailed,
              lastUpdate: coordinator.lastUpdate?.toISOString() ?? null,
              lastError: coordinator.lastError,
              polling: coordinator.isPolling(),
              pollingIntervalSeconds: integration.settings.pollingIntervalSeconds,
            }
          : null,
        setupError: getSetupError(),
        apiUsage: integration?.source.getUsage() ?? null,
        buildInfo: getBuildInfo(),
        timestamp: new Date().toISOString(),
      });
    } catch (error) {
      log(
        "error",
        "system",
        "Fehler beim Abrufen des konsolidierten Status",
        error instanceof Error ? error.message : String(error),
      );
      res.status(500).json({ error: "Failed to retrieve consolidated status" });
    }
  });

  app.get("/api/build-info", (_req, res) => {
    res.json(getBuildInfo());
  });
}
