import type { Express } from "express";
import { z } from "zod";
import { foxessCredentialsSchema, logSettingsSchema, settingsSchema } from "@shared/schema";
import { storage } from "../core/storage";
import { log } from "../core/logger";
import { validateCredentials } from "../integration/credentials";
import { credentialsFromEnv, reloadIntegration } from "../integration";

const testCredentialsSchema = z.object({
  deviceSerialNumber: z.string().trim().min(1),
  credentials: foxessCredentialsSchema.optional(),
});

export function registerSettingsRoutes(app: Express): void {
  app.get("/api/settings", (_req, res) => {
    res.json(storage.getSettings());
  });

  app.post("/api/settings", async (req, res) => {
    const parsed = settingsSchema.safeParse(req.body);
    if (!parsed.success) {
      res.status(400).json({ error: "Invalid settings data", details: parsed.error.issues });
      return;
    }

    try {
      storage.saveSettings(parsed.data);
      log("info", "system", "Einstellungen gespeichert", `SN: ${parsed.data.deviceSerialNumber}, Intervall: ${parsed.data.pollingIntervalSeconds}s`);

      const integration = await reloadIntegration(parsed.data);
      res.json({ success: true, integrationRunning: integration !== null });
    } catch (error) {
      log(
        "error",
        "system",
        "Fehler beim Speichern der Einstellungen",
        error instanceof Error ? error.message : String(error),
      );
      res.status(500).json({ error: "Failed to save settings" });
    }
  });

  /**
   * Prüft Seriennummer und Zugangsdaten mit einem Device-Detail-Call.
   * Ohne credentials im Body werden die aus der Umgebung verwendet.
   */
  app.post("/api/settings/test-credentials", async (req, res) => {
    const parsed = testCredentialsSchema.safeParse(req.body);
    if (!parsed.success) {
      res.status(400).json({ error: "Invalid credentials test data" });
      return;
    }

    const credentials = parsed.data.credentials ?? credentialsFromEnv();
    if (!credentials) {
      res.status(400).json({ error: "No FoxESS credentials given or configured" });
      return;
    }

    const result = await validateCredentials(parsed.data.deviceSerialNumber, credentials, {
      baseUrl: process.env.FOXESS_BASE_URL || undefined,
    });
    res.json(result);
  });

  app.get("/api/logs", (_req, res) => {
    res.json(storage.getLogs());
  });

  app.delete("/api/logs", (_req, res) => {
    storage.clearLogs();
    log("info", "system", "Logs gelöscht");
    res.json({ success: true });
  });

  app.get("/api/logs/settings", (_req, res) => {
    res.json(storage.getLogSettings());
  });

  app.post("/api/logs/settings", (req, res) => {
    const parsed = logSettingsSchema.safeParse(req.body);
    if (!parsed.success) {
      res.status(400).json({ error: "Invalid log settings data" });
      return;
    }
    storage.saveLogSettings(parsed.data);
    log("info", "system", `Log-Level auf "${parsed.data.level}" gesetzt`);
    res.json({ success: true });
  });
}
