import type { Express, Response } from "express";
import { entityWriteSchema } from "@shared/schema";
import { log } from "../core/logger";
import { EntityValueError, isWritable } from "../entities/entity";
import { FoxessApiError } from "../foxess/errors";
import { getIntegration, type Integration } from "../integration";

function requireIntegration(res: Response): Integration | null {
  const integration = getIntegration();
  if (!integration) {
    res.status(503).json({ error: "FoxESS integration not running" });
    return null;
  }
  return integration;
}

export function registerEntityRoutes(app: Express): void {
  app.get("/api/entities", (_req, res) => {
    const integration = requireIntegration(res);
    if (!integration) return;
    res.json(integration.entities.states());
  });

  app.get("/api/entities/:entityId", (req, res) => {
    const integration = requireIntegration(res);
    if (!integration) return;

    const entity = integration.entities.get(req.params.entityId);
    if (!entity) {
      res.status(404).json({ error: `Unknown entity: ${req.params.entityId}` });
      return;
    }
    res.json(entity.toState());
  });

  /**
   * Schreibt number- und select-Entities (SoC-Grenzen, Arbeitsmodus)
   */
  app.post("/api/entities/:entityId", async (req, res) => {
    const integration = requireIntegration(res);
    if (!integration) return;

    const entity = integration.entities.get(req.params.entityId);
    if (!entity) {
      res.status(404).json({ error: `Unknown entity: ${req.params.entityId}` });
      return;
    }
    if (!isWritable(entity)) {
      res.status(405).json({ error: `Entity ${entity.entityId} is read-only` });
      return;
    }

    const body = entityWriteSchema.safeParse(req.body);
    if (!body.success) {
      res.status(400).json({ error: "Request body must be { value: number | string }" });
      return;
    }

    try {
      await entity.setValue(body.data.value);
      res.json({ success: true, entity: entity.toState() });
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      if (error instanceof EntityValueError) {
        res.status(400).json({ error: message });
        return;
      }
      log("error", "entities", `Schreiben von ${entity.entityId} fehlgeschlagen`, message);
      if (error instanceof FoxessApiError) {
        res.status(502).json({ error: message });
        return;
      }
      res.status(500).json({ error: "Failed to update entity" });
    }
  });

  app.post("/api/refresh", (_req, res) => {
    const integration = requireIntegration(res);
    if (!integration) return;

    void integration.coordinator.requestRefresh();
    log("debug", "coordinator", "Refresh über API angefordert");
    res.status(202).json({ success: true });
  });
}
