import { timingSafeEqual } from "crypto";
import type { IncomingHttpHeaders } from "http";
import type { RequestHandler } from "express";
import { log } from "./logger";

/**
 * Liest den Client-Key aus `Authorization: Bearer <key>` oder `X-API-Key: <key>`.
 * Der Bearer-Header gewinnt, wenn beide gesetzt sind.
 */
export function extractApiKey(headers: IncomingHttpHeaders): string | null {
  const authorization = headers.authorization;
  if (authorization?.startsWith("Bearer ")) {
    const key = authorization.slice("Bearer ".length).trim();
    return key || null;
  }
  const headerKey = headers["x-api-key"];
  if (typeof headerKey === "string" && headerKey.trim()) {
    return headerKey.trim();
  }
  return null;
}

function keysMatch(expected: string, provided: string): boolean {
  const expectedBuffer = Buffer.from(expected, "utf8");
  const providedBuffer = Buffer.from(provided, "utf8");
  return expectedBuffer.length === providedBuffer.length && timingSafeEqual(expectedBuffer, providedBuffer);
}

/**
 * Schützt alle dahinter registrierten Routen mit einem statischen Key.
 * Ohne Key läuft FoxBridge offen im LAN, das wird beim Start einmal gewarnt.
 */
export function createApiKeyGuard(apiKey: string | undefined): RequestHandler {
  if (!apiKey) {
    log("warning", "system", "⚠️ API_KEY nicht gesetzt - Entities und Settings sind ohne Key erreichbar");
    return (_req, _res, next) => next();
  }

  return (req, res, next) => {
    const providedKey = extractApiKey(req.headers);
    if (!providedKey) {
      res.status(401).json({ error: "Authentication required" });
      return;
    }

    if (!keysMatch(apiKey, providedKey)) {
      log("debug", "system", "API-Zugriff mit ungültigem Key abgelehnt", `${req.method} ${req.originalUrl}`);
      res.status(401).json({ error: "Invalid API key" });
      return;
    }

    next();
  };
}
