import { describe, it, expect, vi, beforeEach } from "vitest";

vi.mock("../core/storage", () => ({
  storage: {
    getSettings: vi.fn(() => null),
    saveSettings: vi.fn(),
    getLogs: vi.fn(() => []),
    clearLogs: vi.fn(),
    getLogSettings: vi.fn(() => ({ level: "info" })),
    saveLogSettings: vi.fn(),
  },
}));

vi.mock("../core/logger", () => ({
  log: vi.fn(),
}));

vi.mock("../integration", () => ({
  reloadIntegration: vi.fn(async () => ({ entryId: "TESTSN0000001" })),
  credentialsFromEnv: vi.fn(() => null),
}));

vi.mock("../integration/credentials", () => ({
  validateCredentials: vi.fn(async () => ({
    ok: false,
    error: "auth",
    message: "Invalid API key or unauthorized access",
  })),
}));

import express from "express";
import request from "supertest";
import { storage } from "../core/storage";
import { credentialsFromEnv, reloadIntegration } from "../integration";
import { validateCredentials } from "../integration/credentials";
import { registerSettingsRoutes } from "../routes/settings-routes";

describe("settings routes", () => {
  let app: express.Express;

  beforeEach(() => {
    vi.clearAllMocks();
    app = express();
    app.use(express.json());
    registerSettingsRoutes(app);
  });

  describe("POST /api/settings", () => {
    it("applies defaults, saves and reloads the integration", async () => {
      const res = await request(app)
        .post("/api/settings")
        .send({ deviceSerialNumber: " TESTSN0000001 " })
        .expect(200);

      const expected = { deviceSerialNumber: "TESTSN0000001", pollingIntervalSeconds: 3600 };
      expect(storage.saveSettings).toHaveBeenCalledWith(expected);
      expect(reloadIntegration).toHaveBeenCalledWith(expected);
      expect(res.body).toEqual({ success: true, integrationRunning: true });
    });

    it("reports when the integration did not start", async () => {
      vi.mocked(reloadIntegration).mockResolvedValueOnce(null);

      const res = await request(app)
        .post("/api/settings")
        .send({ deviceSerialNumber: "TESTSN0000001", pollingIntervalSeconds: 600 })
        .expect(200);

      expect(res.body).toEqual({ success: true, integrationRunning: false });
    });

    it("rejects polling intervals below five minutes", async () => {
      const res = await request(app)
        .post("/api/settings")
        .send({ deviceSerialNumber: "TESTSN0000001", pollingIntervalSeconds: 60 })
        .expect(400);

      expect(res.body.error).toBe("Invalid settings data");
      expect(storage.saveSettings).not.toHaveBeenCalled();
    });

    it("rejects an empty serial number", async () => {
      await request(app).post("/api/settings").send({ deviceSerialNumber: "   " }).expect(400);
    });
  });

  describe("POST /api/settings/test-credentials", () => {
    it("validates credentials from the request body", async () => {
      const res = await request(app)
        .post("/api/settings/test-credentials")
        .send({ deviceSerialNumber: "TESTSN0000001", credentials: { type: "apiKey", apiKey: "test-secret" } })
        .expect(200);

      expect(validateCredentials).toHaveBeenCalledWith(
        "TESTSN0000001",
        { type: "apiKey", apiKey: "test-secret" },
        { baseUrl: undefined }
      );
      expect(res.body).toEqual({ ok: false, error: "auth", message: "Invalid API key or unauthorized access" });
    });

    it("falls back to credentials from the environment", async () => {
      vi.mocked(credentialsFromEnv).mockReturnValueOnce({ type: "oauth", accessToken: "test-token" });

      await request(app).post("/api/settings/test-credentials").send({ deviceSerialNumber: "TESTSN0000001" }).expect(200);

      expect(validateCredentials).toHaveBeenCalledWith(
        "TESTSN0000001",
        { type: "oauth", accessToken: "test-token" },
        { baseUrl: undefined }
      );
    });

    it("returns 400 without any credentials", async () => {
      const res = await request(app)
        .post("/api/settings/test-credentials")
        .send({ deviceSerialNumber: "TESTSN0000001" })
        .expect(400);

      expect(res.body).toEqual({ error: "No FoxESS credentials given or configured" });
      expect(validateCredentials).not.toHaveBeenCalled();
    });
  });

  describe("log routes", () => {
    it("clears logs", async () => {
      const res = await request(app).delete("/api/logs").expect(200);

      expect(storage.clearLogs).toHaveBeenCalledOnce();
      expect(res.body).toEqual({ success: true });
    });

    it("saves a valid log level", async () => {
      await request(app).post("/api/logs/settings").send({ level: "debug" }).expect(200);

      expect(storage.saveLogSettings).toHaveBeenCalledWith({ level: "debug" });
    });

    it("rejects an unknown log level", async () => {
      const res = await request(app).post("/api/logs/settings").send({ level: "verbose" }).expect(400);

      expect(res.body).toEqual({ error: "Invalid log settings data" });
    });
  });
});
