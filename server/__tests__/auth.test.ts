import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";

vi.mock("../core/logger", () => ({
  log: vi.fn(),
}));

vi.mock("../core/storage", () => ({
  storage: {
    getSettings: vi.fn(() => null),
    getLogSettings: vi.fn(() => ({ level: "info" })),
  },
}));

vi.mock("../core/build-info", () => ({
  getBuildInfo: () => ({ version: "0.1.0", branch: "main", commit: "abc1234", buildTime: "2026-03-01T12:00:00.000Z" }),
}));

import request from "supertest";
import { createApp } from "../app";
import { extractApiKey } from "../core/auth";
import { startIntegration, stopIntegration } from "../integration";
import { createStubSource, testSettings } from "./fixtures/foxess";

describe("extractApiKey", () => {
  it("prefers the Bearer header over X-API-Key", () => {
    expect(extractApiKey({ authorization: "Bearer test-secret", "x-api-key": "other-key" })).toBe("test-secret");
  });

  it("falls back to X-API-Key for other authorization schemes", () => {
    expect(extractApiKey({ authorization: "Basic dXNlcjpwdw==", "x-api-key": "test-secret" })).toBe("test-secret");
  });

  it("returns null for an empty Bearer value", () => {
    expect(extractApiKey({ authorization: "Bearer " })).toBeNull();
    expect(extractApiKey({})).toBeNull();
  });
});

describe("API key guard", () => {
  let source: ReturnType<typeof createStubSource>;

  beforeEach(async () => {
    source = createStubSource();
    await startIntegration(testSettings, { source });
  });

  afterEach(async () => {
    await stopIntegration();
  });

  describe("with API_KEY set", () => {
    const { app } = createApp({ apiKey: "test-secret" });

    it("keeps /api/health open for monitoring", async () => {
      const res = await request(app).get("/api/health").expect(200);
      expect(res.body).toMatchObject({ status: "ok", version: "0.1.0" });
    });

    it("rejects entity reads without a key", async () => {
      const res = await request(app).get("/api/entities").expect(401);
      expect(res.body).toEqual({ error: "Authentication required" });
    });

    it("rejects an entity write with a wrong key and leaves the inverter untouched", async () => {
      const res = await request(app)
        .post("/api/entities/number.min_soc")
        .set("X-API-Key", "wrong-key")
        .send({ value: 25 })
        .expect(401);

      expect(res.body).toEqual({ error: "Invalid API key" });
      expect(source.setBatterySettings).not.toHaveBeenCalled();
    });

    it("guards the settings route", async () => {
      await request(app).get("/api/settings").expect(401);
    });

    it("serves entities for a Bearer key", async () => {
      const res = await request(app).get("/api/entities").set("Authorization", "Bearer test-secret").expect(200);
      expect(res.body).toHaveLength(60);
    });

    it("accepts writes with the X-API-Key header", async () => {
      await request(app)
        .post("/api/entities/number.min_soc")
        .set("X-API-Key", "test-secret")
        .send({ value: 25 })
        .expect(200);

      expect(source.setBatterySettings).toHaveBeenCalledWith({ minSoc: 25, minSocOnGrid: 15 });
    });
  });

  describe("without API_KEY", () => {
    const { app } = createApp({ apiKey: undefined });

    it("serves entities without a key", async () => {
      const res = await request(app).get("/api/entities").expect(200);
      expect(res.body).toHaveLength(60);
    });
  });
});
