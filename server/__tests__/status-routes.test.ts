import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";

// Mock dependencies before importing the module under test
vi.mock("../core/storage", () => ({
  storage: {
    getSettings: vi.fn(() => ({
      deviceSerialNumber: "TESTSN0000001",
      pollingIntervalSeconds: 3600,
      demoMode: false,
    })),
  },
}));

vi.mock("../core/build-info", () => ({
  getBuildInfo: vi.fn(() => ({
    version: "1.0.0",
    branch: "main",
    commit: "abc1234",
    buildTime: "2026-03-01T10:00:00.000Z",
  })),
}));

vi.mock("../core/logger", () => ({
  log: vi.fn(),
}));

import express from "express";
import request from "supertest";
import { FoxessCommunicationError } from "../foxess/errors";
import { startIntegration, stopIntegration } from "../integration";
import { registerStatusRoutes } from "../routes/status-routes";
import { createStubSource, testSettings } from "./fixtures/foxess";

describe("/api/status", () => {
  let app: express.Express;

  beforeEach(() => {
    app = express();
    app.use(express.json());
    registerStatusRoutes(app);
  });

  afterEach(async () => {
    await stopIntegration();
  });

  it("returns device and coordinator state of the running integration", async () => {
    const source = createStubSource();
    source.getUsage.mockReturnValue({ day: "2026-03-01", callsToday: 12, dailyLimit: 1440 });
    await startIntegration(testSettings, { source });

    const res = await request(app).get("/api/status").expect(200);

    expect(res.body.configured).toBe(true);
    expect(res.body.demoMode).toBe(false);
    expect(res.body.deviceInfo.stationName).toBe("Testanlage");
    expect(res.body.coordinator).toMatchObject({
      lastUpdateSuccess: true,
      authFailed: false,
      lastError: null,
      polling: true,
      pollingIntervalSeconds: 3600,
    });
    expect(res.body.setupError).toBeNull();
    expect(res.body.apiUsage).toEqual({ day: "2026-03-01", callsToday: 12, dailyLimit: 1440 });
    expect(res.body.buildInfo.version).toBe("1.0.0");
  });

  it("reports the setup error when the integration could not start", async () => {
    const source = createStubSource();
    source.getData.mockRejectedValueOnce(
      new FoxessCommunicationError("Timeout error fetching information - no response after 75000ms")
    );
    await startIntegration(testSettings, { source });

    const res = await request(app).get("/api/status").expect(200);

    expect(res.body.coordinator).toBeNull();
    expect(res.body.deviceInfo).toBeNull();
    expect(res.body.apiUsage).toBeNull();
    expect(res.body.setupError).toBe("Timeout error fetching information - no response after 75000ms");
  });
});

describe("/api/build-info", () => {
  it("returns build info", async () => {
    const app = express();
    registerStatusRoutes(app);

    const res = await request(app).get("/api/build-info").expect(200);

    expect(res.body).toEqual({
      version: "1.0.0",
      branch: "main",
      commit: "abc1234",
      buildTime: "2026-03-01T10:00:00.000Z",
    });
  });
});
