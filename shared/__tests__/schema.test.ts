import { describe, it, expect } from "vitest";
import {
  batterySettingsSchema,
  fhemSyncSchema,
  foxessCredentialsSchema,
  logLevelSchema,
  scheduleGroupSchema,
  schedulerSchema,
  sensorDescriptionSchema,
  settingsSchema,
  WORK_MODES,
  workModeSchema,
} from "../schema";

describe("Schema Validation", () => {
  describe("workModeSchema", () => {
    it("accepts all five work modes", () => {
      expect(WORK_MODES).toEqual(["SelfUse", "ForceCharge", "ForceDischarge", "Backup", "FeedInFirst"]);
      for (const mode of WORK_MODES) {
        expect(workModeSchema.parse(mode)).toBe(mode);
      }
    });

    it("rejects invalid modes", () => {
      expect(() => workModeSchema.parse("selfuse")).toThrow();
      expect(() => workModeSchema.parse("")).toThrow();
      expect(() => workModeSchema.parse(1)).toThrow();
    });
  });

  describe("settingsSchema", () => {
    it("applies the default polling interval", () => {
      expect(settingsSchema.parse({ deviceSerialNumber: "TESTSN0000001" })).toEqual({
        deviceSerialNumber: "TESTSN0000001",
        pollingIntervalSeconds: 3600,
      });
    });

    it("enforces 300 to 86400 seconds", () => {
      expect(settingsSchema.safeParse({ deviceSerialNumber: "X", pollingIntervalSeconds: 299 }).success).toBe(false);
      expect(settingsSchema.safeParse({ deviceSerialNumber: "X", pollingIntervalSeconds: 300 }).success).toBe(true);
      expect(settingsSchema.safeParse({ deviceSerialNumber: "X", pollingIntervalSeconds: 86401 }).success).toBe(
        false
      );
    });

    it("rejects a blank serial number", () => {
      expect(settingsSchema.safeParse({ deviceSerialNumber: "  " }).success).toBe(false);
    });
  });

  describe("fhemSyncSchema", () => {
    it("applies port and device defaults", () => {
      expect(fhemSyncSchema.parse({ enabled: true, host: "192.168.1.50" })).toEqual({
        enabled: true,
        host: "192.168.1.50",
        port: 7072,
        device: "FoxESS",
      });
    });

    it("rejects device names with spaces", () => {
      expect(fhemSyncSchema.safeParse({ enabled: true, host: "h", device: "Fox ESS" }).success).toBe(false);
    });
  });

  describe("foxessCredentialsSchema", () => {
    it("distinguishes API key and OAuth token", () => {
      expect(foxessCredentialsSchema.parse({ type: "apiKey", apiKey: "test-secret" })).toEqual({
        type: "apiKey",
        apiKey: "test-secret",
      });
      expect(foxessCredentialsSchema.parse({ type: "oauth", accessToken: "test-token" })).toEqual({
        type: "oauth",
        accessToken: "test-token",
      });
    });

    it("rejects empty secrets and unknown types", () => {
      expect(foxessCredentialsSchema.safeParse({ type: "apiKey", apiKey: "" }).success).toBe(false);
      expect(foxessCredentialsSchema.safeParse({ type: "password", password: "x" }).success).toBe(false);
    });
  });

  describe("scheduleGroupSchema", () => {
    it("keeps unknown extraParam fields", () => {
      const group = scheduleGroupSchema.parse({
        enable: 1,
        startHour: 22,
        startMinute: 0,
        endHour: 5,
        endMinute: 59,
        workMode: "ForceCharge",
        extraParam: { minSocOnGrid: 10, importLimit: 5000 },
      });
      expect(group.extraParam).toEqual({ minSocOnGrid: 10, importLimit: 5000 });
    });

    it("rejects invalid hours", () => {
      expect(
        scheduleGroupSchema.safeParse({
          enable: 1,
          startHour: 24,
          startMinute: 0,
          endHour: 5,
          endMinute: 0,
          workMode: "SelfUse",
        }).success
      ).toBe(false);
    });
  });

  describe("schedulerSchema", () => {
    it("defaults to an empty group list", () => {
      expect(schedulerSchema.parse({ enable: 1 })).toEqual({ enable: 1, groups: [] });
    });
  });

  describe("batterySettingsSchema", () => {
    it("accepts integer percentages", () => {
      expect(batterySettingsSchema.parse({ minSoc: 10, minSocOnGrid: 100 })).toEqual({ minSoc: 10, minSocOnGrid: 100 });
    });

    it("rejects fractions and values above 100", () => {
      expect(batterySettingsSchema.safeParse({ minSoc: 10.5, minSocOnGrid: 10 }).success).toBe(false);
      expect(batterySettingsSchema.safeParse({ minSoc: 10, minSocOnGrid: 101 }).success).toBe(false);
    });
  });

  describe("sensorDescriptionSchema", () => {
    it("defaults unit, device class and state class to null", () => {
      expect(
        sensorDescriptionSchema.parse({ key: "running_state", name: "Running State", measurement: "runningState", icon: "mdi:state-machine" })
      ).toEqual({
        key: "running_state",
        name: "Running State",
        measurement: "runningState",
        unit: null,
        deviceClass: null,
        stateClass: null,
        icon: "mdi:state-machine",
      });
    });
  });

  describe("logLevelSchema", () => {
    it("accepts all log levels", () => {
      for (const level of ["trace", "debug", "info", "warning", "error"]) {
        expect(logLevelSchema.parse(level)).toBe(level);
      }
    });

    it("rejects invalid log levels", () => {
      expect(() => logLevelSchema.parse("verbose")).toThrow();
    });
  });
});
