import { z } from "zod";

// ---------------------------------------------------------------------------
// Logging
// ---------------------------------------------------------------------------

export const logLevelSchema = z.enum(["trace", "debug", "info", "warning", "error"]);
export type LogLevel = z.infer<typeof logLevelSchema>;

export const logCategorySchema = z.enum([
  "foxess",
  "foxess-mock",
  "coordinator",
  "entities",
  "fhem",
  "system",
  "storage",
]);
export type LogCategory = z.infer<typeof logCategorySchema>;

export const logEntrySchema = z.object({
  id: z.string(),
  timestamp: z.string(),
  level: logLevelSchema,
  category: logCategorySchema,
  message: z.string(),
  details: z.string().optional(),
});
export type LogEntry = z.infer<typeof logEntrySchema>;

export const logSettingsSchema = z.object({
  level: logLevelSchema,
});
export type LogSettings = z.infer<typeof logSettingsSchema>;

// ---------------------------------------------------------------------------
// Settings
// ---------------------------------------------------------------------------

/** FoxESS erlaubt 1440 Calls/Tag/Wechselrichter - ein Poll kostet bis zu 4 Calls */
export const MIN_POLLING_INTERVAL_SECONDS = 300;
export const DEFAULT_POLLING_INTERVAL_SECONDS = 3600;

export const fhemSyncSchema = z.object({
  enabled: z.boolean(),
  host: z.string(),
  port: z.number().int().min(1).max(65535).default(7072),
  device: z.string().regex(/^[A-Za-z0-9_.]+$/).default("FoxESS"),
});
export type FhemSync = z.infer<typeof fhemSyncSchema>;

export const settingsSchema = z.object({
  deviceSerialNumber: z.string().trim().min(1),
  pollingIntervalSeconds: z
    .number()
    .int()
    .min(MIN_POLLING_INTERVAL_SECONDS)
    .max(86400)
    .default(DEFAULT_POLLING_INTERVAL_SECONDS),
  demoMode: z.boolean().optional(),
  fhemSync: fhemSyncSchema.optional(),
});
export type Settings = z.infer<typeof settingsSchema>;

// ---------------------------------------------------------------------------
// FoxESS Cloud
// ---------------------------------------------------------------------------

export const workModeSchema = z.enum([
  "SelfUse",
  "ForceCharge",
  "ForceDischarge",
  "Backup",
  "FeedInFirst",
]);
export type WorkMode = z.infer<typeof workModeSchema>;
export const WORK_MODES = workModeSchema.options;

export const foxessCredentialsSchema = z.discriminatedUnion("type", [
  z.object({ type: z.literal("apiKey"), apiKey: z.string().min(1) }),
  z.object({ type: z.literal("oauth"), accessToken: z.string().min(1) }),
]);
export type FoxessCredentials = z.infer<typeof foxessCredentialsSchema>;

/** Antwort-Hülle aller FoxESS-Endpunkte */
export const foxessResponseSchema = z.object({
  errno: z.number(),
  msg: z.string().optional(),
  result: z.unknown().optional(),
});
export type FoxessResponse = z.infer<typeof foxessResponseSchema>;

export const scheduleExtraParamSchema = z
  .object({
    minSocOnGrid: z.number().optional(),
    fdSoc: z.number().optional(),
    fdPwr: z.number().optional(),
    maxSoc: z.number().optional(),
  })
  .passthrough();
export type ScheduleExtraParam = z.infer<typeof scheduleExtraParamSchema>;

export const scheduleGroupSchema = z.object({
  enable: z.number().int().min(0).max(1),
  startHour: z.number().int().min(0).max(23),
  startMinute: z.number().int().min(0).max(59),
  endHour: z.number().int().min(0).max(23),
  endMinute: z.number().int().min(0).max(59),
  workMode: z.string(),
  extraParam: scheduleExtraParamSchema.optional(),
});
export type ScheduleGroup = z.infer<typeof scheduleGroupSchema>;

export const schedulerSchema = z.object({
  enable: z.union([z.boolean(), z.number()]).optional(),
  groups: z.array(scheduleGroupSchema.partial()).default([]),
});
export type Scheduler = z.infer<typeof schedulerSchema>;

export const batterySettingsSchema = z.object({
  minSoc: z.number().int().min(0).max(100),
  minSocOnGrid: z.number().int().min(0).max(100),
});
export type BatterySettings = z.infer<typeof batterySettingsSchema>;

export interface FoxessDeviceInfo {
  stationName: string;
  deviceSN: string;
  deviceType: string;
  hasBattery: boolean;
  masterVersion: string;
  managerVersion: string;
  slaveVersion: string;
  batteryList: Record<string, unknown>[] | null;
}

export type MeasurementValue = number | string;

/**
 * Flacher Echtzeit-Snapshot: Messwert-Key → Wert.
 * Die Keys kommen aus server/foxess/measurements.json, dazu das abgeleitete batteryPower.
 */
export interface FoxessRealTimeData {
  values: Record<string, MeasurementValue>;
  rawVariables: Record<string, unknown>;
}

export interface FoxessCoordinatorData {
  deviceInfo: FoxessDeviceInfo;
  realTime: FoxessRealTimeData;
  schedulerGroups: ScheduleGroup[] | null;
  batterySettings: BatterySettings | null;
  fetchedAt: string;
}

// ---------------------------------------------------------------------------
// Entities
// ---------------------------------------------------------------------------

export const entityPlatformSchema = z.enum(["sensor", "binary_sensor", "number", "select"]);
export type EntityPlatform = z.infer<typeof entityPlatformSchema>;

export const sensorDescriptionSchema = z.object({
  key: z.string(),
  name: z.string(),
  measurement: z.string(),
  unit: z.string().nullable().default(null),
  deviceClass: z.string().nullable().default(null),
  stateClass: z.enum(["measurement", "total", "total_increasing"]).nullable().default(null),
  icon: z.string(),
});
export type SensorDescription = z.infer<typeof sensorDescriptionSchema>;

export interface EntityState {
  entityId: string;
  uniqueId: string;
  platform: EntityPlatform;
  name: string;
  state: number | string | boolean | null;
  available: boolean;
  attributes: Record<string, unknown>;
}

export const entityWriteSchema = z.object({
  value: z.union([z.number(), z.string()]),
});

// ---------------------------------------------------------------------------
// Build / Health
// ---------------------------------------------------------------------------

export interface BuildInfo {
  version: string;
  branch: string;
  commit: string;
  buildTime: string;
}
