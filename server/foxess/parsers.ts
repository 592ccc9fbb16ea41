import { readFileSync } from "fs";
import { z } from "zod";
import {
  batterySettingsSchema,
  schedulerSchema,
  type BatterySettings,
  type FoxessDeviceInfo,
  type FoxessRealTimeData,
  type MeasurementValue,
  type Scheduler,
} from "@shared/schema";
import { FoxessApiError } from "./errors";

const measurementSchema = z.object({
  key: z.string(),
  variable: z.string(),
  kind: z.enum(["float", "int", "string"]),
});
export type Measurement = z.infer<typeof measurementSchema>;

/**
 * Zuordnung FoxESS-Variable → Messwert-Key (inkl. der Tippfehler der Cloud wie
 * `ambientTemperation` oder `chargeEnergyToTal`).
 */
export const MEASUREMENTS: Measurement[] = z
  .array(measurementSchema)
  .parse(JSON.parse(readFileSync(new URL("./measurements.json", import.meta.url), "utf-8")));

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function toFloat(value: unknown): number {
  if (value === null || value === undefined || value === "") return 0;
  const num = typeof value === "number" ? value : Number(value);
  return Number.isFinite(num) ? num : 0;
}

function toInt(value: unknown): number {
  return Math.trunc(toFloat(value));
}

function toStr(value: unknown): string {
  return value === null || value === undefined ? "" : String(value);
}

function str(data: Record<string, unknown>, key: string, fallback: string = ""): string {
  const value = data[key];
  return typeof value === "string" ? value : fallback;
}

/**
 * GET /op/v1/device/detail → Geräteidentität
 */
export function parseDeviceDetail(result: unknown, fallbackSn: string): FoxessDeviceInfo {
  const data = isRecord(result) ? result : {};
  const batteryList = Array.isArray(data.batteryList) ? data.batteryList.filter(isRecord) : null;

  return {
    stationName: str(data, "stationName"),
    deviceSN: str(data, "deviceSN", fallbackSn) || fallbackSn,
    deviceType: str(data, "deviceType"),
    hasBattery: data.hasBattery === true,
    masterVersion: str(data, "masterVersion"),
    managerVersion: str(data, "managerVersion"),
    slaveVersion: str(data, "slaveVersion"),
    batteryList,
  };
}

/**
 * POST /op/v1/device/real/query → flacher Snapshot.
 * Die Cloud liefert eine Liste pro Gerät; verwendet wird das erste Gerät.
 */
export function parseRealTimeData(result: unknown): FoxessRealTimeData {
  const device = Array.isArray(result) ? result[0] : result;
  const datas = isRecord(device) && Array.isArray(device.datas) ? device.datas : [];

  const variables: Record<string, unknown> = {};
  for (const entry of datas) {
    if (!isRecord(entry) || typeof entry.variable !== "string") continue;
    variables[entry.variable] = entry.value ?? 0;
  }

  const values: Record<string, MeasurementValue> = {};
  for (const { key, variable, kind } of MEASUREMENTS) {
    const raw = variables[variable];
    values[key] = kind === "string" ? toStr(raw) : kind === "int" ? toInt(raw) : toFloat(raw);
  }

  // Positiv = Laden, negativ = Entladen
  values.batteryPower = toFloat(variables.batChargePower) - toFloat(variables.batDischargePower);

  return { values, rawVariables: variables };
}

export function parseScheduler(result: unknown): Scheduler {
  const parsed = schedulerSchema.safeParse(result ?? {});
  if (!parsed.success) {
    throw new FoxessApiError(`Unexpected scheduler response: ${parsed.error.message}`);
  }
  return parsed.data;
}

export function parseBatterySettings(result: unknown): BatterySettings {
  const data = isRecord(result) ? result : {};
  const parsed = batterySettingsSchema.safeParse({
    minSoc: toInt(data.minSoc),
    minSocOnGrid: toInt(data.minSocOnGrid),
  });
  if (!parsed.success) {
    throw new FoxessApiError(`Unexpected battery SoC response: ${parsed.error.message}`);
  }
  return parsed.data;
}
