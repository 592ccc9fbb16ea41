import {
  batterySettingsSchema,
  scheduleGroupSchema,
  workModeSchema,
  type BatterySettings,
  type FoxessCoordinatorData,
  type FoxessDeviceInfo,
  type FoxessRealTimeData,
  type ScheduleGroup,
  type Scheduler,
  type WorkMode,
} from "@shared/schema";
import { log } from "../core/logger";
import { FoxessApiError } from "./errors";
import { parseRealTimeData } from "./parsers";
import { createDefaultScheduleGroup, findCurrentPeriodIndex, minimalGroup } from "./schedule";
import type { FoxessDataSource } from "./source";

// Demo-Anlage: 6 kWp, 10 kWh Speicher, max. 3 kW Lade-/Entladeleistung
const PV_PEAK_KW = 6;
const BATTERY_CAPACITY_KWH = 10;
const BATTERY_MAX_POWER_KW = 3;
const MAX_SIMULATION_STEP_HOURS = 1;

export interface MockClientOptions {
  deviceSerialNumber?: string;
  now?: () => Date;
  random?: () => number;
  initialSoc?: number;
}

function round(value: number, digits: number = 3): number {
  const factor = 10 ** digits;
  return Math.round(value * factor) / factor;
}

/**
 * Haushaltslast nach Tageszeit (kW, ohne Streuung)
 */
export function baseLoadKw(hour: number): number {
  if (hour < 6) return 0.3;
  if (hour < 9) return 0.8;
  if (hour < 17) return 0.5;
  if (hour < 22) return 1.2;
  return 0.5;
}

/**
 * PV-Leistung als Sinus zwischen 06:00 und 20:00 UTC
 * @param cloudFactor - 0.8 (bewölkt) bis 1.0 (klar)
 */
export function pvPowerKw(utcHour: number, cloudFactor: number): number {
  if (utcHour < 6 || utcHour > 20) return 0;
  return Math.max(0, PV_PEAK_KW * Math.sin((Math.PI * (utcHour - 6)) / 14) * cloudFactor);
}

/**
 * Demo-Wechselrichter ohne Netzwerk. Simuliert PV, Haushalt, Speicher und Netz
 * und merkt sich Arbeitsmodus und SoC-Grenzen aus den Schreib-Operationen.
 */
export class MockFoxessClient implements FoxessDataSource {
  readonly deviceSerialNumber: string;
  private readonly now: () => Date;
  private readonly random: () => number;

  private groups: ScheduleGroup[] = [createDefaultScheduleGroup()];
  private schedulerEnabled = true;
  private batterySettings: BatterySettings = { minSoc: 10, minSocOnGrid: 10 };
  private soc: number;
  private lastSimulatedAt: number | null = null;

  constructor(options: MockClientOptions = {}) {
    this.deviceSerialNumber = options.deviceSerialNumber ?? "DEMO0000000001";
    this.now = options.now ?? (() => new Date());
    this.random = options.random ?? Math.random;
    this.soc = options.initialSoc ?? 60;
  }

  getUsage(): null {
    return null;
  }

  async getData(): Promise<FoxessCoordinatorData> {
    const deviceInfo = await this.getDeviceDetail();
    const realTime = await this.getRealTimeData();
    return {
      deviceInfo,
      realTime,
      schedulerGroups: await this.getScheduleGroups(),
      batterySettings: await this.getBatterySettings(),
      fetchedAt: this.now().toISOString(),
    };
  }

  async getDeviceDetail(): Promise<FoxessDeviceInfo> {
    return {
      stationName: "Demo-Anlage",
      deviceSN: this.deviceSerialNumber,
      deviceType: "H3-10.0-E",
      hasBattery: true,
      masterVersion: "1.54",
      managerVersion: "1.38",
      slaveVersion: "1.02",
      batteryList: [{ batterySN: "DEMOBAT000001", model: "EP11" }],
    };
  }

  /** Aktiver Arbeitsmodus laut Scheduler-Periode, sonst SelfUse */
  currentWorkMode(): WorkMode {
    if (!this.schedulerEnabled) return "SelfUse";
    const index = findCurrentPeriodIndex(this.groups, this.now());
    if (index === null) return "SelfUse";
    const parsed = workModeSchema.safeParse(this.groups[index].workMode);
    return parsed.success ? parsed.data : "SelfUse";
  }

  getSoc(): number {
    return this.soc;
  }

  async getRealTimeData(): Promise<FoxessRealTimeData> {
    const now = this.now();
    const utcHour = now.getUTCHours() + now.getUTCMinutes() / 60;

    const pv = pvPowerKw(utcHour, 0.8 + 0.2 * this.random());
    const load = baseLoadKw(now.getHours()) * (0.7 + 0.6 * this.random());
    const mode = this.currentWorkMode();
    const minSoc = this.batterySettings.minSoc;

    const surplus = pv - load;
    const canCharge = this.soc < 100;
    const canDischarge = this.soc > minSoc;

    // Positiv = Laden, negativ = Entladen
    let battery = 0;
    switch (mode) {
      case "ForceCharge":
        battery = canCharge ? BATTERY_MAX_POWER_KW : 0;
        break;
      case "ForceDischarge":
        battery = canDischarge ? -BATTERY_MAX_POWER_KW : 0;
        break;
      case "Backup":
        battery = surplus > 0 && canCharge ? Math.min(surplus, BATTERY_MAX_POWER_KW) : 0;
        break;
      case "FeedInFirst":
        battery = surplus < 0 && canDischarge ? -Math.min(-surplus, BATTERY_MAX_POWER_KW) : 0;
        break;
      case "SelfUse":
        if (surplus > 0 && canCharge) {
          battery = Math.min(surplus, BATTERY_MAX_POWER_KW);
        } else if (surplus < 0 && canDischarge) {
          battery = -Math.min(-surplus, BATTERY_MAX_POWER_KW);
        }
        break;
    }

    this.advanceSoc(now.getTime(), battery);

    // Positiv = Bezug, negativ = Einspeisung
    const grid = load + battery - pv;

    log(
      "debug",
      "foxess-mock",
      `Demo-Daten: PV=${round(pv)}kW, Haus=${round(load)}kW, Batterie=${round(battery)}kW (SOC=${Math.round(this.soc)}%), Netz=${round(grid)}kW`,
      `Modus: ${mode}`
    );

    const datas = [
      { variable: "pvPower", value: round(pv) },
      { variable: "generationPower", value: round(pv) },
      { variable: "loadsPower", value: round(load) },
      { variable: "SoC", value: Math.round(this.soc) },
      { variable: "batChargePower", value: round(Math.max(battery, 0)) },
      { variable: "batDischargePower", value: round(Math.max(-battery, 0)) },
      { variable: "invBatPower", value: round(battery) },
      { variable: "meterPower", value: round(grid) },
      { variable: "gridConsumptionPower", value: round(Math.max(grid, 0)) },
      { variable: "feedinPower", value: round(Math.max(-grid, 0)) },
      { variable: "ResidualEnergy", value: round((this.soc / 100) * BATTERY_CAPACITY_KWH * 100, 0) },
      { variable: "RFreq", value: 50 },
      { variable: "RVolt", value: 230 },
      { variable: "ambientTemperation", value: 24 },
      { variable: "invTemperation", value: 38 },
      { variable: "batTemperature", value: 22 },
      { variable: "runningState", value: "163" },
    ];

    return parseRealTimeData([{ datas }]);
  }

  private advanceSoc(timestamp: number, batteryKw: number): void {
    if (this.lastSimulatedAt !== null) {
      const hours = Math.min(
        Math.max(0, (timestamp - this.lastSimulatedAt) / 3_600_000),
        MAX_SIMULATION_STEP_HOURS
      );
      const deltaPercent = ((batteryKw * hours) / BATTERY_CAPACITY_KWH) * 100;
      this.soc = Math.min(100, Math.max(0, this.soc + deltaPercent));
    }
    this.lastSimulatedAt = timestamp;
  }

  async getScheduler(): Promise<Scheduler> {
    return { enable: this.schedulerEnabled, groups: this.groups.map(minimalGroup) };
  }

  async getScheduleGroups(): Promise<ScheduleGroup[]> {
    return this.groups.map(minimalGroup);
  }

  async setScheduler(groups: ScheduleGroup[], options: { enable?: boolean } = {}): Promise<boolean> {
    for (const group of groups) {
      const parsed = scheduleGroupSchema.safeParse(group);
      if (!parsed.success || !workModeSchema.safeParse(group.workMode).success) {
        throw new FoxessApiError(`API error: invalid scheduler group`, 40257);
      }
    }

    this.groups = groups.map(minimalGroup);
    this.schedulerEnabled = options.enable ?? true;
    log("info", "foxess-mock", `Demo-Scheduler gesetzt (${groups.length} Perioden)`, `Modus jetzt: ${this.currentWorkMode()}`);
    return true;
  }

  async getBatterySettings(): Promise<BatterySettings> {
    return { ...this.batterySettings };
  }

  async setBatterySettings(settings: BatterySettings): Promise<boolean> {
    const parsed = batterySettingsSchema.safeParse(settings);
    if (!parsed.success) {
      throw new FoxessApiError(`API error: invalid battery settings`, 40257);
    }
    this.batterySettings = parsed.data;
    log("info", "foxess-mock", "Demo-Batterie-Einstellungen gesetzt", `minSoc=${settings.minSoc}%, minSocOnGrid=${settings.minSocOnGrid}%`);
    return true;
  }
}
