import {
  foxessResponseSchema,
  type BatterySettings,
  type FoxessCoordinatorData,
  type FoxessCredentials,
  type FoxessDeviceInfo,
  type FoxessRealTimeData,
  type FoxessResponse,
  type ScheduleGroup,
  type Scheduler,
} from "@shared/schema";
import { log } from "../core/logger";
import { FoxessApiError, FoxessAuthenticationError, FoxessCommunicationError } from "./errors";
import { parseBatterySettings, parseDeviceDetail, parseRealTimeData, parseScheduler } from "./parsers";
import { filterPlaceholderGroups, minimalGroup } from "./schedule";
import { buildHeaders } from "./signature";
import { getDeviceThrottle, type RequestThrottle, type RequestKind, type ThrottleUsage } from "./throttle";
import type { FoxessDataSource } from "./source";

export const FOXESS_BASE_URL = "https://www.foxesscloud.com";
const REQUEST_TIMEOUT_MS = 75_000;

export interface FoxessClientOptions {
  deviceSerialNumber: string;
  credentials: FoxessCredentials;
  baseUrl?: string;
  timeoutMs?: number;
  throttle?: RequestThrottle;
  fetch?: typeof fetch;
}

/**
 * FoxESS Cloud Open-API Client für einen Wechselrichter.
 *
 * Jeder Call wird signiert und über den RequestThrottle serialisiert.
 * Fehler werden auf FoxessApiError / FoxessCommunicationError /
 * FoxessAuthenticationError abgebildet.
 */
export class FoxessApiClient implements FoxessDataSource {
  readonly deviceSerialNumber: string;
  private readonly credentials: FoxessCredentials;
  private readonly baseUrl: string;
  private readonly timeoutMs: number;
  private readonly throttle: RequestThrottle;
  private readonly fetchImpl: typeof fetch;

  constructor(options: FoxessClientOptions) {
    this.deviceSerialNumber = options.deviceSerialNumber;
    this.credentials = options.credentials;
    this.baseUrl = (options.baseUrl ?? FOXESS_BASE_URL).replace(/\/+$/, "");
    this.timeoutMs = options.timeoutMs ?? REQUEST_TIMEOUT_MS;
    this.throttle = options.throttle ?? getDeviceThrottle(options.deviceSerialNumber);
    // Spät binden, damit Tests global.fetch austauschen können
    this.fetchImpl = options.fetch ?? ((input, init) => fetch(input, init));
  }

  getUsage(): ThrottleUsage {
    return this.throttle.getUsage();
  }

  async request(
    method: "GET" | "POST",
    path: string,
    body?: unknown,
    kind: RequestKind = "read"
  ): Promise<FoxessResponse> {
    await this.throttle.acquire(kind);

    // Signatur nur über den Pfad ohne Query-String
    const signaturePath = path.split("?")[0];
    const headers = buildHeaders(signaturePath, this.credentials);
    const url = `${this.baseUrl}${path}`;

    const controller = new AbortController();
    const timeout = setTimeout(() => controller.abort(), this.timeoutMs);

    try {
      log("debug", "foxess", `API Request ${method} ${url}`, body !== undefined ? JSON.stringify(body) : undefined);

      const response = await this.fetchImpl(url, {
        method,
        headers,
        body: body !== undefined ? JSON.stringify(body) : undefined,
        signal: controller.signal,
      });

      if (response.status === 401 || response.status === 403) {
        throw new FoxessAuthenticationError("Invalid API key or unauthorized access", undefined, response.status);
      }

      const text = await response.text();
      log("trace", "foxess", `API Response ${response.status} ${path}`, text);

      if (!response.ok) {
        throw new FoxessCommunicationError(`HTTP ${response.status} from FoxESS Cloud`, response.status);
      }

      let json: unknown;
      try {
        json = JSON.parse(text);
      } catch {
        throw new FoxessCommunicationError(`Invalid JSON response from FoxESS Cloud`, response.status);
      }

      const parsed = foxessResponseSchema.safeParse(json);
      if (!parsed.success) {
        throw new FoxessCommunicationError(`Unexpected response shape: ${parsed.error.message}`, response.status);
      }

      const result = parsed.data;
      if (result.errno !== 0) {
        const apiMsg = result.msg || "Unknown error";
        if (/token|auth/i.test(apiMsg)) {
          throw new FoxessAuthenticationError(apiMsg, result.errno);
        }
        throw new FoxessApiError(`API error: ${apiMsg}`, result.errno);
      }

      return result;
    } catch (error) {
      if (error instanceof FoxessApiError) {
        throw error;
      }
      if (controller.signal.aborted) {
        throw new FoxessCommunicationError(`Timeout error fetching information - no response after ${this.timeoutMs}ms`);
      }
      const message = error instanceof Error ? error.message : String(error);
      throw new FoxessCommunicationError(`Error fetching information - ${message}`);
    } finally {
      clearTimeout(timeout);
    }
  }

  /**
   * Alle Daten für einen Coordinator-Durchlauf. Scheduler und Batterie-Settings
   * nur mit Batterie (spart zwei Calls vom Tagesbudget).
   */
  async getData(): Promise<FoxessCoordinatorData> {
    const deviceInfo = await this.getDeviceDetail();
    const realTime = await this.getRealTimeData();

    let schedulerGroups: ScheduleGroup[] | null = null;
    let batterySettings: BatterySettings | null = null;
    if (deviceInfo.hasBattery) {
      schedulerGroups = await this.getScheduleGroups();
      batterySettings = await this.getBatterySettings();
    }

    return {
      deviceInfo,
      realTime,
      schedulerGroups,
      batterySettings,
      fetchedAt: new Date().toISOString(),
    };
  }

  async getDeviceDetail(): Promise<FoxessDeviceInfo> {
    const sn = encodeURIComponent(this.deviceSerialNumber);
    const response = await this.request("GET", `/op/v1/device/detail?sn=${sn}`);
    return parseDeviceDetail(response.result, this.deviceSerialNumber);
  }

  async getRealTimeData(): Promise<FoxessRealTimeData> {
    const response = await this.request("POST", "/op/v1/device/real/query", {
      sns: [this.deviceSerialNumber],
    });
    return parseRealTimeData(response.result);
  }

  async getScheduler(): Promise<Scheduler> {
    const response = await this.request("POST", "/op/v2/device/scheduler/get", {
      deviceSN: this.deviceSerialNumber,
    });
    return parseScheduler(response.result);
  }

  async getScheduleGroups(): Promise<ScheduleGroup[]> {
    const scheduler = await this.getScheduler();
    return filterPlaceholderGroups(scheduler.groups).map(minimalGroup);
  }

  /**
   * Schreibt den Scheduler. Über diesen Endpoint laufen Änderungen am Arbeitsmodus;
   * `isDefault: false` lässt nicht übergebene Parameter unverändert.
   */
  async setScheduler(groups: ScheduleGroup[], options: { enable?: boolean } = {}): Promise<boolean> {
    const enable = options.enable ?? true;
    const response = await this.request(
      "POST",
      "/op/v2/device/scheduler/enable",
      {
        deviceSN: this.deviceSerialNumber,
        groups,
        enable: enable ? 1 : 0,
        isDefault: false,
      },
      "write"
    );
    return response.errno === 0;
  }

  async getBatterySettings(): Promise<BatterySettings> {
    const sn = encodeURIComponent(this.deviceSerialNumber);
    const response = await this.request("GET", `/op/v0/device/battery/soc/get?sn=${sn}`);
    return parseBatterySettings(response.result);
  }

  async setBatterySettings(settings: BatterySettings): Promise<boolean> {
    const response = await this.request(
      "POST",
      "/op/v0/device/battery/soc/set",
      {
        sn: this.deviceSerialNumber,
        minSoc: settings.minSoc,
        minSocOnGrid: settings.minSocOnGrid,
      },
      "write"
    );
    return response.errno === 0;
  }
}
