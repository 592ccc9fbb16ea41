import type { FoxessCredentials, FoxessDeviceInfo } from "@shared/schema";
import { log } from "../core/logger";
import { FoxessApiClient } from "../foxess/client";
import { FoxessAuthenticationError, FoxessCommunicationError } from "../foxess/errors";
import type { RequestThrottle } from "../foxess/throttle";

export type CredentialsErrorCode = "auth" | "connection" | "unknown";

export type CredentialsValidationResult =
  | { ok: true; title: string; deviceInfo: FoxessDeviceInfo }
  | { ok: false; error: CredentialsErrorCode; message: string };

export interface ValidateCredentialsOptions {
  baseUrl?: string;
  fetch?: typeof fetch;
  /** Standard: der gemeinsame Throttle der Seriennummer */
  throttle?: RequestThrottle;
}

/**
 * Prüft Zugangsdaten und Seriennummer mit einem einzelnen Device-Detail-Call.
 */
export async function validateCredentials(
  deviceSerialNumber: string,
  credentials: FoxessCredentials,
  options: ValidateCredentialsOptions = {}
): Promise<CredentialsValidationResult> {
  const client = new FoxessApiClient({
    deviceSerialNumber,
    credentials,
    baseUrl: options.baseUrl,
    fetch: options.fetch,
    throttle: options.throttle,
  });

  try {
    const deviceInfo = await client.getDeviceDetail();
    const title = deviceInfo.stationName || deviceSerialNumber;
    log("info", "foxess", `Zugangsdaten gültig für ${title}`, `SN: ${deviceSerialNumber}, Typ: ${deviceInfo.deviceType}`);
    return { ok: true, title, deviceInfo };
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    let code: CredentialsErrorCode = "unknown";
    if (error instanceof FoxessAuthenticationError) {
      code = "auth";
    } else if (error instanceof FoxessCommunicationError) {
      code = "connection";
    }
    log("warning", "foxess", `Zugangsdaten-Prüfung fehlgeschlagen (${code})`, message);
    return { ok: false, error: code, message };
  }
}
