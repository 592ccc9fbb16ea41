import { log } from "../core/logger";
import { FoxessApiError } from "./errors";

export type RequestKind = "read" | "write";

export interface ThrottleOptions {
  /** Mindestabstand vor einem lesenden Call (FoxESS: 1 req/s) */
  readIntervalMs?: number;
  /** Mindestabstand vor einem schreibenden Call (FoxESS: 1 req/2s) */
  writeIntervalMs?: number;
  /** Sicherheitszuschlag auf jede Wartezeit */
  slackMs?: number;
  /** FoxESS: 1440 Calls pro Tag und Wechselrichter */
  dailyLimit?: number;
  now?: () => number;
  sleep?: (ms: number) => Promise<void>;
}

export interface ThrottleUsage {
  day: string;
  callsToday: number;
  dailyLimit: number;
}

function localDayKey(timestamp: number): string {
  const d = new Date(timestamp);
  const pad = (n: number) => String(n).padStart(2, "0");
  return `${d.getFullYear()}-${pad(d.getMonth() + 1)}-${pad(d.getDate())}`;
}

/**
 * Serialisiert alle Calls eines Wechselrichters und hält die FoxESS-Limits ein.
 * Parallele Aufrufer werden in eine Queue gestellt und laufen nie überlappend.
 */
export class RequestThrottle {
  private readonly readIntervalMs: number;
  private readonly writeIntervalMs: number;
  private readonly slackMs: number;
  private readonly dailyLimit: number;
  private readonly now: () => number;
  private readonly sleep: (ms: number) => Promise<void>;

  private lastCallAt = 0;
  private queue: Promise<void> = Promise.resolve();
  private day = "";
  private callsToday = 0;

  constructor(options: ThrottleOptions = {}) {
    this.readIntervalMs = options.readIntervalMs ?? 1000;
    this.writeIntervalMs = options.writeIntervalMs ?? 2000;
    this.slackMs = options.slackMs ?? 200;
    this.dailyLimit = options.dailyLimit ?? 1440;
    this.now = options.now ?? (() => Date.now());
    this.sleep = options.sleep ?? ((ms) => new Promise((resolve) => setTimeout(resolve, ms)));
  }

  /**
   * Wartet bis der nächste Call erlaubt ist und zählt ihn.
   * Wirft FoxessApiError wenn das Tagesbudget aufgebraucht ist.
   */
  acquire(kind: RequestKind): Promise<void> {
    const turn = this.queue.then(() => this.waitTurn(kind));
    // Ein abgelehnter Call darf die Queue nicht blockieren
    this.queue = turn.catch(() => undefined);
    return turn;
  }

  getUsage(): ThrottleUsage {
    this.rollDay();
    return { day: this.day, callsToday: this.callsToday, dailyLimit: this.dailyLimit };
  }

  private rollDay(): void {
    const today = localDayKey(this.now());
    if (today !== this.day) {
      this.day = today;
      this.callsToday = 0;
    }
  }

  private async waitTurn(kind: RequestKind): Promise<void> {
    this.rollDay();

    if (this.callsToday >= this.dailyLimit) {
      log("error", "foxess", `Tagesbudget von ${this.dailyLimit} API-Calls aufgebraucht`, `Tag: ${this.day}`);
      throw new FoxessApiError(`Daily API call budget of ${this.dailyLimit} exhausted`);
    }

    const interval = kind === "write" ? this.writeIntervalMs : this.readIntervalMs;
    if (this.lastCallAt > 0) {
      const elapsed = this.now() - this.lastCallAt;
      if (elapsed < interval) {
        const waitMs = interval - elapsed + this.slackMs;
        log("trace", "foxess", `Rate Limiting - warte ${waitMs}ms vor ${kind === "write" ? "Schreib" : "Lese"}-Call`);
        await this.sleep(waitMs);
      }
    }

    this.lastCallAt = this.now();
    this.callsToday++;

    if (this.callsToday === Math.floor(this.dailyLimit * 0.9)) {
      log(
        "warning",
        "foxess",
        `⚠️ ${this.callsToday}/${this.dailyLimit} API-Calls heute verbraucht`,
        "Polling-Intervall ggf. erhöhen"
      );
    }
  }
}

const deviceThrottles = new Map<string, RequestThrottle>();

/**
 * Die Limits gelten pro Wechselrichter. Alle Clients derselben Seriennummer
 * (Polling, Zugangsdaten-Prüfung) teilen sich deshalb eine Instanz.
 */
export function getDeviceThrottle(deviceSerialNumber: string): RequestThrottle {
  let throttle = deviceThrottles.get(deviceSerialNumber);
  if (!throttle) {
    throttle = new RequestThrottle();
    deviceThrottles.set(deviceSerialNumber, throttle);
  }
  return throttle;
}
