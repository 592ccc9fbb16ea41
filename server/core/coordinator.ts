import { log } from "./logger";

export type CoordinatorListener = () => void | Promise<void>;

export interface CoordinatorOptions<T> {
  /** Für Log-Meldungen */
  name: string;
  updateIntervalSeconds: number;
  fetchData: () => Promise<T>;
  /** Auth-Fehler stoppen das Polling dauerhaft */
  isAuthError?: (error: unknown) => boolean;
  /** Mindestabstand zwischen angeforderten Refreshes (nach Schreib-Operationen) */
  refreshCooldownMs?: number;
}

/**
 * Pollt eine Datenquelle in festem Intervall und verteilt Updates an Listener.
 *
 * - Rekursiver setTimeout statt setInterval, ein laufender Poll wird nie überlappt
 * - Fehler behalten die letzten Daten, markieren das Update aber als fehlgeschlagen
 * - Auth-Fehler beenden das Polling bis zum nächsten Setup
 */
export class UpdateCoordinator<T> {
  data: T | null = null;
  lastUpdateSuccess = false;
  authFailed = false;
  lastUpdate: Date | null = null;
  lastError: string | null = null;

  private readonly name: string;
  private readonly updateIntervalMs: number;
  private readonly fetchData: () => Promise<T>;
  private readonly isAuthError: (error: unknown) => boolean;
  private readonly refreshCooldownMs: number;

  private listeners: Set<CoordinatorListener> = new Set();
  private pollTimeout: NodeJS.Timeout | null = null;
  private cooldownTimeout: NodeJS.Timeout | null = null;
  private runningPollPromise: Promise<void> | null = null;
  private runningStopPromise: Promise<void> | null = null;
  private pendingRefresh: Promise<void> | null = null;
  private resolvePendingRefresh: (() => void) | null = null;
  private lastRequestedRefreshAt = 0;
  private lastException: unknown = null;
  private stopped = true;

  constructor(options: CoordinatorOptions<T>) {
    this.name = options.name;
    this.updateIntervalMs = options.updateIntervalSeconds * 1000;
    this.fetchData = options.fetchData;
    this.isAuthError = options.isAuthError ?? (() => false);
    this.refreshCooldownMs = options.refreshCooldownMs ?? 10_000;
  }

  /**
   * Erster Poll beim Setup. Wirft den Fehler weiter, damit das Setup abbricht;
   * bei Erfolg startet das Intervall-Polling.
   */
  async firstRefresh(): Promise<void> {
    await this.refresh();
    if (!this.lastUpdateSuccess) {
      throw this.lastException;
    }
    this.stopped = false;
    this.scheduleNextPoll();
  }

  /**
   * Pollt sofort. Läuft bereits ein Poll, wird auf diesen gewartet.
   * Wirft nie; das Ergebnis steht in lastUpdateSuccess / lastError.
   */
  refresh(): Promise<void> {
    if (this.runningPollPromise) {
      return this.runningPollPromise;
    }
    this.runningPollPromise = this.poll().finally(() => {
      this.runningPollPromise = null;
    });
    return this.runningPollPromise;
  }

  /**
   * Refresh nach einer Schreib-Operation. Mehrere Anforderungen innerhalb
   * des Cooldowns werden zu einem Poll am Ende des Cooldowns zusammengefasst.
   */
  requestRefresh(): Promise<void> {
    if (this.pendingRefresh) {
      return this.pendingRefresh;
    }

    const elapsed = Date.now() - this.lastRequestedRefreshAt;
    if (elapsed >= this.refreshCooldownMs) {
      this.lastRequestedRefreshAt = Date.now();
      return this.refresh();
    }

    const delay = this.refreshCooldownMs - elapsed;
    log("debug", "coordinator", `${this.name}: Refresh angefordert, läuft in ${delay}ms (Cooldown)`);

    this.pendingRefresh = new Promise<void>((resolve) => {
      this.resolvePendingRefresh = resolve;
      this.cooldownTimeout = setTimeout(() => {
        this.cooldownTimeout = null;
        this.lastRequestedRefreshAt = Date.now();
        void this.refresh().finally(() => this.settlePendingRefresh());
      }, delay);
    });
    return this.pendingRefresh;
  }

  /**
   * Registriert einen Listener für neue Daten (auch bei fehlgeschlagenem Update,
   * damit Entities ihre Verfügbarkeit aktualisieren).
   * @returns Unsubscribe-Funktion
   */
  subscribe(listener: CoordinatorListener): () => void {
    this.listeners.add(listener);
    log("debug", "coordinator", `${this.name}: Listener registriert (insgesamt: ${this.listeners.size})`);
    return () => {
      this.listeners.delete(listener);
      log("debug", "coordinator", `${this.name}: Listener deregistriert (verbleibend: ${this.listeners.size})`);
    };
  }

  /**
   * Stoppt das Polling und wartet auf einen laufenden Poll.
   */
  async stop(): Promise<void> {
    if (this.runningStopPromise) {
      log("debug", "coordinator", `${this.name}: Stop bereits aktiv, warte darauf`);
      await this.runningStopPromise;
      return;
    }

    this.runningStopPromise = (async () => {
      try {
        this.stopped = true;
        this.cancelPollTimeout();

        if (this.cooldownTimeout) {
          clearTimeout(this.cooldownTimeout);
          this.cooldownTimeout = null;
        }
        this.settlePendingRefresh();

        if (this.runningPollPromise) {
          log("debug", "coordinator", `${this.name}: Warte auf laufenden Poll...`);
          await this.runningPollPromise;
        }

        log("info", "coordinator", `${this.name}: Polling gestoppt`);
      } finally {
        this.runningStopPromise = null;
      }
    })();

    await this.runningStopPromise;
  }

  isPolling(): boolean {
    return this.pollTimeout !== null;
  }

  private settlePendingRefresh(): void {
    const resolve = this.resolvePendingRefresh;
    this.pendingRefresh = null;
    this.resolvePendingRefresh = null;
    if (resolve) resolve();
  }

  private cancelPollTimeout(): void {
    if (this.pollTimeout) {
      clearTimeout(this.pollTimeout);
      this.pollTimeout = null;
    }
  }

  private scheduleNextPoll(): void {
    if (this.stopped || this.authFailed) {
      return;
    }
    this.pollTimeout = setTimeout(async () => {
      this.pollTimeout = null;
      await this.refresh();
      this.scheduleNextPoll();
    }, this.updateIntervalMs);
  }

  private async poll(): Promise<void> {
    const start = Date.now();
    try {
      const data = await this.fetchData();
      const recovered = !this.lastUpdateSuccess && this.lastUpdate !== null;

      this.data = data;
      this.lastUpdateSuccess = true;
      this.lastUpdate = new Date();
      this.lastError = null;
      this.lastException = null;

      if (recovered) {
        log("info", "coordinator", `${this.name}: Datenabruf wieder erfolgreich`);
      }
      log("debug", "coordinator", `${this.name}: Daten aktualisiert in ${Date.now() - start}ms`);
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      this.lastUpdateSuccess = false;
      this.lastError = message;
      this.lastException = error;

      if (this.isAuthError(error)) {
        this.authFailed = true;
        this.cancelPollTimeout();
        log("error", "coordinator", `${this.name}: Authentifizierung fehlgeschlagen - Polling gestoppt`, message);
      } else {
        log("warning", "coordinator", `${this.name}: Datenabruf fehlgeschlagen`, message);
      }
    }

    this.notifyListeners();
  }

  private notifyListeners(): void {
    for (const listener of Array.from(this.listeners)) {
      try {
        const result = listener();
        if (result instanceof Promise) {
          result.catch((error: unknown) => {
            log(
              "error",
              "coordinator",
              `${this.name}: Fehler in asynchronem Listener`,
              error instanceof Error ? error.message : String(error)
            );
          });
        }
      } catch (error) {
        log(
          "error",
          "coordinator",
          `${this.name}: Fehler in Listener`,
          error instanceof Error ? error.message : String(error)
        );
      }
    }
  }
}
