import type { FoxessCoordinatorData, FoxessCredentials, Settings } from "@shared/schema";
import { UpdateCoordinator } from "../core/coordinator";
import { log } from "../core/logger";
import { storage } from "../core/storage";
import { EntityRegistry } from "../entities/registry";
import { FoxessApiClient } from "../foxess/client";
import { FoxessAuthenticationError } from "../foxess/errors";
import { MockFoxessClient } from "../foxess/mock-client";
import type { FoxessDataSource } from "../foxess/source";
import { getDeviceThrottle } from "../foxess/throttle";
import { startFhemSync } from "../sync/fhem-sync";

export interface Integration {
  /** Seriennummer des Wechselrichters */
  entryId: string;
  settings: Settings;
  source: FoxessDataSource;
  coordinator: UpdateCoordinator<FoxessCoordinatorData>;
  entities: EntityRegistry;
}

export interface SetupOptions {
  settings: Settings;
  credentials?: FoxessCredentials | null;
  baseUrl?: string;
  /** Eigene Datenquelle (Tests); sonst Cloud-Client oder Demo */
  source?: FoxessDataSource;
}

/**
 * FOXESS_API_KEY hat Vorrang vor FOXESS_ACCESS_TOKEN (OAuth)
 */
export function credentialsFromEnv(env: NodeJS.ProcessEnv = process.env): FoxessCredentials | null {
  const apiKey = env.FOXESS_API_KEY?.trim();
  if (apiKey) {
    return { type: "apiKey", apiKey };
  }
  const accessToken = env.FOXESS_ACCESS_TOKEN?.trim();
  if (accessToken) {
    return { type: "oauth", accessToken };
  }
  return null;
}

export function isDemoMode(settings: Settings): boolean {
  return process.env.DEMO_AUTOSTART === "true" || settings.demoMode === true;
}

function createDataSource(options: SetupOptions): FoxessDataSource {
  if (options.source) {
    return options.source;
  }

  const { settings } = options;
  if (isDemoMode(settings)) {
    log("info", "system", "🔧 FoxESS Datenquelle: Demo-Modus aktiviert");
    return new MockFoxessClient({ deviceSerialNumber: settings.deviceSerialNumber });
  }

  if (!options.credentials) {
    throw new Error("FoxESS API-Key fehlt - FOXESS_API_KEY oder FOXESS_ACCESS_TOKEN setzen");
  }

  log("info", "system", "🔧 FoxESS Datenquelle: Cloud-API");
  return new FoxessApiClient({
    deviceSerialNumber: settings.deviceSerialNumber,
    credentials: options.credentials,
    baseUrl: options.baseUrl,
    throttle: getDeviceThrottle(settings.deviceSerialNumber),
  });
}

/**
 * Baut Datenquelle, Coordinator und Entities auf. Der erste Poll muss gelingen,
 * sonst wird der Fehler geworfen und nichts bleibt aktiv.
 */
export async function setupIntegration(options: SetupOptions): Promise<Integration> {
  const { settings } = options;
  const source = createDataSource(options);

  const coordinator = new UpdateCoordinator<FoxessCoordinatorData>({
    name: `FoxESS ${settings.deviceSerialNumber}`,
    updateIntervalSeconds: settings.pollingIntervalSeconds,
    fetchData: () => source.getData(),
    isAuthError: (error) => error instanceof FoxessAuthenticationError,
  });

  await coordinator.firstRefresh();

  const entities = new EntityRegistry(coordinator, source, settings.deviceSerialNumber);

  log(
    "info",
    "system",
    `✅ FoxESS-Integration gestartet: ${coordinator.data?.deviceInfo.stationName || settings.deviceSerialNumber}`,
    `Polling-Intervall: ${settings.pollingIntervalSeconds}s`
  );

  return {
    entryId: settings.deviceSerialNumber,
    settings,
    source,
    coordinator,
    entities,
  };
}

export async function unloadIntegration(integration: Integration): Promise<void> {
  await integration.coordinator.stop();
  log("info", "system", `FoxESS-Integration entladen: ${integration.entryId}`);
}

// Laufende Instanz (genau ein Wechselrichter)
let activeIntegration: Integration | null = null;
let stopFhemSync: (() => Promise<void>) | null = null;
let setupError: string | null = null;

// Start, Stop und Reload laufen nacheinander, nie verschränkt
let lifecycleQueue: Promise<void> = Promise.resolve();

function enqueueLifecycle<T>(task: () => Promise<T>): Promise<T> {
  const run = lifecycleQueue.then(task);
  // Fehler gehen an den Aufrufer, die Queue läuft weiter
  lifecycleQueue = run.then(
    () => undefined,
    () => undefined
  );
  return run;
}

export function getIntegration(): Integration | null {
  return activeIntegration;
}

export function getSetupError(): string | null {
  return setupError;
}

async function deactivate(): Promise<void> {
  if (stopFhemSync) {
    const stopSync = stopFhemSync;
    stopFhemSync = null;
    await stopSync();
  }
  if (activeIntegration) {
    const integration = activeIntegration;
    activeIntegration = null;
    await unloadIntegration(integration);
  }
}

async function activate(
  settings: Settings | null,
  overrides: Omit<Partial<SetupOptions>, "settings">
): Promise<Integration | null> {
  if (!settings) {
    setupError = "Keine Seriennummer konfiguriert";
    log("warning", "system", "⚠️ FoxESS nicht konfiguriert - FOXESS_DEVICE_SN oder /api/settings setzen");
    return null;
  }

  // Nie zwei Coordinatoren gleichzeitig pollen lassen
  await deactivate();

  try {
    const integration = await setupIntegration({
      settings,
      credentials: credentialsFromEnv(),
      baseUrl: process.env.FOXESS_BASE_URL || undefined,
      ...overrides,
    });
    activeIntegration = integration;
    stopFhemSync = startFhemSync(integration);
    setupError = null;
    return integration;
  } catch (error) {
    setupError = error instanceof Error ? error.message : String(error);
    log("error", "system", "❌ FoxESS-Integration konnte nicht gestartet werden", setupError);
    return null;
  }
}

/**
 * Startet die Integration aus den gespeicherten Settings.
 * Fehler werden geloggt und über getSetupError() sichtbar, der Server läuft weiter.
 */
export function startIntegration(
  settings: Settings | null = storage.getSettings(),
  overrides: Omit<Partial<SetupOptions>, "settings"> = {}
): Promise<Integration | null> {
  return enqueueLifecycle(() => activate(settings, overrides));
}

export function stopIntegration(): Promise<void> {
  return enqueueLifecycle(deactivate);
}

/**
 * Nach Settings-Änderung: alte Instanz stoppen, neue aufbauen
 */
export function reloadIntegration(
  settings: Settings | null = storage.getSettings(),
  overrides: Omit<Partial<SetupOptions>, "settings"> = {}
): Promise<Integration | null> {
  return enqueueLifecycle(async () => {
    log("info", "system", "FoxESS-Integration wird neu geladen");
    await deactivate();
    return activate(settings, overrides);
  });
}
