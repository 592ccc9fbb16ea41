import { Socket } from "net";
import type { FhemSync } from "@shared/schema";
import { log } from "../core/logger";
import { storage } from "../core/storage";
import type { Integration } from "../integration";

export interface FhemReading {
  key: string;
  value: number | string | boolean | null;
}

/**
 * Formatiert einen Wert für `setreading`. Null und Strings mit Leerzeichen
 * (nicht als einzelnes FHEM-Argument darstellbar) ergeben null.
 */
export function formatFhemValue(value: FhemReading["value"]): string | null {
  if (value === null) return null;
  if (typeof value === "boolean") return value ? "on" : "off";
  if (typeof value === "number") {
    return Number.isFinite(value) ? String(Math.round(value * 100) / 100) : null;
  }
  if (value === "" || /\s/.test(value)) return null;
  return value;
}

export function buildFhemCommands(device: string, readings: FhemReading[]): string[] {
  const commands: string[] = [];
  for (const { key, value } of readings) {
    const formatted = formatFhemValue(value);
    if (formatted !== null) {
      commands.push(`setreading ${device} ${key} ${formatted}`);
    }
  }
  return commands;
}

function validateFhemConfig(config: FhemSync): void {
  if (!config.host || config.host.trim() === "") {
    throw new Error("FHEM Host ist nicht konfiguriert - bitte IP-Adresse in Settings angeben");
  }
  if (!Number.isInteger(config.port) || config.port < 1 || config.port > 65535) {
    throw new Error(`Ungültiger FHEM Port: ${config.port}`);
  }
}

/**
 * Sendet Befehle an FHEM via TCP-Socket (Telnet-Port)
 * Ablauf: connect -> write -> drain -> end -> finish -> close
 */
export async function sendToFhemSocket(
  host: string,
  port: number,
  commands: string,
  timeout: number = 5000
): Promise<void> {
  return new Promise((resolve, reject) => {
    const socket = new Socket();
    const payload = commands + "\n";
    const expectedBytes = Buffer.byteLength(payload);
    let hasErrored = false;

    const timeoutHandle = setTimeout(() => {
      hasErrored = true;
      socket.destroy();
      reject(new Error(`FHEM-Socket-Timeout nach ${timeout}ms`));
    }, timeout);

    socket.on("error", (err) => {
      clearTimeout(timeoutHandle);
      hasErrored = true;
      socket.destroy();
      reject(err);
    });

    socket.on("finish", () => {
      const actualBytes = socket.bytesWritten;
      if (actualBytes < expectedBytes) {
        hasErrored = true;
        clearTimeout(timeoutHandle);
        const msg = `FHEM-Socket: Partial Write (${actualBytes}/${expectedBytes} bytes)`;
        log("error", "fhem", msg);
        socket.destroy();
        reject(new Error(msg));
      }
    });

    socket.on("close", () => {
      clearTimeout(timeoutHandle);
      if (!hasErrored) {
        resolve();
      }
    });

    socket.on("connect", () => {
      if (!socket.write(payload)) {
        socket.once("drain", () => socket.end());
      } else {
        socket.end();
      }
    });

    socket.connect(port, host);
  });
}

/**
 * Überträgt alle verfügbaren Sensor- und Binary-Sensor-Werte an FHEM.
 */
export async function syncToFhem(
  integration: Integration,
  send: typeof sendToFhemSocket = sendToFhemSocket
): Promise<void> {
  const fhemConfig = storage.getSettings()?.fhemSync;
  if (!fhemConfig?.enabled) {
    return;
  }

  try {
    validateFhemConfig(fhemConfig);

    if (!integration.coordinator.lastUpdateSuccess) {
      log("debug", "fhem", "Letztes FoxESS-Update fehlgeschlagen - FHEM-Sync übersprungen");
      return;
    }

    const readings = integration.entities
      .all()
      .filter((entity) => entity.platform === "sensor" || entity.platform === "binary_sensor")
      .map((entity) => ({ key: entity.key, value: entity.value }));

    const commands = buildFhemCommands(fhemConfig.device, readings);
    if (commands.length === 0) {
      return;
    }

    await send(fhemConfig.host, fhemConfig.port, commands.join("\n"));

    log(
      "debug",
      "fhem",
      "FoxESS-Daten erfolgreich an FHEM gesendet",
      `Host: ${fhemConfig.host}:${fhemConfig.port}, Device: ${fhemConfig.device}, ${commands.length} Readings`
    );
  } catch (error) {
    log(
      "error",
      "fhem",
      "Fehler beim Senden an FHEM",
      error instanceof Error ? error.message : String(error)
    );
  }
}

/**
 * Registriert den FHEM-Sync als Coordinator-Listener.
 * @returns Stop-Funktion, wartet auf einen laufenden Sync
 */
export function startFhemSync(
  integration: Integration,
  send: typeof sendToFhemSocket = sendToFhemSocket
): () => Promise<void> {
  let runningSyncPromise: Promise<void> | null = null;

  const syncWithTracking = async (): Promise<void> => {
    // Läuft bereits ein Sync, wird dieser Durchlauf ausgelassen
    if (runningSyncPromise) {
      await runningSyncPromise;
      return;
    }
    runningSyncPromise = syncToFhem(integration, send).finally(() => {
      runningSyncPromise = null;
    });
    await runningSyncPromise;
  };

  const unsubscribe = integration.coordinator.subscribe(syncWithTracking);
  log("info", "fhem", "FHEM-Sync registriert", "FHEM wird bei jedem FoxESS-Update aktualisiert");

  // Erster Poll ist beim Start bereits gelaufen
  void syncWithTracking();

  return async () => {
    unsubscribe();
    if (runningSyncPromise) {
      log("debug", "fhem", "Warte auf laufenden FHEM-Sync...");
      await runningSyncPromise;
    }
    log("info", "fhem", "FHEM-Sync gestoppt");
  };
}
