import type { LogCategory, LogLevel } from "@shared/schema";
import { storage } from "./storage";

const logLevelPriority: Record<LogLevel, number> = {
  trace: 0,
  debug: 1,
  info: 2,
  warning: 3,
  error: 4,
};

export function shouldLog(level: LogLevel, threshold: LogLevel): boolean {
  return logLevelPriority[level] >= logLevelPriority[threshold];
}

/**
 * Konsolenzeile im Format `<ISO-Zeit> LEVEL [kategorie] Nachricht - Details`.
 * ISO-Zeit, damit `docker logs` über Tagesgrenzen sortierbar bleibt.
 */
export function formatLogLine(
  at: Date,
  level: LogLevel,
  category: LogCategory,
  message: string,
  details?: string
): string {
  const line = `${at.toISOString()} ${level.toUpperCase().padEnd(7)} [${category}] ${message}`;
  return details ? `${line} - ${details}` : line;
}

export function log(
  level: LogLevel,
  category: LogCategory,
  message: string,
  details?: string
): void {
  if (!shouldLog(level, storage.getLogSettings().level)) {
    return;
  }

  storage.addLog({ level, category, message, details });

  const line = formatLogLine(new Date(), level, category, message, details);
  if (level === "error") {
    console.error(line);
  } else if (level === "warning") {
    console.warn(line);
  } else {
    console.log(line);
  }
}
