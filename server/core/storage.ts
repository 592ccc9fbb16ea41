import {
  settingsSchema,
  type Settings,
  type LogEntry,
  type LogSettings,
} from "@shared/schema";
import { readFileSync, writeFileSync, existsSync, mkdirSync } from "fs";
import { join } from "path";

export interface IStorage {
  getSettings(): Settings | null;
  saveSettings(settings: Settings): void;
  getLogs(): LogEntry[];
  addLog(entry: Omit<LogEntry, "id" | "timestamp">): void;
  clearLogs(): void;
  getLogSettings(): LogSettings;
  saveLogSettings(settings: LogSettings): void;
}

export class MemStorage implements IStorage {
  private settingsFilePath: string;
  private settings: Settings | null = null;
  private logs: LogEntry[] = [];
  private logSettings: LogSettings = {
    level: "info",
  };
  private maxLogs = 1000;

  constructor(private dataDir: string = process.env.DATA_DIR || join(process.cwd(), "data")) {
    this.settingsFilePath = join(this.dataDir, "settings.json");

    // Erstelle data-Verzeichnis falls nicht vorhanden
    if (!existsSync(this.dataDir)) {
      mkdirSync(this.dataDir, { recursive: true });
    }

    this.settings = this.loadSettingsFromFile();
  }

  /**
   * Lädt die Settings aus der Datei. Ohne Datei wird aus FOXESS_DEVICE_SN ein
   * Default gebaut; ohne Seriennummer bleibt die Integration unkonfiguriert (null).
   */
  private loadSettingsFromFile(): Settings | null {
    if (existsSync(this.settingsFilePath)) {
      try {
        const data = readFileSync(this.settingsFilePath, "utf-8");
        const parsed = settingsSchema.safeParse(JSON.parse(data));
        if (parsed.success) {
          console.log("[Storage] Einstellungen geladen aus:", this.settingsFilePath);
          return parsed.data;
        }
        console.error("[Storage] Ungültige Einstellungen in:", this.settingsFilePath, parsed.error.message);
      } catch (error) {
        console.error("[Storage] Fehler beim Laden der Einstellungen:", error);
      }
    }

    const serial = process.env.FOXESS_DEVICE_SN?.trim();
    if (!serial) {
      return null;
    }

    const defaults = settingsSchema.parse({
      deviceSerialNumber: serial,
      demoMode: process.env.DEMO_AUTOSTART === "true",
    });

    this.saveSettingsToFile(defaults);
    return defaults;
  }

  private saveSettingsToFile(settings: Settings): void {
    try {
      writeFileSync(this.settingsFilePath, JSON.stringify(settings, null, 2), "utf-8");
      console.log("[Storage] Einstellungen gespeichert in:", this.settingsFilePath);
    } catch (error) {
      console.error("[Storage] Fehler beim Speichern der Einstellungen:", error);
    }
  }

  getSettings(): Settings | null {
    return this.settings;
  }

  saveSettings(settings: Settings): void {
    this.settings = settings;
    this.saveSettingsToFile(settings);
  }

  getLogs(): LogEntry[] {
    return [...this.logs];
  }

  addLog(entry: Omit<LogEntry, "id" | "timestamp">): void {
    const logEntry: LogEntry = {
      id: `${Date.now()}-${Math.random().toString(36).slice(2, 11)}`,
      timestamp: new Date().toISOString(),
      ...entry,
    };

    this.logs.push(logEntry);

    if (this.logs.length > this.maxLogs) {
      this.logs = this.logs.slice(-this.maxLogs);
    }
  }

  clearLogs(): void {
    this.logs = [];
  }

  getLogSettings(): LogSettings {
    return this.logSettings;
  }

  saveLogSettings(settings: LogSettings): void {
    this.logSettings = settings;
  }
}

export const storage = new MemStorage();
