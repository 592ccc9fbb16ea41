import { log } from "./logger";

type LogLevel = "warning" | "info" | "debug";

interface EnvVarConfig {
  name: string;
  required: boolean;
  defaultValue?: string;
  description: string;
  /** Log level when not set (default: "warning") */
  missingLogLevel?: LogLevel;
}

const ENV_VARS: EnvVarConfig[] = [
  {
    name: "FOXESS_API_KEY",
    required: false,
    description: "FoxESS Open-API-Key (alternativ FOXESS_ACCESS_TOKEN)",
    missingLogLevel: "debug",
  },
  {
    name: "FOXESS_ACCESS_TOKEN",
    required: false,
    description: "FoxESS OAuth2-Access-Token (Bearer)",
    missingLogLevel: "debug",
  },
  {
    name: "FOXESS_DEVICE_SN",
    required: false,
    description: "Seriennummer des Wechselrichters (ohne: Konfiguration über /api/settings)",
    missingLogLevel: "info",
  },
  {
    name: "FOXESS_BASE_URL",
    required: false,
    defaultValue: "https://www.foxesscloud.com",
    description: "Basis-URL der FoxESS Cloud",
    missingLogLevel: "debug",
  },
  {
    name: "PORT",
    required: false,
    defaultValue: "3000",
    description: "HTTP-Server-Port",
    missingLogLevel: "info",
  },
  {
    name: "HOST",
    required: false,
    defaultValue: "0.0.0.0",
    description: "HTTP-Server-Adresse",
    missingLogLevel: "debug",
  },
  {
    name: "API_KEY",
    required: false,
    description: "API-Schlüssel für Authentifizierung (ohne: ungeschützter LAN-Modus)",
    missingLogLevel: "warning",
  },
  {
    name: "NODE_ENV",
    required: false,
    defaultValue: "development",
    description: "Umgebung (development/production)",
  },
  {
    name: "DEMO_AUTOSTART",
    required: false,
    description: "Demo-Modus beim Start aktivieren (true/false)",
    missingLogLevel: "debug",
  },
  {
    name: "DATA_DIR",
    required: false,
    defaultValue: "./data",
    description: "Verzeichnis für settings.json",
    missingLogLevel: "debug",
  },
  {
    name: "BUILD_BRANCH",
    required: false,
    description: "Git-Branch (Build-Zeit, Fallback: git CLI)",
    missingLogLevel: "debug",
  },
  {
    name: "BUILD_COMMIT",
    required: false,
    description: "Git-Commit-Hash (Build-Zeit, Fallback: git CLI)",
    missingLogLevel: "debug",
  },
  {
    name: "BUILD_TIME",
    required: false,
    description: "Build-Zeitstempel (Fallback: Startzeit)",
    missingLogLevel: "debug",
  },
];

export interface EnvMessage {
  level: LogLevel;
  message: string;
}

export interface ValidationResult {
  valid: boolean;
  missing: string[];
  warnings: string[];
  messages: EnvMessage[];
}

/**
 * Validates environment variables at startup.
 * Required or malformed vars → error + process exit.
 * Optional vars without value → warning log.
 */
export function validateEnvironment(): ValidationResult {
  const missing: string[] = [];
  const warnings: string[] = [];
  const messages: EnvMessage[] = [];

  for (const envVar of ENV_VARS) {
    const value = process.env[envVar.name];

    if (!value) {
      if (envVar.required) {
        missing.push(`${envVar.name} – ${envVar.description}`);
      } else {
        const defaultInfo = envVar.defaultValue
          ? ` (Default: ${envVar.defaultValue})`
          : "";
        const msg = `${envVar.name} nicht gesetzt${defaultInfo} – ${envVar.description}`;
        const level = envVar.missingLogLevel ?? "warning";
        messages.push({ level, message: msg });
        if (level === "warning") {
          warnings.push(msg);
        }
      }
    }
  }

  // Ohne Zugangsdaten läuft nur der Demo-Modus
  const isDemo = process.env.DEMO_AUTOSTART === "true";
  if (!isDemo && !process.env.FOXESS_API_KEY && !process.env.FOXESS_ACCESS_TOKEN) {
    const msg = "Weder FOXESS_API_KEY noch FOXESS_ACCESS_TOKEN gesetzt – Cloud-Abfrage nicht möglich (nur Demo-Modus)";
    messages.push({ level: "warning", message: msg });
    warnings.push(msg);
  }

  const baseUrl = process.env.FOXESS_BASE_URL;
  if (baseUrl && !/^https?:\/\//.test(baseUrl)) {
    missing.push(`FOXESS_BASE_URL – muss mit http:// oder https:// beginnen (ist: ${baseUrl})`);
  }

  // Log messages at their appropriate levels
  for (const { level, message } of messages) {
    const prefix = level === "warning" ? "⚠️ " : "";
    log(level, "system", `${prefix}${message}`);
  }

  // Log errors and exit if required vars missing
  if (missing.length > 0) {
    log("error", "system", "❌ Fehlende oder ungültige Environment-Variablen:");
    for (const m of missing) {
      log("error", "system", `   → ${m}`);
    }
    log("error", "system", "Server kann nicht starten. Bitte Environment-Variablen korrigieren.");
  }

  return { valid: missing.length === 0, missing, warnings, messages };
}
