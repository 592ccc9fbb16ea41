import type { EntityPlatform, EntityState, FoxessCoordinatorData, MeasurementValue } from "@shared/schema";
import type { UpdateCoordinator } from "../core/coordinator";

export const ATTRIBUTION = "Data provided by FoxESS Cloud API";

export type FoxessCoordinator = UpdateCoordinator<FoxessCoordinatorData>;

export interface DeviceInfo {
  identifiers: string[];
  name: string;
  manufacturer: string;
  model: string;
  swVersion: string;
}

/** Ungültiger Wert beim Schreiben (→ HTTP 400) */
export class EntityValueError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "EntityValueError";
  }
}

/**
 * Basis aller Entities: Identität, Verfügbarkeit und Geräte-Info
 * kommen aus dem Coordinator-Snapshot.
 */
export abstract class CoordinatorEntity {
  abstract readonly platform: EntityPlatform;

  constructor(
    protected readonly coordinator: FoxessCoordinator,
    protected readonly entryId: string,
    readonly key: string,
    readonly name: string
  ) {}

  get uniqueId(): string {
    return `${this.entryId}_${this.key}`;
  }

  get entityId(): string {
    return `${this.platform}.${this.key}`;
  }

  get available(): boolean {
    return this.coordinator.lastUpdateSuccess && this.coordinator.data !== null;
  }

  get deviceInfo(): DeviceInfo {
    const info = this.coordinator.data?.deviceInfo;
    return {
      identifiers: [this.entryId],
      name: info?.stationName || `FoxESS ${this.entryId}`,
      manufacturer: "FoxESS",
      model: info?.deviceType || "Unknown",
      swVersion: info?.masterVersion || "Unknown",
    };
  }

  /** Aktueller Wert, unabhängig von der Verfügbarkeit */
  abstract get value(): number | string | boolean | null;

  protected extraAttributes(): Record<string, unknown> {
    return {};
  }

  toState(): EntityState {
    const available = this.available;
    return {
      entityId: this.entityId,
      uniqueId: this.uniqueId,
      platform: this.platform,
      name: this.name,
      state: available ? this.value : null,
      available,
      attributes: {
        attribution: ATTRIBUTION,
        device: this.deviceInfo,
        ...this.extraAttributes(),
      },
    };
  }
}

/**
 * Entities mit Schreibzugriff (number, select)
 */
export interface WritableEntity {
  setValue(value: number | string): Promise<void>;
}

export function isWritable(entity: CoordinatorEntity): entity is CoordinatorEntity & WritableEntity {
  return "setValue" in entity && typeof entity.setValue === "function";
}

/** Numerischer Messwert, Strings und fehlende Werte zählen als 0 */
export function numericValue(values: Record<string, MeasurementValue> | undefined, key: string): number {
  const value = values?.[key];
  return typeof value === "number" ? value : 0;
}
