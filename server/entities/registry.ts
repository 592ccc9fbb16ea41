import type { EntityState } from "@shared/schema";
import { log } from "../core/logger";
import type { FoxessDataSource } from "../foxess/source";
import { createBinarySensors } from "./binary-sensor";
import type { CoordinatorEntity, FoxessCoordinator } from "./entity";
import { createNumbers } from "./number";
import { FoxessWorkModeSelect } from "./select";
import { createSensors } from "./sensor";

/**
 * Alle Entities eines Wechselrichters, nach entityId adressierbar.
 * Number- und Select-Entities nur bei Geräten mit Batterie.
 */
export class EntityRegistry {
  private readonly entities = new Map<string, CoordinatorEntity>();

  constructor(coordinator: FoxessCoordinator, source: FoxessDataSource, entryId: string) {
    const hasBattery = coordinator.data?.deviceInfo.hasBattery === true;

    const all: CoordinatorEntity[] = [
      ...createSensors(coordinator, entryId),
      ...createBinarySensors(coordinator, entryId),
    ];
    if (hasBattery) {
      all.push(...createNumbers(coordinator, entryId, source));
      all.push(new FoxessWorkModeSelect(coordinator, entryId, source));
    }

    for (const entity of all) {
      this.entities.set(entity.entityId, entity);
    }

    log(
      "info",
      "entities",
      `${this.entities.size} Entities angelegt`,
      hasBattery ? "inkl. Batterie-Steuerung (number/select)" : "ohne Batterie - nur Sensoren"
    );
  }

  all(): CoordinatorEntity[] {
    return Array.from(this.entities.values());
  }

  get(entityId: string): CoordinatorEntity | undefined {
    return this.entities.get(entityId);
  }

  states(): EntityState[] {
    return this.all().map((entity) => entity.toState());
  }
}
