import { readFileSync } from "fs";
import { z } from "zod";
import { sensorDescriptionSchema, type SensorDescription } from "@shared/schema";
import { CoordinatorEntity, type FoxessCoordinator } from "./entity";

export const SENSOR_DESCRIPTIONS: SensorDescription[] = z
  .array(sensorDescriptionSchema)
  .parse(JSON.parse(readFileSync(new URL("./sensor-descriptions.json", import.meta.url), "utf-8")));

export class FoxessSensor extends CoordinatorEntity {
  readonly platform = "sensor" as const;

  constructor(
    coordinator: FoxessCoordinator,
    entryId: string,
    readonly description: SensorDescription
  ) {
    super(coordinator, entryId, description.key, description.name);
  }

  get value(): number | string | null {
    return this.coordinator.data?.realTime.values[this.description.measurement] ?? null;
  }

  protected extraAttributes(): Record<string, unknown> {
    return {
      unit: this.description.unit,
      deviceClass: this.description.deviceClass,
      stateClass: this.description.stateClass,
      icon: this.description.icon,
    };
  }
}

export function createSensors(coordinator: FoxessCoordinator, entryId: string): FoxessSensor[] {
  return SENSOR_DESCRIPTIONS.map((description) => new FoxessSensor(coordinator, entryId, description));
}
