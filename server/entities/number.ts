import type { BatterySettings } from "@shared/schema";
import { log } from "../core/logger";
import { FoxessApiError } from "../foxess/errors";
import { DEFAULT_MIN_SOC_ON_GRID } from "../foxess/schedule";
import type { FoxessDataSource } from "../foxess/source";
import { CoordinatorEntity, EntityValueError, type FoxessCoordinator, type WritableEntity } from "./entity";

export interface NumberDescription {
  key: string;
  name: string;
  setting: keyof BatterySettings;
  min: number;
  max: number;
  step: number;
  unit: string;
  icon: string;
}

export const NUMBER_DESCRIPTIONS: NumberDescription[] = [
  {
    key: "min_soc",
    name: "Minimum SoC",
    setting: "minSoc",
    min: 10,
    max: 100,
    step: 1,
    unit: "%",
    icon: "mdi:battery-low",
  },
  {
    key: "min_soc_on_grid",
    name: "Minimum SoC On Grid",
    setting: "minSocOnGrid",
    min: 10,
    max: 100,
    step: 1,
    unit: "%",
    icon: "mdi:battery-charging-low",
  },
];

/**
 * SoC-Grenze der Batterie. Der Endpoint setzt immer beide Werte,
 * der jeweils andere kommt aus dem letzten Snapshot.
 */
export class FoxessNumber extends CoordinatorEntity implements WritableEntity {
  readonly platform = "number" as const;

  constructor(
    coordinator: FoxessCoordinator,
    entryId: string,
    private readonly source: FoxessDataSource,
    readonly description: NumberDescription
  ) {
    super(coordinator, entryId, description.key, description.name);
  }

  get value(): number | null {
    return this.coordinator.data?.batterySettings?.[this.description.setting] ?? null;
  }

  protected extraAttributes(): Record<string, unknown> {
    return {
      min: this.description.min,
      max: this.description.max,
      step: this.description.step,
      unit: this.description.unit,
      icon: this.description.icon,
    };
  }

  async setValue(input: number | string): Promise<void> {
    const { min, max, setting } = this.description;
    const value = typeof input === "string" && input.trim() !== "" ? Number(input) : input;

    if (typeof value !== "number" || !Number.isInteger(value) || value < min || value > max) {
      throw new EntityValueError(`${this.name} must be an integer between ${min} and ${max}`);
    }

    const current = this.coordinator.data?.batterySettings;
    const next: BatterySettings = {
      minSoc: current?.minSoc ?? DEFAULT_MIN_SOC_ON_GRID,
      minSocOnGrid: current?.minSocOnGrid ?? DEFAULT_MIN_SOC_ON_GRID,
    };
    next[setting] = value;

    log("info", "entities", `${this.name} wird auf ${value}% gesetzt`, `minSoc=${next.minSoc}, minSocOnGrid=${next.minSocOnGrid}`);

    const ok = await this.source.setBatterySettings(next);
    if (!ok) {
      throw new FoxessApiError(`Failed to set ${this.name}`);
    }

    void this.coordinator.requestRefresh();
  }
}

export function createNumbers(
  coordinator: FoxessCoordinator,
  entryId: string,
  source: FoxessDataSource
): FoxessNumber[] {
  return NUMBER_DESCRIPTIONS.map((description) => new FoxessNumber(coordinator, entryId, source, description));
}
