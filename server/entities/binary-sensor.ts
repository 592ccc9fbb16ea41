import type { FoxessCoordinatorData } from "@shared/schema";
import { CoordinatorEntity, numericValue, type FoxessCoordinator } from "./entity";

export interface BinarySensorDescription {
  key: string;
  name: string;
  deviceClass: string | null;
  icon: string;
  isOn: (data: FoxessCoordinatorData) => boolean;
}

export const BINARY_SENSOR_DESCRIPTIONS: BinarySensorDescription[] = [
  {
    key: "has_battery",
    name: "Has Battery",
    deviceClass: null,
    icon: "mdi:battery",
    isOn: (data) => data.deviceInfo.hasBattery,
  },
  {
    key: "battery_charging",
    name: "Battery Charging",
    deviceClass: "battery_charging",
    icon: "mdi:battery-charging",
    isOn: (data) => numericValue(data.realTime.values, "batteryPower") > 0,
  },
  {
    key: "battery_discharging",
    name: "Battery Discharging",
    deviceClass: "power",
    icon: "mdi:battery-minus",
    isOn: (data) => numericValue(data.realTime.values, "batteryPower") < 0,
  },
  {
    key: "grid_exporting",
    name: "Grid Exporting",
    deviceClass: "power",
    icon: "mdi:transmission-tower-export",
    isOn: (data) => numericValue(data.realTime.values, "feedInPower") > 0,
  },
];

export class FoxessBinarySensor extends CoordinatorEntity {
  readonly platform = "binary_sensor" as const;

  constructor(
    coordinator: FoxessCoordinator,
    entryId: string,
    readonly description: BinarySensorDescription
  ) {
    super(coordinator, entryId, description.key, description.name);
  }

  get value(): boolean | null {
    const data = this.coordinator.data;
    return data ? this.description.isOn(data) : null;
  }

  protected extraAttributes(): Record<string, unknown> {
    return {
      deviceClass: this.description.deviceClass,
      icon: this.description.icon,
    };
  }
}

export function createBinarySensors(coordinator: FoxessCoordinator, entryId: string): FoxessBinarySensor[] {
  return BINARY_SENSOR_DESCRIPTIONS.map((description) => new FoxessBinarySensor(coordinator, entryId, description));
}
