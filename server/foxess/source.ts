import type {
  BatterySettings,
  FoxessCoordinatorData,
  FoxessDeviceInfo,
  FoxessRealTimeData,
  ScheduleGroup,
  Scheduler,
} from "@shared/schema";
import type { ThrottleUsage } from "./throttle";

/**
 * Datenquelle für genau einen Wechselrichter.
 * Abstrahiert den Unterschied zwischen FoxESS Cloud und Demo-Simulation.
 */
export interface FoxessDataSource {
  readonly deviceSerialNumber: string;

  /** Kompletter Poll-Durchlauf für den Coordinator */
  getData(): Promise<FoxessCoordinatorData>;
  getDeviceDetail(): Promise<FoxessDeviceInfo>;
  getRealTimeData(): Promise<FoxessRealTimeData>;
  getScheduler(): Promise<Scheduler>;
  /** Scheduler-Gruppen ohne Platzhalter, auf das Schreibformat reduziert */
  getScheduleGroups(): Promise<ScheduleGroup[]>;
  setScheduler(groups: ScheduleGroup[], options?: { enable?: boolean }): Promise<boolean>;
  getBatterySettings(): Promise<BatterySettings>;
  setBatterySettings(settings: BatterySettings): Promise<boolean>;
  /** API-Verbrauch des aktuellen Tages (null ohne Rate-Limit, z.B. Demo) */
  getUsage(): ThrottleUsage | null;
}
