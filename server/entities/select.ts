import {
  WORK_MODES,
  workModeSchema,
  type FoxessCoordinatorData,
  type ScheduleGroup,
  type WorkMode,
} from "@shared/schema";
import { log } from "../core/logger";
import { FoxessApiError } from "../foxess/errors";
import { applyWorkMode, DEFAULT_MIN_SOC_ON_GRID, findCurrentPeriodIndex } from "../foxess/schedule";
import type { FoxessDataSource } from "../foxess/source";
import { CoordinatorEntity, EntityValueError, type FoxessCoordinator, type WritableEntity } from "./entity";

/**
 * Arbeitsmodus des Wechselrichters. Gelesen aus der aktuellen Scheduler-Periode,
 * geschrieben über den Scheduler (v2).
 */
export class FoxessWorkModeSelect extends CoordinatorEntity implements WritableEntity {
  readonly platform = "select" as const;
  readonly options: readonly WorkMode[] = WORK_MODES;

  private lastSelected: WorkMode | null = null;
  // Zuletzt geschriebene Perioden, gültig bis der Coordinator neue Daten liefert
  private written: { groups: ScheduleGroup[]; basis: FoxessCoordinatorData | null } | null = null;

  constructor(
    coordinator: FoxessCoordinator,
    entryId: string,
    private readonly source: FoxessDataSource,
    private readonly now: () => Date = () => new Date()
  ) {
    super(coordinator, entryId, "work_mode", "Work Mode");
  }

  get value(): WorkMode {
    const groups = this.currentGroups();
    if (groups && groups.length > 0) {
      const index = findCurrentPeriodIndex(groups, this.now());
      if (index !== null) {
        const parsed = workModeSchema.safeParse(groups[index].workMode);
        if (parsed.success) {
          return parsed.data;
        }
      }
    }
    return this.lastSelected ?? "SelfUse";
  }

  private currentGroups(): ScheduleGroup[] | null | undefined {
    const data = this.coordinator.data;
    if (this.written && this.written.basis === data) {
      return this.written.groups;
    }
    return data?.schedulerGroups;
  }

  protected extraAttributes(): Record<string, unknown> {
    return {
      options: [...this.options],
      icon: "mdi:cog",
    };
  }

  async setValue(input: number | string): Promise<void> {
    const parsed = workModeSchema.safeParse(input);
    if (!parsed.success) {
      throw new EntityValueError(`Invalid work mode: ${String(input)} (allowed: ${this.options.join(", ")})`);
    }
    const mode = parsed.data;

    const basis = this.coordinator.data;
    const groups = this.currentGroups() ?? [];
    const minSocOnGrid = this.coordinator.data?.batterySettings?.minSocOnGrid ?? DEFAULT_MIN_SOC_ON_GRID;
    const nextGroups = applyWorkMode(groups, mode, minSocOnGrid);

    log("info", "entities", `Arbeitsmodus wird auf ${mode} gesetzt`, `${nextGroups.length} Scheduler-Perioden`);

    const ok = await this.source.setScheduler(nextGroups);
    if (!ok) {
      throw new FoxessApiError(`Failed to set work mode ${mode}`);
    }

    this.lastSelected = mode;
    this.written = { groups: nextGroups, basis };
    void this.coordinator.requestRefresh();
  }
}
