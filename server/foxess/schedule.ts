import type { ScheduleGroup, WorkMode } from "@shared/schema";

export const DEFAULT_MIN_SOC_ON_GRID = 10;

/**
 * Entfernt Platzhalter-Gruppen ohne Dauer (Start == Ende), die die Cloud
 * für ungenutzte Slots mitliefert.
 */
export function filterPlaceholderGroups<T extends Partial<ScheduleGroup>>(groups: T[]): T[] {
  return groups.filter(
    (g) => !(g.startHour === g.endHour && g.startMinute === g.endMinute)
  );
}

/**
 * Reduziert eine Gruppe auf die Felder, die der v2-Endpoint beim Schreiben erwartet.
 */
export function minimalGroup(group: Partial<ScheduleGroup>): ScheduleGroup {
  const minimal: ScheduleGroup = {
    enable: group.enable ?? 1,
    startHour: group.startHour ?? 0,
    startMinute: group.startMinute ?? 0,
    endHour: group.endHour ?? 23,
    endMinute: group.endMinute ?? 59,
    workMode: group.workMode ?? "SelfUse",
  };
  if (group.extraParam) {
    minimal.extraParam = { ...group.extraParam };
  }
  return minimal;
}

/**
 * Index der Periode, die `now` (lokale Zeit) abdeckt. Perioden über Mitternacht
 * (Ende < Start) werden berücksichtigt, Grenzen sind inklusiv.
 */
export function findCurrentPeriodIndex(
  groups: Partial<ScheduleGroup>[],
  now: Date = new Date()
): number | null {
  const currentMinutes = now.getHours() * 60 + now.getMinutes();

  for (let i = 0; i < groups.length; i++) {
    const group = groups[i];
    const start = (group.startHour ?? 0) * 60 + (group.startMinute ?? 0);
    const end = (group.endHour ?? 23) * 60 + (group.endMinute ?? 59);

    if (end < start) {
      if (currentMinutes >= start || currentMinutes <= end) {
        return i;
      }
    } else if (start <= currentMinutes && currentMinutes <= end) {
      return i;
    }
  }

  return null;
}

/** 24h-Gruppe im v2-Format */
export function createDefaultScheduleGroup(
  workMode: WorkMode = "SelfUse",
  minSocOnGrid: number = DEFAULT_MIN_SOC_ON_GRID
): ScheduleGroup {
  return {
    enable: 1,
    startHour: 0,
    startMinute: 0,
    endHour: 23,
    endMinute: 59,
    workMode,
    extraParam: {
      minSocOnGrid,
    },
  };
}

/**
 * Setzt den Arbeitsmodus auf allen Perioden. Ohne Perioden wird eine
 * 24h-Gruppe mit dem aktuellen minSocOnGrid angelegt.
 */
export function applyWorkMode(
  groups: ScheduleGroup[],
  workMode: WorkMode,
  minSocOnGrid: number = DEFAULT_MIN_SOC_ON_GRID
): ScheduleGroup[] {
  if (groups.length === 0) {
    return [createDefaultScheduleGroup(workMode, minSocOnGrid)];
  }
  return groups.map((group) => ({ ...minimalGroup(group), workMode }));
}
