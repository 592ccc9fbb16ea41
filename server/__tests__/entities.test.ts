import { describe, it, expect, vi, beforeEach } from "vitest";

vi.mock("../core/logger", () => ({
  log: vi.fn(),
}));

import type { FoxessCoordinatorData } from "@shared/schema";
import { UpdateCoordinator } from "../core/coordinator";
import { EntityRegistry } from "../entities/registry";
import { EntityValueError, isWritable } from "../entities/entity";
import { FoxessWorkModeSelect } from "../entities/select";
import { createCoordinatorData, createStubSource, TEST_SN } from "./fixtures/foxess";

async function createCoordinator(data: FoxessCoordinatorData) {
  const coordinator = new UpdateCoordinator<FoxessCoordinatorData>({
    name: "Test",
    updateIntervalSeconds: 3600,
    fetchData: async () => data,
    refreshCooldownMs: 0,
  });
  await coordinator.refresh();
  return coordinator;
}

describe("EntityRegistry", () => {
  it("creates all platforms for devices with battery", async () => {
    const data = createCoordinatorData();
    const registry = new EntityRegistry(await createCoordinator(data), createStubSource(data), TEST_SN);

    const ids = registry.all().map((e) => e.entityId);
    expect(ids).toHaveLength(60);
    expect(ids).toContain("number.min_soc");
    expect(ids).toContain("number.min_soc_on_grid");
    expect(ids).toContain("select.work_mode");
  });

  it("omits number and select without battery", async () => {
    const data = createCoordinatorData({
      deviceInfo: { ...createCoordinatorData().deviceInfo, hasBattery: false },
      schedulerGroups: null,
      batterySettings: null,
    });
    const registry = new EntityRegistry(await createCoordinator(data), createStubSource(data), TEST_SN);

    expect(registry.all()).toHaveLength(57);
    expect(registry.get("select.work_mode")).toBeUndefined();
  });
});

describe("sensor entities", () => {
  it("exposes the measurement value with unit metadata", async () => {
    const data = createCoordinatorData();
    const registry = new EntityRegistry(await createCoordinator(data), createStubSource(data), TEST_SN);

    const state = registry.get("sensor.pv_power")?.toState();
    expect(state).toMatchObject({
      entityId: "sensor.pv_power",
      uniqueId: `${TEST_SN}_pv_power`,
      platform: "sensor",
      name: "PV Power",
      state: 4.2,
      available: true,
    });
    expect(state?.attributes).toMatchObject({
      attribution: "Data provided by FoxESS Cloud API",
      unit: "kW",
      deviceClass: "power",
      stateClass: "measurement",
      device: {
        identifiers: [TEST_SN],
        name: "Testanlage",
        manufacturer: "FoxESS",
        model: "H3-8.0-E",
        swVersion: "1.50",
      },
    });
  });

  it("becomes unavailable after a failed update", async () => {
    const data = createCoordinatorData();
    let fail = false;
    const coordinator = new UpdateCoordinator<FoxessCoordinatorData>({
      name: "Test",
      updateIntervalSeconds: 3600,
      fetchData: async () => {
        if (fail) throw new Error("HTTP 502");
        return data;
      },
    });
    await coordinator.refresh();
    const registry = new EntityRegistry(coordinator, createStubSource(data), TEST_SN);

    fail = true;
    await coordinator.refresh();

    const state = registry.get("sensor.battery_soc")?.toState();
    expect(state?.available).toBe(false);
    expect(state?.state).toBeNull();
  });
});

describe("binary sensor entities", () => {
  it("derives flags from battery and feed-in power", async () => {
    const data = createCoordinatorData();
    const registry = new EntityRegistry(await createCoordinator(data), createStubSource(data), TEST_SN);

    expect(registry.get("binary_sensor.has_battery")?.value).toBe(true);
    expect(registry.get("binary_sensor.battery_charging")?.value).toBe(true);
    expect(registry.get("binary_sensor.battery_discharging")?.value).toBe(false);
    expect(registry.get("binary_sensor.grid_exporting")?.value).toBe(true);
  });
});

describe("number entities", () => {
  let source: ReturnType<typeof createStubSource>;
  let registry: EntityRegistry;

  beforeEach(async () => {
    const data = createCoordinatorData();
    source = createStubSource(data);
    registry = new EntityRegistry(await createCoordinator(data), source, TEST_SN);
  });

  it("reads the SoC limits from battery settings", () => {
    expect(registry.get("number.min_soc")?.value).toBe(12);
    expect(registry.get("number.min_soc_on_grid")?.value).toBe(15);
  });

  it("writes both limits and keeps the other value", async () => {
    const entity = registry.get("number.min_soc");
    if (!entity || !isWritable(entity)) throw new Error("number.min_soc not writable");

    await entity.setValue(20);

    expect(source.setBatterySettings).toHaveBeenCalledWith({ minSoc: 20, minSocOnGrid: 15 });
  });

  it("accepts numeric strings", async () => {
    const entity = registry.get("number.min_soc_on_grid");
    if (!entity || !isWritable(entity)) throw new Error("number.min_soc_on_grid not writable");

    await entity.setValue("30");

    expect(source.setBatterySettings).toHaveBeenCalledWith({ minSoc: 12, minSocOnGrid: 30 });
  });

  it.each([5, 101, 20.5, "abc"])("rejects %s", async (value) => {
    const entity = registry.get("number.min_soc");
    if (!entity || !isWritable(entity)) throw new Error("number.min_soc not writable");

    await expect(entity.setValue(value)).rejects.toBeInstanceOf(EntityValueError);
    expect(source.setBatterySettings).not.toHaveBeenCalled();
  });

  it("sensors are not writable", () => {
    const sensor = registry.get("sensor.pv_power");
    expect(sensor && isWritable(sensor)).toBe(false);
  });
});

describe("work mode select", () => {
  function groupsData() {
    return createCoordinatorData({
      schedulerGroups: [
        { enable: 1, startHour: 6, startMinute: 0, endHour: 10, endMinute: 0, workMode: "ForceCharge" },
      ],
    });
  }

  it("reports the mode of the period covering now", async () => {
    const data = groupsData();
    const select = new FoxessWorkModeSelect(
      await createCoordinator(data),
      TEST_SN,
      createStubSource(data),
      () => new Date(2026, 2, 1, 7, 30)
    );
    expect(select.value).toBe("ForceCharge");
  });

  it("falls back to SelfUse outside all periods", async () => {
    const data = groupsData();
    const select = new FoxessWorkModeSelect(
      await createCoordinator(data),
      TEST_SN,
      createStubSource(data),
      () => new Date(2026, 2, 1, 14, 0)
    );
    expect(select.value).toBe("SelfUse");
  });

  it("writes the new mode into every scheduler period and remembers it", async () => {
    const data = groupsData();
    const source = createStubSource(data);
    const select = new FoxessWorkModeSelect(
      await createCoordinator(data),
      TEST_SN,
      source,
      () => new Date(2026, 2, 1, 14, 0)
    );

    await select.setValue("Backup");

    expect(source.setScheduler).toHaveBeenCalledWith([
      { enable: 1, startHour: 6, startMinute: 0, endHour: 10, endMinute: 0, workMode: "Backup" },
    ]);
    expect(select.value).toBe("Backup");
  });

  it("reports the written mode before the next poll lands", async () => {
    const data = groupsData();
    const source = createStubSource(data);
    const select = new FoxessWorkModeSelect(
      await createCoordinator(data),
      TEST_SN,
      source,
      () => new Date(2026, 2, 1, 7, 30)
    );

    await select.setValue("Backup");

    expect(select.value).toBe("Backup");
  });

  it("follows the scheduler again once fresh data arrives", async () => {
    let current = groupsData();
    const coordinator = new UpdateCoordinator<FoxessCoordinatorData>({
      name: "Test",
      updateIntervalSeconds: 3600,
      fetchData: async () => current,
      refreshCooldownMs: 0,
    });
    await coordinator.refresh();
    const select = new FoxessWorkModeSelect(
      coordinator,
      TEST_SN,
      createStubSource(current),
      () => new Date(2026, 2, 1, 7, 30)
    );

    await select.setValue("Backup");
    // Refresh aus setValue abwarten
    await coordinator.refresh();
    current = createCoordinatorData({
      schedulerGroups: [{ enable: 1, startHour: 6, startMinute: 0, endHour: 10, endMinute: 0, workMode: "FeedInFirst" }],
    });
    await coordinator.refresh();

    expect(select.value).toBe("FeedInFirst");
  });

  it("creates a 24h group with current minSocOnGrid when no periods exist", async () => {
    const data = createCoordinatorData({ schedulerGroups: [] });
    const source = createStubSource(data);
    const select = new FoxessWorkModeSelect(await createCoordinator(data), TEST_SN, source);

    await select.setValue("ForceDischarge");

    expect(source.setScheduler).toHaveBeenCalledWith([
      {
        enable: 1,
        startHour: 0,
        startMinute: 0,
        endHour: 23,
        endMinute: 59,
        workMode: "ForceDischarge",
        extraParam: { minSocOnGrid: 15 },
      },
    ]);
  });

  it("rejects unknown modes", async () => {
    const data = groupsData();
    const source = createStubSource(data);
    const select = new FoxessWorkModeSelect(await createCoordinator(data), TEST_SN, source);

    await expect(select.setValue("Turbo")).rejects.toThrow(/Invalid work mode: Turbo/);
    expect(source.setScheduler).not.toHaveBeenCalled();
  });
});
