import { afterEach, beforeEach, describe, expect, test, vi } from "vitest";
import { EntityDirectory, createReplicationContext, integer, text } from "@starlane/replication";
import { Beacon, DEFAULT_MOTD } from "./beacon.js";

describe("Beacon", () => {
  let clock: number;
  let beacon: Beacon;

  beforeEach(() => {
    clock = 10_000;
    beacon = new Beacon(new EntityDirectory(createReplicationContext()), { intervalMs: 1000, now: () => clock });
  });

  afterEach(() => {
    beacon.stop();
    vi.useRealTimers();
  });

  test("should define uptime and a writable motd", () => {
    expect(beacon.entity.id).toBe(1);
    expect(beacon.uptime.getValue()).toEqual(integer(0));
    expect(beacon.uptime.remoteWritable).toBe(false);
    expect(beacon.motd.getValue()).toEqual(text(DEFAULT_MOTD));
    expect(beacon.motd.remoteWritable).toBe(true);
  });

  test("tick should publish whole seconds since creation", () => {
    clock += 2_500;
    beacon.tick();
    expect(beacon.uptime.read()).toBe(2n);

    clock += 400;
    beacon.tick();
    expect(beacon.uptime.read()).toBe(2n);
  });

  test("should tick on its interval once started", () => {
    vi.useFakeTimers();
    beacon.start();
    expect(beacon.isRunning()).toBe(true);

    clock += 3_000;
    vi.advanceTimersByTime(1000);
    expect(beacon.uptime.read()).toBe(3n);

    beacon.stop();
    clock += 5_000;
    vi.advanceTimersByTime(5000);
    expect(beacon.uptime.read()).toBe(3n);
    expect(beacon.isRunning()).toBe(false);
  });

  test("should reject a non-positive interval", () => {
    const entities = new EntityDirectory(createReplicationContext());
    expect(() => new Beacon(entities, { intervalMs: 0 })).toThrow("[Beacon] intervalMs must be a positive number. Got: 0");
  });

  test("motd should reject messages longer than 140 characters", () => {
    expect(() => beacon.motd.update("x".repeat(141))).toThrow("expects text(<= 140 chars)");
    expect(beacon.motd.read()).toBe(DEFAULT_MOTD);
  });
});
