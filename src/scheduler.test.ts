import { EventEmitter } from "node:events";
import { describe, it, expect, beforeEach, vi } from "vitest";
import cron from "node-cron";
import pino from "pino";
import { createAggregationScheduler } from "./scheduler";

vi.mock("node-cron");

describe("createAggregationScheduler", () => {
  const logger = pino({ level: "silent" });
  let tick: () => Promise<unknown>;
  let taskStop: ReturnType<typeof vi.fn>;

  beforeEach(() => {
    vi.clearAllMocks();
    tick = () => Promise.reject(new Error("no task scheduled"));
    taskStop = vi.fn();

    vi.mocked(cron.schedule).mockImplementation((_expression: string, callback: unknown) => {
      if (typeof callback === "function") {
        tick = async () => callback(new Date());
      }
      return Object.assign(new EventEmitter(), { start: vi.fn(), stop: taskStop, now: vi.fn() });
    });
  });

  it("registers a cron task with the configured schedule", () => {
    createAggregationScheduler("*/30 * * * *", vi.fn(), logger);

    expect(vi.mocked(cron.schedule)).toHaveBeenCalledWith("*/30 * * * *", expect.any(Function));
  });

  it("runs an aggregation on each tick", async () => {
    const runOnce = vi.fn().mockResolvedValue(undefined);
    createAggregationScheduler("0 * * * *", runOnce, logger);

    await tick();
    await tick();

    expect(runOnce).toHaveBeenCalledTimes(2);
  });

  it("skips a tick while the previous run is still going", async () => {
    let finish: () => void = () => {};
    const runOnce = vi.fn(
      () =>
        new Promise<void>((resolve) => {
          finish = resolve;
        }),
    );
    const warn = vi.spyOn(logger, "warn");
    createAggregationScheduler("0 * * * *", runOnce, logger);

    const first = tick();
    await tick();
    expect(runOnce).toHaveBeenCalledTimes(1);
    expect(warn).toHaveBeenCalledWith(
      { schedule: "0 * * * *" },
      "previous aggregation still running, skipping tick",
    );

    finish();
    await first;
    runOnce.mockResolvedValueOnce(undefined);
    await tick();
    expect(runOnce).toHaveBeenCalledTimes(2);
  });

  it("logs a failed run and keeps the schedule", async () => {
    const runOnce = vi
      .fn()
      .mockRejectedValueOnce(new Error("cache store is not writable"))
      .mockResolvedValueOnce(undefined);
    const error = vi.spyOn(logger, "error");
    createAggregationScheduler("0 * * * *", runOnce, logger);

    await expect(tick()).resolves.toBeUndefined();
    await tick();

    expect(error).toHaveBeenCalledWith(
      { error: "cache store is not writable" },
      "scheduled aggregation failed",
    );
    expect(runOnce).toHaveBeenCalledTimes(2);
  });

  it("stops the cron task", () => {
    const scheduler = createAggregationScheduler("0 * * * *", vi.fn(), logger);

    scheduler.stop();

    expect(taskStop).toHaveBeenCalledTimes(1);
  });
});
