import { describe, it, expect, afterEach, vi } from "vitest";
import pino from "pino";
import { createShutdown, registerShutdownHandlers } from "./lifecycle";
import type { ShutdownDeps } from "./lifecycle";

function deps(overrides: Partial<ShutdownDeps> = {}) {
  const calls: Array<string> = [];
  const base: ShutdownDeps = {
    schedulers: [{ stop: () => calls.push("stop") }],
    idle: async () => {
      calls.push("idle");
    },
    closeDb: () => {
      calls.push("close");
    },
    logger: pino({ level: "silent" }),
    exit: (code) => {
      calls.push(`exit ${code}`);
    },
  };
  return { calls, deps: { ...base, ...overrides } };
}

describe("createShutdown", () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("stops schedulers, waits for the run in progress, closes the cache, then exits", async () => {
    const { calls, deps: shutdownDeps } = deps();

    await createShutdown(shutdownDeps)("SIGTERM");

    expect(calls).toEqual(["stop", "idle", "close", "exit 0"]);
  });

  it("ignores a second signal", async () => {
    const { calls, deps: shutdownDeps } = deps();
    const shutdown = createShutdown(shutdownDeps);

    await Promise.all([shutdown("SIGTERM"), shutdown("SIGINT")]);

    expect(calls).toEqual(["stop", "idle", "close", "exit 0"]);
  });

  it("still closes the cache when a step fails", async () => {
    const logger = pino({ level: "silent" });
    const error = vi.spyOn(logger, "error");
    const { calls, deps: shutdownDeps } = deps({
      schedulers: [
        {
          stop: () => {
            throw new Error("already stopped");
          },
        },
      ],
      idle: () => Promise.reject(new Error("run failed")),
      logger,
    });

    await createShutdown(shutdownDeps)("SIGINT");

    expect(calls).toEqual(["close", "exit 0"]);
    expect(error).toHaveBeenCalledWith({ error: "already stopped" }, "error stopping scheduler");
    expect(error).toHaveBeenCalledWith(
      { error: "run failed" },
      "in-flight aggregation ended with an error",
    );
  });
});

describe("registerShutdownHandlers", () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("registers SIGTERM and SIGINT handlers", () => {
    const onSpy = vi.spyOn(process, "on").mockReturnValue(process);

    registerShutdownHandlers(deps().deps);

    expect(onSpy).toHaveBeenCalledWith("SIGTERM", expect.any(Function));
    expect(onSpy).toHaveBeenCalledWith("SIGINT", expect.any(Function));
  });
});
