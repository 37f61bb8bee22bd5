import { describe, it, expect, vi } from "vitest";
import { AgentSupervisor } from "../../src/agent/AgentSupervisor.js";
import type { TickResult } from "../../src/engine/TickEngine.js";
import { StateError } from "../../src/core/errors.js";
import { silentLogger } from "../fixtures/index.js";

const tickResult: TickResult = { tick: 1, results: [], worldContext: [], executionItems: [] };

const sleep = (ms: number) => new Promise((resolve) => setTimeout(resolve, ms));

describe("AgentSupervisor", () => {
  it("ticks repeatedly until stopped", async () => {
    const tick = vi.fn().mockResolvedValue(tickResult);
    const onTick = vi.fn();
    const supervisor = new AgentSupervisor({ tick }, { intervalMs: 1, onTick, logger: silentLogger });

    supervisor.start();
    await vi.waitFor(() => expect(tick.mock.calls.length).toBeGreaterThanOrEqual(3));
    await supervisor.stop();

    const status = supervisor.status();
    expect(status.state).toBe("stopped");
    expect(status.ticks).toBe(tick.mock.calls.length);
    expect(status.lastHeartbeat).toMatch(/^\d{4}-\d{2}-\d{2}T/);
    expect(onTick).toHaveBeenCalledWith(tickResult);
  });

  it("starts out stopped and ignores a second start", async () => {
    const tick = vi.fn().mockResolvedValue(tickResult);
    const supervisor = new AgentSupervisor({ tick }, { intervalMs: 10_000, logger: silentLogger });
    expect(supervisor.status().state).toBe("stopped");

    supervisor.start();
    supervisor.start();
    await vi.waitFor(() => expect(tick).toHaveBeenCalledTimes(1));
    await sleep(20);
    await supervisor.stop();

    expect(tick).toHaveBeenCalledTimes(1);
  });

  it("treats an empty task queue as an idle heartbeat", async () => {
    const tick = vi.fn().mockRejectedValue(new StateError("NO_PENDING_TASKS", "nothing to do"));
    const onError = vi.fn();
    const supervisor = new AgentSupervisor({ tick }, { intervalMs: 1, onError, logger: silentLogger });

    supervisor.start();
    await vi.waitFor(() => expect(supervisor.status().idleBeats).toBeGreaterThanOrEqual(2));

    expect(supervisor.status().state).toBe("idle");
    expect(supervisor.isActive).toBe(true);
    expect(onError).not.toHaveBeenCalled();
    await supervisor.stop();
    expect(supervisor.status().state).toBe("stopped");
  });

  it("stops with state failed on the first real error", async () => {
    const tick = vi.fn().mockRejectedValue(new Error("provider down"));
    const onError = vi.fn();
    const supervisor = new AgentSupervisor({ tick }, { intervalMs: 1, onError, logger: silentLogger });

    supervisor.start();
    await vi.waitFor(() => expect(supervisor.status().state).toBe("failed"));
    await sleep(10);

    expect(tick).toHaveBeenCalledTimes(1);
    expect(supervisor.isActive).toBe(false);
    expect(supervisor.status()).toMatchObject({ failures: 1, lastError: "provider down" });
    expect(onError).toHaveBeenCalledTimes(1);

    await supervisor.stop();
    expect(supervisor.status().state).toBe("failed");
  });

  it("keeps going past errors when stopOnError is off", async () => {
    const tick = vi.fn().mockRejectedValue(new Error("flaky"));
    const supervisor = new AgentSupervisor(
      { tick },
      { intervalMs: 1, stopOnError: false, logger: silentLogger },
    );

    supervisor.start();
    await vi.waitFor(() => expect(supervisor.status().failures).toBeGreaterThanOrEqual(2));

    expect(supervisor.isActive).toBe(true);
    await supervisor.stop();
  });

  it("waits for the tick in flight when stopping", async () => {
    let finish: (result: TickResult) => void = () => undefined;
    const tick = vi.fn(
      () =>
        new Promise<TickResult>((resolve) => {
          finish = resolve;
        }),
    );
    const supervisor = new AgentSupervisor({ tick }, { intervalMs: 1, logger: silentLogger });

    supervisor.start();
    await vi.waitFor(() => expect(tick).toHaveBeenCalledTimes(1));

    let stopped = false;
    const stopping = supervisor.stop().then(() => {
      stopped = true;
    });
    await sleep(5);
    expect(stopped).toBe(false);

    finish(tickResult);
    await stopping;

    expect(supervisor.status()).toMatchObject({ state: "stopped", ticks: 1 });
    expect(tick).toHaveBeenCalledTimes(1);
  });
});
