import { describe, it, expect, vi } from "vitest";
import { Agent } from "../../src/agent/Agent.js";
import { CapabilityRegistry } from "../../src/registry/CapabilityRegistry.js";
import { InMemoryPersistenceSink } from "../../src/persistence/PersistenceSink.js";
import { StateError } from "../../src/core/errors.js";
import { ScriptedGateway, callPayload, recordingLogCapability, silentLogger } from "../fixtures/index.js";
import type { ScriptStep } from "../fixtures/index.js";

const HAIKU_CALL = callPayload("LogAdapter", "log", { output: "logging a haiku!" });

function createAgent(steps: ScriptStep[], sink = new InMemoryPersistenceSink()) {
  const { capability, lines } = recordingLogCapability();
  const registry = new CapabilityRegistry();
  registry.register("LogAdapter", capability);
  const agent = new Agent({
    gateway: new ScriptedGateway(steps),
    registry,
    sink,
    sessionHandle: "session-1",
    logger: silentLogger,
  });
  return { agent, sink, lines };
}

describe("Agent", () => {
  it("initializes with an optional first task", () => {
    const { agent } = createAgent([]);
    agent.initialize("write a haiku");
    agent.pushTask("then rest");
    expect(agent.store.taskContext).toEqual(["write a haiku", "then rest"]);

    const { agent: blank } = createAgent([]);
    blank.initialize();
    expect(blank.store.taskContext).toEqual([]);
  });

  it("saves a snapshot after every tick", async () => {
    const { agent, sink, lines } = createAgent([["log the haiku"], [HAIKU_CALL]]);
    agent.initialize("write a haiku");

    await agent.tick();

    expect(lines).toEqual(["logging a haiku!"]);
    const saved = await sink.load("session-1");
    expect(saved).toMatchObject({
      sessionHandle: "session-1",
      taskContext: [],
      executionContext: [],
      tickCount: 1,
    });
    expect(saved?.functionLog).toHaveLength(1);
  });

  it("saves the partial state of a failed tick", async () => {
    const { agent, sink } = createAgent([["log the haiku"], ["nope"], ["nope"], ["nope"]]);
    agent.initialize("write a haiku");

    await expect(agent.tick()).rejects.toThrow(/No valid function call/);

    expect(await sink.load("session-1")).toMatchObject({
      taskContext: [],
      executionContext: ["log the haiku"],
      tickCount: 0,
    });
  });

  it("keeps the tick's own error when saving the failed state also fails", async () => {
    const sink = new InMemoryPersistenceSink();
    vi.spyOn(sink, "save").mockRejectedValue(new Error("disk full"));
    const { agent } = createAgent([], sink);

    await expect(agent.tick()).rejects.toBeInstanceOf(StateError);
    expect(sink.save).toHaveBeenCalledTimes(1);
  });

  it("surfaces an empty queue as a StateError", async () => {
    const { agent } = createAgent([]);
    await expect(agent.tick()).rejects.toBeInstanceOf(StateError);
  });

  it("phases out and back in through the sink", async () => {
    const sink = new InMemoryPersistenceSink();
    const { agent } = createAgent([], sink);
    agent.initialize("write a haiku");
    agent.store.replaceWorld(["it is raining"]);
    await agent.phaseOut();

    const { agent: resumed } = createAgent([], sink);
    expect(await resumed.phaseIn()).toBe(true);
    expect(resumed.store.taskContext).toEqual(["write a haiku"]);
    expect(resumed.store.worldContext).toEqual(["it is raining"]);
  });

  it("reports when there is nothing to phase in", async () => {
    const { agent } = createAgent([]);
    expect(await agent.phaseIn()).toBe(false);
  });

  it("stops its supervisor on phase out", async () => {
    const { agent } = createAgent([]);
    const supervisor = agent.supervise({ intervalMs: 5 });
    expect(supervisor.isActive).toBe(true);

    await agent.phaseOut();

    expect(supervisor.isActive).toBe(false);
    expect(supervisor.status().state).not.toBe("running");
  });
});
