import { describe, it, expect } from "vitest";
import { Metrics } from "../../src/observability/Metrics.js";

describe("Metrics", () => {
  it("keys counters by name and labels regardless of label order", () => {
    const metrics = new Metrics();
    metrics.increment("requests", { provider: "a", outcome: "ok" });
    metrics.increment("requests", { outcome: "ok", provider: "a" }, 2);

    expect(metrics.getCounter("requests", { provider: "a", outcome: "ok" })).toBe(3);
    expect(metrics.getCounter("requests", { provider: "b", outcome: "ok" })).toBe(0);
  });

  it("buckets observed latencies", () => {
    const metrics = new Metrics();
    metrics.recordTick(true, 40);
    metrics.recordTick(false, 700);

    const histogram = metrics.getHistogram("tick_latency_ms", {});
    expect(histogram?.count).toBe(2);
    expect(histogram?.sum).toBe(740);
    expect(histogram?.buckets.get(50)).toBe(1);
    expect(histogram?.buckets.get(1000)).toBe(2);
    expect(metrics.getCounter("ticks_total", { ok: "false" })).toBe(1);
  });

  it("counts observations into buckets over a long run", () => {
    const metrics = new Metrics();
    for (let i = 0; i < 1000; i++) metrics.observe("tick_latency_ms", {}, 5);
    metrics.observe("tick_latency_ms", {}, 90_000);

    const histogram = metrics.getHistogram("tick_latency_ms", {});
    expect(histogram?.count).toBe(1001);
    expect(histogram?.sum).toBe(95_000);
    expect(histogram?.buckets.get(10)).toBe(1000);
    expect(histogram?.buckets.get(60000)).toBe(1000);
  });

  it("records dispatches per capability and action", () => {
    const metrics = new Metrics();
    metrics.recordDispatch("LogAdapter", "log", true, 3);
    metrics.recordDispatch("LogAdapter", "log", true, 4);

    expect(metrics.getAllCounters()).toEqual([
      { name: "dispatches_total", labels: { capability: "LogAdapter", action: "log", ok: "true" }, value: 2 },
    ]);
    expect(metrics.getHistogram("dispatch_latency_ms", { capability: "LogAdapter" })?.sum).toBe(7);
  });

  it("forgets everything on reset", () => {
    const metrics = new Metrics();
    metrics.recordInvalidFunctionCall();
    metrics.recordFailover("a", "b");
    metrics.reset();

    expect(metrics.getAllCounters()).toEqual([]);
    expect(metrics.getAllHistograms()).toEqual([]);
  });
});
