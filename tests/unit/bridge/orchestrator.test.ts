import { describe, expect, it, vi } from "vitest";

import { BridgeOrchestrator } from "../../../src/bridge/orchestrator.js";
import { parsePath } from "../../../src/gnmi/path.js";
import { buildSubscribeRequest } from "../../../src/gnmi/request.js";
import { FakeSink, FakeSource, type PublishScript, type SubscribeScript, update } from "../../helpers/fake-streams.js";
import { WARN, createCapturingLogger } from "../../helpers/logger.js";

const request = buildSubscribeRequest("", [parsePath("/interfaces/interface/state/counters")]);

function setup(sourceScripts: SubscribeScript[], sinkScripts?: PublishScript[], backoff?: (n: number) => number) {
  const source = new FakeSource(sourceScripts);
  const sink = new FakeSink(sinkScripts);
  const { logger, entries } = createCapturingLogger();
  const orchestrator = new BridgeOrchestrator({ logger, source, sink, request, backoff });
  const warnings = () => entries.filter((e) => e.level === WARN);
  return { source, sink, orchestrator, entries, warnings };
}

describe("BridgeOrchestrator", () => {
  it("forwards updates to the collector in the order the target sent them", async () => {
    const { sink, orchestrator } = setup([{ updates: [update("1"), update("2"), update("3")], end: "hang" }]);
    const controller = new AbortController();
    sink.onSend = (_update, total) => {
      if (total === 3) controller.abort(new Error("done"));
    };

    const stats = await orchestrator.run({ signal: controller.signal });

    expect(sink.received.map((u) => u.toString())).toEqual(["1", "2", "3"]);
    expect(stats).toEqual({ attempts: 1, failures: 0, forwarded: 3 });
    expect(orchestrator.state).toBe("stopped");
  });

  it("retries after every failure until stopped", async () => {
    const { source, orchestrator, warnings } = setup([{ end: "close" }, { end: "close" }, { end: "close" }, { end: "hang" }]);
    const controller = new AbortController();
    source.onSubscribe = (call) => {
      if (call === 4) controller.abort(new Error("stop"));
    };

    const stats = await orchestrator.run({ signal: controller.signal });

    expect(stats).toEqual({ attempts: 4, failures: 3, forwarded: 0 });
    expect(warnings()).toHaveLength(3);
    expect(warnings()[0]).toMatchObject({
      msg: "encountered error, retrying",
      attempt: 1,
      forwarded: 0,
      delayMs: 0,
      err: { type: "StreamError", message: "subscription stream closed by target" },
    });
  });

  it("runs each iteration with exactly one session of each kind", async () => {
    const { source, sink, orchestrator } = setup([{ end: "close" }]);
    const seen: number[] = [];
    source.onSubscribe = () => seen.push(orchestrator.activeSessions);

    const stats = await orchestrator.run({ maxAttempts: 3 });

    expect(stats.attempts).toBe(3);
    expect(seen).toEqual([2, 2, 2]);
    expect(source.streams).toHaveLength(3);
    expect(sink.streams).toHaveLength(3);
    expect(orchestrator.activeSessions).toBe(0);
    expect(source.streams.every((s) => s.closed)).toBe(true);
    expect(sink.streams.every((s) => s.closed)).toBe(true);
  });

  it("cancels the subscription when the collector fails", async () => {
    const { source, sink, orchestrator, warnings } = setup(
      [{ updates: [update("a")], end: "hang" }],
      [{ failAt: 0, error: new Error("collector went away") }],
    );

    const stats = await orchestrator.run({ maxAttempts: 1 });

    expect(stats).toEqual({ attempts: 1, failures: 1, forwarded: 0 });
    expect(source.streams[0]?.signal.aborted).toBe(true);
    expect(source.streams[0]?.closed).toBe(true);
    expect(sink.received).toEqual([]);
    expect(warnings()[0]?.err).toMatchObject({
      type: "StreamError",
      message: "error from Publish.Send: collector went away",
    });
  });

  it("cancels the publish stream when the target fails", async () => {
    const { sink, orchestrator, warnings } = setup([{ end: new Error("target rebooting") }]);

    await orchestrator.run({ maxAttempts: 1 });

    expect(sink.streams[0]?.closed).toBe(true);
    expect(warnings()[0]?.err).toMatchObject({ message: "error from Subscribe.Recv: target rebooting" });
  });

  it("drops the update that was in flight when an iteration ends", async () => {
    const { sink, orchestrator } = setup(
      [{ updates: [update("lost")], end: "hang" }, { updates: [update("fresh")], end: "close" }],
      [{ failAt: 0 }, {}],
    );

    await orchestrator.run({ maxAttempts: 2 });

    expect(sink.received.map((u) => u.toString())).toEqual(["fresh"]);
  });

  it("counts consecutive failures for the backoff and resets after progress", async () => {
    const backoff = vi.fn((_consecutiveFailures: number) => 0);
    const { orchestrator } = setup(
      [{ end: "close" }, { end: "close" }, { updates: [update("a")], end: "close" }, { end: "close" }],
      undefined,
      backoff,
    );

    const stats = await orchestrator.run({ maxAttempts: 4 });

    expect(stats).toEqual({ attempts: 4, failures: 4, forwarded: 1 });
    expect(backoff.mock.calls.map(([n]) => n)).toEqual([1, 2, 1, 2]);
  });

  it("stops during the backoff delay", async () => {
    const controller = new AbortController();
    const backoff = vi.fn(() => {
      queueMicrotask(() => controller.abort(new Error("stop")));
      return 60_000;
    });
    const { orchestrator } = setup([{ end: "close" }], undefined, backoff);

    const stats = await orchestrator.run({ signal: controller.signal });

    expect(stats).toEqual({ attempts: 1, failures: 1, forwarded: 0 });
    expect(orchestrator.state).toBe("stopped");
  });

  it("does nothing when already stopped", async () => {
    const { source, orchestrator, entries } = setup([{ end: "close" }]);
    const controller = new AbortController();
    controller.abort();

    const stats = await orchestrator.run({ signal: controller.signal });

    expect(stats).toEqual({ attempts: 0, failures: 0, forwarded: 0 });
    expect(source.streams).toHaveLength(0);
    expect(entries.find((e) => e.msg === "Bridge stopped")).toMatchObject({ attempts: 0 });
  });

  it("refuses to run twice at once", async () => {
    const { orchestrator } = setup([{ end: "hang" }]);
    const controller = new AbortController();
    const first = orchestrator.run({ signal: controller.signal });

    await expect(orchestrator.run()).rejects.toThrow("Bridge already running");

    controller.abort();
    await first;
  });
});
