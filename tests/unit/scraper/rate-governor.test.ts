import { describe, it, expect } from "vitest";

import { CancelledError } from "../../../src/errors.js";
import { RateGovernor } from "../../../src/scraper/rate-governor.js";
import { VirtualClock, createGate, flushPromises } from "../../mocks/clock.js";

describe("scraper/rate-governor", () => {
  it("should reject a concurrency below one", () => {
    expect(
      () =>
        new RateGovernor({ name: "test", maxConcurrent: 0, defaultIntervalMs: 0 })
    ).toThrow(RangeError);
  });

  it("should space request starts by the interval", async () => {
    const clock = new VirtualClock();
    const governor = new RateGovernor({
      name: "test",
      maxConcurrent: 1,
      defaultIntervalMs: 1000,
      clock,
    });
    const starts: number[] = [];
    const task = (): Promise<void> => {
      starts.push(clock.now());
      return Promise.resolve();
    };

    await Promise.all([
      governor.run("detail", task),
      governor.run("detail", task),
      governor.run("detail", task),
    ]);

    expect(starts).toEqual([0, 1000, 2000]);
  });

  it("should apply the interval of the endpoint that started last", async () => {
    const clock = new VirtualClock();
    const governor = new RateGovernor({
      name: "steamspy",
      maxConcurrent: 1,
      defaultIntervalMs: 1000,
      endpointIntervalsMs: { all: 60_000 },
      clock,
    });
    const starts: [string, number][] = [];
    const run = (endpoint: string): Promise<void> =>
      governor.run(endpoint, () => {
        starts.push([endpoint, clock.now()]);
        return Promise.resolve();
      });

    await Promise.all([run("all"), run("detail"), run("detail")]);

    expect(starts).toEqual([
      ["all", 0],
      ["detail", 60_000],
      ["detail", 61_000],
    ]);
  });

  it("should not wait when the spacing has already elapsed", async () => {
    const clock = new VirtualClock();
    const governor = new RateGovernor({
      name: "test",
      maxConcurrent: 1,
      defaultIntervalMs: 1000,
      clock,
    });

    await governor.run("detail", () => Promise.resolve());
    clock.advance(5000);
    await governor.run("detail", () => Promise.resolve());

    expect(clock.sleeps).toEqual([]);
  });

  it("should grant slots in call order", async () => {
    const governor = new RateGovernor({
      name: "test",
      maxConcurrent: 1,
      defaultIntervalMs: 0,
      clock: new VirtualClock(),
    });
    const order: string[] = [];
    const gate = createGate();

    const first = governor.run("a", async () => {
      await gate.promise;
      order.push("first");
    });
    const second = governor.run("a", () => {
      order.push("second");
      return Promise.resolve();
    });
    const third = governor.run("a", () => {
      order.push("third");
      return Promise.resolve();
    });

    gate.open();
    await Promise.all([first, second, third]);

    expect(order).toEqual(["first", "second", "third"]);
  });

  it("should cap requests in flight", async () => {
    const governor = new RateGovernor({
      name: "test",
      maxConcurrent: 2,
      defaultIntervalMs: 0,
      clock: new VirtualClock(),
    });
    const gate = createGate();
    let started = 0;
    const task = async (): Promise<void> => {
      started++;
      await gate.promise;
    };

    const runs = [
      governor.run("a", task),
      governor.run("a", task),
      governor.run("a", task),
    ];
    await flushPromises();

    expect(started).toBe(2);
    expect(governor.inFlight).toBe(2);

    gate.open();
    await Promise.all(runs);

    expect(started).toBe(3);
    expect(governor.inFlight).toBe(0);
  });

  it("should drop a queued request when its signal aborts", async () => {
    const governor = new RateGovernor({
      name: "test",
      maxConcurrent: 1,
      defaultIntervalMs: 0,
      clock: new VirtualClock(),
    });
    const gate = createGate();
    const controller = new AbortController();
    let queuedRan = false;

    const first = governor.run("a", () => gate.promise);
    const queued = governor.run(
      "a",
      () => {
        queuedRan = true;
        return Promise.resolve();
      },
      controller.signal
    );

    controller.abort(new CancelledError("Run cancelled by caller"));
    await expect(queued).rejects.toThrow("Run cancelled by caller");

    gate.open();
    await first;

    expect(queuedRan).toBe(false);
    expect(governor.inFlight).toBe(0);
  });

  it("should refuse work once the signal is aborted", async () => {
    const governor = new RateGovernor({
      name: "test",
      maxConcurrent: 1,
      defaultIntervalMs: 0,
    });
    const controller = new AbortController();
    controller.abort();

    await expect(
      governor.run("a", () => Promise.resolve(), controller.signal)
    ).rejects.toThrow(CancelledError);
    expect(governor.inFlight).toBe(0);
  });
});
