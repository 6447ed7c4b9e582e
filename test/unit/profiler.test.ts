import { test, expect, describe, beforeEach } from "vitest";
import { Profiler, calculateStats, globalProfiler } from "../../src/profiler";

describe("Profiler", () => {
  let profiler: Profiler;

  beforeEach(() => {
    profiler = new Profiler();
  });

  describe("mark and measure", () => {
    test("measure() returns -1 for missing mark", () => {
      expect(profiler.measure("retrieval.query", "nonexistent")).toBe(-1);
      expect(profiler.getStats("retrieval.query")).toBeNull();
    });

    test("measure() calculates duration correctly", async () => {
      profiler.mark("start");
      await new Promise(resolve => setTimeout(resolve, 10));
      const duration = profiler.measure("elapsed", "start");
      expect(duration).toBeGreaterThanOrEqual(9);
      expect(duration).toBeLessThan(1000);
      expect(profiler.getStats("elapsed")?.count).toBe(1);
    });
  });

  describe("getStats", () => {
    test("min/max/avg/total", () => {
      profiler.record("test", 10);
      profiler.record("test", 30);
      profiler.record("test", 20);

      expect(profiler.getStats("test")).toEqual({
        count: 3,
        min: 10,
        max: 30,
        avg: 20,
        p50: 20,
        p95: 30,
        p99: 30,
        total: 60,
      });
    });

    test("nearest-rank percentiles", () => {
      for (let i = 1; i <= 100; i++) {
        profiler.record("perc", i);
      }
      const stats = profiler.getStats("perc");
      expect([stats?.p50, stats?.p95, stats?.p99]).toEqual([50, 95, 99]);
    });

    test("a single sample is every percentile", () => {
      expect(calculateStats([42])).toMatchObject({ p50: 42, p95: 42, p99: 42 });
      expect(calculateStats([])).toBeNull();
    });
  });

  describe("connection tracking", () => {
    test("states move from idle through connecting to the outcome", () => {
      expect(profiler.getConnectState()).toBe("idle");
      profiler.connectStart();
      expect(profiler.getConnectState()).toBe("connecting");
      profiler.connectComplete("degraded");
      expect(profiler.getConnectState()).toBe("degraded");
    });

    test("getConnectDuration() is null before connecting", () => {
      expect(profiler.getConnectDuration()).toBeNull();
    });

    test("getConnectDuration() is frozen once complete", async () => {
      profiler.connectStart();
      await new Promise(resolve => setTimeout(resolve, 10));
      profiler.connectComplete("ready");
      const first = profiler.getConnectDuration();
      await new Promise(resolve => setTimeout(resolve, 5));

      expect(first).toBeGreaterThanOrEqual(9);
      expect(profiler.getConnectDuration()).toBe(first);
    });

    test("server metrics appear in the report", () => {
      profiler.recordServerConnect("academic", -1, 0, "error", "Connection refused");

      expect(profiler.export().connection.servers).toEqual([
        { name: "academic", connectTime: -1, toolCount: 0, status: "error", error: "Connection refused" },
      ]);
    });
  });

  describe("export", () => {
    test("indexing totals accumulate across builds", () => {
      profiler.recordIndexBuild(20, 5, 5, 0);
      profiler.recordIndexBuild(2, 5, 0, 5);

      expect(profiler.export().indexing).toEqual({ buildTime: 2, toolCount: 5, added: 5, skipped: 5 });
    });

    test("latency sections map to their metric names", () => {
      profiler.record("retrieval.query", 4);
      profiler.record("agent.decide", 40);
      profiler.record("tool.invoke", 8);

      const report = profiler.export();

      expect(report.retrieval?.total).toBe(4);
      expect(report.decisions?.total).toBe(40);
      expect(report.invocations?.total).toBe(8);
      expect(report.queries).toBeNull();
      expect(typeof report.uptime).toBe("number");
    });
  });

  test("reset() clears all state", () => {
    profiler.mark("test");
    profiler.record("metric", 100);
    profiler.recordServerConnect("utility", 50, 2, "connected");
    profiler.connectStart();
    profiler.connectComplete("ready");
    profiler.recordIndexBuild(10, 5, 5, 0);

    profiler.reset();

    expect(profiler.getConnectState()).toBe("idle");
    expect(profiler.getConnectDuration()).toBeNull();
    expect(profiler.getStats("metric")).toBeNull();
    expect(profiler.measure("again", "test")).toBe(-1);
    const report = profiler.export();
    expect(report.connection.servers).toEqual([]);
    expect(report.indexing).toEqual({ buildTime: null, toolCount: 0, added: 0, skipped: 0 });
  });

  test("startTimer() records one sample per call", () => {
    const done1 = profiler.startTimer("multi");
    const done2 = profiler.startTimer("multi");
    done1();
    done2();

    expect(profiler.getStats("multi")?.count).toBe(2);
  });
});

test("globalProfiler is a shared Profiler", () => {
  expect(globalProfiler).toBeInstanceOf(Profiler);
});
