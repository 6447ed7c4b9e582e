/**
 * Performance profiler for toolrag
 * Uses performance.now() high-resolution timers
 */

export interface PerformanceStats {
  count: number;
  min: number;
  max: number;
  avg: number;
  p50: number;
  p95: number;
  p99: number;
  total: number;
}

export interface ServerMetrics {
  name: string;
  connectTime: number;
  toolCount: number;
  status: "connected" | "error" | "connecting";
  error?: string;
}

export type ConnectState = "idle" | "connecting" | "ready" | "degraded" | "failed";

export interface PerformanceReport {
  timestamp: string;
  uptime: number;
  connection: {
    startTime: number;
    endTime: number | null;
    duration: number | null;
    state: ConnectState;
    servers: ServerMetrics[];
  };
  indexing: {
    buildTime: number | null;
    toolCount: number;
    added: number;
    skipped: number;
  };
  retrieval: PerformanceStats | null;
  decisions: PerformanceStats | null;
  invocations: PerformanceStats | null;
  queries: PerformanceStats | null;
}

/**
 * Nearest-rank percentile from a sorted array
 */
function percentile(sorted: number[], p: number): number {
  if (sorted.length === 0) return 0;
  const index = Math.ceil((p / 100) * sorted.length) - 1;
  return sorted[Math.max(0, index)] ?? 0;
}

/**
 * Calculate statistics from measurements
 */
export function calculateStats(measurements: number[]): PerformanceStats | null {
  if (measurements.length === 0) return null;

  const sorted = [...measurements].sort((a, b) => a - b);
  const total = sorted.reduce((sum, v) => sum + v, 0);

  return {
    count: sorted.length,
    min: sorted[0] ?? 0,
    max: sorted[sorted.length - 1] ?? 0,
    avg: total / sorted.length,
    p50: percentile(sorted, 50),
    p95: percentile(sorted, 95),
    p99: percentile(sorted, 99),
    total,
  };
}

/**
 * Collects connect, indexing and per-query latencies
 */
export class Profiler {
  private marks: Map<string, number> = new Map();
  private measures: Map<string, number[]> = new Map();
  private serverMetrics: Map<string, ServerMetrics> = new Map();

  private connectStartTime: number | null = null;
  private connectEndTime: number | null = null;
  private connectState: ConnectState = "idle";

  private indexBuildTime: number | null = null;
  private toolCount: number = 0;
  private added: number = 0;
  private skipped: number = 0;

  private readonly startTime: number = performance.now();

  /**
   * Mark a point in time with a name
   */
  mark(name: string): void {
    this.marks.set(name, performance.now());
  }

  /**
   * Measure duration from a mark to now.
   * Returns milliseconds, or -1 when the mark does not exist
   */
  measure(name: string, startMark: string): number {
    const start = this.marks.get(startMark);
    if (start === undefined) {
      return -1;
    }

    const duration = performance.now() - start;
    this.record(name, duration);
    return duration;
  }

  /**
   * Record a duration directly (for pre-calculated values)
   */
  record(name: string, duration: number): void {
    const existing = this.measures.get(name) || [];
    existing.push(duration);
    this.measures.set(name, existing);
  }

  getStats(name: string): PerformanceStats | null {
    const measurements = this.measures.get(name);
    if (!measurements) return null;
    return calculateStats(measurements);
  }

  connectStart(): void {
    this.connectStartTime = performance.now();
    this.connectEndTime = null;
    this.connectState = "connecting";
  }

  connectComplete(state: "ready" | "degraded" | "failed"): void {
    this.connectEndTime = performance.now();
    this.connectState = state;
  }

  recordServerConnect(
    name: string,
    connectTime: number,
    toolCount: number,
    status: "connected" | "error",
    error?: string
  ): void {
    this.serverMetrics.set(name, {
      name,
      connectTime,
      toolCount,
      status,
      error,
    });
  }

  recordIndexBuild(duration: number, toolCount: number, added: number, skipped: number): void {
    this.indexBuildTime = duration;
    this.toolCount = toolCount;
    this.added += added;
    this.skipped += skipped;
  }

  getConnectState(): ConnectState {
    return this.connectState;
  }

  /**
   * Connect duration, or time since start while still connecting
   */
  getConnectDuration(): number | null {
    if (this.connectStartTime === null) return null;
    if (this.connectEndTime !== null) {
      return this.connectEndTime - this.connectStartTime;
    }
    return performance.now() - this.connectStartTime;
  }

  export(): PerformanceReport {
    return {
      timestamp: new Date().toISOString(),
      uptime: performance.now() - this.startTime,
      connection: {
        startTime: this.connectStartTime || 0,
        endTime: this.connectEndTime,
        duration: this.getConnectDuration(),
        state: this.connectState,
        servers: Array.from(this.serverMetrics.values()),
      },
      indexing: {
        buildTime: this.indexBuildTime,
        toolCount: this.toolCount,
        added: this.added,
        skipped: this.skipped,
      },
      retrieval: this.getStats("retrieval.query"),
      decisions: this.getStats("agent.decide"),
      invocations: this.getStats("tool.invoke"),
      queries: this.getStats("agent.query"),
    };
  }

  reset(): void {
    this.marks.clear();
    this.measures.clear();
    this.serverMetrics.clear();
    this.connectStartTime = null;
    this.connectEndTime = null;
    this.connectState = "idle";
    this.indexBuildTime = null;
    this.toolCount = 0;
    this.added = 0;
    this.skipped = 0;
  }

  /**
   * Scoped timer that records its duration when called
   * Usage: const done = profiler.startTimer("tool.invoke"); ... done();
   */
  startTimer(name: string): () => number {
    const start = performance.now();
    return () => {
      const duration = performance.now() - start;
      this.record(name, duration);
      return duration;
    };
  }
}

// Process-wide profiler shared by the registry, retriever and agent loop
export const globalProfiler = new Profiler();
