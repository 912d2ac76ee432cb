export interface WindowLatencySample {
  queueMs: number;
  audioMs: number;
  engineMs: number;
  sinkMs: number;
  endToEndMs: number;
}

interface PercentileSummary {
  p50: number;
  p95: number;
  max: number;
  avg: number;
}

export interface LatencySummary {
  windows: number;
  queueMs: PercentileSummary;
  engineMs: PercentileSummary;
  sinkMs: PercentileSummary;
  endToEndMs: PercentileSummary;
  /** Mean engine time over mean audio duration; above 1 the queue grows. */
  realTimeFactor: number;
}

const asSummary = (values: number[]): PercentileSummary => {
  if (values.length === 0) {
    return { p50: 0, p95: 0, max: 0, avg: 0 };
  }

  const sorted = [...values].sort((a, b) => a - b);
  const pick = (pct: number): number => {
    const index = Math.min(sorted.length - 1, Math.max(0, Math.ceil(sorted.length * pct) - 1));
    return sorted[index] ?? 0;
  };
  const total = sorted.reduce((sum, value) => sum + value, 0);

  return {
    p50: Math.round(pick(0.5)),
    p95: Math.round(pick(0.95)),
    max: Math.round(sorted[sorted.length - 1] ?? 0),
    avg: Math.round(total / sorted.length)
  };
};

export class LatencyTracker {
  private samples: WindowLatencySample[] = [];

  public reset(): void {
    this.samples = [];
  }

  public push(sample: WindowLatencySample): void {
    this.samples.push(sample);
  }

  public summarize(): LatencySummary {
    const audioTotal = this.samples.reduce((sum, sample) => sum + sample.audioMs, 0);
    const engineTotal = this.samples.reduce((sum, sample) => sum + sample.engineMs, 0);

    return {
      windows: this.samples.length,
      queueMs: asSummary(this.samples.map((sample) => sample.queueMs)),
      engineMs: asSummary(this.samples.map((sample) => sample.engineMs)),
      sinkMs: asSummary(this.samples.map((sample) => sample.sinkMs)),
      endToEndMs: asSummary(this.samples.map((sample) => sample.endToEndMs)),
      realTimeFactor: audioTotal > 0 ? Number((engineTotal / audioTotal).toFixed(3)) : 0
    };
  }
}
