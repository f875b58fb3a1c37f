import { metrics, trace } from "@opentelemetry/api";

export const otelTracer = trace.getTracer("modelpath");

const otelMeter = metrics.getMeter("modelpath");
export const referenceCallCounter = otelMeter.createCounter("modelpath.reference.calls", {
  description: "Total number of reference resolver invocations",
});
export const referenceDurationHistogram = otelMeter.createHistogram("modelpath.reference.duration", {
  description: "Reference resolver duration in milliseconds",
  unit: "ms",
});
export const referenceErrorCounter = otelMeter.createCounter("modelpath.reference.errors", {
  description: "Total number of reference resolver errors",
});

/** Round milliseconds to 2 decimal places */
export function roundMs(ms: number): number {
  return Math.round(ms * 100) / 100;
}

/** Trace verbosity level.
 *  - `"off"` (default): no collection
 *  - `"basic"`: reference name, timing, errors
 *  - `"full"`: also the resolved output */
export type TraceLevel = "basic" | "full" | "off";

/** A single recorded reference resolution. */
export type ReferenceTrace = {
  /** Reference name as written after the `:` */
  reference: string;
  /** Resolved value (only in "full" level, on success) */
  output?: unknown;
  /** Error message (present when the resolver threw) */
  error?: string;
  /** Wall-clock duration in milliseconds */
  durationMs: number;
  /** Monotonic timestamp (ms) relative to the start of the evaluation */
  startedAt: number;
};

/** Collects reference traces for one evaluation. */
export class TraceCollector {
  readonly traces: ReferenceTrace[] = [];
  readonly level: "basic" | "full";
  private readonly epoch = performance.now();

  constructor(level: "basic" | "full" = "full") {
    this.level = level;
  }

  /** Returns ms since the collector was created */
  now(): number {
    return roundMs(performance.now() - this.epoch);
  }

  record(trace: ReferenceTrace): void {
    this.traces.push(trace);
  }

  /** Build a trace entry, omitting output for basic level. */
  entry(base: ReferenceTrace): ReferenceTrace {
    const t: ReferenceTrace = {
      reference: base.reference,
      durationMs: base.durationMs,
      startedAt: base.startedAt,
    };
    if (base.error !== undefined) t.error = base.error;
    else if (this.level === "full" && base.output !== undefined) t.output = base.output;
    return t;
  }
}
