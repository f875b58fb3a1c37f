import { SpanStatusCode } from "@opentelemetry/api";
import { PathSyntaxError } from "./errors.js";
import { parsePathDiagnostics, type PathDiagnostic } from "./lint/diagnostics.js";
import { resolveExpressions } from "./parser.js";
import {
  TraceCollector,
  otelTracer,
  referenceCallCounter,
  referenceDurationHistogram,
  referenceErrorCounter,
  roundMs,
  type ReferenceTrace,
  type TraceLevel,
} from "./tracing.js";
import type { EvalContext, Logger, ReferenceResolver } from "./types.js";

const noop = () => {};
const defaultLogger: Logger = { debug: noop, info: noop, warn: noop, error: noop };

export type EvaluatorOptions = {
  /** Resolves `:name` references. Without it every reference is undefined. */
  references?: ReferenceResolver;
  /** Structured logger for evaluator events (pino, winston, console, etc.).
   *  Defaults to silent no-ops. */
  logger?: Logger;
  /** Record reference resolutions. `resolveTraced` returns them.
   *  - `"off"` (default): nothing collected
   *  - `"basic"`: name, timing, errors
   *  - `"full"`: also the resolved values */
  trace?: TraceLevel;
  /** Reject paths that have error diagnostics with a {@link PathSyntaxError}
   *  instead of evaluating them leniently. */
  strict?: boolean;
};

export type TracedResolution = {
  value: unknown;
  traces: ReferenceTrace[];
};

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

/** State for a single evaluation: the reference hook with its instrumentation. */
class EvaluationScope implements EvalContext {
  constructor(
    readonly logger: Logger,
    private readonly references: ReferenceResolver | undefined,
    private readonly tracer: TraceCollector | undefined,
  ) {}

  callReference(name: string, data: unknown): unknown {
    const references = this.references;
    if (!references) return undefined;

    const tracer = this.tracer;
    const logger = this.logger;
    const traceStart = tracer?.now();
    const metricAttrs = { "modelpath.reference.name": name };
    return otelTracer.startActiveSpan(
      `modelpath.reference.${name}`,
      { attributes: metricAttrs },
      (span) => {
        const wallStart = performance.now();
        try {
          const result = references(name, data);
          const durationMs = roundMs(performance.now() - wallStart);
          referenceCallCounter.add(1, metricAttrs);
          referenceDurationHistogram.record(durationMs, metricAttrs);
          if (tracer && traceStart != null) {
            tracer.record(
              tracer.entry({
                reference: name,
                output: result,
                durationMs: roundMs(tracer.now() - traceStart),
                startedAt: traceStart,
              }),
            );
          }
          logger.debug("[modelpath] reference %s resolved in %dms", name, durationMs);
          return result;
        } catch (err) {
          const durationMs = roundMs(performance.now() - wallStart);
          const message = errorMessage(err);
          referenceCallCounter.add(1, metricAttrs);
          referenceDurationHistogram.record(durationMs, metricAttrs);
          referenceErrorCounter.add(1, metricAttrs);
          if (tracer && traceStart != null) {
            tracer.record(
              tracer.entry({
                reference: name,
                error: message,
                durationMs: roundMs(tracer.now() - traceStart),
                startedAt: traceStart,
              }),
            );
          }
          span.recordException(err instanceof Error ? err : message);
          span.setStatus({ code: SpanStatusCode.ERROR, message });
          logger.error("[modelpath] reference %s failed: %s", name, message);
          throw err;
        } finally {
          span.end();
        }
      },
    );
  }
}

/**
 * Evaluates path expressions against arbitrary data with a fixed set of
 * options. Holds no per-evaluation state, so one instance can be shared.
 *
 * ```ts
 * const evaluator = createEvaluator({ references: (name) => config[name] });
 * evaluator.resolve(".Name ' is ' .Age", { Name: "Alice", Age: 30 }); // "Alice is 30"
 * ```
 */
export class PathEvaluator {
  private readonly references: ReferenceResolver | undefined;
  private readonly logger: Logger;
  private readonly traceLevel: TraceLevel;
  private readonly strict: boolean;

  constructor(options: EvaluatorOptions = {}) {
    this.references = options.references;
    this.logger = options.logger ?? defaultLogger;
    this.traceLevel = options.trace ?? "off";
    this.strict = options.strict ?? false;
  }

  resolve(path: string, data: unknown): unknown {
    return this.evaluate(path, data, this.collector());
  }

  /** Like {@link resolve}, also returning the reference traces recorded on the way. */
  resolveTraced(path: string, data: unknown): TracedResolution {
    const tracer = this.collector();
    const value = this.evaluate(path, data, tracer);
    return { value, traces: tracer?.traces ?? [] };
  }

  /** Static diagnostics for `path`. Does not evaluate anything. */
  check(path: string): PathDiagnostic[] {
    return parsePathDiagnostics(path).diagnostics;
  }

  private collector(): TraceCollector | undefined {
    return this.traceLevel === "off" ? undefined : new TraceCollector(this.traceLevel);
  }

  private evaluate(path: string, data: unknown, tracer: TraceCollector | undefined): unknown {
    if (this.strict) {
      const diagnostics = this.check(path);
      if (diagnostics.some((d) => d.severity === "error")) {
        throw new PathSyntaxError(path, diagnostics);
      }
    }
    const scope = new EvaluationScope(this.logger, this.references, tracer);
    return resolveExpressions(path, data, scope).value;
  }
}

export function createEvaluator(options?: EvaluatorOptions): PathEvaluator {
  return new PathEvaluator(options);
}

/**
 * Evaluate `path` against `data`.
 *
 * ```ts
 * resolve(".User.Address.City", { User: { Address: { City: "NYC" } } }); // "NYC"
 * resolve("?.Age=='30'", { Age: 30 });                                     // true
 * resolve(":env", {}, (name) => process.env[name]);
 * ```
 */
export function resolve(path: string, data: unknown, referenceResolver?: ReferenceResolver): unknown {
  return new PathEvaluator({ references: referenceResolver }).resolve(path, data);
}
