import { defaultIdGenerator } from "./ids.js";
import type { IdGenerator } from "./ids.js";
import { noopReporter } from "./reporter.js";
import type { Reporter } from "./reporter.js";
import type { Sampler } from "./sampling.js";
import { SpanHandle } from "./span.js";
import type { AnyContext, SpanOptions } from "./types.js";

export interface TracerOptions<C, TTraceId> {
  /** Decides whether a new trace is recorded. Not consulted for child spans. */
  sampler: Sampler<TTraceId>;
  /** Default: the process-wide random generator. */
  idGenerator?: IdGenerator;
  /** Receives sampled spans when they finish. Default: drops them. */
  reporter?: Reporter<C>;
  /**
   * Called when the reporter throws while a span finishes.
   * Default: silent.
   */
  onError?: (err: Error) => void;
}

/** What context derivation needs from a tracer. */
export interface DerivationEnv<TTraceId> {
  readonly idGenerator: IdGenerator;
  readonly sampler:     Sampler<TTraceId>;
}

/**
 * Span bookkeeping shared by the tracers. How a span's context is derived
 * from its references is left to each context variant.
 */
export abstract class BaseTracer<C extends AnyContext<C>, TTraceId> implements DerivationEnv<TTraceId> {
  readonly idGenerator: IdGenerator;
  readonly sampler:     Sampler<TTraceId>;

  readonly #reporter: Reporter<C>;
  readonly #onError: (err: Error) => void;

  constructor(opts: TracerOptions<C, TTraceId>) {
    this.sampler     = opts.sampler;
    this.idGenerator = opts.idGenerator ?? defaultIdGenerator;
    this.#reporter   = opts.reporter    ?? noopReporter;
    this.#onError    = opts.onError     ?? (() => {});
  }

  /** Start a span. Call .finish() on the returned handle when the work is done. */
  startSpan(options: SpanOptions<C>): SpanHandle<C> {
    return new SpanHandle<C>({
      operation:  options.operation,
      context:    this.deriveContext(options),
      references: options.references ?? [],
      tags:       options.tags ?? {},
      startTime:  options.startTime ?? new Date(),
      reporter:   this.#reporter,
      onError:    this.#onError,
    });
  }

  /** Picks a parent among `options.references`, or starts a new trace. */
  abstract deriveContext(options: SpanOptions<C>): C;
}
