import type { Reporter } from "./reporter.js";
import type {
  AnyContext,
  FinishedSpan,
  LogFields,
  LogRecord,
  Reference,
  TagValue,
} from "./types.js";

/** @internal */
export interface SpanHandleInit<C> {
  operation:  string;
  context:    C;
  references: readonly Reference<C>[];
  tags:       Record<string, TagValue>;
  startTime:  Date;
  reporter:   Reporter<C>;
  onError:    (err: Error) => void;
}

/**
 * A handle to an in-progress span.
 *
 * Obtain one via a tracer's startSpan(). Call .finish() when the work is
 * complete; sampled spans are then handed to the tracer's reporter.
 */
export class SpanHandle<C extends AnyContext<C>> {
  readonly operation:  string;
  readonly references: readonly Reference<C>[];
  readonly startTime:  Date;

  readonly #tags: Record<string, TagValue>;
  readonly #logs: LogRecord[] = [];
  readonly #reporter: Reporter<C>;
  readonly #onError: (err: Error) => void;

  #context: C;
  #finished: FinishedSpan<C> | undefined;

  /** @internal */
  constructor(init: SpanHandleInit<C>) {
    this.operation  = init.operation;
    this.references = init.references;
    this.startTime  = init.startTime;
    this.#context   = init.context;
    this.#tags      = { ...init.tags };
    this.#reporter  = init.reporter;
    this.#onError   = init.onError;
  }

  get context(): C {
    return this.#context;
  }

  get finished(): boolean {
    return this.#finished !== undefined;
  }

  setTag(key: string, value: TagValue): this {
    this.#tags[key] = value;
    return this;
  }

  log(fields: LogFields, time: Date = new Date()): this {
    this.#logs.push({ time, fields: { ...fields } });
    return this;
  }

  /**
   * Adds a baggage item. The handle's context is replaced by an extended
   * copy; contexts already handed out are left as they were.
   */
  setBaggageItem(key: string, value: string): this {
    this.#context = this.#context.withBaggageItem(key, value);
    return this;
  }

  /**
   * Finish the span and report it if sampled.
   *
   * Calling finish() more than once is a no-op — every call returns the
   * span recorded by the first one. A reporter that throws does not throw
   * here; the error goes to the tracer's onError hook.
   */
  finish(finishTime: Date = new Date()): FinishedSpan<C> {
    if (this.#finished) return this.#finished;

    const finished: FinishedSpan<C> = {
      operation:  this.operation,
      start:      this.startTime,
      duration:   (finishTime.getTime() - this.startTime.getTime()) / 1000,
      context:    this.#context,
      references: this.references,
      tags:       { ...this.#tags },
      logs:       [...this.#logs],
    };
    this.#finished = finished;

    if (finished.context.sampled) {
      try {
        this.#reporter.report(finished);
      } catch (err) {
        this.#onError(err instanceof Error ? err : new Error(String(err)));
      }
    }
    return finished;
  }
}
