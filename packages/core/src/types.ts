/** 64-bit span ID, an unsigned integer in [0, 2^64). */
export type SpanId = bigint;

/**
 * Trace ID wide enough for 128-bit mode.
 *
 * `hi` is absent when the tracer runs with 64-bit trace IDs; `lo` is always
 * set. Variants that only ever use 64-bit trace IDs use a plain bigint.
 */
export interface TraceId128 {
  readonly hi: bigint | undefined;
  readonly lo: bigint;
}

/** Key/value data that travels with a context across process boundaries. */
export type Baggage = Readonly<Record<string, string>>;

export type TagValue = string | number | boolean;

/**
 * The capabilities every context variant shares. `TSelf` is the implementing
 * type.
 *
 * Contexts are immutable: the `with*` methods return a new context and leave
 * the receiver untouched.
 */
export interface SpanContext<TTraceId, TSelf> {
  readonly traceId: TTraceId;
  readonly spanId:  SpanId;
  /** Whether spans carrying this context are recorded. */
  readonly sampled: boolean;
  readonly baggage: Baggage;

  withBaggageItem(key: string, value: string): TSelf;
  withSampled(sampled: boolean): TSelf;
  toJSON(): ContextJson;
}

/**
 * JSON shape of a context inside a finished-span document.
 * IDs are strings: JSON numbers cannot hold 64 bits.
 */
export interface ContextJson {
  trace_id:        string;
  span_id:         string;
  parent_span_id?: string;
  sampled:         boolean;
  flags?:          string[];
  baggage:         Record<string, string>;
}

/** Any context variant, as seen by variant-agnostic code. */
export type AnyContext<C> = SpanContext<unknown, C>;

export type ReferenceKind = "child_of" | "follows_from";

export interface Reference<C> {
  readonly kind:    ReferenceKind;
  readonly context: C;
}

export function childOf<C>(context: C): Reference<C> {
  return { kind: "child_of", context };
}

export function followsFrom<C>(context: C): Reference<C> {
  return { kind: "follows_from", context };
}

export interface SpanOptions<C> {
  operation: string;
  /** Ordered. Which reference becomes the parent depends on the tracer. */
  references?: readonly Reference<C>[];
  /**
   * Explicit sampling decision. Leave undefined to let the tracer's sampler
   * decide when a new trace starts.
   */
  sampled?: boolean;
  tags?: Record<string, TagValue>;
  /** Defaults to now. */
  startTime?: Date;
}

/** Standard log field labels, plus free-form ones. */
export type LogFields = {
  event?:        string;
  message?:      string;
  stack?:        string;
  "error.kind"?: string;
} & Record<string, TagValue | undefined>;

export interface LogRecord {
  time:   Date;
  fields: LogFields;
}

export interface FinishedSpan<C> {
  operation:  string;
  start:      Date;
  /** Seconds. */
  duration:   number;
  context:    C;
  references: readonly Reference<C>[];
  tags:       Record<string, TagValue>;
  /** Chronological. */
  logs:       LogRecord[];
}
