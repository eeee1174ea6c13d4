import { EMPTY_BAGGAGE, formatHex64, formatTraceIdHex, withBaggageItem } from "@tracewire/core";
import type { Baggage, ContextJson, SpanContext, SpanId, TraceId128 } from "@tracewire/core";
import { Flag, NO_FLAGS, flagNames, hasFlag, withFlag, withoutFlag } from "./flags.js";
import type { FlagSet } from "./flags.js";

export interface B3ContextInit {
  traceId:       TraceId128;
  spanId:        SpanId;
  parentSpanId?: SpanId;
  flags?:        FlagSet;
  baggage?:      Baggage;
}

/**
 * B3-compatible span context.
 *
 * Whether the context is sampled is not stored on its own: it is the
 * presence of Flag.Sampled in `flags`.
 */
export class B3Context implements SpanContext<TraceId128, B3Context> {
  readonly traceId:      TraceId128;
  readonly spanId:       SpanId;
  readonly parentSpanId: SpanId | undefined;
  readonly flags:        FlagSet;
  readonly baggage:      Baggage;

  constructor(init: B3ContextInit) {
    this.traceId      = Object.freeze({ hi: init.traceId.hi, lo: init.traceId.lo });
    this.spanId       = init.spanId;
    this.parentSpanId = init.parentSpanId;
    this.flags        = init.flags ?? NO_FLAGS;
    this.baggage      = init.baggage ? Object.freeze({ ...init.baggage }) : EMPTY_BAGGAGE;
    Object.freeze(this);
  }

  get sampled(): boolean {
    return hasFlag(this.flags, Flag.Sampled);
  }

  hasFlag(flag: Flag): boolean {
    return hasFlag(this.flags, flag);
  }

  withFlag(flag: Flag): B3Context {
    return this.#with({ flags: withFlag(this.flags, flag) });
  }

  withoutFlag(flag: Flag): B3Context {
    return this.#with({ flags: withoutFlag(this.flags, flag) });
  }

  withSampled(sampled: boolean): B3Context {
    return sampled ? this.withFlag(Flag.Sampled) : this.withoutFlag(Flag.Sampled);
  }

  withBaggageItem(key: string, value: string): B3Context {
    return this.#with({ baggage: withBaggageItem(this.baggage, key, value) });
  }

  toJSON(): ContextJson {
    const json: ContextJson = {
      trace_id: formatTraceIdHex(this.traceId),
      span_id:  formatHex64(this.spanId),
      sampled:  this.sampled,
      flags:    flagNames(this.flags),
      baggage:  { ...this.baggage },
    };
    if (this.parentSpanId !== undefined) {
      json.parent_span_id = formatHex64(this.parentSpanId);
    }
    return json;
  }

  #with(changes: Partial<B3ContextInit>): B3Context {
    return new B3Context({
      traceId:      this.traceId,
      spanId:       this.spanId,
      parentSpanId: this.parentSpanId,
      flags:        this.flags,
      baggage:      this.baggage,
      ...changes,
    });
  }
}
