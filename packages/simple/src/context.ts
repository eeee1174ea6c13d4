import { EMPTY_BAGGAGE, formatDecimal, withBaggageItem } from "@tracewire/core";
import type { Baggage, ContextJson, SpanContext, SpanId } from "@tracewire/core";

export interface SimpleContextInit {
  traceId:  bigint;
  spanId:   SpanId;
  sampled:  boolean;
  baggage?: Baggage;
}

/**
 * Minimal span context: a 64-bit trace ID, a span ID, a definite sampling
 * decision and baggage. The parent is not recorded here; a child shares its
 * parent's trace ID and the parent is named by the span's references.
 */
export class SimpleContext implements SpanContext<bigint, SimpleContext> {
  readonly traceId: bigint;
  readonly spanId:  SpanId;
  readonly sampled: boolean;
  readonly baggage: Baggage;

  constructor(init: SimpleContextInit) {
    this.traceId = init.traceId;
    this.spanId  = init.spanId;
    this.sampled = init.sampled;
    this.baggage = init.baggage ? Object.freeze({ ...init.baggage }) : EMPTY_BAGGAGE;
    Object.freeze(this);
  }

  withBaggageItem(key: string, value: string): SimpleContext {
    return new SimpleContext({ ...this, baggage: withBaggageItem(this.baggage, key, value) });
  }

  withSampled(sampled: boolean): SimpleContext {
    return new SimpleContext({ ...this, sampled });
  }

  toJSON(): ContextJson {
    return {
      trace_id: formatDecimal(this.traceId),
      span_id:  formatDecimal(this.spanId),
      sampled:  this.sampled,
      baggage:  { ...this.baggage },
    };
  }
}
