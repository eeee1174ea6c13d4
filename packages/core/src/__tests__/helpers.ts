import type { Baggage, ContextJson, SpanContext } from "../types.js";
import type { IdGenerator } from "../ids.js";

/** Hands out the given values in order, then fails. */
export class SequenceIdGenerator implements IdGenerator {
  readonly #values: bigint[];

  constructor(...values: bigint[]) {
    this.#values = values;
  }

  next64(): bigint {
    const value = this.#values.shift();
    if (value === undefined) throw new Error("SequenceIdGenerator exhausted");
    return value;
  }
}

export class FakeContext implements SpanContext<string, FakeContext> {
  constructor(
    readonly traceId: string,
    readonly spanId: bigint,
    readonly sampled: boolean = true,
    readonly baggage: Baggage = {},
  ) {}

  withBaggageItem(key: string, value: string): FakeContext {
    return new FakeContext(this.traceId, this.spanId, this.sampled, { ...this.baggage, [key]: value });
  }

  withSampled(sampled: boolean): FakeContext {
    return new FakeContext(this.traceId, this.spanId, sampled, this.baggage);
  }

  toJSON(): ContextJson {
    return {
      trace_id: this.traceId,
      span_id:  this.spanId.toString(),
      sampled:  this.sampled,
      baggage:  { ...this.baggage },
    };
  }
}
