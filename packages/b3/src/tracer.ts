import { BaseTracer, decodeOrThrow, nextSpanId, nextTraceId128 } from "@tracewire/core";
import type {
  Codec,
  DerivationEnv,
  HeadersLike,
  HttpHeaders,
  Reference,
  SpanOptions,
  TextMap,
  TraceId128,
  TracerOptions,
} from "@tracewire/core";
import { B3Context } from "./context.js";
import { Flag, NO_FLAGS } from "./flags.js";
import { b3HttpHeadersCodec, b3TextMapCodec } from "./propagation.js";

export interface B3TracerOptions extends TracerOptions<B3Context, TraceId128> {
  /** Draw 128-bit trace IDs. Default: true */
  traceId128bit?: boolean;
}

export interface B3DerivationEnv extends DerivationEnv<TraceId128> {
  readonly traceId128bit: boolean;
}

/** Carrier types per format, as [encoded, accepted for decoding]. */
export interface B3Carriers {
  text_map:     [TextMap, TextMap];
  http_headers: [HttpHeaders, HeadersLike];
}

export type B3Format = keyof B3Carriers;

const codecs: { [F in B3Format]: Codec<B3Context, B3Carriers[F][0], B3Carriers[F][1]> } = {
  text_map:     b3TextMapCodec,
  http_headers: b3HttpHeadersCodec,
};

/**
 * The first child_of reference is the parent. follows_from references never
 * are: with no child_of reference the span starts a new trace.
 */
export function selectParent(
  references: readonly Reference<B3Context>[],
): Reference<B3Context> | undefined {
  return references.find((ref) => ref.kind === "child_of");
}

export function freshContext(
  env: B3DerivationEnv,
  options: Pick<SpanOptions<B3Context>, "operation" | "sampled">,
): B3Context {
  const traceId = nextTraceId128(env.idGenerator, env.traceId128bit);
  const spanId  = nextSpanId(env.idGenerator);
  const sampled = options.sampled ?? env.sampler(traceId, options.operation);
  return new B3Context({
    traceId,
    spanId,
    flags: sampled ? Flag.Sampled : NO_FLAGS,
  });
}

/**
 * Continues the parent's trace: new span ID, parent recorded, every flag
 * (debug included) inherited. Baggage is not inherited.
 */
export function childContext(
  env: Pick<DerivationEnv<TraceId128>, "idGenerator">,
  parent: B3Context,
): B3Context {
  return new B3Context({
    traceId:      parent.traceId,
    spanId:       nextSpanId(env.idGenerator),
    parentSpanId: parent.spanId,
    flags:        parent.flags,
  });
}

/**
 * Tracer for B3-compatible contexts.
 *
 * @example
 * ```ts
 * const tracer = new B3Tracer({ sampler: probabilisticSampler(0.1) });
 * const server = tracer.startSpan({
 *   operation:  "handle-request",
 *   references: [childOf(tracer.extract("http_headers", req.headers))],
 * });
 * ```
 */
export class B3Tracer extends BaseTracer<B3Context, TraceId128> implements B3DerivationEnv {
  readonly traceId128bit: boolean;

  constructor(opts: B3TracerOptions) {
    super(opts);
    this.traceId128bit = opts.traceId128bit ?? true;
  }

  deriveContext(options: SpanOptions<B3Context>): B3Context {
    const parent = selectParent(options.references ?? []);
    return parent ? childContext(this, parent.context) : freshContext(this, options);
  }

  inject<F extends B3Format>(context: B3Context, format: F): B3Carriers[F][0] {
    return codecs[format].encode(context);
  }

  /** @throws {MalformedCarrierError} when x-b3-traceid or x-b3-spanid is missing or malformed. */
  extract<F extends B3Format>(format: F, carrier: B3Carriers[F][1]): B3Context {
    return decodeOrThrow(codecs[format].decode(carrier));
  }
}
