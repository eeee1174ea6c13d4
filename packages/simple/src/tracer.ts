import { BaseTracer, decodeOrThrow, nextSpanId } from "@tracewire/core";
import type {
  Codec,
  DerivationEnv,
  HeadersLike,
  HttpHeaders,
  Reference,
  SpanOptions,
  TextMap,
  TracerOptions,
} from "@tracewire/core";
import { SimpleContext } from "./context.js";
import { httpHeadersCodec, textMapCodec } from "./propagation.js";

export type SimpleTracerOptions = TracerOptions<SimpleContext, bigint>;

/** Carrier types per format, as [encoded, accepted for decoding]. */
export interface SimpleCarriers {
  text_map:     [TextMap, TextMap];
  http_headers: [HttpHeaders, HeadersLike];
}

export type SimpleFormat = keyof SimpleCarriers;

const codecs: { [F in SimpleFormat]: Codec<SimpleContext, SimpleCarriers[F][0], SimpleCarriers[F][1]> } = {
  text_map:     textMapCodec,
  http_headers: httpHeadersCodec,
};

/**
 * The first reference is the parent, whatever its kind. (The B3 tracer
 * instead looks for the first child_of reference.)
 */
export function selectParent(
  references: readonly Reference<SimpleContext>[],
): Reference<SimpleContext> | undefined {
  return references[0];
}

/**
 * Starts a new trace. The sampler is consulted only when the caller did not
 * decide already.
 */
export function freshContext(
  env: DerivationEnv<bigint>,
  options: Pick<SpanOptions<SimpleContext>, "operation" | "sampled">,
): SimpleContext {
  const traceId = env.idGenerator.next64();
  const spanId  = nextSpanId(env.idGenerator);
  const sampled = options.sampled ?? env.sampler(traceId, options.operation);
  return new SimpleContext({ traceId, spanId, sampled });
}

/**
 * Continues the parent's trace with a new span ID. The sampling decision is
 * inherited; baggage is not.
 */
export function childContext(
  env: Pick<DerivationEnv<bigint>, "idGenerator">,
  parent: SimpleContext,
): SimpleContext {
  return new SimpleContext({
    traceId: parent.traceId,
    spanId:  nextSpanId(env.idGenerator),
    sampled: parent.sampled,
  });
}

/**
 * Tracer for the minimal context variant.
 *
 * @example
 * ```ts
 * const tracer = new SimpleTracer({ sampler: constSampler(true) });
 * const span = tracer.startSpan({ operation: "get-user" });
 * const headers = tracer.inject(span.context, "http_headers");
 * span.finish();
 * ```
 */
export class SimpleTracer extends BaseTracer<SimpleContext, bigint> {
  deriveContext(options: SpanOptions<SimpleContext>): SimpleContext {
    const parent = selectParent(options.references ?? []);
    return parent ? childContext(this, parent.context) : freshContext(this, options);
  }

  inject<F extends SimpleFormat>(context: SimpleContext, format: F): SimpleCarriers[F][0] {
    return codecs[format].encode(context);
  }

  /** @throws {MalformedCarrierError} when a required field is missing or malformed. */
  extract<F extends SimpleFormat>(format: F, carrier: SimpleCarriers[F][1]): SimpleContext {
    return decodeOrThrow(codecs[format].decode(carrier));
  }
}
