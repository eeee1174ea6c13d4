export type {
  SpanId,
  TraceId128,
  Baggage,
  TagValue,
  SpanContext,
  AnyContext,
  ContextJson,
  ReferenceKind,
  Reference,
  SpanOptions,
  LogFields,
  LogRecord,
  FinishedSpan,
} from "./types.js";
export { childOf, followsFrom } from "./types.js";

export {
  MAX_UINT64,
  RandomIdGenerator,
  defaultIdGenerator,
  nextSpanId,
  nextTraceId128,
  formatDecimal,
  formatHex64,
  formatTraceIdHex,
} from "./ids.js";
export type { IdGenerator } from "./ids.js";

export { constSampler, probabilisticSampler } from "./sampling.js";
export type { Sampler } from "./sampling.js";

export { EMPTY_BAGGAGE, withBaggageItem, encodeBaggage, decodeBaggage } from "./baggage.js";

export { decimalIdSchema, hexSpanIdSchema, hexTraceIdSchema } from "./schemas.js";

export {
  required,
  lenient,
  decodeFields,
  decodeOrThrow,
  toHttpHeaders,
  fromHttpHeaders,
  httpHeadersCodec,
} from "./carrier.js";
export type { TextMap, HttpHeaders, HeadersLike, DecodeResult, Codec } from "./carrier.js";

export { TracewireError, MalformedCarrierError } from "./errors.js";

export { SpanHandle } from "./span.js";

export {
  JsonLinesReporter,
  MemoryReporter,
  noopReporter,
  encodeFinishedSpan,
} from "./reporter.js";
export type { Reporter, FinishedSpanJson, JsonLinesReporterOptions } from "./reporter.js";

export { BaseTracer } from "./tracer.js";
export type { TracerOptions, DerivationEnv } from "./tracer.js";
