export { SimpleContext } from "./context.js";
export type { SimpleContextInit } from "./context.js";

export {
  TRACE_ID_KEY,
  SPAN_ID_KEY,
  SAMPLED_KEY,
  BAGGAGE_PREFIX,
  textMapCodec,
  httpHeadersCodec,
} from "./propagation.js";

export { SimpleTracer, freshContext, childContext, selectParent } from "./tracer.js";
export type { SimpleTracerOptions, SimpleCarriers, SimpleFormat } from "./tracer.js";
