export { Flag, NO_FLAGS, flagsOf, hasFlag, withFlag, withoutFlag, flagNames } from "./flags.js";
export type { FlagSet } from "./flags.js";

export { B3Context } from "./context.js";
export type { B3ContextInit } from "./context.js";

export {
  TRACE_ID_HEADER,
  SPAN_ID_HEADER,
  PARENT_SPAN_ID_HEADER,
  SAMPLED_HEADER,
  FLAGS_HEADER,
  BAGGAGE_PREFIX,
  b3TextMapCodec,
  b3HttpHeadersCodec,
} from "./propagation.js";

export { B3Tracer, freshContext, childContext, selectParent } from "./tracer.js";
export type { B3TracerOptions, B3DerivationEnv, B3Carriers, B3Format } from "./tracer.js";
