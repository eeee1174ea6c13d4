import { z } from "zod";
import {
  decodeBaggage,
  decodeFields,
  encodeBaggage,
  formatHex64,
  formatTraceIdHex,
  hexSpanIdSchema,
  hexTraceIdSchema,
  httpHeadersCodec,
  lenient,
  required,
} from "@tracewire/core";
import type { Codec, HeadersLike, HttpHeaders, TextMap } from "@tracewire/core";
import { B3Context } from "./context.js";
import { Flag, NO_FLAGS, withFlag } from "./flags.js";

export const TRACE_ID_HEADER       = "x-b3-traceid";
export const SPAN_ID_HEADER        = "x-b3-spanid";
export const PARENT_SPAN_ID_HEADER = "x-b3-parentspanid";
export const SAMPLED_HEADER        = "x-b3-sampled";
export const FLAGS_HEADER          = "x-b3-flags";
export const BAGGAGE_PREFIX        = "ot-baggage-";

//   x-b3-traceid       required  16 or 32 hex digits
//   x-b3-spanid        required  16 hex digits
//   x-b3-parentspanid  lenient   16 hex digits, else no parent
//   x-b3-sampled       lenient   "true" sets Sampled, anything else does not
//   x-b3-flags         lenient   "1" sets Debug, anything else does not
const b3Fields = z.object({
  [TRACE_ID_HEADER]:       required(hexTraceIdSchema),
  [SPAN_ID_HEADER]:        required(hexSpanIdSchema),
  [PARENT_SPAN_ID_HEADER]: lenient(hexSpanIdSchema.optional(), undefined),
  [SAMPLED_HEADER]:        lenient(z.literal("true").transform(() => true), false),
  [FLAGS_HEADER]:          lenient(z.literal("1").transform(() => true), false),
});

/** Hex IDs under `x-b3-*`, baggage under `ot-baggage-*`. */
export const b3TextMapCodec: Codec<B3Context, TextMap> = {
  encode(context) {
    const carrier: TextMap = {
      [TRACE_ID_HEADER]: formatTraceIdHex(context.traceId),
      [SPAN_ID_HEADER]:  formatHex64(context.spanId),
    };
    if (context.parentSpanId !== undefined) {
      carrier[PARENT_SPAN_ID_HEADER] = formatHex64(context.parentSpanId);
    }
    carrier[SAMPLED_HEADER] = context.hasFlag(Flag.Sampled) ? "true" : "false";
    carrier[FLAGS_HEADER]   = context.hasFlag(Flag.Debug)   ? "1"    : "0";
    return { ...carrier, ...encodeBaggage(context.baggage, BAGGAGE_PREFIX) };
  },

  decode(carrier) {
    const fields = decodeFields(b3Fields, carrier);
    if (!fields.success) return fields;

    let flags = NO_FLAGS;
    if (fields.data[SAMPLED_HEADER]) flags = withFlag(flags, Flag.Sampled);
    if (fields.data[FLAGS_HEADER])   flags = withFlag(flags, Flag.Debug);

    return {
      success: true,
      context: new B3Context({
        traceId:      fields.data[TRACE_ID_HEADER],
        spanId:       fields.data[SPAN_ID_HEADER],
        parentSpanId: fields.data[PARENT_SPAN_ID_HEADER],
        flags,
        baggage:      decodeBaggage(carrier, BAGGAGE_PREFIX),
      }),
    };
  },
};

/** B3 headers on an HTTP request; names are matched case-insensitively. */
export const b3HttpHeadersCodec: Codec<B3Context, HttpHeaders, HeadersLike> = httpHeadersCodec(b3TextMapCodec);
