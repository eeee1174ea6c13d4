import { z } from "zod";
import {
  decimalIdSchema,
  decodeBaggage,
  decodeFields,
  encodeBaggage,
  formatDecimal,
  httpHeadersCodec as toHttpCodec,
  required,
} from "@tracewire/core";
import type { Codec, HeadersLike, HttpHeaders, TextMap } from "@tracewire/core";
import { SimpleContext } from "./context.js";

export const TRACE_ID_KEY   = "ot-tracer-traceid";
export const SPAN_ID_KEY    = "ot-tracer-spanid";
export const SAMPLED_KEY    = "ot-tracer-sampled";
export const BAGGAGE_PREFIX = "ot-baggage-";

// "1" is sampled, any other decimal number is not.
const sampledSchema = z
  .string()
  .regex(/^[0-9]+$/, "must be a decimal number")
  .transform((value) => BigInt(value) === 1n);

// Every reserved field of the text map is required.
const textMapFields = z.object({
  [TRACE_ID_KEY]: required(decimalIdSchema),
  [SPAN_ID_KEY]:  required(decimalIdSchema),
  [SAMPLED_KEY]:  required(sampledSchema),
});

/** Decimal IDs, `ot-tracer-*` reserved keys, `ot-baggage-*` baggage. */
export const textMapCodec: Codec<SimpleContext, TextMap> = {
  encode(context) {
    return {
      [TRACE_ID_KEY]: formatDecimal(context.traceId),
      [SPAN_ID_KEY]:  formatDecimal(context.spanId),
      [SAMPLED_KEY]:  context.sampled ? "1" : "0",
      ...encodeBaggage(context.baggage, BAGGAGE_PREFIX),
    };
  },

  decode(carrier) {
    const fields = decodeFields(textMapFields, carrier);
    if (!fields.success) return fields;

    return {
      success: true,
      context: new SimpleContext({
        traceId: fields.data[TRACE_ID_KEY],
        spanId:  fields.data[SPAN_ID_KEY],
        sampled: fields.data[SAMPLED_KEY],
        baggage: decodeBaggage(carrier, BAGGAGE_PREFIX),
      }),
    };
  },
};

/** The text-map encoding carried in case-insensitive HTTP headers. */
export const httpHeadersCodec: Codec<SimpleContext, HttpHeaders, HeadersLike> = toHttpCodec(textMapCodec);
