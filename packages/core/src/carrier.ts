import type { z } from "zod";
import { MalformedCarrierError } from "./errors.js";

/** Flat string-to-string carrier. */
export type TextMap = Record<string, string>;

/**
 * Outgoing HTTP headers, names lower-cased. Usable as a `fetch` HeadersInit
 * and as Node's `OutgoingHttpHeaders`.
 */
export type HttpHeaders = Record<string, string>;

/** Incoming headers: a WHATWG `Headers` or Node's `IncomingHttpHeaders`. */
export type HeadersLike = Headers | Readonly<Record<string, string | readonly string[] | undefined>>;

export type DecodeResult<C> =
  | { success: true;  context: C }
  | { success: false; error: MalformedCarrierError };

/** Bidirectional conversion between a context and one carrier format. */
export interface Codec<C, TOut, TIn = TOut> {
  /** Total: never throws. */
  encode(context: C): TOut;
  /** Either a complete context or an error, never a partial context. */
  decode(carrier: TIn): DecodeResult<C>;
}

// ── Field policies ──────────────────────────────────────────────────────────
//
// A carrier's reserved fields are declared as one z.object whose entries are
// wrapped in one of the two policies below:
//
//   required — missing or unparsable aborts the whole decode
//   lenient  — missing or unparsable silently becomes `fallback`

export function required<T extends z.ZodTypeAny>(schema: T): T {
  return schema;
}

export function lenient<T extends z.ZodTypeAny>(schema: T, fallback: z.output<T>): z.ZodCatch<T> {
  return schema.catch(fallback);
}

/** Runs a field policy table over a carrier. */
export function decodeFields<T>(
  table: z.ZodType<T, z.ZodTypeDef, unknown>,
  carrier: TextMap,
): { success: true; data: T } | { success: false; error: MalformedCarrierError } {
  const result = table.safeParse(carrier);
  if (result.success) {
    return { success: true, data: result.data };
  }
  return { success: false, error: new MalformedCarrierError(result.error.issues) };
}

export function decodeOrThrow<C>(result: DecodeResult<C>): C {
  if (!result.success) {
    throw result.error;
  }
  return result.context;
}

// ── HTTP headers ────────────────────────────────────────────────────────────

/** Relabels a text map as HTTP headers. Header names are case-insensitive. */
export function toHttpHeaders(textMap: TextMap): HttpHeaders {
  const headers: HttpHeaders = {};
  for (const [key, value] of Object.entries(textMap)) {
    headers[key.toLowerCase()] = value;
  }
  return headers;
}

/**
 * Relabels incoming headers as a text map with lower-cased keys. Of a
 * repeated header the first value wins.
 */
export function fromHttpHeaders(headers: HeadersLike): TextMap {
  const textMap: TextMap = {};
  if (headers instanceof Headers) {
    headers.forEach((value, key) => {
      textMap[key.toLowerCase()] = value;
    });
    return textMap;
  }
  for (const [key, value] of Object.entries(headers)) {
    const first = typeof value === "string" ? value : value?.[0];
    if (first !== undefined) {
      textMap[key.toLowerCase()] = first;
    }
  }
  return textMap;
}

/** Wraps a text-map codec so it reads and writes HTTP headers instead. */
export function httpHeadersCodec<C>(textMap: Codec<C, TextMap>): Codec<C, HttpHeaders, HeadersLike> {
  return {
    encode: (context) => toHttpHeaders(textMap.encode(context)),
    decode: (headers) => textMap.decode(fromHttpHeaders(headers)),
  };
}
