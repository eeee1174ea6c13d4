import { z } from "zod";
import { MAX_UINT64 } from "./ids.js";
import type { TraceId128 } from "./types.js";

// Wire formats of 64-bit IDs:
//   decimal — 1 to 20 digits, at most 2^64 - 1
//   hex     — 16 digits per 64-bit word, either letter case

export const decimalIdSchema = z
  .string()
  .regex(/^[0-9]{1,20}$/, "must be an unsigned decimal integer")
  .transform((value, ctx) => {
    const id = BigInt(value);
    if (id > MAX_UINT64) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: "must fit in 64 bits" });
      return z.NEVER;
    }
    return id;
  });

export const hexSpanIdSchema = z
  .string()
  .regex(/^[0-9a-f]{16}$/i, "must be 16 hex digits")
  .transform((value) => BigInt(`0x${value}`));

export const hexTraceIdSchema = z
  .string()
  .regex(/^(?:[0-9a-f]{16}|[0-9a-f]{32})$/i, "must be 16 or 32 hex digits")
  .transform((value): TraceId128 =>
    value.length === 32
      ? { hi: BigInt(`0x${value.slice(0, 16)}`), lo: BigInt(`0x${value.slice(16)}`) }
      : { hi: undefined, lo: BigInt(`0x${value}`) },
  );
