import { randomFillSync } from "node:crypto";
import type { SpanId, TraceId128 } from "./types.js";

export const MAX_UINT64 = (1n << 64n) - 1n;

/** Source of uniformly random 64-bit values. */
export interface IdGenerator {
  next64(): bigint;
}

const WORD_BYTES = 8;

/**
 * Draws 64-bit IDs from the OS CSPRNG via `crypto.randomFillSync`.
 *
 * Random bytes are fetched in pools of `poolSize` words to keep the number
 * of syscalls down. Draws are synchronous, so two callers on the same event
 * loop never interleave inside one; worker threads each load their own
 * instance of this module.
 */
export class RandomIdGenerator implements IdGenerator {
  readonly #pool: Buffer;
  #offset: number;

  constructor(poolSize = 64) {
    this.#pool   = Buffer.alloc(Math.max(1, Math.floor(poolSize)) * WORD_BYTES);
    this.#offset = this.#pool.length;
  }

  next64(): bigint {
    if (this.#offset >= this.#pool.length) {
      randomFillSync(this.#pool);
      this.#offset = 0;
    }
    const value = this.#pool.readBigUInt64BE(this.#offset);
    this.#offset += WORD_BYTES;
    return value;
  }
}

/** Process-wide generator used when a tracer is not given one. */
export const defaultIdGenerator: IdGenerator = new RandomIdGenerator();

export function nextSpanId(generator: IdGenerator): SpanId {
  return generator.next64();
}

/**
 * Draws a trace ID. With `use128` the high word is drawn first, then the low
 * word; otherwise only the low word is drawn.
 */
export function nextTraceId128(generator: IdGenerator, use128: boolean): TraceId128 {
  const hi = use128 ? generator.next64() : undefined;
  const lo = generator.next64();
  return { hi, lo };
}

// ── Formatting ──────────────────────────────────────────────────────────────

export function formatDecimal(id: bigint): string {
  return id.toString(10);
}

/** 16 lowercase hex digits, zero-padded. */
export function formatHex64(id: bigint): string {
  return id.toString(16).padStart(16, "0");
}

/** 32 hex digits (hi||lo) when the high word is present, else 16. */
export function formatTraceIdHex(traceId: TraceId128): string {
  const lo = formatHex64(traceId.lo);
  return traceId.hi === undefined ? lo : formatHex64(traceId.hi) + lo;
}
