import { describe, it, expect } from "vitest";
import {
  MAX_UINT64,
  RandomIdGenerator,
  defaultIdGenerator,
  formatDecimal,
  formatHex64,
  formatTraceIdHex,
  nextSpanId,
  nextTraceId128,
} from "../ids.js";
import { SequenceIdGenerator } from "./helpers.js";

describe("RandomIdGenerator", () => {
  it("returns unsigned 64-bit values", () => {
    const gen = new RandomIdGenerator();
    for (let i = 0; i < 500; i++) {
      const id = gen.next64();
      expect(typeof id).toBe("bigint");
      expect(id >= 0n && id <= MAX_UINT64).toBe(true);
    }
  });

  it("generates unique IDs", () => {
    const ids = new Set(Array.from({ length: 1000 }, () => defaultIdGenerator.next64()));
    expect(ids.size).toBe(1000);
  });

  it("refills its pool when exhausted", () => {
    const gen = new RandomIdGenerator(1);
    const ids = new Set([gen.next64(), gen.next64(), gen.next64()]);
    expect(ids.size).toBe(3);
  });

  it("rounds a fractional pool size down to whole words", () => {
    const gen = new RandomIdGenerator(1.5);
    const ids = new Set([gen.next64(), gen.next64(), gen.next64()]);
    expect(ids.size).toBe(3);
  });

  it("uses the high bits too", () => {
    const gen = new RandomIdGenerator();
    const draws = Array.from({ length: 64 }, () => gen.next64());
    expect(draws.some((id) => id >= 1n << 63n)).toBe(true);
  });
});

describe("nextTraceId128", () => {
  it("draws hi then lo in 128-bit mode", () => {
    const gen = new SequenceIdGenerator(7n, 9n);
    expect(nextTraceId128(gen, true)).toEqual({ hi: 7n, lo: 9n });
  });

  it("draws only lo in 64-bit mode", () => {
    const gen = new SequenceIdGenerator(7n, 9n);
    expect(nextTraceId128(gen, false)).toEqual({ hi: undefined, lo: 7n });
    expect(nextSpanId(gen)).toBe(9n);
  });
});

describe("formatting", () => {
  it("formats decimal IDs", () => {
    expect(formatDecimal(0n)).toBe("0");
    expect(formatDecimal(MAX_UINT64)).toBe("18446744073709551615");
  });

  it("zero-pads hex span IDs to 16 digits", () => {
    expect(formatHex64(2n)).toBe("0000000000000002");
    expect(formatHex64(0xabcn)).toBe("0000000000000abc");
    expect(formatHex64(MAX_UINT64)).toBe("ffffffffffffffff");
  });

  it("formats a 128-bit trace ID as hi||lo", () => {
    expect(formatTraceIdHex({ hi: 0n, lo: 1n })).toBe("00000000000000000000000000000001");
    expect(formatTraceIdHex({ hi: 0x10n, lo: 0x20n })).toBe("00000000000000100000000000000020");
  });

  it("formats a 64-bit trace ID as 16 digits", () => {
    expect(formatTraceIdHex({ hi: undefined, lo: 0xffn })).toBe("00000000000000ff");
  });
});
