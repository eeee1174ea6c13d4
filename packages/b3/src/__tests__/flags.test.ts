import { describe, it, expect } from "vitest";
import { Flag, NO_FLAGS, flagNames, flagsOf, hasFlag, withFlag, withoutFlag } from "../flags.js";

describe("flag sets", () => {
  it("builds sets from flags", () => {
    expect(flagsOf()).toBe(NO_FLAGS);
    expect(flagsOf(Flag.Debug, Flag.Sampled)).toBe(Flag.Debug | Flag.Sampled);
  });

  it("tests membership", () => {
    const set = flagsOf(Flag.Sampled);
    expect(hasFlag(set, Flag.Sampled)).toBe(true);
    expect(hasFlag(set, Flag.Debug)).toBe(false);
  });

  it("inserts and removes flags without touching the others", () => {
    const set = withFlag(flagsOf(Flag.Debug), Flag.Sampled);
    expect(hasFlag(set, Flag.Debug)).toBe(true);
    expect(hasFlag(set, Flag.Sampled)).toBe(true);
    const removed = withoutFlag(set, Flag.Sampled);
    expect(hasFlag(removed, Flag.Sampled)).toBe(false);
    expect(hasFlag(removed, Flag.Debug)).toBe(true);
  });

  it("inserting twice is the same as inserting once", () => {
    expect(withFlag(withFlag(NO_FLAGS, Flag.IsRoot), Flag.IsRoot)).toBe(Flag.IsRoot);
  });

  it("names flags in declaration order", () => {
    expect(flagNames(flagsOf(Flag.IsRoot, Flag.Debug, Flag.Sampled))).toEqual(["debug", "sampled", "is_root"]);
    expect(flagNames(flagsOf(Flag.SamplingSet))).toEqual(["sampling_set"]);
  });
});
