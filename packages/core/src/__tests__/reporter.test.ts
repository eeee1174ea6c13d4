import { describe, it, expect, vi } from "vitest";
import { JsonLinesReporter, MemoryReporter, encodeFinishedSpan, noopReporter } from "../reporter.js";
import type { FinishedSpan } from "../types.js";
import { FakeContext } from "./helpers.js";

const parent = new FakeContext("t1", 1n);
const child  = new FakeContext("t1", 2n, true, { user: "alice" });

const finished: FinishedSpan<FakeContext> = {
  operation:  "get-user",
  start:      new Date("2026-01-01T00:00:00.000Z"),
  duration:   0.25,
  context:    child,
  references: [
    { kind: "child_of", context: parent },
    { kind: "follows_from", context: parent },
  ],
  tags: { "http.status_code": 200 },
  logs: [
    { time: new Date("2026-01-01T00:00:00.100Z"), fields: { event: "cache-miss", stack: undefined } },
  ],
};

const parentJson = { trace_id: "t1", span_id: "1", sampled: true, baggage: {} };

describe("encodeFinishedSpan", () => {
  it("renders the documented shape", () => {
    expect(encodeFinishedSpan(finished)).toEqual({
      operation:  "get-user",
      start:      "2026-01-01T00:00:00.000Z",
      duration:   0.25,
      context:    { trace_id: "t1", span_id: "2", sampled: true, baggage: { user: "alice" } },
      references: [{ child_of: parentJson }, { follows_from: parentJson }],
      tags:       { "http.status_code": 200 },
      logs:       [{ time: "2026-01-01T00:00:00.100Z", fields: { event: "cache-miss" } }],
    });
  });
});

describe("JsonLinesReporter", () => {
  it("writes one JSON line per span", () => {
    const write = vi.fn();
    new JsonLinesReporter<FakeContext>({ write }).report(finished);
    expect(write).toHaveBeenCalledOnce();
    expect(JSON.parse(write.mock.calls[0]?.[0])).toEqual(encodeFinishedSpan(finished));
  });

  it("defaults to console.log", () => {
    const log = vi.spyOn(console, "log").mockImplementation(() => {});
    new JsonLinesReporter<FakeContext>().report(finished);
    expect(log).toHaveBeenCalledWith(JSON.stringify(encodeFinishedSpan(finished)));
    log.mockRestore();
  });
});

describe("MemoryReporter", () => {
  it("keeps spans until cleared", () => {
    const reporter = new MemoryReporter<FakeContext>();
    reporter.report(finished);
    expect(reporter.spans).toEqual([finished]);
    reporter.clear();
    expect(reporter.spans).toEqual([]);
  });
});

describe("noopReporter", () => {
  it("accepts spans", () => {
    expect(() => noopReporter.report(finished)).not.toThrow();
  });
});
