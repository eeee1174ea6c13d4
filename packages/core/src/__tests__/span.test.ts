import { describe, it, expect, vi } from "vitest";
import { SpanHandle } from "../span.js";
import type { SpanHandleInit } from "../span.js";
import { MemoryReporter } from "../reporter.js";
import { childOf } from "../types.js";
import { FakeContext } from "./helpers.js";

const START = new Date("2026-01-01T00:00:00.000Z");

function makeSpan(overrides: Partial<SpanHandleInit<FakeContext>> = {}) {
  const reporter = new MemoryReporter<FakeContext>();
  const onError  = vi.fn();
  const span = new SpanHandle<FakeContext>({
    operation:  "test-span",
    context:    new FakeContext("t1", 1n),
    references: [],
    tags:       {},
    startTime:  START,
    reporter,
    onError,
    ...overrides,
  });
  return { span, reporter, onError };
}

describe("SpanHandle — finish()", () => {
  it("reports the finished span", () => {
    const { span, reporter } = makeSpan();
    span.finish(new Date(START.getTime() + 1500));
    expect(reporter.spans).toHaveLength(1);
    expect(reporter.spans[0]?.operation).toBe("test-span");
    expect(reporter.spans[0]?.duration).toBe(1.5);
    expect(span.finished).toBe(true);
  });

  it("is idempotent — second call is a no-op", () => {
    const { span, reporter } = makeSpan();
    const first  = span.finish(new Date(START.getTime() + 10));
    const second = span.finish(new Date(START.getTime() + 99));
    expect(second).toBe(first);
    expect(reporter.spans).toHaveLength(1);
  });

  it("does not report unsampled spans", () => {
    const { span, reporter } = makeSpan({ context: new FakeContext("t1", 1n, false) });
    const finished = span.finish();
    expect(finished.context.sampled).toBe(false);
    expect(reporter.spans).toHaveLength(0);
  });

  it("routes reporter failures to onError", () => {
    const failure = new Error("sink closed");
    const { span, onError } = makeSpan({
      reporter: { report: () => { throw failure; } },
    });
    expect(() => span.finish()).not.toThrow();
    expect(onError).toHaveBeenCalledWith(failure);
  });

  it("wraps non-Error throws before calling onError", () => {
    const { span, onError } = makeSpan({
      reporter: { report: () => { throw "boom"; } },
    });
    span.finish();
    expect(onError.mock.calls[0]?.[0]).toBeInstanceOf(Error);
    expect(onError.mock.calls[0]?.[0].message).toBe("boom");
  });
});

describe("SpanHandle — tags, logs and baggage", () => {
  it("records tags and logs in order", () => {
    const { span } = makeSpan({ tags: { component: "db" } });
    const t1 = new Date(START.getTime() + 1);
    const t2 = new Date(START.getTime() + 2);
    span.setTag("rows", 3).log({ event: "query" }, t1).log({ message: "done" }, t2);
    const finished = span.finish();
    expect(finished.tags).toEqual({ component: "db", rows: 3 });
    expect(finished.logs).toEqual([
      { time: t1, fields: { event: "query" } },
      { time: t2, fields: { message: "done" } },
    ]);
  });

  it("keeps references as given", () => {
    const parent = new FakeContext("t1", 9n);
    const { span } = makeSpan({ references: [childOf(parent)] });
    expect(span.finish().references).toEqual([{ kind: "child_of", context: parent }]);
  });

  it("setBaggageItem replaces the context without touching the old one", () => {
    const { span } = makeSpan();
    const before = span.context;
    span.setBaggageItem("user", "alice");
    expect(span.context.baggage).toEqual({ user: "alice" });
    expect(before.baggage).toEqual({});
    expect(span.context.spanId).toBe(before.spanId);
  });
});
