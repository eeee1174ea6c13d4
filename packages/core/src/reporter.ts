import type { ContextJson, FinishedSpan, ReferenceKind, TagValue } from "./types.js";

/** Receives every sampled span once it finishes. */
export interface Reporter<C> {
  report(span: FinishedSpan<C>): void;
}

export interface FinishedSpanJson {
  operation:  string;
  /** ISO 8601 */
  start:      string;
  /** Seconds */
  duration:   number;
  context:    ContextJson;
  references: Partial<Record<ReferenceKind, ContextJson>>[];
  tags:       Record<string, TagValue>;
  logs:       { time: string; fields: Record<string, TagValue> }[];
}

/** Documented wire shape of a finished span, as written by JsonLinesReporter. */
export function encodeFinishedSpan<C extends { toJSON(): ContextJson }>(
  span: FinishedSpan<C>,
): FinishedSpanJson {
  return {
    operation:  span.operation,
    start:      span.start.toISOString(),
    duration:   span.duration,
    context:    span.context.toJSON(),
    references: span.references.map((ref) =>
      ref.kind === "child_of"
        ? { child_of: ref.context.toJSON() }
        : { follows_from: ref.context.toJSON() },
    ),
    tags:       { ...span.tags },
    logs:       span.logs.map((record) => ({
      time:   record.time.toISOString(),
      fields: definedFields(record.fields),
    })),
  };
}

function definedFields(fields: Record<string, TagValue | undefined>): Record<string, TagValue> {
  const out: Record<string, TagValue> = {};
  for (const [key, value] of Object.entries(fields)) {
    if (value !== undefined) out[key] = value;
  }
  return out;
}

export interface JsonLinesReporterOptions {
  /** Receives one JSON document per finished span. Default: console.log. */
  write?: (line: string) => void;
}

/** Writes each finished span as a single line of JSON. */
export class JsonLinesReporter<C extends { toJSON(): ContextJson }> implements Reporter<C> {
  readonly #write: (line: string) => void;

  constructor(opts: JsonLinesReporterOptions = {}) {
    this.#write = opts.write ?? ((line) => console.log(line));
  }

  report(span: FinishedSpan<C>): void {
    this.#write(JSON.stringify(encodeFinishedSpan(span)));
  }
}

/** Keeps finished spans in memory. */
export class MemoryReporter<C> implements Reporter<C> {
  readonly spans: FinishedSpan<C>[] = [];

  report(span: FinishedSpan<C>): void {
    this.spans.push(span);
  }

  clear(): void {
    this.spans.length = 0;
  }
}

export const noopReporter: Reporter<unknown> = {
  report: () => {},
};
