/**
 * 02-b3-propagation — B3 headers between two services, including a
 * malformed request.
 *
 * Run: npm run b3 --workspace=examples
 */

import { JsonLinesReporter, MalformedCarrierError, childOf } from "@tracewire/core";
import { B3Tracer, Flag } from "@tracewire/b3";
import type { B3Context } from "@tracewire/b3";
import { config } from "./config.js";

const tracer = new B3Tracer({
  sampler:       config.sampler,
  traceId128bit: config.traceId128bit,
  reporter:      new JsonLinesReporter<B3Context>(),
});

// ── Client ────────────────────────────────────────────────────────────────────

const outgoing = tracer.startSpan({ operation: "checkout", sampled: true });
const debugContext = outgoing.context.withFlag(Flag.Debug);
const headers = tracer.inject(debugContext, "http_headers");
console.log("request headers:", headers);

// ── Server ────────────────────────────────────────────────────────────────────

// Header names arrive in whatever case the client's HTTP stack chose.
const received = new Headers(headers);
const serverSpan = tracer.startSpan({
  operation:  "charge-card",
  references: [childOf(tracer.extract("http_headers", received))],
});
serverSpan.setTag("debug", serverSpan.context.hasFlag(Flag.Debug));
serverSpan.finish();
outgoing.finish();

// ── Malformed request ─────────────────────────────────────────────────────────

try {
  tracer.extract("http_headers", { "X-B3-TraceId": "not-hex", "X-B3-ParentSpanId": "also-bad" });
} catch (err) {
  if (!(err instanceof MalformedCarrierError)) throw err;
  console.log("rejected carrier, bad keys:", err.keys.join(", "));
}
