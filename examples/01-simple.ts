/**
 * 01-simple — a root span and a child, carried across a text map.
 *
 * Run: npm run simple --workspace=examples
 */

import { JsonLinesReporter, childOf } from "@tracewire/core";
import { SimpleTracer } from "@tracewire/simple";
import type { SimpleContext } from "@tracewire/simple";
import { config } from "./config.js";

const tracer = new SimpleTracer({
  sampler:  config.sampler,
  reporter: new JsonLinesReporter<SimpleContext>(),
  onError:  (err) => console.error("report failed:", err.message),
});

const root = tracer.startSpan({ operation: "get-user", tags: { "user.id": "u-42" } });
root.setBaggageItem("tenant", "acme");

// What a client would put on the wire.
const carrier = tracer.inject(root.context, "text_map");
console.log("carrier:", carrier);

// What the server would do with it.
const remote = tracer.extract("text_map", carrier);
const child = tracer.startSpan({ operation: "load-profile", references: [childOf(remote)] });
child.log({ event: "cache-miss" });
child.finish();

root.finish();
