import { config as loadEnv } from "dotenv";
import { fileURLToPath } from "url";
import { dirname, join } from "path";
import { probabilisticSampler } from "@tracewire/core";

// Load examples/.env relative to this file, so the path is correct
// regardless of which directory you run the script from.
loadEnv({ path: join(dirname(fileURLToPath(import.meta.url)), ".env") });

const rawRate = process.env["TRACEWIRE_SAMPLE_RATE"] ?? "1";
const sampleRate = Number(rawRate);
if (Number.isNaN(sampleRate)) {
  console.error(`TRACEWIRE_SAMPLE_RATE must be a number between 0 and 1, got "${rawRate}"`);
  process.exit(1);
}

export const config = {
  sampler:       probabilisticSampler(sampleRate),
  traceId128bit: process.env["TRACEWIRE_TRACE_ID_128BIT"] !== "false",
};
