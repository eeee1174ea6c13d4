import type { Baggage } from "./types.js";

export const EMPTY_BAGGAGE: Baggage = Object.freeze({});

/** Frozen copy of `baggage` with `key` set to `value`. */
export function withBaggageItem(baggage: Baggage, key: string, value: string): Baggage {
  return Object.freeze({ ...baggage, [key]: value });
}

/** Spreads baggage into carrier entries: item `k` becomes `${prefix}k`. */
export function encodeBaggage(baggage: Baggage, prefix: string): Record<string, string> {
  return Object.fromEntries(Object.entries(baggage).map(([key, value]): [string, string] => [prefix + key, value]));
}

/**
 * Collects every carrier entry whose key starts with `prefix`, prefix
 * stripped. Any string is valid baggage, so this never fails.
 */
export function decodeBaggage(carrier: Readonly<Record<string, string>>, prefix: string): Baggage {
  // fromEntries defines own properties, so a `__proto__` item survives.
  const items = Object.entries(carrier)
    .filter(([key]) => key.startsWith(prefix))
    .map(([key, value]): [string, string] => [key.slice(prefix.length), value]);
  return Object.freeze(Object.fromEntries(items));
}
