/**
 * Decides whether a new trace is recorded.
 *
 * Tracers call it at most once per fresh context and never for a child,
 * whose sampling disposition is inherited. Implementations must not depend
 * on being called in any particular order.
 */
export type Sampler<TTraceId> = (traceId: TTraceId, operation: string) => boolean;

/** Always returns the same decision. */
export function constSampler(decision: boolean): Sampler<unknown> {
  return () => decision;
}

/**
 * Samples each new trace independently with probability `rate`.
 * Rates outside [0, 1] are clamped.
 */
export function probabilisticSampler(rate: number): Sampler<unknown> {
  const p = Number.isNaN(rate) ? 0 : Math.min(1, Math.max(0, rate));
  if (p === 0) return constSampler(false);
  if (p === 1) return constSampler(true);
  return () => Math.random() < p;
}
