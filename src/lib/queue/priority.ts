import { FRESHNESS_MAX_BOOST, FRESHNESS_TIME_CONSTANT_MS } from "@/lib/constants";

export interface FreshnessOptions {
  maxBoost?: number;
  timeConstantMs?: number;
}

/**
 * Multiplier applied to waiting tasks: 1 at zero wait, strictly increasing, approaching `maxBoost`.
 */
export function freshnessDecay(waitMs: number, options: FreshnessOptions = {}): number {
  const maxBoost = options.maxBoost ?? FRESHNESS_MAX_BOOST;
  const timeConstantMs = options.timeConstantMs ?? FRESHNESS_TIME_CONSTANT_MS;
  const wait = Math.max(0, waitMs);
  return 1 + (maxBoost - 1) * (1 - Math.exp(-wait / timeConstantMs));
}

export function computePriority(params: {
  uncertainty: number;
  difficulty: number;
  waitMs: number;
  freshness?: FreshnessOptions;
}): number {
  return params.uncertainty * params.difficulty * freshnessDecay(params.waitMs, params.freshness);
}
