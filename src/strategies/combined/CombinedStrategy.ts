import { requireThat } from '../../common/errors';
import { writeJsonFile } from '../../common/jsonFile';
import { buildTwapConfig } from '../twap/TwapPlanner';

export interface CombinedStrategyParams {
  twapDurationMinutes: number;
  twapIntervals: number;
  volatilityThreshold: number; // bps
}

/**
 * TWAP schedule gated by a volatility threshold
 */
export interface CombinedStrategyDocument {
  twap_duration_minutes: number;
  twap_intervals: number;
  interval_seconds: number;
  volatility_threshold: number;
  created_at: number;
}

export function buildCombinedStrategy(params: CombinedStrategyParams, now: number): CombinedStrategyDocument {
  requireThat(Number.isSafeInteger(params.volatilityThreshold) && params.volatilityThreshold > 0,
    `Volatility threshold must be a positive integer (bps), got ${params.volatilityThreshold}`);

  const twap = buildTwapConfig({
    durationMinutes: params.twapDurationMinutes,
    intervals: params.twapIntervals,
    randomizeExecution: false
  }, now);

  return {
    twap_duration_minutes: twap.durationMinutes,
    twap_intervals: twap.intervals,
    interval_seconds: twap.intervalSeconds,
    volatility_threshold: params.volatilityThreshold,
    created_at: now
  };
}

export async function saveCombinedStrategy(path: string, document: CombinedStrategyDocument): Promise<void> {
  await writeJsonFile(path, document);
}
