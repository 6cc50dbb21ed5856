import { requireThat } from '../../common/errors';
import { sizeFromMinorUnits, toMinorUnits } from '../../common/units';
import { VolatilityConfig, VolatilityConfigParams } from './types';

export const THRESHOLD_MULTIPLIER = 2;
export const EMERGENCY_MULTIPLIER = 4;

export function currentUnixTime(): number {
  return Math.floor(Date.now() / 1000);
}

function requireBasisPoints(value: number, name: string): void {
  requireThat(Number.isSafeInteger(value) && value >= 0, `${name} must be a non-negative integer (bps), got ${value}`);
}

/**
 * Build a volatility configuration from baseline inputs.
 *
 * Thresholds are derived from the baseline. Max and min sizes are not
 * compared here; that is the validator's job.
 */
export function buildVolatilityConfig(params: VolatilityConfigParams, now: number = currentUnixTime()): VolatilityConfig {
  requireBasisPoints(params.baselineVolatility, 'Baseline volatility');
  requireBasisPoints(params.currentVolatility, 'Current volatility');

  return {
    baselineVolatility: params.baselineVolatility,
    currentVolatility: params.currentVolatility,
    maxExecutionSize: sizeFromMinorUnits(toMinorUnits(params.maxExecutionSize)),
    minExecutionSize: sizeFromMinorUnits(toMinorUnits(params.minExecutionSize)),
    volatilityThreshold: params.baselineVolatility * THRESHOLD_MULTIPLIER,
    conservativeMode: params.conservativeMode,
    emergencyThreshold: params.baselineVolatility * EMERGENCY_MULTIPLIER,
    lastUpdateTime: now
  };
}
