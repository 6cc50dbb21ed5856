import { requireThat } from '../../common/errors';
import { sizeToWholeUnits } from '../../common/units';
import { AdjustmentResult, AmountCap, VolatilityConfig, VolatilityRegime } from './types';

const MAX_BOOST_PERCENT = 50;
const MAX_REDUCTION_PERCENT = 50;
const CONSERVATIVE_FACTOR_PERCENT = 90;

export interface AdjustmentFactor {
  regime: VolatilityRegime;
  percent: number;
}

/**
 * Size multiplier, in whole percent, for the current volatility regime.
 *
 * Ratios use floor division on basis points, so steps are coarser than a
 * floating-point ratio would give.
 */
export function calculateAdjustmentFactor(config: VolatilityConfig): AdjustmentFactor {
  requireThat(config.baselineVolatility > 0, 'Baseline volatility must be greater than zero', {
    baselineVolatility: config.baselineVolatility
  });

  const { baselineVolatility: baseline, currentVolatility: current } = config;

  if (current <= baseline) {
    const boost = Math.floor(((baseline - current) * 50) / baseline);
    return { regime: VolatilityRegime.LOW, percent: 100 + Math.min(boost, MAX_BOOST_PERCENT) };
  }

  if (current > config.volatilityThreshold) {
    const reduction = Math.floor(((current - baseline) * 50) / baseline);
    return { regime: VolatilityRegime.HIGH, percent: 100 - Math.min(reduction, MAX_REDUCTION_PERCENT) };
  }

  return {
    regime: VolatilityRegime.NORMAL,
    percent: config.conservativeMode ? CONSERVATIVE_FACTOR_PERCENT : 100
  };
}

/**
 * Scale a trade amount by the volatility factor and clamp it to the
 * configured execution size bounds.
 */
export function calculateAdjustment(amount: number, config: VolatilityConfig): AdjustmentResult {
  requireThat(Number.isFinite(amount) && amount > 0, `Amount must be greater than zero, got ${amount}`);

  const factor = calculateAdjustmentFactor(config);
  const adjustedAmount = (amount * factor.percent) / 100;
  const minAllowed = sizeToWholeUnits(config.minExecutionSize);
  const maxAllowed = sizeToWholeUnits(config.maxExecutionSize);
  const finalAmount = Math.min(Math.max(adjustedAmount, minAllowed), maxAllowed);

  let capped = AmountCap.NONE;
  if (finalAmount !== adjustedAmount) {
    capped = finalAmount === maxAllowed ? AmountCap.AT_MAX : AmountCap.AT_MIN;
  }

  return {
    regime: factor.regime,
    adjustmentFactorPercent: factor.percent,
    originalAmount: amount,
    adjustedAmount,
    finalAmount,
    minAllowed,
    maxAllowed,
    capped
  };
}
