import { VolatilityConfig, VolatilityValidationResult } from './types';

/**
 * Volatility validator configuration
 */
export interface VolatilityValidatorConfig {
  warningMultiplier: number; // Warn when current volatility exceeds baseline by this factor
  staleAfterSeconds: number; // Warn when the record is older than this
}

export const DEFAULT_VALIDATOR_CONFIG: VolatilityValidatorConfig = {
  warningMultiplier: 3,
  staleAfterSeconds: 3600 // 1 hour
};

/**
 * Checks a loaded volatility configuration.
 *
 * Every rule runs regardless of earlier results so that a single pass
 * reports all warnings and errors. Only errors make the record invalid.
 */
export class VolatilityValidator {
  private config: VolatilityValidatorConfig;

  constructor(config?: Partial<VolatilityValidatorConfig>) {
    this.config = { ...DEFAULT_VALIDATOR_CONFIG, ...config };
  }

  validate(config: VolatilityConfig, now: number): VolatilityValidationResult {
    const warnings: string[] = [];
    const errors: string[] = [];

    if (config.currentVolatility > config.baselineVolatility * this.config.warningMultiplier) {
      warnings.push(
        `Current volatility is >${this.config.warningMultiplier}x baseline - consider conservative mode`
      );
    }

    if (config.currentVolatility > config.emergencyThreshold) {
      errors.push('Current volatility exceeds emergency threshold!');
    }

    if (config.maxExecutionSize.lte(config.minExecutionSize)) {
      errors.push('Max execution size must be > min execution size');
    }

    // A timestamp in the future has no age
    const age = now - config.lastUpdateTime;
    if (age > this.config.staleAfterSeconds) {
      warnings.push(`Configuration is more than ${formatAge(this.config.staleAfterSeconds)} old`);
    }

    return {
      valid: errors.length === 0,
      warnings,
      errors
    };
  }
}

function formatAge(seconds: number): string {
  if (seconds % 3600 === 0) {
    const hours = seconds / 3600;
    return hours === 1 ? '1 hour' : `${hours} hours`;
  }
  return `${seconds} seconds`;
}

export function validateVolatilityConfig(config: VolatilityConfig, now: number): VolatilityValidationResult {
  return new VolatilityValidator().validate(config, now);
}
