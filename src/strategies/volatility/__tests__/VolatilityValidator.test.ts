import { parseSize, sizeFromMinorUnits } from '../../../common/units';
import { fromVolatilityDocument } from '../serialization';
import { DEFAULT_VALIDATOR_CONFIG, validateVolatilityConfig, VolatilityValidator } from '../VolatilityValidator';
import { VolatilityConfig } from '../types';

const NOW = 1_700_000_000;

function makeConfig(overrides: Partial<VolatilityConfig> = {}): VolatilityConfig {
  return {
    baselineVolatility: 300,
    currentVolatility: 350,
    maxExecutionSize: sizeFromMinorUnits(5000000000000000000n),
    minExecutionSize: sizeFromMinorUnits(100000000000000000n),
    volatilityThreshold: 600,
    conservativeMode: false,
    emergencyThreshold: 1200,
    lastUpdateTime: NOW,
    ...overrides
  };
}

describe('VolatilityValidator', () => {
  test('should accept a fresh, sane configuration', () => {
    expect(validateVolatilityConfig(makeConfig(), NOW)).toEqual({ valid: true, warnings: [], errors: [] });
  });

  test('should warn above three times baseline without failing', () => {
    const result = validateVolatilityConfig(makeConfig({ currentVolatility: 901 }), NOW);

    expect(result).toEqual({
      valid: true,
      warnings: ['Current volatility is >3x baseline - consider conservative mode'],
      errors: []
    });
  });

  test('should not warn at exactly three times baseline', () => {
    expect(validateVolatilityConfig(makeConfig({ currentVolatility: 900 }), NOW).warnings).toEqual([]);
  });

  test('should fail above the emergency threshold and still report the warning', () => {
    const result = validateVolatilityConfig(makeConfig({ currentVolatility: 1201 }), NOW);

    expect(result).toEqual({
      valid: false,
      warnings: ['Current volatility is >3x baseline - consider conservative mode'],
      errors: ['Current volatility exceeds emergency threshold!']
    });
  });

  test('should fail when max size does not exceed min size', () => {
    const equal = validateVolatilityConfig(makeConfig({ maxExecutionSize: sizeFromMinorUnits(100000000000000000n) }), NOW);
    expect(equal.valid).toBe(false);
    expect(equal.errors).toEqual(['Max execution size must be > min execution size']);

    const inverted = validateVolatilityConfig(makeConfig({ maxExecutionSize: sizeFromMinorUnits(0n) }), NOW);
    expect(inverted.errors).toEqual(['Max execution size must be > min execution size']);
  });

  test('should compare fractional sizes exactly', () => {
    const stored = fromVolatilityDocument({
      baseline_volatility: 300,
      current_volatility: 350,
      max_execution_size: '1.9',
      min_execution_size: '1.1',
      volatility_threshold: 600,
      conservative_mode: false,
      emergency_threshold: 1200,
      last_update_time: NOW
    });

    expect(validateVolatilityConfig(stored, NOW)).toEqual({ valid: true, warnings: [], errors: [] });

    const inverted = makeConfig({ maxExecutionSize: parseSize('1.1'), minExecutionSize: parseSize('1.9') });
    expect(validateVolatilityConfig(inverted, NOW).errors).toEqual(['Max execution size must be > min execution size']);
  });

  test('should treat unparseable sizes as zero when comparing', () => {
    const result = validateVolatilityConfig(makeConfig({ maxExecutionSize: parseSize('lots') }), NOW);

    expect(result.errors).toEqual(['Max execution size must be > min execution size']);
  });

  test('should report every error in rule order', () => {
    const result = validateVolatilityConfig(makeConfig({ currentVolatility: 1300, maxExecutionSize: sizeFromMinorUnits(0n) }), NOW);

    expect(result.errors).toEqual([
      'Current volatility exceeds emergency threshold!',
      'Max execution size must be > min execution size'
    ]);
  });

  test('should warn once the record is more than an hour old', () => {
    expect(validateVolatilityConfig(makeConfig({ lastUpdateTime: NOW - 3600 }), NOW).warnings).toEqual([]);
    expect(validateVolatilityConfig(makeConfig({ lastUpdateTime: NOW - 3601 }), NOW)).toEqual({
      valid: true,
      warnings: ['Configuration is more than 1 hour old'],
      errors: []
    });
  });

  test('should treat a future timestamp as fresh', () => {
    expect(validateVolatilityConfig(makeConfig({ lastUpdateTime: NOW + 86_400 }), NOW).warnings).toEqual([]);
  });

  test('should honour custom thresholds', () => {
    const validator = new VolatilityValidator({ warningMultiplier: 2, staleAfterSeconds: 7200 });
    const result = validator.validate(makeConfig({ currentVolatility: 601, lastUpdateTime: NOW - 7201 }), NOW);

    expect(result.warnings).toEqual([
      'Current volatility is >2x baseline - consider conservative mode',
      'Configuration is more than 2 hours old'
    ]);
  });

  test('should describe non-hour staleness in seconds', () => {
    const validator = new VolatilityValidator({ staleAfterSeconds: 90 });

    expect(validator.validate(makeConfig({ lastUpdateTime: NOW - 91 }), NOW).warnings).toEqual([
      'Configuration is more than 90 seconds old'
    ]);
  });

  test('should default to three times baseline and one hour', () => {
    expect(DEFAULT_VALIDATOR_CONFIG).toEqual({ warningMultiplier: 3, staleAfterSeconds: 3600 });
  });
});
