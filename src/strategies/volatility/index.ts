export * from './types';
export * from './VolatilityConfigBuilder';
export * from './VolatilityValidator';
export * from './AdjustmentCalculator';
export * from './serialization';
