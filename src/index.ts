/**
 * Vector Plus
 *
 * Build, validate and evaluate execution strategy configurations.
 *
 * @module vector-plus
 */

export * from './common/errors';
export * from './common/units';
export { createLogger, setLogLevel } from './common/logger';
export * from './strategies/volatility';
export * from './strategies/twap';
export * from './strategies/options';
export * from './strategies/combined';
export * from './config/ProjectConfig';
