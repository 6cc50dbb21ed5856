/**
 * Volatility Strategy Types
 *
 * All volatility figures are basis points (100 = 1%); execution sizes are
 * minor units of the execution asset, held as fixed-point values.
 */

import type { FixedNumber } from 'ethers';

/**
 * Volatility configuration record
 */
export interface VolatilityConfig {
  baselineVolatility: number;
  currentVolatility: number;
  maxExecutionSize: FixedNumber;
  minExecutionSize: FixedNumber;
  volatilityThreshold: number; // 2x baseline
  conservativeMode: boolean;
  emergencyThreshold: number; // 4x baseline
  lastUpdateTime: number; // Unix seconds
}

/**
 * Persisted form of VolatilityConfig
 */
export interface VolatilityConfigDocument {
  baseline_volatility: number;
  current_volatility: number;
  max_execution_size: string;
  min_execution_size: string;
  volatility_threshold: number;
  conservative_mode: boolean;
  emergency_threshold: number;
  last_update_time: number;
}

/**
 * Baseline inputs for building a configuration; sizes in whole units
 */
export interface VolatilityConfigParams {
  baselineVolatility: number;
  currentVolatility: number;
  maxExecutionSize: number;
  minExecutionSize: number;
  conservativeMode: boolean;
}

export interface VolatilityValidationResult {
  valid: boolean;
  warnings: string[];
  errors: string[];
}

export enum VolatilityRegime {
  LOW = 'low',
  NORMAL = 'normal',
  HIGH = 'high'
}

export enum AmountCap {
  NONE = 'none',
  AT_MAX = 'at_max',
  AT_MIN = 'at_min'
}

export interface AdjustmentResult {
  regime: VolatilityRegime;
  adjustmentFactorPercent: number;
  originalAmount: number;
  adjustedAmount: number;
  finalAmount: number;
  minAllowed: number;
  maxAllowed: number;
  capped: AmountCap;
}
