import volatilityConfigSchema from '../../schemas/volatility-config.schema.json';
import { readJsonFile, writeJsonFile } from '../../common/jsonFile';
import { createDocumentValidator } from '../../common/schemaValidator';
import { formatSize, parseSize } from '../../common/units';
import { VolatilityConfig, VolatilityConfigDocument } from './types';

const validateDocument = createDocumentValidator<VolatilityConfigDocument>(
  volatilityConfigSchema,
  'volatility config'
);

export function toVolatilityDocument(config: VolatilityConfig): VolatilityConfigDocument {
  return {
    baseline_volatility: config.baselineVolatility,
    current_volatility: config.currentVolatility,
    max_execution_size: formatSize(config.maxExecutionSize),
    min_execution_size: formatSize(config.minExecutionSize),
    volatility_threshold: config.volatilityThreshold,
    conservative_mode: config.conservativeMode,
    emergency_threshold: config.emergencyThreshold,
    last_update_time: config.lastUpdateTime
  };
}

/**
 * Check a parsed JSON value against the schema and convert it.
 * Size strings that do not parse are read as zero.
 */
export function fromVolatilityDocument(value: unknown): VolatilityConfig {
  const document = validateDocument(value);

  return {
    baselineVolatility: document.baseline_volatility,
    currentVolatility: document.current_volatility,
    maxExecutionSize: parseSize(document.max_execution_size),
    minExecutionSize: parseSize(document.min_execution_size),
    volatilityThreshold: document.volatility_threshold,
    conservativeMode: document.conservative_mode,
    emergencyThreshold: document.emergency_threshold,
    lastUpdateTime: document.last_update_time
  };
}

export async function loadVolatilityConfig(path: string): Promise<VolatilityConfig> {
  return fromVolatilityDocument(await readJsonFile(path));
}

export async function saveVolatilityConfig(path: string, config: VolatilityConfig): Promise<void> {
  await writeJsonFile(path, toVolatilityDocument(config));
}
