import twapConfigSchema from '../../schemas/twap-config.schema.json';
import { requireThat } from '../../common/errors';
import { readJsonFile, writeJsonFile } from '../../common/jsonFile';
import { createDocumentValidator } from '../../common/schemaValidator';
import { fromMinorUnits, toMinorUnits } from '../../common/units';

/**
 * Configuration for TWAP execution
 */
export interface TwapConfig {
  durationMinutes: number;
  intervals: number;
  randomizeExecution: boolean;
  intervalSeconds: number;
  createdAt: number;
}

export interface TwapConfigDocument {
  duration_minutes: number;
  intervals: number;
  randomize_execution: boolean;
  interval_seconds: number;
  created_at: number;
}

export interface TwapConfigParams {
  durationMinutes: number;
  intervals: number;
  randomizeExecution: boolean;
}

export interface TwapSlice {
  index: number; // 1-based
  offsetSeconds: number;
  amount: number;
  amountMinorUnits: bigint;
}

export interface TwapSimulation {
  orderSize: number;
  intervalSeconds: number;
  slices: TwapSlice[];
}

/**
 * Largest share of an interval a randomized slice may move by
 */
export const JITTER_RATIO = 0.1;

const validateDocument = createDocumentValidator<TwapConfigDocument>(twapConfigSchema, 'TWAP config');

export function buildTwapConfig(params: TwapConfigParams, now: number): TwapConfig {
  requireThat(Number.isSafeInteger(params.durationMinutes) && params.durationMinutes >= 1,
    `Duration must be a positive number of minutes, got ${params.durationMinutes}`);
  requireThat(Number.isSafeInteger(params.intervals) && params.intervals >= 1,
    `Intervals must be a positive integer, got ${params.intervals}`);

  const durationSeconds = params.durationMinutes * 60;
  requireThat(params.intervals <= durationSeconds,
    `Intervals (${params.intervals}) must not exceed the duration in seconds (${durationSeconds})`);

  return {
    durationMinutes: params.durationMinutes,
    intervals: params.intervals,
    randomizeExecution: params.randomizeExecution,
    intervalSeconds: Math.floor(durationSeconds / params.intervals),
    createdAt: now
  };
}

/**
 * Split an order into equal slices over the configured window.
 *
 * Sizes are divided in minor units; the last slice takes the remainder so
 * the slices always add up to the order.
 */
export function simulateTwap(config: TwapConfig, orderSize: number, random: () => number = Math.random): TwapSimulation {
  requireThat(Number.isFinite(orderSize) && orderSize > 0, `Order size must be greater than zero, got ${orderSize}`);

  const total = toMinorUnits(orderSize);
  const count = BigInt(config.intervals);
  const sliceSize = total / count;
  const maxJitter = config.intervalSeconds * JITTER_RATIO;
  const slices: TwapSlice[] = [];

  for (let i = 0; i < config.intervals; i++) {
    const isLast = i === config.intervals - 1;
    const amountMinorUnits = isLast ? total - sliceSize * (count - 1n) : sliceSize;

    let offsetSeconds = i * config.intervalSeconds;
    if (config.randomizeExecution && i > 0) {
      offsetSeconds = Math.max(0, offsetSeconds + Math.round((random() * 2 - 1) * maxJitter));
    }

    slices.push({
      index: i + 1,
      offsetSeconds,
      amount: fromMinorUnits(amountMinorUnits),
      amountMinorUnits
    });
  }

  return {
    orderSize,
    intervalSeconds: config.intervalSeconds,
    slices
  };
}

export function toTwapDocument(config: TwapConfig): TwapConfigDocument {
  return {
    duration_minutes: config.durationMinutes,
    intervals: config.intervals,
    randomize_execution: config.randomizeExecution,
    interval_seconds: config.intervalSeconds,
    created_at: config.createdAt
  };
}

export function fromTwapDocument(value: unknown): TwapConfig {
  const document = validateDocument(value);

  return {
    durationMinutes: document.duration_minutes,
    intervals: document.intervals,
    randomizeExecution: document.randomize_execution,
    intervalSeconds: document.interval_seconds,
    createdAt: document.created_at
  };
}

export async function loadTwapConfig(path: string): Promise<TwapConfig> {
  return fromTwapDocument(await readJsonFile(path));
}

export async function saveTwapConfig(path: string, config: TwapConfig): Promise<void> {
  await writeJsonFile(path, toTwapDocument(config));
}
