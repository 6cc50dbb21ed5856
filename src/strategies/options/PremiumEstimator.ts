import { requireThat } from '../../common/errors';
import { writeJsonFile } from '../../common/jsonFile';

export enum OptionType {
  CALL = 'call',
  PUT = 'put'
}

/**
 * Time value added per hour to expiration, in quote currency (USDC)
 */
export const TIME_VALUE_PER_HOUR = 0.1;

export interface PremiumEstimateParams {
  optionType: OptionType;
  currentPrice: number;
  strikePrice: number;
  hoursToExpiration: number;
}

export interface PremiumEstimate {
  intrinsicValue: number;
  timeValue: number;
  premium: number;
}

export interface OptionConfigParams {
  optionType: OptionType;
  strikePrice: number;
  expirationHours: number;
  premium: number;
}

export interface OptionConfigDocument {
  option_type: OptionType;
  strike_price: number;
  expiration_hours: number;
  premium: number;
  created_at: number;
  expires_at: number;
}

function requirePositivePrice(value: number, name: string): void {
  requireThat(Number.isFinite(value) && value > 0, `${name} must be greater than zero, got ${value}`);
}

/**
 * Rough premium: intrinsic value plus a flat time value per hour.
 * Not a pricing model.
 */
export function estimatePremium(params: PremiumEstimateParams): PremiumEstimate {
  requirePositivePrice(params.currentPrice, 'Current price');
  requirePositivePrice(params.strikePrice, 'Strike price');
  requireThat(Number.isFinite(params.hoursToExpiration) && params.hoursToExpiration >= 0,
    `Time to expiration must be non-negative, got ${params.hoursToExpiration}`);

  const intrinsicValue = params.optionType === OptionType.CALL
    ? Math.max(params.currentPrice - params.strikePrice, 0)
    : Math.max(params.strikePrice - params.currentPrice, 0);
  const timeValue = params.hoursToExpiration * TIME_VALUE_PER_HOUR;

  return {
    intrinsicValue,
    timeValue,
    premium: intrinsicValue + timeValue
  };
}

export function buildOptionConfig(params: OptionConfigParams, now: number): OptionConfigDocument {
  requirePositivePrice(params.strikePrice, 'Strike price');
  requireThat(Number.isSafeInteger(params.expirationHours) && params.expirationHours > 0,
    `Expiration must be a positive number of hours, got ${params.expirationHours}`);
  requireThat(Number.isFinite(params.premium) && params.premium >= 0,
    `Premium must be non-negative, got ${params.premium}`);

  return {
    option_type: params.optionType,
    strike_price: params.strikePrice,
    expiration_hours: params.expirationHours,
    premium: params.premium,
    created_at: now,
    expires_at: now + params.expirationHours * 3600
  };
}

export async function saveOptionConfig(path: string, document: OptionConfigDocument): Promise<void> {
  await writeJsonFile(path, document);
}
