import { InvalidArgumentError } from 'commander';

const INTEGER_PATTERN = /^\d+$/;

export function parseBasisPoints(value: string): number {
  if (!INTEGER_PATTERN.test(value.trim())) {
    throw new InvalidArgumentError('Expected a non-negative integer number of basis points.');
  }
  return Number(value);
}

export function parsePositiveInteger(value: string): number {
  const parsed = INTEGER_PATTERN.test(value.trim()) ? Number(value) : NaN;
  if (!Number.isSafeInteger(parsed) || parsed < 1) {
    throw new InvalidArgumentError('Expected a positive integer.');
  }
  return parsed;
}

export function parseAmount(value: string): number {
  const parsed = value.trim() === '' ? NaN : Number(value);
  if (!Number.isFinite(parsed) || parsed < 0) {
    throw new InvalidArgumentError('Expected a non-negative number.');
  }
  return parsed;
}

export function parsePositiveAmount(value: string): number {
  const parsed = parseAmount(value);
  if (parsed === 0) {
    throw new InvalidArgumentError('Expected a number greater than zero.');
  }
  return parsed;
}
