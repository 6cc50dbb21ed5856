/**
 * Error codes surfaced by configuration loading, validation and calculation
 */
export enum StrategyConfigErrorCode {
  MALFORMED_INPUT = 'MALFORMED_INPUT',
  VALIDATION_FAILURE = 'VALIDATION_FAILURE',
  PRECONDITION_VIOLATION = 'PRECONDITION_VIOLATION',
  FILE_NOT_FOUND = 'FILE_NOT_FOUND',
  FILE_EXISTS = 'FILE_EXISTS'
}

export class StrategyConfigError extends Error {
  constructor(
    public code: StrategyConfigErrorCode,
    message: string,
    public details?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'StrategyConfigError';
  }
}

export function isStrategyConfigError(error: unknown): error is StrategyConfigError {
  return error instanceof StrategyConfigError;
}

/**
 * Throw a PRECONDITION_VIOLATION unless the condition holds
 */
export function requireThat(condition: boolean, message: string, details?: Record<string, unknown>): void {
  if (!condition) {
    throw new StrategyConfigError(StrategyConfigErrorCode.PRECONDITION_VIOLATION, message, details);
  }
}
