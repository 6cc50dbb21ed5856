import Ajv, { Schema } from 'ajv';
import { StrategyConfigError, StrategyConfigErrorCode } from './errors';

const ajv = new Ajv({ allErrors: true, allowUnionTypes: true });

export type DocumentValidator<T> = (value: unknown) => T;

/**
 * Compile a JSON schema into a function that returns the typed document
 * or throws MALFORMED_INPUT with Ajv's error text.
 */
export function createDocumentValidator<T>(schema: Schema, label: string): DocumentValidator<T> {
  const validate = ajv.compile<T>(schema);

  return (value: unknown): T => {
    if (!validate(value)) {
      throw new StrategyConfigError(
        StrategyConfigErrorCode.MALFORMED_INPUT,
        `Invalid ${label}: ${ajv.errorsText(validate.errors)}`,
        { errors: validate.errors ?? [] }
      );
    }
    return value;
  };
}
