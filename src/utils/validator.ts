import type { StandardSchemaV1 } from '@standard-schema/spec';
import { ValidationError } from '../error/validationError.js';
import { type SafeWrapAsync, safeWrap, safeWrapAsync } from './wrap.js';

/**
 * Validates an input value against a StandardSchemaV1 schema and wraps the result
 * in a tuple-style `[error, value]` response.
 *
 * Sync and async validators are both accepted; a validator that throws, or
 * reports issues, yields a {@link ValidationError}.
 */
export async function validator<T extends StandardSchemaV1>(
  input: unknown,
  schema: T,
): SafeWrapAsync<ValidationError, StandardSchemaV1.InferOutput<T>> {
  type ValidationResult = StandardSchemaV1.Result<StandardSchemaV1.InferOutput<T>>;

  const [err, pending] = safeWrap<ValidationResult | Promise<ValidationResult>>(() =>
    schema['~standard'].validate(input),
  );
  if (err) {
    return [new ValidationError('error validating on validation start', [], { cause: err }), null];
  }

  const [errAsync, result] = await safeWrapAsync(async () => pending);
  if (errAsync) {
    return [new ValidationError('error validating async data', [], { cause: errAsync }), null];
  }

  if (result.issues) {
    return [new ValidationError('error validating data', result.issues), null];
  }

  return [null, result.value];
}
