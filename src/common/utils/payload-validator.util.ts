// src/common/utils/payload-validator.util.ts

import { ClassConstructor, plainToInstance } from 'class-transformer';
import { ValidationError, validateSync } from 'class-validator';
import { MalformedResponseError } from '../errors/weather.errors';

/**
 * Validates an upstream JSON payload against a class-validator DTO.
 *
 * @param source upstream name used in the error message
 * @throws MalformedResponseError listing every violated constraint
 */
export function parsePayload<T extends object>(
  dto: ClassConstructor<T>,
  payload: unknown,
  source: string
): T {
  if (typeof payload !== 'object' || payload === null || Array.isArray(payload)) {
    throw new MalformedResponseError(`${source} response is not a JSON object`);
  }

  const instance = plainToInstance(dto, payload);
  const errors = validateSync(instance);
  if (errors.length > 0) {
    const violations = flattenValidationErrors(errors);
    throw new MalformedResponseError(
      `${source} response does not match the expected schema: ${violations.join('; ')}`,
      { details: { violations } }
    );
  }

  return instance;
}

/**
 * Flattens nested validation errors into `path: message` strings.
 */
export function flattenValidationErrors(errors: ValidationError[], parentPath = ''): string[] {
  return errors.flatMap((error) => {
    const path = parentPath ? `${parentPath}.${error.property}` : error.property;
    const own = Object.values(error.constraints ?? {}).map((message) => `${path}: ${message}`);
    return [...own, ...flattenValidationErrors(error.children ?? [], path)];
  });
}
