import { ClassConstructor, plainToInstance } from 'class-transformer';
import { ValidationError, validateSync } from 'class-validator';

/**
 * Walk a class-validator error tree down to the first violated constraint
 * and render it as `path: message`, e.g. `data.timelines.0.intervals: ...`.
 */
export function describeFirstViolation(
  errors: ValidationError[],
  parentPath = '',
): string | null {
  for (const error of errors) {
    const path = parentPath ? `${parentPath}.${error.property}` : error.property;
    if (error.constraints) {
      const [message] = Object.values(error.constraints);
      if (message) {
        return `${path}: ${message}`;
      }
    }
    if (error.children && error.children.length > 0) {
      const nested = describeFirstViolation(error.children, path);
      if (nested) {
        return nested;
      }
    }
  }
  return null;
}

/**
 * Turn an untyped payload into a validated DTO instance.
 * `onInvalid` builds the error thrown for the first violation found.
 */
export function validatePayload<T extends object>(
  dtoClass: ClassConstructor<T>,
  payload: unknown,
  onInvalid: (violation: string) => Error,
): T {
  if (typeof payload !== 'object' || payload === null || Array.isArray(payload)) {
    throw onInvalid('payload must be a JSON object');
  }

  const instance = plainToInstance(dtoClass, payload);
  const errors = validateSync(instance, { forbidUnknownValues: false });
  if (errors.length > 0) {
    throw onInvalid(describeFirstViolation(errors) ?? 'invalid payload');
  }
  return instance;
}
