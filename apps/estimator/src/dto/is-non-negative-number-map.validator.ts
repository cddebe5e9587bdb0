import { buildMessage, ValidateBy, ValidationOptions } from 'class-validator';

export const IS_NON_NEGATIVE_NUMBER_MAP = 'isNonNegativeNumberMap';

/**
 * Plain object whose values are all finite numbers >= 0.
 */
export function isNonNegativeNumberMap(value: unknown): value is Record<string, number> {
  return (
    typeof value === 'object' &&
    value !== null &&
    !Array.isArray(value) &&
    Object.values(value).every(v => typeof v === 'number' && Number.isFinite(v) && v >= 0)
  );
}

export function IsNonNegativeNumberMap(validationOptions?: ValidationOptions): PropertyDecorator {
  return ValidateBy(
    {
      name: IS_NON_NEGATIVE_NUMBER_MAP,
      validator: {
        validate: (value): boolean => isNonNegativeNumberMap(value),
        defaultMessage: buildMessage(
          eachPrefix => `${eachPrefix}$property must map names to non-negative numbers`,
          validationOptions,
        ),
      },
    },
    validationOptions,
  );
}
