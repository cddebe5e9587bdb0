import { buildMessage, isISO8601, ValidateBy, ValidationOptions } from 'class-validator';

export const IS_TIMESTAMP = 'isTimestamp';

/**
 * ISO 8601 string that also resolves to an instant. Week and ordinal dates
 * pass `isISO8601` but not `Date.parse`, so they are rejected here.
 */
export function isTimestamp(value: unknown): value is string {
  return typeof value === 'string' && isISO8601(value) && Number.isFinite(Date.parse(value));
}

export function IsTimestamp(validationOptions?: ValidationOptions): PropertyDecorator {
  return ValidateBy(
    {
      name: IS_TIMESTAMP,
      validator: {
        validate: (value): boolean => isTimestamp(value),
        defaultMessage: buildMessage(
          eachPrefix => `${eachPrefix}$property must be an ISO 8601 date-time`,
          validationOptions,
        ),
      },
    },
    validationOptions,
  );
}
