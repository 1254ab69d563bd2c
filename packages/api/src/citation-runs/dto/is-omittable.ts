import { ValidateIf } from 'class-validator';

/**
 * `@IsOptional()` for NOT NULL columns: skips a missing field, still
 * validates an explicit `null`.
 */
export const IsOmittable = (): PropertyDecorator =>
  ValidateIf((_object: object, value: unknown) => value !== undefined);
