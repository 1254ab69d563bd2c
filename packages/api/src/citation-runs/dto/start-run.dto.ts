import { IsInt, IsObject, IsOptional, Min } from 'class-validator';

import { IsOmittable } from './is-omittable';

export class StartRunDto {
  @IsOmittable()
  @IsInt()
  @Min(0)
  total_examples?: number;

  @IsOptional()
  @IsObject()
  config?: Record<string, unknown>;
}
