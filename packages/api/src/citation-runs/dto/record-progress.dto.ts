import { IsArray, IsBoolean, IsInt, IsNumber, IsOptional, Max, Min } from 'class-validator';

import { IsOmittable } from './is-omittable';

export class RecordProgressDto {
  @IsOmittable()
  @IsInt()
  @Min(0)
  total_examples?: number;

  @IsOmittable()
  @IsInt()
  @Min(0)
  total_citations?: number;

  @IsOmittable()
  @IsInt()
  @Min(0)
  valid_citations?: number;

  @IsOmittable()
  @IsInt()
  @Min(0)
  misused_citations?: number;

  @IsOmittable()
  @IsInt()
  @Min(0)
  hallucinated_citations?: number;

  @IsOmittable()
  @IsNumber({ allowNaN: false, allowInfinity: false })
  @Min(0)
  @Max(1)
  overall_accuracy?: number;

  @IsOmittable()
  @IsArray()
  results?: unknown[];

  // Appends `results` to the stored list instead of replacing it.
  @IsOptional()
  @IsBoolean()
  append_results?: boolean;
}
