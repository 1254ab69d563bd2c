import { Type } from 'class-transformer';
import { IsIn, IsInt, IsOptional, Max, Min } from 'class-validator';

import type { CitationRunStatus } from '@citation-eval/shared';

export const DEFAULT_RUN_LIST_LIMIT = 20;
export const MAX_RUN_LIST_LIMIT = 100;

export class ListRunsQueryDto {
  @IsOptional()
  @Type(() => Number)
  @IsInt()
  @Min(1)
  @Max(MAX_RUN_LIST_LIMIT)
  limit?: number;

  @IsOptional()
  @IsIn(['in_progress', 'completed'])
  status?: CitationRunStatus;
}
