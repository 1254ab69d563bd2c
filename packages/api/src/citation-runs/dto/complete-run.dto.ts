import { IsDateString, IsOptional } from 'class-validator';

import { RecordProgressDto } from './record-progress.dto';

export class CompleteRunDto extends RecordProgressDto {
  @IsOptional()
  @IsDateString()
  completed_at?: string;
}
