import { Module } from '@nestjs/common';
import { TypeOrmModule } from '@nestjs/typeorm';

import { CitationRunsController } from './citation-runs.controller';
import { CitationRunsService } from './citation-runs.service';
import { CitationAccuracyRun } from './entities/citation-accuracy-run.entity';

@Module({
  imports: [TypeOrmModule.forFeature([CitationAccuracyRun])],
  controllers: [CitationRunsController],
  providers: [CitationRunsService],
  exports: [CitationRunsService],
})
export class CitationRunsModule {}
