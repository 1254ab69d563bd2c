import { Body, Controller, Get, Param, ParseUUIDPipe, Patch, Post, Query } from '@nestjs/common';

import type { CitationRunListResponse, CitationRunResponse } from '@citation-eval/shared';

import { CitationRunsService } from './citation-runs.service';
import { CompleteRunDto } from './dto/complete-run.dto';
import { ListRunsQueryDto } from './dto/list-runs-query.dto';
import { RecordProgressDto } from './dto/record-progress.dto';
import { StartRunDto } from './dto/start-run.dto';

@Controller('citation-runs')
export class CitationRunsController {
  constructor(private readonly citationRunsService: CitationRunsService) {}

  @Post()
  start(@Body() dto: StartRunDto): Promise<CitationRunResponse> {
    return this.citationRunsService.startRun(dto);
  }

  @Get()
  list(@Query() query: ListRunsQueryDto): Promise<CitationRunListResponse> {
    return this.citationRunsService.listRecent(query);
  }

  @Get(':runId')
  getOne(@Param('runId', ParseUUIDPipe) runId: string): Promise<CitationRunResponse> {
    return this.citationRunsService.getRun(runId);
  }

  @Patch(':runId')
  recordProgress(
    @Param('runId', ParseUUIDPipe) runId: string,
    @Body() dto: RecordProgressDto,
  ): Promise<CitationRunResponse> {
    return this.citationRunsService.recordProgress(runId, dto);
  }

  @Post(':runId/complete')
  complete(
    @Param('runId', ParseUUIDPipe) runId: string,
    @Body() dto: CompleteRunDto,
  ): Promise<CitationRunResponse> {
    return this.citationRunsService.completeRun(runId, dto);
  }
}
