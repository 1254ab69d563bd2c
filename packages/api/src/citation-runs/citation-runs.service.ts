import {
  BadRequestException,
  ConflictException,
  Injectable,
  Logger,
  NotFoundException,
} from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { FindOptionsWhere, IsNull, MoreThan, Not, Repository } from 'typeorm';

import type { CitationAccuracyRun as CitationRunView } from '@citation-eval/shared';

import { CompleteRunDto } from './dto/complete-run.dto';
import { DEFAULT_RUN_LIST_LIMIT, ListRunsQueryDto } from './dto/list-runs-query.dto';
import { RecordProgressDto } from './dto/record-progress.dto';
import { StartRunDto } from './dto/start-run.dto';
import { CitationAccuracyRun } from './entities/citation-accuracy-run.entity';

@Injectable()
export class CitationRunsService {
  private readonly logger = new Logger(CitationRunsService.name);

  constructor(
    @InjectRepository(CitationAccuracyRun)
    private readonly runRepository: Repository<CitationAccuracyRun>,
  ) {}

  async startRun(dto: StartRunDto): Promise<{ run: CitationRunView }> {
    const run = this.runRepository.create({
      ...(dto.total_examples !== undefined ? { totalExamples: dto.total_examples } : {}),
      ...(dto.config !== undefined ? { config: dto.config } : {}),
    });

    const saved = await this.runRepository.save(run);
    this.logger.log(`Started citation accuracy run ${saved.runId}`);

    return { run: this.toView(saved) };
  }

  async getRun(runId: string): Promise<{ run: CitationRunView }> {
    const run = await this.findRunOrFail(runId);
    return { run: this.toView(run) };
  }

  async listRecent(query: ListRunsQueryDto): Promise<{ runs: CitationRunView[] }> {
    const where: FindOptionsWhere<CitationAccuracyRun> = {};
    if (query.status === 'in_progress') {
      where.completedAt = IsNull();
    } else if (query.status === 'completed') {
      where.completedAt = Not(IsNull());
    }

    const runs = await this.runRepository.find({
      where,
      order: { startedAt: 'DESC' },
      take: query.limit ?? DEFAULT_RUN_LIST_LIMIT,
    });

    return { runs: runs.map((run) => this.toView(run)) };
  }

  async recordProgress(runId: string, dto: RecordProgressDto): Promise<{ run: CitationRunView }> {
    const saved = await this.runRepository.manager.transaction(async (manager) => {
      const repository = manager.getRepository(CitationAccuracyRun);
      const run = await this.lockOpenRunOrFail(repository, runId);

      this.applyProgress(run, dto);
      return repository.save(run);
    });

    return { run: this.toView(saved) };
  }

  async completeRun(runId: string, dto: CompleteRunDto): Promise<{ run: CitationRunView }> {
    const saved = await this.runRepository.manager.transaction(async (manager) => {
      const repository = manager.getRepository(CitationAccuracyRun);
      const run = await this.lockOpenRunOrFail(repository, runId);

      const completedAt = dto.completed_at ? new Date(dto.completed_at) : null;
      if (completedAt) {
        // started_at keeps microseconds that Date drops, so Postgres compares.
        const startsLater = await repository.exists({
          where: { runId, startedAt: MoreThan(completedAt) },
        });
        if (startsLater) {
          throw new BadRequestException('completed_at cannot be earlier than started_at.');
        }
      }

      this.applyProgress(run, dto);
      if (dto.overall_accuracy == null) {
        run.overallAccuracy =
          run.totalCitations > 0 ? run.validCitations / run.totalCitations : 0;
      }
      await repository.save(run);

      // Without a caller time, completion takes the clock that stamped started_at.
      await repository.update({ runId }, { completedAt: completedAt ?? (() => 'now()') });

      return repository.findOneOrFail({ where: { runId } });
    });

    this.logger.log(
      `Completed citation accuracy run ${saved.runId}: ${saved.validCitations}/${saved.totalCitations} valid, accuracy ${saved.overallAccuracy.toFixed(3)}`,
    );

    return { run: this.toView(saved) };
  }

  private async findRunOrFail(runId: string): Promise<CitationAccuracyRun> {
    const run = await this.runRepository.findOne({ where: { runId } });
    if (!run) {
      throw new NotFoundException('Citation accuracy run not found.');
    }
    return run;
  }

  private async lockOpenRunOrFail(
    repository: Repository<CitationAccuracyRun>,
    runId: string,
  ): Promise<CitationAccuracyRun> {
    const run = await repository.findOne({
      where: { runId },
      lock: { mode: 'pessimistic_write' },
    });
    if (!run) {
      throw new NotFoundException('Citation accuracy run not found.');
    }
    if (run.completedAt) {
      throw new ConflictException('Citation accuracy run is already completed.');
    }
    return run;
  }

  private applyProgress(run: CitationAccuracyRun, dto: RecordProgressDto): void {
    if (dto.total_examples != null) {
      run.totalExamples = dto.total_examples;
    }
    if (dto.total_citations != null) {
      run.totalCitations = dto.total_citations;
    }
    if (dto.valid_citations != null) {
      run.validCitations = dto.valid_citations;
    }
    if (dto.misused_citations != null) {
      run.misusedCitations = dto.misused_citations;
    }
    if (dto.hallucinated_citations != null) {
      run.hallucinatedCitations = dto.hallucinated_citations;
    }
    if (dto.overall_accuracy != null) {
      run.overallAccuracy = dto.overall_accuracy;
    }
    if (dto.results != null) {
      run.results = dto.append_results ? [...(run.results ?? []), ...dto.results] : dto.results;
    }

    // The table does not constrain the breakdown; writes through this service do.
    const judged = run.validCitations + run.misusedCitations + run.hallucinatedCitations;
    if (judged > run.totalCitations) {
      throw new BadRequestException(
        `valid, misused and hallucinated citations (${judged}) exceed total_citations (${run.totalCitations}).`,
      );
    }
  }

  private toView(run: CitationAccuracyRun): CitationRunView {
    return {
      run_id: run.runId,
      started_at: run.startedAt?.toISOString() ?? null,
      completed_at: run.completedAt?.toISOString() ?? null,
      status: run.completedAt ? 'completed' : 'in_progress',
      total_examples: run.totalExamples,
      total_citations: run.totalCitations,
      valid_citations: run.validCitations,
      misused_citations: run.misusedCitations,
      hallucinated_citations: run.hallucinatedCitations,
      overall_accuracy: run.overallAccuracy,
      results: run.results ?? [],
      config: run.config ?? null,
    };
  }
}
