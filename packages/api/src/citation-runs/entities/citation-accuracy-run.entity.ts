import { Column, Entity, PrimaryGeneratedColumn } from 'typeorm';

@Entity('citation_accuracy_runs')
export class CitationAccuracyRun {
  @PrimaryGeneratedColumn('uuid', { name: 'run_id' })
  runId!: string;

  @Column({ name: 'started_at', type: 'timestamptz', nullable: true, default: () => 'now()' })
  startedAt!: Date | null;

  @Column({ name: 'completed_at', type: 'timestamptz', nullable: true })
  completedAt!: Date | null;

  @Column({ name: 'total_examples', type: 'int', default: 0 })
  totalExamples!: number;

  @Column({ name: 'total_citations', type: 'int', default: 0 })
  totalCitations!: number;

  @Column({ name: 'valid_citations', type: 'int', default: 0 })
  validCitations!: number;

  @Column({ name: 'misused_citations', type: 'int', default: 0 })
  misusedCitations!: number;

  @Column({ name: 'hallucinated_citations', type: 'int', default: 0 })
  hallucinatedCitations!: number;

  @Column({ name: 'overall_accuracy', type: 'float', default: 0 })
  overallAccuracy!: number;

  @Column({ type: 'jsonb', default: () => "'[]'" })
  results!: unknown[];

  @Column({ type: 'jsonb', nullable: true, default: () => "'{}'" })
  config!: Record<string, unknown> | null;
}
