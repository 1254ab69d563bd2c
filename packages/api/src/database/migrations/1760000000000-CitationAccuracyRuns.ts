import { MigrationInterface, QueryRunner } from 'typeorm';

/**
 * Historical results of batch citation accuracy evaluations.
 *
 * Both statements are guarded by IF NOT EXISTS, so re-running `up` against a
 * database that already has the table and index does nothing. The guard only
 * checks names: a pre-existing table with a different shape is left as is.
 */
export class CitationAccuracyRuns1760000000000 implements MigrationInterface {
  name = 'CitationAccuracyRuns1760000000000';

  public async up(queryRunner: QueryRunner): Promise<void> {
    await queryRunner.query('CREATE EXTENSION IF NOT EXISTS "pgcrypto";');

    await queryRunner.query(`
      CREATE TABLE IF NOT EXISTS citation_accuracy_runs (
        run_id uuid PRIMARY KEY DEFAULT gen_random_uuid(),
        started_at timestamptz DEFAULT now(),
        completed_at timestamptz NULL,
        total_examples integer NOT NULL DEFAULT 0,
        total_citations integer NOT NULL DEFAULT 0,
        valid_citations integer NOT NULL DEFAULT 0,
        misused_citations integer NOT NULL DEFAULT 0,
        hallucinated_citations integer NOT NULL DEFAULT 0,
        overall_accuracy float NOT NULL DEFAULT 0,
        results jsonb NOT NULL DEFAULT '[]'::jsonb,
        config jsonb DEFAULT '{}'::jsonb
      );
    `);

    await queryRunner.query(`
      CREATE INDEX IF NOT EXISTS idx_citation_runs_started_at
        ON citation_accuracy_runs (started_at DESC);
    `);
  }

  public async down(queryRunner: QueryRunner): Promise<void> {
    await queryRunner.query('DROP INDEX IF EXISTS idx_citation_runs_started_at;');
    await queryRunner.query('DROP TABLE IF EXISTS citation_accuracy_runs;');
  }
}
