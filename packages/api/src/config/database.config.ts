import { join } from 'path';
import { PostgresConnectionOptions } from 'typeorm/driver/postgres/PostgresConnectionOptions';

import { CitationAccuracyRun } from '../citation-runs/entities/citation-accuracy-run.entity';

export type EnvReader = (key: string) => string | undefined;

export const MIGRATIONS_GLOB = join(__dirname, '../database/migrations/*{.ts,.js}');

export function readFlag(value: string | undefined, fallback: boolean): boolean {
  if (value === undefined || value.trim() === '') {
    return fallback;
  }

  return ['1', 'true', 'yes', 'on'].includes(value.trim().toLowerCase());
}

/**
 * Shared by the Nest module and the standalone migration data source so both
 * connect the same way.
 */
export function buildDatabaseOptions(read: EnvReader): PostgresConnectionOptions {
  const isProduction = read('NODE_ENV') === 'production';

  return {
    type: 'postgres',
    url: read('DATABASE_URL'),
    synchronize: false,
    logging: readFlag(read('DB_LOGGING'), !isProduction),
    entities: [CitationAccuracyRun],
    migrations: [MIGRATIONS_GLOB],
    migrationsRun: readFlag(read('DB_MIGRATIONS_RUN'), true),
  };
}
