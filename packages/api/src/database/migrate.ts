import 'reflect-metadata';

import { Logger } from '@nestjs/common';
import { DataSource } from 'typeorm';

import { AppDataSource } from './data-source';

const logger = new Logger('Migrations');

export type MigrationCommand = 'run' | 'revert';

export function parseCommand(argv: string[]): MigrationCommand {
  const [command = 'run'] = argv;
  if (command !== 'run' && command !== 'revert') {
    throw new Error(`Unknown migration command "${command}". Use "run" or "revert".`);
  }
  return command;
}

export async function runMigrations(
  dataSource: DataSource,
  command: MigrationCommand,
): Promise<string[]> {
  if (!dataSource.isInitialized) {
    await dataSource.initialize();
  }

  try {
    if (command === 'revert') {
      await dataSource.undoLastMigration({ transaction: 'each' });
      logger.log('Reverted the last applied migration.');
      return [];
    }

    const applied = await dataSource.runMigrations({ transaction: 'each' });
    if (applied.length === 0) {
      logger.log('Schema is up to date.');
    }
    for (const migration of applied) {
      logger.log(`Applied ${migration.name}`);
    }
    return applied.map((migration) => migration.name);
  } finally {
    await dataSource.destroy();
  }
}

async function main(): Promise<void> {
  const command = parseCommand(process.argv.slice(2));
  await runMigrations(AppDataSource, command);
}

if (require.main === module) {
  main().catch((error: unknown) => {
    logger.error(
      error instanceof Error ? error.message : String(error),
      error instanceof Error ? error.stack : undefined,
    );
    process.exitCode = 1;
  });
}
