import 'reflect-metadata';

import { DataSource } from 'typeorm';

import { buildDatabaseOptions } from '../config/database.config';

export const AppDataSource = new DataSource({
  ...buildDatabaseOptions((key) => process.env[key]),
  migrationsRun: false,
});

export default AppDataSource;
