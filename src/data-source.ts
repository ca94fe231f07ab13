/**
 * Standalone DataSource for the TypeORM CLI (migration:run against dist/).
 */
import { config } from 'dotenv';
import * as path from 'path';
import { DataSource } from 'typeorm';
import databaseConfig from './config/database.config';

config();

export default new DataSource({
  ...databaseConfig(),
  synchronize: false,
  migrationsRun: false,
  entities: [path.join(__dirname, 'entities', '*.entity.js')],
  migrations: [path.join(__dirname, 'migrations', '*.js')],
});
