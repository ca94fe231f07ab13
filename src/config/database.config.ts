import { registerAs } from '@nestjs/config';
import { PostgresConnectionOptions } from 'typeorm/driver/postgres/PostgresConnectionOptions';

function flag(name: string): boolean {
  return process.env[name] === 'true';
}

/**
 * DATABASE_URL wins over the individual DB_* settings when both are given.
 * Entities are registered per module (autoLoadEntities), so none are listed.
 */
export default registerAs(
  'database',
  (): PostgresConnectionOptions => ({
    type: 'postgres',
    url: process.env.DATABASE_URL || undefined,
    host: process.env.DB_HOST ?? 'localhost',
    port: parseInt(process.env.DB_PORT ?? '5432', 10),
    username: process.env.DB_USERNAME ?? 'postgres',
    password: process.env.DB_PASSWORD ?? 'postgres',
    database: process.env.DB_NAME ?? 'order_ledger',
    synchronize: flag('DB_SYNCHRONIZE'),
    migrationsRun: flag('DB_RUN_MIGRATIONS'),
    logging: flag('DB_LOGGING'),
    migrations: [__dirname + '/../migrations/*{.ts,.js}'],
    ssl: flag('DB_SSL') ? { rejectUnauthorized: false } : undefined,
  }),
);
