import 'reflect-metadata';
import path from 'path';
import { DataSource } from 'typeorm';
import type { EnvConfig } from './env';
import { JobPostingEntity } from '../entities/JobPostingEntity';

// Resolves to migrations/ from src/config and to dist/migrations/ from dist/src/config.
const migrationsGlob = path.join(__dirname, '..', '..', 'migrations', '*.{ts,js}');

export function createDataSource(env: Pick<EnvConfig, 'DATABASE_URL' | 'NODE_ENV' | 'DB_STATEMENT_TIMEOUT_MS'>): DataSource {
  return new DataSource({
    type: 'postgres',
    url: env.DATABASE_URL,
    entities: [JobPostingEntity],
    migrations: [migrationsGlob],
    synchronize: false,
    logging: env.NODE_ENV === 'development' ? ['error', 'warn', 'migration'] : ['error'],
    extra: {
      statement_timeout: env.DB_STATEMENT_TIMEOUT_MS,
      connectionTimeoutMillis: env.DB_STATEMENT_TIMEOUT_MS
    }
  });
}
