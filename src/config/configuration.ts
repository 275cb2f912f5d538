import { registerAs } from '@nestjs/config';
import { resolve } from 'path';
import {
  InvalidConfigurationError,
  MissingConfigurationError,
} from '../common/errors/database.errors';

export interface DatabaseConfig {
  host: string;
  port: number;
  username: string;
  password: string;
  database: string;
  poolMax: number;
  sqlEcho: boolean;
}

export interface MigrationsConfig {
  directory: string;
  tableName: string;
  emit: 'ts' | 'js';
}

export interface AppConfig {
  database: DatabaseConfig;
  migrations: MigrationsConfig;
  state: {
    directory: string;
  };
  logging: {
    level: string;
    file?: string;
  };
}

export type Environment = Record<string, string | undefined>;

const REQUIRED_DATABASE_KEYS = ['USERNAME', 'PASSWORD', 'HOST', 'PORT', 'DATABASE'] as const;

// NODE_ENV=test 时读取 TEST_DB_* 变量
export function databaseEnvPrefix(env: Environment): string {
  return env.NODE_ENV === 'test' ? 'TEST_DB_' : 'DB_';
}

function parseInteger(key: string, value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed <= 0) {
    throw new InvalidConfigurationError(key, value);
  }
  return parsed;
}

/**
 * Reads the connection settings, failing before any connection is attempted
 * when a required variable is absent.
 */
export function loadDatabaseConfig(env: Environment): DatabaseConfig {
  const prefix = databaseEnvPrefix(env);
  const missing = REQUIRED_DATABASE_KEYS.map((key) => `${prefix}${key}`).filter(
    (name) => env[name] === undefined || env[name] === '',
  );
  if (missing.length > 0) {
    throw new MissingConfigurationError(missing);
  }

  const read = (key: (typeof REQUIRED_DATABASE_KEYS)[number]): string => env[`${prefix}${key}`] ?? '';

  return {
    host: read('HOST'),
    port: parseInteger(`${prefix}PORT`, read('PORT')),
    username: read('USERNAME'),
    password: read('PASSWORD'),
    database: read('DATABASE'),
    poolMax: env.DB_POOL_MAX ? parseInteger('DB_POOL_MAX', env.DB_POOL_MAX) : 10,
    sqlEcho: (env.SQL_ECHO ?? 'false').toLowerCase() === 'true',
  };
}

export function buildConfiguration(env: Environment): AppConfig {
  return {
    database: loadDatabaseConfig(env),
    migrations: {
      directory: env.MIGRATIONS_DIR ?? resolve(__dirname, '..', 'migrations'),
      tableName: 'schema_migrations',
      // running from sources (ts-node) writes TypeScript migrations, compiled output writes JavaScript
      emit: __filename.endsWith('.ts') ? 'ts' : 'js',
    },
    state: {
      directory: env.STATE_DIR ?? resolve(__dirname, '..', '..', 'states'),
    },
    logging: {
      level: env.LOG_LEVEL ?? 'info',
      file: env.LOG_FILE,
    },
  };
}

export default registerAs('config', () => buildConfiguration(process.env));
