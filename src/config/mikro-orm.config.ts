import { Logger } from '@nestjs/common';
import { MigrationsOptions } from '@mikro-orm/core';
import { Migrator } from '@mikro-orm/migrations';
import { Options, PostgreSqlDriver } from '@mikro-orm/postgresql';
import { ENTITIES } from '../entities';
import { AppConfig, MigrationsConfig } from './configuration';

// "Add container quota" -> "add_container_quota"
export function slugifyMigrationName(message: string): string {
  return message
    .trim()
    .toLowerCase()
    .replace(/[^a-z0-9]+/g, '_')
    .replace(/^_+|_+$/g, '');
}

export function migrationFileName(timestamp: string, name?: string): string {
  const slug = name ? slugifyMigrationName(name) : '';
  return slug ? `Migration${timestamp}_${slug}` : `Migration${timestamp}`;
}

/**
 * Migrator settings shared by every driver. Each migration runs in its own
 * transaction so a failing step never leaves a half-applied version behind.
 */
export function buildMigrationsOptions(config: MigrationsConfig): MigrationsOptions {
  return {
    tableName: config.tableName,
    path: config.directory,
    pathTs: config.directory,
    glob: '!(*.d).{js,ts}',
    transactional: true,
    allOrNothing: false,
    disableForeignKeys: false,
    dropTables: true,
    safe: false,
    snapshot: false,
    emit: config.emit,
    fileName: migrationFileName,
  };
}

export function createMikroOrmOptions(config: AppConfig): Options {
  const { database } = config;
  const logger = new Logger('MikroORM');

  return {
    driver: PostgreSqlDriver,
    host: database.host,
    port: database.port,
    user: database.username,
    password: database.password,
    dbName: database.database,
    entities: ENTITIES,
    extensions: [Migrator],
    migrations: buildMigrationsOptions(config.migrations),
    pool: { min: 0, max: database.poolMax },
    debug: database.sqlEcho,
    // SQL_ECHO output is shown at the default log level
    logger: (message: string) => logger.log(message),
    // compiled to require() so migrations load under ts-node and ts-jest
    dynamicImportProvider: (id: string) => import(id),
  };
}
