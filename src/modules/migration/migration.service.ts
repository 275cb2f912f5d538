import { Injectable, Logger } from '@nestjs/common';
import { IMigrator, MikroORM } from '@mikro-orm/core';
import { PostgreSqlPlatform } from '@mikro-orm/postgresql';
import { existsSync } from 'fs';
import { mkdir, readdir, unlink, writeFile } from 'fs/promises';
import { join } from 'path';
import { migrationFileName, slugifyMigrationName } from '../../config/mikro-orm.config';
import { MigrationApplyError, PendingMigrationsError } from '../../common/errors/database.errors';
import {
  CONTAINER_STATUS_NOTIFY_DOWN,
  CONTAINER_STATUS_NOTIFY_MIGRATION,
  CONTAINER_STATUS_NOTIFY_UP,
  DROP_CONTAINER_STATUS_NOTIFY_FUNCTION,
} from '../container/container-status-notify';
import { nextMigrationTimestamp, renderMigration } from './migration-template';

export interface CreatedMigration {
  created: boolean;
  fileName?: string;
  statements: number;
}

export interface CreateAndApplyResult {
  migration: CreatedMigration;
  applied: string[];
}

const MIGRATION_FILE = /^Migration\d{14}.*\.(ts|js)$/;

/**
 * 迁移引擎
 * Wraps the MikroORM migrator: generates migration files from the difference
 * between entity metadata and the live database, and applies pending files in
 * order, one transaction per file.
 */
@Injectable()
export class MigrationService {
  private readonly logger = new Logger(MigrationService.name);

  constructor(private readonly orm: MikroORM) {}

  private get migrator(): IMigrator {
    return this.orm.getMigrator();
  }

  async createMigration(message: string): Promise<CreatedMigration> {
    // the name ends up in the generated class name, so it must be an identifier fragment
    const name = slugifyMigrationName(message);
    if (!name) {
      throw new Error(`Migration message must contain letters or digits: "${message}"`);
    }

    // the diff runs against the live schema, so unapplied files would be generated again
    const pending = await this.getPending();
    if (pending.length > 0) {
      throw new PendingMigrationsError(pending);
    }

    this.logger.log(`Creating migration: ${message}`);
    const result = await this.migrator.createMigration(undefined, false, false, name);

    if (!result.fileName) {
      this.logger.log('No schema changes detected, no migration created');
      return { created: false, statements: 0 };
    }

    this.logger.log(`Created ${result.fileName} (${result.diff.up.length} statements)`);
    return { created: true, fileName: result.fileName, statements: result.diff.up.length };
  }

  /**
   * Writes the migration that installs the `containers` status trigger
   * (`notify_container_status_change()` publishing on `container_status_change`).
   * It is ordered after every migration already known.
   */
  async createContainerStatusNotifyMigration(): Promise<CreatedMigration> {
    const { path, emit } = this.orm.config.get('migrations');
    if (!path) {
      throw new Error('Migrations path is not configured');
    }

    const known = [...(await this.getExecuted()), ...(await this.getPending())];
    const className = migrationFileName(nextMigrationTimestamp(known), CONTAINER_STATUS_NOTIFY_MIGRATION);
    const extension = emit === 'ts' ? 'ts' : 'js';
    const fileName = `${className}.${extension}`;

    await mkdir(path, { recursive: true });
    await writeFile(
      join(path, fileName),
      renderMigration(className, CONTAINER_STATUS_NOTIFY_UP, CONTAINER_STATUS_NOTIFY_DOWN, extension),
    );

    this.logger.log(`Created ${fileName} (${CONTAINER_STATUS_NOTIFY_UP.length} statements)`);
    return { created: true, fileName, statements: CONTAINER_STATUS_NOTIFY_UP.length };
  }

  /**
   * Applies every pending migration. Already executed migrations are never
   * re-run, so calling this on an up-to-date database does nothing.
   */
  async upgrade(): Promise<string[]> {
    const pending = await this.getPending();
    if (pending.length === 0) {
      this.logger.log('Database is up to date');
      return [];
    }

    const executed = await this.getExecuted();
    let current = executed.length > 0 ? executed[executed.length - 1] : null;
    const applied: string[] = [];

    for (const name of pending) {
      this.logger.log(`Applying ${name}`);
      try {
        await this.migrator.up({ migrations: [name] });
      } catch (error) {
        this.logger.error(
          `Migration ${name} failed, database remains at ${current ?? 'an empty schema'}`,
          error instanceof Error ? error.stack : undefined,
        );
        throw new MigrationApplyError(name, error);
      }
      applied.push(name);
      current = name;
    }

    this.logger.log(`Applied ${applied.length} migration(s), now at ${current}`);
    return applied;
  }

  async createAndApply(message: string): Promise<CreateAndApplyResult> {
    const migration = await this.createMigration(message);
    const applied = await this.upgrade();
    return { migration, applied };
  }

  /**
   * Reverts the last executed migration, or every migration down to and
   * including `to`.
   */
  async downgrade(to?: string): Promise<string[]> {
    const reverted = await this.migrator.down(to ? { to } : undefined);
    const names = reverted.map((migration) => migration.name);
    if (names.length === 0) {
      this.logger.log('Nothing to revert');
    } else {
      this.logger.log(`Reverted ${names.join(', ')}`);
    }
    return names;
  }

  async getExecuted(): Promise<string[]> {
    const rows = await this.migrator.getExecutedMigrations();
    return rows.map((row) => row.name);
  }

  async getPending(): Promise<string[]> {
    const pending = await this.migrator.getPendingMigrations();
    return pending.map((migration) => migration.name);
  }

  async isSchemaInSync(): Promise<boolean> {
    return !(await this.migrator.checkMigrationNeeded());
  }

  /**
   * Drops every table in the schema, including ones no entity declares any
   * more, together with the migrations table, and deletes the migration files.
   * Only meant for first-time setup.
   */
  async reset(): Promise<string[]> {
    this.logger.warn('Dropping schema and migration history');
    await this.orm.getSchemaGenerator().dropSchema({ dropMigrationsTable: true });
    await this.dropRemainingTables();
    const removed = await this.removeMigrationFiles();
    this.logger.log(`Removed ${removed.length} migration file(s)`);
    return removed;
  }

  private async dropRemainingTables(): Promise<void> {
    const connection = this.orm.em.getConnection();
    const postgres = this.orm.em.getPlatform() instanceof PostgreSqlPlatform;

    const rows = await connection.execute<{ name: string }[]>(
      postgres
        ? 'select tablename as name from pg_tables where schemaname = current_schema()'
        : "select name from sqlite_master where type = 'table' and name not like 'sqlite_%'",
    );
    for (const { name } of rows) {
      this.logger.warn(`Dropping undeclared table ${name}`);
      await connection.execute(`drop table if exists "${name}"${postgres ? ' cascade' : ''}`);
    }

    if (postgres) {
      await connection.execute(DROP_CONTAINER_STATUS_NOTIFY_FUNCTION);
    }
  }

  private async removeMigrationFiles(): Promise<string[]> {
    const directory = this.orm.config.get('migrations').path;
    if (!directory || !existsSync(directory)) {
      return [];
    }

    const files = (await readdir(directory)).filter((file) => MIGRATION_FILE.test(file));
    for (const file of files) {
      await unlink(join(directory, file));
    }
    return files;
  }
}
