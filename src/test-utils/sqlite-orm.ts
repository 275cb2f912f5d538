import 'reflect-metadata';
import { MikroORM } from '@mikro-orm/better-sqlite';
import { Migrator } from '@mikro-orm/migrations';
import { mkdir, mkdtemp, rm } from 'fs/promises';
import { join, resolve } from 'path';
import { buildMigrationsOptions } from '../config/mikro-orm.config';
import { ENTITIES } from '../entities';

// generated migrations require @mikro-orm/migrations, so they must live inside the project
const TMP_ROOT = resolve(__dirname, '..', '..', 'tmp');

export async function createTempDirectory(prefix: string): Promise<string> {
  await mkdir(TMP_ROOT, { recursive: true });
  return mkdtemp(join(TMP_ROOT, `${prefix}-`));
}

export async function removeTempDirectory(directory: string): Promise<void> {
  await rm(directory, { recursive: true, force: true });
}

/**
 * In-memory SQLite database with the production entities and migrator
 * settings. Migrations are emitted as JavaScript so Jest can load them
 * without a transform.
 */
export async function createSqliteOrm(migrationsDirectory: string): Promise<MikroORM> {
  const orm = await MikroORM.init({
    dbName: ':memory:',
    entities: ENTITIES,
    extensions: [Migrator],
    migrations: buildMigrationsOptions({
      directory: migrationsDirectory,
      tableName: 'schema_migrations',
      emit: 'js',
    }),
    allowGlobalContext: true,
    dynamicImportProvider: (id: string) => import(id),
  });
  await orm.em.getConnection().execute('pragma foreign_keys = on');
  return orm;
}

export async function listTables(orm: MikroORM): Promise<string[]> {
  const rows = await orm.em
    .getConnection()
    .execute<{ name: string }[]>("select name from sqlite_master where type = 'table' order by name");
  return rows.map((row) => row.name);
}
