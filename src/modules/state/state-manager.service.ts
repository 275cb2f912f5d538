import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { EntityManager } from '@mikro-orm/core';
import { ClassConstructor, plainToInstance } from 'class-transformer';
import { validate, ValidationError } from 'class-validator';
import { readFile } from 'fs/promises';
import { join } from 'path';
import { describeError, StateFileError } from '../../common/errors/database.errors';
import { AppConfig } from '../../config/configuration';
import { MigrationService } from '../migration/migration.service';
import { SubscriptionType } from '../subscription/entities/subscription-type.entity';
import { Image } from '../container/entities/image.entity';
import { ImageState, SubscriptionTypeState } from './dto/seed-state.dto';

export type SeedTable = 'subscription_types' | 'images';

export const SEED_TABLES: readonly SeedTable[] = ['subscription_types', 'images'];

export const STATE_FILES: Record<SeedTable, string> = {
  subscription_types: 'subscription-types.json',
  images: 'images.json',
};

export interface MigrationStateReport {
  currentVersion: string | null;
  executed: string[];
  pending: string[];
  schemaInSync: boolean;
}

export interface SeedSyncResult {
  table: SeedTable;
  created: string[];
  updated: string[];
  unchanged: string[];
  deactivated: string[];
}

export interface StateDifferences {
  uniqueToState: Set<string>;
  uniqueToDb: Set<string>;
  common: Set<string>;
}

export function findDifferences(stateKeys: Iterable<string>, dbKeys: Iterable<string>): StateDifferences {
  const state = new Set(stateKeys);
  const db = new Set(dbKeys);
  return {
    uniqueToState: new Set([...state].filter((key) => !db.has(key))),
    uniqueToDb: new Set([...db].filter((key) => !state.has(key))),
    common: new Set([...state].filter((key) => db.has(key))),
  };
}

interface ReconcileOperations<S, E> {
  stateKey: (state: S) => string;
  rowKey: (row: E) => string;
  create: (state: S) => void;
  update: (row: E, state: S) => void;
  // compared before and after `update` to tell real changes apart
  fingerprint: (row: E) => string;
}

function formatValidationErrors(errors: ValidationError[]): string {
  return errors
    .map((error) => `${error.property}: ${Object.values(error.constraints ?? {}).join(', ')}`)
    .join('; ');
}

function assignSubscriptionType(row: SubscriptionType, state: SubscriptionTypeState): void {
  row.name = state.name;
  row.type = state.type;
  row.amount = state.amount.toFixed(2);
  row.durationDays = state.durationDays;
  if (state.currency !== undefined) row.currency = state.currency;
  if (state.maxContainers !== undefined) row.maxContainers = state.maxContainers;
  if (state.cpuLimitPerContainer !== undefined) row.cpuLimitPerContainer = state.cpuLimitPerContainer;
  if (state.memoryLimitPerContainer !== undefined) row.memoryLimitPerContainer = state.memoryLimitPerContainer;
  row.description = state.description;
  row.isActive = state.isActive ?? true;
}

function subscriptionTypeFingerprint(row: SubscriptionType): string {
  return JSON.stringify([
    row.name,
    row.type,
    Number(row.amount),
    row.currency,
    row.durationDays,
    row.maxContainers,
    row.cpuLimitPerContainer,
    row.memoryLimitPerContainer,
    row.description ?? null,
    row.isActive,
  ]);
}

function imageFingerprint(row: Image): string {
  return JSON.stringify([row.name, row.image, row.isActive]);
}

function assignImage(row: Image, state: ImageState): void {
  row.name = state.name;
  row.image = state.image;
  row.isActive = state.isActive ?? true;
}

/**
 * 数据库状态管理
 * Reports where the database stands against the migration files and entity
 * definitions, and keeps the lookup tables in line with the JSON files under
 * `states/`. Rows that disappear from a file are deactivated, never deleted,
 * because subscriptions and orders may still reference them.
 */
@Injectable()
export class StateManagerService {
  private readonly logger = new Logger(StateManagerService.name);

  constructor(
    private readonly em: EntityManager,
    private readonly migrationService: MigrationService,
    private readonly configService: ConfigService,
  ) {}

  private get stateDirectory(): string {
    return this.configService.getOrThrow<AppConfig['state']>('config.state').directory;
  }

  async getMigrationState(): Promise<MigrationStateReport> {
    const executed = await this.migrationService.getExecuted();
    const pending = await this.migrationService.getPending();
    const schemaInSync = await this.migrationService.isSchemaInSync();

    return {
      currentVersion: executed.length > 0 ? executed[executed.length - 1] : null,
      executed,
      pending,
      schemaInSync,
    };
  }

  async reconcile(): Promise<MigrationStateReport> {
    const report = await this.getMigrationState();

    this.logger.log(`Current version: ${report.currentVersion ?? 'none'} (${report.executed.length} applied)`);
    if (report.pending.length > 0) {
      this.logger.warn(`${report.pending.length} pending migration(s): ${report.pending.join(', ')}`);
    }
    if (!report.schemaInSync) {
      this.logger.warn('Entity definitions differ from the database schema, a new migration is needed');
    }
    if (report.pending.length === 0 && report.schemaInSync) {
      this.logger.log('Migration state is consistent');
    }

    return report;
  }

  async syncSeedState(table: SeedTable): Promise<SeedSyncResult> {
    switch (table) {
      case 'subscription_types':
        return this.syncSubscriptionTypes();
      case 'images':
        return this.syncImages();
    }
  }

  async syncAll(): Promise<SeedSyncResult[]> {
    const results: SeedSyncResult[] = [];
    for (const table of SEED_TABLES) {
      results.push(await this.syncSeedState(table));
    }
    return results;
  }

  private async syncSubscriptionTypes(): Promise<SeedSyncResult> {
    const table: SeedTable = 'subscription_types';
    const states = await this.loadStateFile(table, SubscriptionTypeState, (state) => state.type);

    return this.em.fork().transactional(async (em) => {
      const rows = await em.find(SubscriptionType, {});
      return this.reconcileRows(table, states, rows, {
        stateKey: (state) => state.type,
        rowKey: (row) => row.type,
        create: (state) => {
          const row = new SubscriptionType();
          assignSubscriptionType(row, state);
          em.persist(row);
        },
        update: assignSubscriptionType,
        fingerprint: subscriptionTypeFingerprint,
      });
    });
  }

  private async syncImages(): Promise<SeedSyncResult> {
    const table: SeedTable = 'images';
    const states = await this.loadStateFile(table, ImageState, (state) => state.name);

    return this.em.fork().transactional(async (em) => {
      const rows = await em.find(Image, {});
      return this.reconcileRows(table, states, rows, {
        stateKey: (state) => state.name,
        rowKey: (row) => row.name,
        create: (state) => {
          const row = new Image();
          assignImage(row, state);
          em.persist(row);
        },
        update: assignImage,
        fingerprint: imageFingerprint,
      });
    });
  }

  private reconcileRows<S, E extends { isActive: boolean }>(
    table: SeedTable,
    states: S[],
    rows: E[],
    operations: ReconcileOperations<S, E>,
  ): SeedSyncResult {
    const differences = findDifferences(states.map(operations.stateKey), rows.map(operations.rowKey));
    const rowsByKey = new Map(rows.map((row): [string, E] => [operations.rowKey(row), row]));
    const result: SeedSyncResult = { table, created: [], updated: [], unchanged: [], deactivated: [] };

    for (const state of states) {
      const key = operations.stateKey(state);
      const row = rowsByKey.get(key);
      if (row) {
        const before = operations.fingerprint(row);
        operations.update(row, state);
        if (operations.fingerprint(row) === before) {
          result.unchanged.push(key);
        } else {
          result.updated.push(key);
        }
      } else {
        operations.create(state);
        result.created.push(key);
      }
    }

    for (const key of differences.uniqueToDb) {
      const row: { isActive: boolean } | undefined = rowsByKey.get(key);
      if (row && row.isActive) {
        row.isActive = false;
        result.deactivated.push(key);
      }
    }

    this.logger.log(
      `${table}: ${result.created.length} created, ${result.updated.length} updated, ` +
        `${result.unchanged.length} unchanged, ${result.deactivated.length} deactivated`,
    );
    return result;
  }

  private async loadStateFile<S extends object>(
    table: SeedTable,
    type: ClassConstructor<S>,
    keyOf: (state: S) => string,
  ): Promise<S[]> {
    const filePath = join(this.stateDirectory, STATE_FILES[table]);

    let raw: unknown;
    try {
      raw = JSON.parse(await readFile(filePath, 'utf8'));
    } catch (error) {
      throw new StateFileError(filePath, describeError(error));
    }
    if (!Array.isArray(raw) || raw.length === 0) {
      throw new StateFileError(filePath, 'expected a non-empty JSON array');
    }

    const records = plainToInstance(type, raw);
    const seen = new Set<string>();
    for (const [index, record] of records.entries()) {
      const errors = await validate(record, { whitelist: true, forbidNonWhitelisted: true });
      if (errors.length > 0) {
        throw new StateFileError(filePath, `record ${index}: ${formatValidationErrors(errors)}`);
      }
      const key = keyOf(record);
      if (seen.has(key)) {
        throw new StateFileError(filePath, `duplicate key "${key}"`);
      }
      seen.add(key);
    }

    return records;
  }
}
