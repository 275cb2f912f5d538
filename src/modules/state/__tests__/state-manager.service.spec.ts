import { Test, TestingModule } from '@nestjs/testing';
import { EntityManager } from '@mikro-orm/core';
import { ConfigService } from '@nestjs/config';
import { writeFile } from 'fs/promises';
import { join, resolve } from 'path';
import { findDifferences, StateManagerService } from '../state-manager.service';
import { MigrationService } from '../../migration/migration.service';
import { Image, SubscriptionType } from '../../../entities';
import { StateFileError } from '../../../common/errors/database.errors';
import {
  createSqliteOrm,
  createTempDirectory,
  removeTempDirectory,
} from '../../../test-utils/sqlite-orm';

describe('findDifferences', () => {
  it('should split keys into state-only, database-only and shared', () => {
    const differences = findDifferences(['free', 'basic', 'pro'], ['basic', 'pro', 'legacy']);

    expect([...differences.uniqueToState]).toEqual(['free']);
    expect([...differences.uniqueToDb]).toEqual(['legacy']);
    expect([...differences.common]).toEqual(['basic', 'pro']);
  });

  it('should handle empty inputs', () => {
    const differences = findDifferences([], ['basic']);

    expect(differences.uniqueToState.size).toBe(0);
    expect([...differences.uniqueToDb]).toEqual(['basic']);
    expect(differences.common.size).toBe(0);
  });
});

describe('StateManagerService', () => {
  let orm: Awaited<ReturnType<typeof createSqliteOrm>>;
  let module: TestingModule;
  let service: StateManagerService;
  let workDirectory: string;
  let stateDirectory: string;

  const mockMigrationService = {
    getExecuted: jest.fn(),
    getPending: jest.fn(),
    isSchemaInSync: jest.fn(),
  };

  const mockConfigService = {
    getOrThrow: jest.fn(() => ({ directory: stateDirectory })),
  };

  const writeState = (file: string, content: unknown) =>
    writeFile(join(stateDirectory, file), typeof content === 'string' ? content : JSON.stringify(content));

  const findPlan = (type: string) => orm.em.fork().findOneOrFail(SubscriptionType, { type });

  beforeAll(async () => {
    workDirectory = await createTempDirectory('state');
    orm = await createSqliteOrm(join(workDirectory, 'migrations'));
    await orm.getSchemaGenerator().createSchema();
  });

  afterAll(async () => {
    await orm.close(true);
    await removeTempDirectory(workDirectory);
  });

  beforeEach(async () => {
    jest.clearAllMocks();
    await orm.getSchemaGenerator().clearDatabase();
    stateDirectory = workDirectory;

    module = await Test.createTestingModule({
      providers: [
        StateManagerService,
        {
          provide: EntityManager,
          useValue: orm.em,
        },
        {
          provide: MigrationService,
          useValue: mockMigrationService,
        },
        {
          provide: ConfigService,
          useValue: mockConfigService,
        },
      ],
    }).compile();

    service = module.get<StateManagerService>(StateManagerService);
  });

  describe('getMigrationState / reconcile', () => {
    it('should report the latest executed migration as the current version', async () => {
      mockMigrationService.getExecuted.mockResolvedValue(['Migration20260101000000_initial', 'Migration20260201000000_quota']);
      mockMigrationService.getPending.mockResolvedValue(['Migration20260301000000_orders']);
      mockMigrationService.isSchemaInSync.mockResolvedValue(false);

      await expect(service.reconcile()).resolves.toEqual({
        currentVersion: 'Migration20260201000000_quota',
        executed: ['Migration20260101000000_initial', 'Migration20260201000000_quota'],
        pending: ['Migration20260301000000_orders'],
        schemaInSync: false,
      });
    });

    it('空数据库没有当前版本', async () => {
      mockMigrationService.getExecuted.mockResolvedValue([]);
      mockMigrationService.getPending.mockResolvedValue([]);
      mockMigrationService.isSchemaInSync.mockResolvedValue(true);

      const report = await service.getMigrationState();

      expect(report.currentVersion).toBeNull();
      expect(report.schemaInSync).toBe(true);
    });
  });

  describe('syncSeedState', () => {
    it('should insert every record on the first sync', async () => {
      await writeState('subscription-types.json', [
        { name: 'Basic', type: 'basic', amount: 199, durationDays: 30 },
        { name: 'Pro', type: 'pro', amount: 499.5, durationDays: 30, maxContainers: 10, memoryLimitPerContainer: '4Gi' },
      ]);

      await expect(service.syncSeedState('subscription_types')).resolves.toEqual({
        table: 'subscription_types',
        created: ['basic', 'pro'],
        updated: [],
        unchanged: [],
        deactivated: [],
      });

      const basic = await findPlan('basic');
      expect(Number(basic.amount)).toBe(199);
      expect(basic.maxContainers).toBe(1);
      expect(basic.isActive).toBe(true);

      const pro = await findPlan('pro');
      expect(Number(pro.amount)).toBe(499.5);
      expect(pro.maxContainers).toBe(10);
      expect(pro.memoryLimitPerContainer).toBe('4Gi');
    });

    it('should update changed records and deactivate removed ones', async () => {
      await writeState('subscription-types.json', [
        { name: 'Basic', type: 'basic', amount: 199, durationDays: 30 },
        { name: 'Pro', type: 'pro', amount: 499, durationDays: 30 },
      ]);
      await service.syncSeedState('subscription_types');

      await writeState('subscription-types.json', [{ name: 'Basic', type: 'basic', amount: 249, durationDays: 30 }]);
      await expect(service.syncSeedState('subscription_types')).resolves.toEqual({
        table: 'subscription_types',
        created: [],
        updated: ['basic'],
        unchanged: [],
        deactivated: ['pro'],
      });

      expect(Number((await findPlan('basic')).amount)).toBe(249);
      expect((await findPlan('pro')).isActive).toBe(false);

      // already inactive rows are not reported again
      const again = await service.syncSeedState('subscription_types');
      expect(again.deactivated).toEqual([]);
    });

    it('相同的状态文件再次同步时不计为更新', async () => {
      await writeState('subscription-types.json', [
        { name: 'Basic', type: 'basic', amount: 199, durationDays: 30 },
        { name: 'Pro', type: 'pro', amount: 499.5, durationDays: 30, description: 'Larger limits' },
      ]);
      await service.syncSeedState('subscription_types');

      await expect(service.syncSeedState('subscription_types')).resolves.toEqual({
        table: 'subscription_types',
        created: [],
        updated: [],
        unchanged: ['basic', 'pro'],
        deactivated: [],
      });
    });

    it('should reactivate a record that returns to the file', async () => {
      await writeState('images.json', [{ name: 'ubuntu', image: 'ubuntu:24.04' }]);
      await service.syncSeedState('images');
      await writeState('images.json', [{ name: 'alpine', image: 'alpine:3.20' }]);
      await service.syncSeedState('images');

      await writeState('images.json', [
        { name: 'alpine', image: 'alpine:3.20' },
        { name: 'ubuntu', image: 'ubuntu:24.10' },
      ]);
      const result = await service.syncSeedState('images');

      expect(result.updated).toEqual(['ubuntu']);
      expect(result.unchanged).toEqual(['alpine']);
      const ubuntu = await orm.em.fork().findOneOrFail(Image, { name: 'ubuntu' });
      expect(ubuntu.isActive).toBe(true);
      expect(ubuntu.image).toBe('ubuntu:24.10');
    });

    it('should load the files shipped under states/', async () => {
      stateDirectory = resolve(__dirname, '..', '..', '..', '..', 'states');

      const results = await service.syncAll();

      expect(results.map((result) => [result.table, result.created.length])).toEqual([
        ['subscription_types', 3],
        ['images', 5],
      ]);
      expect(await orm.em.fork().count(SubscriptionType, { isActive: true })).toBe(3);
    });
  });

  describe('state file validation', () => {
    it('should reject a file that is not JSON', async () => {
      await writeState('images.json', '{ not json');

      await expect(service.syncSeedState('images')).rejects.toThrow(StateFileError);
    });

    it('should reject a missing file', async () => {
      stateDirectory = join(workDirectory, 'does-not-exist');

      await expect(service.syncSeedState('images')).rejects.toThrow(/ENOENT/);
    });

    it('should reject an empty array', async () => {
      await writeState('images.json', []);

      await expect(service.syncSeedState('images')).rejects.toThrow('expected a non-empty JSON array');
    });

    it('should name the invalid record and property', async () => {
      await writeState('subscription-types.json', [
        { name: 'Basic', type: 'basic', amount: 199, durationDays: 0 },
      ]);

      await expect(service.syncSeedState('subscription_types')).rejects.toThrow(
        'record 0: durationDays: durationDays must not be less than 1',
      );
    });

    it('should reject unknown properties', async () => {
      await writeState('images.json', [
        { name: 'ubuntu', image: 'ubuntu:24.04' },
        { name: 'debian', image: 'debian:bookworm-slim', extra: true },
      ]);

      await expect(service.syncSeedState('images')).rejects.toThrow(
        'record 1: extra: property extra should not exist',
      );
    });

    it('should reject duplicate keys', async () => {
      await writeState('subscription-types.json', [
        { name: 'Basic', type: 'basic', amount: 199, durationDays: 30 },
        { name: 'Basic again', type: 'basic', amount: 99, durationDays: 30 },
      ]);

      await expect(service.syncSeedState('subscription_types')).rejects.toThrow('duplicate key "basic"');
    });

    it('should not touch the database when the file is invalid', async () => {
      await writeState('images.json', [{ name: 'ubuntu', image: 'ubuntu:24.04' }, { name: '', image: 'x' }]);

      await expect(service.syncSeedState('images')).rejects.toThrow(StateFileError);
      expect(await orm.em.fork().count(Image, {})).toBe(0);
    });
  });
});
