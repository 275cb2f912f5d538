import { Injectable, Logger } from '@nestjs/common';
import { MigrationService } from '../modules/migration/migration.service';
import { StateManagerService } from '../modules/state/state-manager.service';
import { SchemaCommandHandlers, UpgradeAction, UsageError } from './program';

export const INITIAL_MIGRATION_MESSAGE = 'initial';

@Injectable()
export class SchemaCommandsService implements SchemaCommandHandlers {
  private readonly logger = new Logger(SchemaCommandsService.name);

  constructor(
    private readonly migrationService: MigrationService,
    private readonly stateManager: StateManagerService,
  ) {}

  async init(options: { force: boolean }): Promise<void> {
    const executed = await this.migrationService.getExecuted();
    if (executed.length > 0 && !options.force) {
      throw new UsageError(
        `Database already has ${executed.length} applied migration(s); run "init --force" to reset it`,
      );
    }

    await this.migrationService.reset();
    await this.migrationService.createMigration(INITIAL_MIGRATION_MESSAGE);
    await this.migrationService.createContainerStatusNotifyMigration();
    await this.migrationService.upgrade();
    await this.stateManager.syncAll();
    this.logger.log('Database initialized');
  }

  async upgrade(action: UpgradeAction): Promise<void> {
    switch (action.kind) {
      case 'create':
        await this.migrationService.createMigration(action.message);
        return;
      case 'apply':
        await this.migrationService.upgrade();
        return;
      case 'createAndApply':
        await this.migrationService.createAndApply(action.message);
        return;
    }
  }

  async downgrade(options: { to?: string }): Promise<void> {
    await this.migrationService.downgrade(options.to);
  }

  async status(): Promise<void> {
    await this.stateManager.reconcile();
  }

  async syncState(): Promise<void> {
    await this.stateManager.syncAll();
  }
}
