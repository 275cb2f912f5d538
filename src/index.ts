export * from './entities';
export * from './modules/subscription/subscription-lifecycle';
export * from './common/errors/database.errors';
export { MigrationService } from './modules/migration/migration.service';
export { MigrationModule } from './modules/migration/migration.module';
export {
  StateManagerService,
  findDifferences,
  MigrationStateReport,
  SeedSyncResult,
  SeedTable,
} from './modules/state/state-manager.service';
export { StateModule } from './modules/state/state.module';
export { AppConfig, DatabaseConfig, loadDatabaseConfig } from './config/configuration';
export { createMikroOrmOptions, buildMigrationsOptions } from './config/mikro-orm.config';
export {
  CONTAINER_STATUS_CHANGE_CHANNEL,
  ContainerStatusChange,
  ContainerStatusPayloadError,
  parseContainerStatusChange,
} from './modules/container/container-status-notify';
