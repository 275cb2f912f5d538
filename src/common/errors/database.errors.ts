/**
 * 数据库相关错误
 * 配置缺失、迁移失败、状态文件异常
 */

export class MissingConfigurationError extends Error {
  constructor(public readonly missing: string[]) {
    super(`Missing database configuration: ${missing.join(', ')}`);
    this.name = 'MissingConfigurationError';
  }
}

export class InvalidConfigurationError extends Error {
  constructor(public readonly key: string, value: string) {
    super(`Invalid value for ${key}: "${value}"`);
    this.name = 'InvalidConfigurationError';
  }
}

export class MigrationApplyError extends Error {
  constructor(
    public readonly step: string,
    public readonly originalError: unknown,
  ) {
    super(`Migration ${step} failed: ${describeError(originalError)}`);
    this.name = 'MigrationApplyError';
  }
}

export class PendingMigrationsError extends Error {
  constructor(public readonly pending: string[]) {
    super(
      `Database is not up to date, pending: ${pending.join(', ')}; run "upgrade upgrade" first`,
    );
    this.name = 'PendingMigrationsError';
  }
}

export class StateFileError extends Error {
  constructor(public readonly filePath: string, reason: string) {
    super(`Invalid state file ${filePath}: ${reason}`);
    this.name = 'StateFileError';
  }
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
