import { Command } from 'commander';

export type UpgradeAction =
  | { kind: 'create'; message: string }
  | { kind: 'apply' }
  | { kind: 'createAndApply'; message: string };

export interface SchemaCommandHandlers {
  init(options: { force: boolean }): Promise<void>;
  upgrade(action: UpgradeAction): Promise<void>;
  downgrade(options: { to?: string }): Promise<void>;
  status(): Promise<void>;
  syncState(): Promise<void>;
}

export class UsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'UsageError';
  }
}

/**
 * upgrade <message>          create a migration and apply it
 * upgrade create <message>   create only
 * upgrade upgrade            apply pending migrations
 */
export function parseUpgradeArgs(args: string[]): UpgradeAction {
  const [first, ...rest] = args;

  if (first === 'create') {
    const message = rest.join(' ').trim();
    if (!message) {
      throw new UsageError('upgrade create requires a migration message');
    }
    return { kind: 'create', message };
  }

  if (first === 'upgrade') {
    if (rest.length > 0) {
      throw new UsageError('upgrade upgrade takes no further arguments');
    }
    return { kind: 'apply' };
  }

  const message = args.join(' ').trim();
  if (!message) {
    throw new UsageError('upgrade requires a migration message');
  }
  return { kind: 'createAndApply', message };
}

export function createProgram(handlers: SchemaCommandHandlers): Command {
  const program = new Command();

  program
    .name('saas-schema')
    .description('Schema and migration management for the SaaS database');

  program
    .command('init')
    .description('reset the database, generate the initial migration, apply it and seed lookup tables')
    .option('-f, --force', 'reset even when migrations have already been applied', false)
    .action(async (options: { force: boolean }) => {
      await handlers.init({ force: options.force });
    });

  program
    .command('upgrade')
    .description('create and apply a migration ("upgrade <message>"), create only ("upgrade create <message>"), or apply pending ("upgrade upgrade")')
    .argument('<args...>', 'migration message, or a subcommand followed by its arguments')
    .action(async (args: string[]) => {
      await handlers.upgrade(parseUpgradeArgs(args));
    });

  program
    .command('downgrade')
    .description('revert the last migration, or every migration down to and including --to')
    .option('--to <name>', 'oldest migration to revert')
    .action(async (options: { to?: string }) => {
      await handlers.downgrade({ to: options.to });
    });

  program
    .command('status')
    .description('report the applied and pending migrations and whether the schema matches the entities')
    .action(async () => {
      await handlers.status();
    });

  program
    .command('sync-state')
    .description('reconcile subscription_types and images with the JSON files under states/')
    .action(async () => {
      await handlers.syncState();
    });

  return program;
}
