#!/usr/bin/env node
import 'reflect-metadata';
import { NestFactory } from '@nestjs/core';
import { AppModule } from './app.module';
import { CustomLogger } from './common/utils/logger.service';
import { describeError } from './common/errors/database.errors';
import { createProgram, SchemaCommandHandlers } from './cli/program';
import { SchemaCommandsService } from './cli/schema-commands.service';

const logger = new CustomLogger({ level: process.env.LOG_LEVEL, file: process.env.LOG_FILE });

// the application context (and the database connection) is only created once a command runs
async function withCommands(run: (commands: SchemaCommandsService) => Promise<void>): Promise<void> {
  const app = await NestFactory.createApplicationContext(AppModule, {
    logger,
    abortOnError: false,
  });
  try {
    await run(app.get(SchemaCommandsService));
  } finally {
    await app.close();
  }
}

const handlers: SchemaCommandHandlers = {
  init: (options) => withCommands((commands) => commands.init(options)),
  upgrade: (action) => withCommands((commands) => commands.upgrade(action)),
  downgrade: (options) => withCommands((commands) => commands.downgrade(options)),
  status: () => withCommands((commands) => commands.status()),
  syncState: () => withCommands((commands) => commands.syncState()),
};

async function bootstrap() {
  await createProgram(handlers).parseAsync(process.argv);
}

bootstrap().catch((error: unknown) => {
  logger.error(describeError(error), error instanceof Error ? error.stack : undefined, 'CLI');
  process.exitCode = 1;
});
