import { Module } from '@nestjs/common';
import { ConfigModule, ConfigService } from '@nestjs/config';
import { MikroOrmModule } from '@mikro-orm/nestjs';
import { PostgreSqlDriver } from '@mikro-orm/postgresql';
import configuration, { AppConfig } from './config/configuration';
import { createMikroOrmOptions } from './config/mikro-orm.config';
import { MigrationModule } from './modules/migration/migration.module';
import { StateModule } from './modules/state/state.module';
import { SchemaCommandsService } from './cli/schema-commands.service';

@Module({
  imports: [
    ConfigModule.forRoot({
      isGlobal: true,
      load: [configuration],
    }),
    MikroOrmModule.forRootAsync({
      driver: PostgreSqlDriver,
      inject: [ConfigService],
      useFactory: (configService: ConfigService) =>
        createMikroOrmOptions(configService.getOrThrow<AppConfig>('config')),
    }),
    MigrationModule,
    StateModule,
  ],
  providers: [SchemaCommandsService],
})
export class AppModule {}
