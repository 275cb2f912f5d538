import { Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import { MikroOrmModule } from '@mikro-orm/nestjs';
import { MigrationModule } from '../migration/migration.module';
import { SubscriptionType } from '../subscription/entities/subscription-type.entity';
import { Image } from '../container/entities/image.entity';
import { StateManagerService } from './state-manager.service';

@Module({
  imports: [
    MikroOrmModule.forFeature([SubscriptionType, Image]),
    ConfigModule,
    MigrationModule,
  ],
  providers: [StateManagerService],
  exports: [StateManagerService],
})
export class StateModule {}
