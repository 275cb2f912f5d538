import { Expose } from 'class-transformer';
import { IsEnum, IsString, IsUUID } from 'class-validator';
import { ContainerStatus } from '../entities/container.entity';

// field names as written by notify_container_status_change()
export class ContainerStatusChangeMessage {
  @IsUUID()
  id!: string;

  @Expose({ name: 'user_id' })
  @IsUUID()
  userId!: string;

  @IsString()
  name!: string;

  @Expose({ name: 'old_status' })
  @IsEnum(ContainerStatus)
  oldStatus!: ContainerStatus;

  @Expose({ name: 'new_status' })
  @IsEnum(ContainerStatus)
  newStatus!: ContainerStatus;

  @Expose({ name: 'updated_at' })
  @IsString()
  updatedAt!: string;
}
