import { Entity, Property, ManyToOne, Enum, Index, Unique } from '@mikro-orm/core';
import { BaseEntity } from '../../../common/entities/base.entity';
import { User } from '../../user/entities/user.entity';
import { Image } from './image.entity';

export enum ContainerStatus {
  PENDING = 'Pending',
  RUNNING = 'Running',
  SUCCEEDED = 'Succeeded',
  FAILED = 'Failed',
  UNKNOWN = 'Unknown',
}

export const DEFAULT_CPU_LIMIT = '1';
export const DEFAULT_MEMORY_LIMIT = '1Gi';
export const DEFAULT_STORAGE_LIMIT = '2Gi';

@Entity({ tableName: 'containers' })
@Unique({ name: 'uq_container_user_name', properties: ['user', 'name'] })
@Index({ name: 'idx_container_status', properties: ['status'] })
@Index({ name: 'idx_container_user_status', properties: ['user', 'status'] })
@Index({ name: 'idx_container_deleted_at', properties: ['deletedAt'] })
export class Container extends BaseEntity {
  @ManyToOne(() => User, { deleteRule: 'cascade' })
  user!: User;

  @ManyToOne(() => Image, { nullable: true, deleteRule: 'set null' })
  image?: Image;

  @Property({ length: 255 })
  name!: string;

  @Enum({ items: () => ContainerStatus, default: ContainerStatus.PENDING })
  status: ContainerStatus = ContainerStatus.PENDING;

  // 资源限制
  @Property({ length: 20, default: DEFAULT_CPU_LIMIT })
  cpuLimit: string = DEFAULT_CPU_LIMIT;

  @Property({ length: 20, default: DEFAULT_MEMORY_LIMIT })
  memoryLimit: string = DEFAULT_MEMORY_LIMIT;

  @Property({ length: 20, default: DEFAULT_STORAGE_LIMIT })
  storageLimit: string = DEFAULT_STORAGE_LIMIT;

  @Property({ length: 20, nullable: true })
  ipAddress?: string;

  @Property({ type: 'json', nullable: true })
  portMappings?: Record<string, number>;

  @Property({ type: 'json', nullable: true })
  environmentVars?: Record<string, string>;

  @Property({ type: 'json', nullable: true })
  associatedResources?: Record<string, unknown>;

  // set by the orchestrator after the row exists
  @Property({ length: 255, nullable: true })
  kubernetesId?: string;

  @Property({ length: 255, nullable: true })
  savedImage?: string;

  @Property({ type: 'datetime', nullable: true })
  deletedAt?: Date;
}
