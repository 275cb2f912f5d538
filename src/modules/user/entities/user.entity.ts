import { Entity, Property, OneToMany, OneToOne, Collection, Enum, Index, Unique } from '@mikro-orm/core';
import { BaseEntity } from '../../../common/entities/base.entity';
import { Container } from '../../container/entities/container.entity';
import { Order } from '../../order/entities/order.entity';
import { Subscription } from '../../subscription/entities/subscription.entity';

export enum AuthProvider {
  GOOGLE = 'google',
  GITHUB = 'github',
}

/**
 * Application user, created on first OAuth login.
 * Deactivation is a soft delete through `isActive`; a hard delete removes the
 * user's containers and subscription and is refused while orders exist.
 */
@Entity({ tableName: 'users' })
@Index({ name: 'idx_user_provider', properties: ['provider'] })
@Index({ name: 'idx_user_is_active', properties: ['isActive'] })
@Index({ name: 'idx_user_email_provider', properties: ['email', 'provider'] })
export class User extends BaseEntity {
  @Property({ length: 255 })
  @Unique({ name: 'uq_user_email' })
  email!: string;

  @Enum(() => AuthProvider)
  provider!: AuthProvider;

  @Property({ length: 255 })
  providerId!: string;

  @Property({ type: 'datetime', nullable: true })
  lastLogin?: Date;

  @Property({ default: true })
  isActive: boolean = true;

  @OneToMany(() => Container, container => container.user)
  containers = new Collection<Container>(this);

  @OneToOne(() => Subscription, subscription => subscription.user, { nullable: true })
  subscription?: Subscription;

  @OneToMany(() => Order, order => order.user)
  orders = new Collection<Order>(this);
}
