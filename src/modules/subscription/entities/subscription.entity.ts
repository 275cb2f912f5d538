import { Entity, Property, ManyToOne, OneToOne, OneToMany, Collection, Enum, Index } from '@mikro-orm/core';
import { BaseEntity } from '../../../common/entities/base.entity';
import { User } from '../../user/entities/user.entity';
import { Order } from '../../order/entities/order.entity';
import { SubscriptionType } from './subscription-type.entity';

export enum SubscriptionStatus {
  PENDING = 'Pending',
  ACTIVE = 'Active',
  SUSPENDED = 'Suspended',
  EXPIRED = 'Expired',
  CANCELLED = 'Cancelled',
}

/**
 * A user's current subscription. `user_id` is unique, so a user holds at most
 * one subscription row; earlier states live in the CDC history, not here.
 */
@Entity({ tableName: 'subscriptions' })
@Index({ name: 'idx_subscription_status', properties: ['status'] })
@Index({ name: 'idx_subscription_valid_until', properties: ['validUntil'] })
@Index({ name: 'idx_subscription_auto_renew', properties: ['autoRenew'] })
export class Subscription extends BaseEntity {
  @OneToOne(() => User, user => user.subscription, { owner: true, deleteRule: 'cascade' })
  user!: User;

  @ManyToOne(() => SubscriptionType, { deleteRule: 'restrict' })
  subscriptionType!: SubscriptionType;

  @Enum({ items: () => SubscriptionStatus, default: SubscriptionStatus.PENDING })
  status: SubscriptionStatus = SubscriptionStatus.PENDING;

  @Property({ default: true })
  autoRenew: boolean = true;

  @Property({ type: 'datetime' })
  validUntil!: Date;

  @Property({ type: 'datetime', nullable: true })
  cancelledAt?: Date;

  @Property({ type: 'datetime', nullable: true })
  suspendedAt?: Date;

  @OneToMany(() => Order, order => order.subscription)
  orders = new Collection<Order>(this);
}
