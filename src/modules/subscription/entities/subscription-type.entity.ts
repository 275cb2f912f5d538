import { Entity, Property, OneToMany, Collection, Enum, Index, Unique } from '@mikro-orm/core';
import { BaseEntity } from '../../../common/entities/base.entity';
import { Order } from '../../order/entities/order.entity';
import { Subscription } from './subscription.entity';

export enum Currency {
  INR = 'INR',
  USD = 'USD',
  EUR = 'EUR',
}

/**
 * 订阅套餐
 * 被订阅或订单引用后不可删除，只能通过 isActive 下线
 */
@Entity({ tableName: 'subscription_types' })
@Index({ name: 'idx_subscription_type_is_active', properties: ['isActive'] })
@Index({ name: 'idx_subscription_type_amount', properties: ['amount'] })
export class SubscriptionType extends BaseEntity {
  @Property({ length: 100 })
  name!: string;

  // internal identifier, the key used when syncing from states/subscription-types.json
  @Property({ length: 50 })
  @Unique({ name: 'uq_subscription_type_type' })
  type!: string;

  @Property({ type: 'decimal', precision: 10, scale: 2 })
  amount!: string;

  @Enum({ items: () => Currency, default: Currency.INR })
  currency: Currency = Currency.INR;

  @Property({ type: 'integer' })
  durationDays!: number;

  @Property({ type: 'integer', default: 1 })
  maxContainers: number = 1;

  @Property({ length: 20, default: '1' })
  cpuLimitPerContainer: string = '1';

  @Property({ length: 20, default: '1Gi' })
  memoryLimitPerContainer: string = '1Gi';

  @Property({ type: 'text', nullable: true })
  description?: string;

  @Property({ default: true })
  isActive: boolean = true;

  @OneToMany(() => Subscription, subscription => subscription.subscriptionType)
  subscriptions = new Collection<Subscription>(this);

  @OneToMany(() => Order, order => order.subscriptionType)
  orders = new Collection<Order>(this);
}
