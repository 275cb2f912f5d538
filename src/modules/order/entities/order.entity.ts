import { Entity, Property, ManyToOne, Enum, Index } from '@mikro-orm/core';
import { BaseEntity } from '../../../common/entities/base.entity';
import { User } from '../../user/entities/user.entity';
import { Subscription } from '../../subscription/entities/subscription.entity';
import { Currency, SubscriptionType } from '../../subscription/entities/subscription-type.entity';

export enum OrderStatus {
  PENDING = 'Pending',
  PAID = 'Paid',
  FAILED = 'Failed',
  REFUNDED = 'Refunded',
}

/**
 * 支付订单（审计记录，不删除）
 *
 * `subscription` is empty for a first purchase and is filled in once the
 * subscription row exists; renewals and upgrades point at the existing one.
 */
@Entity({ tableName: 'orders' })
@Index({ name: 'idx_orders_status', properties: ['status'] })
@Index({ name: 'idx_orders_created_at', properties: ['createdAt'] })
@Index({ name: 'idx_orders_user_status', properties: ['user', 'status'] })
@Index({ name: 'idx_orders_payment_provider_id', properties: ['paymentProviderId'] })
export class Order extends BaseEntity {
  @ManyToOne(() => User, { deleteRule: 'restrict' })
  user!: User;

  @ManyToOne(() => Subscription, { nullable: true, deleteRule: 'set null' })
  subscription?: Subscription;

  @ManyToOne(() => SubscriptionType, { deleteRule: 'restrict' })
  subscriptionType!: SubscriptionType;

  @Property({ type: 'decimal', precision: 10, scale: 2 })
  amount!: string;

  @Enum({ items: () => Currency, default: Currency.INR })
  currency: Currency = Currency.INR;

  @Enum({ items: () => OrderStatus, default: OrderStatus.PENDING })
  status: OrderStatus = OrderStatus.PENDING;

  @Property({ length: 100, nullable: true })
  paymentMethod?: string;

  // external payment reference
  @Property({ length: 255, nullable: true })
  paymentProviderId?: string;

  @Property({ type: 'datetime', nullable: true })
  paidAt?: Date;
}
