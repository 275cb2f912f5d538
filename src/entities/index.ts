import { User } from '../modules/user/entities/user.entity';
import { SubscriptionType } from '../modules/subscription/entities/subscription-type.entity';
import { Subscription } from '../modules/subscription/entities/subscription.entity';
import { Image } from '../modules/container/entities/image.entity';
import { Container } from '../modules/container/entities/container.entity';
import { Order } from '../modules/order/entities/order.entity';

export { AuthProvider, User } from '../modules/user/entities/user.entity';
export { Currency, SubscriptionType } from '../modules/subscription/entities/subscription-type.entity';
export { Subscription, SubscriptionStatus } from '../modules/subscription/entities/subscription.entity';
export { Image } from '../modules/container/entities/image.entity';
export { Container, ContainerStatus } from '../modules/container/entities/container.entity';
export { Order, OrderStatus } from '../modules/order/entities/order.entity';
export { BaseEntity } from '../common/entities/base.entity';

// every table the migrator diffs against
export const ENTITIES = [User, SubscriptionType, Subscription, Image, Container, Order];
