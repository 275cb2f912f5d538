import { Subscription, SubscriptionStatus } from './entities/subscription.entity';

export type SubscriptionEvent = 'activate' | 'expire' | 'cancel' | 'suspend' | 'reactivate';

export const NONPAYMENT_GRACE_PERIOD_DAYS = 7;

const DAY_MS = 24 * 60 * 60 * 1000;

const TRANSITIONS: Record<SubscriptionStatus, Partial<Record<SubscriptionEvent, SubscriptionStatus>>> = {
  [SubscriptionStatus.PENDING]: {
    activate: SubscriptionStatus.ACTIVE,
  },
  [SubscriptionStatus.ACTIVE]: {
    expire: SubscriptionStatus.EXPIRED,
    cancel: SubscriptionStatus.CANCELLED,
    suspend: SubscriptionStatus.SUSPENDED,
  },
  [SubscriptionStatus.SUSPENDED]: {
    reactivate: SubscriptionStatus.ACTIVE,
  },
  [SubscriptionStatus.EXPIRED]: {},
  [SubscriptionStatus.CANCELLED]: {},
};

export class InvalidSubscriptionTransitionError extends Error {
  constructor(
    public readonly from: SubscriptionStatus,
    public readonly event: SubscriptionEvent,
  ) {
    super(`Cannot ${event} a subscription in status ${from}`);
    this.name = 'InvalidSubscriptionTransitionError';
  }
}

export function canTransition(from: SubscriptionStatus, event: SubscriptionEvent): boolean {
  return TRANSITIONS[from][event] !== undefined;
}

export function nextStatus(from: SubscriptionStatus, event: SubscriptionEvent): SubscriptionStatus {
  const to = TRANSITIONS[from][event];
  if (to === undefined) {
    throw new InvalidSubscriptionTransitionError(from, event);
  }
  return to;
}

export function graceDeadline(validUntil: Date): Date {
  return new Date(validUntil.getTime() + NONPAYMENT_GRACE_PERIOD_DAYS * DAY_MS);
}

/**
 * Applies an event to the subscription in place. Only the row's current state
 * changes; the history is kept by change data capture.
 */
export function applySubscriptionEvent(
  subscription: Subscription,
  event: SubscriptionEvent,
  now: Date = new Date(),
): Subscription {
  const status = nextStatus(subscription.status, event);

  switch (event) {
    case 'cancel':
      subscription.cancelledAt = now;
      subscription.autoRenew = false;
      break;
    case 'suspend':
      subscription.suspendedAt = now;
      break;
    case 'reactivate':
      subscription.suspendedAt = undefined;
      break;
    default:
      break;
  }

  subscription.status = status;
  return subscription;
}

/**
 * Time-driven event due for an active subscription, if any: a non-renewing
 * subscription expires at `validUntil`, a renewing one is suspended once the
 * grace period after `validUntil` runs out without payment.
 */
export function dueEvent(subscription: Subscription, now: Date = new Date()): SubscriptionEvent | null {
  if (subscription.status !== SubscriptionStatus.ACTIVE) {
    return null;
  }
  if (now.getTime() <= subscription.validUntil.getTime()) {
    return null;
  }
  if (!subscription.autoRenew) {
    return 'expire';
  }
  return now.getTime() > graceDeadline(subscription.validUntil).getTime() ? 'suspend' : null;
}
