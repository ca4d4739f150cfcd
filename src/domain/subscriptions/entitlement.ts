import { SubscriptionHolder } from '../users';
import { SubscriptionGrant, SubscriptionState } from './models';

const DAY_MS = 24 * 60 * 60 * 1000;

/**
 * Whether the holder may reach subscription-only content at `now`.
 *
 * A subscribed holder without an expiry is entitled indefinitely; an expiry
 * equal to `now` has already lapsed.
 */
export const isEntitled = (holder: SubscriptionHolder, now: Date): boolean =>
  holder.isSubscribed &&
  (holder.subscriptionExpiry === null ||
    holder.subscriptionExpiry.getTime() > now.getTime());

export const subscriptionStateOf = (
  holder: SubscriptionHolder,
  now: Date,
): SubscriptionState => {
  if (!holder.isSubscribed) return SubscriptionState.UNSUBSCRIBED;
  return isEntitled(holder, now)
    ? SubscriptionState.ACTIVE
    : SubscriptionState.LAPSED;
};

/**
 * Subscription values after paying for `durationDays` more days.
 *
 * While active the new period starts at the current expiry, so renewing early
 * keeps the unused time. From `unsubscribed` or `lapsed` it starts at `now`.
 * A non-expiring grant stays non-expiring.
 */
export const grantSubscription = (
  holder: SubscriptionHolder,
  durationDays: number,
  now: Date,
): SubscriptionGrant => {
  const state = subscriptionStateOf(holder, now);

  if (state === SubscriptionState.ACTIVE && holder.subscriptionExpiry === null) {
    return { isSubscribed: true, subscriptionExpiry: null };
  }

  const periodStart =
    state === SubscriptionState.ACTIVE && holder.subscriptionExpiry !== null
      ? holder.subscriptionExpiry.getTime()
      : now.getTime();

  return {
    isSubscribed: true,
    subscriptionExpiry: new Date(periodStart + durationDays * DAY_MS),
  };
};
