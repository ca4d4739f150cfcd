/**
 * Subscription state of a principal.
 *
 * Only `isSubscribed` and `subscriptionExpiry` are stored; the state is
 * derived from them at the moment of each check. `LAPSED` is therefore never
 * written anywhere.
 */
export enum SubscriptionState {
  UNSUBSCRIBED = 'unsubscribed',
  ACTIVE = 'active',
  LAPSED = 'lapsed',
}

/**
 * Values written to the principal by a successful activation.
 */
export interface SubscriptionGrant {
  isSubscribed: true;
  subscriptionExpiry: Date | null;
}
