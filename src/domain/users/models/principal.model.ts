/**
 * An account as stored in the credential store.
 */
export interface Principal {
  id: string;
  username: string;
  email: string;
  firstName: string;
  lastName: string;
  phoneNumber: string;
  passwordHash: string;
  isAdmin: boolean;
  isSubscribed: boolean;
  /**
   * Null with `isSubscribed` set means a non-expiring grant.
   */
  subscriptionExpiry: Date | null;
  /**
   * Outstanding single-use password reset token, if any.
   */
  resetToken: string | null;
  avatarUrl: string | null;
  /**
   * Last time the username was taken by this account through a rename.
   * Refresh tokens name their subject by username, so any issued earlier
   * no longer refer to this account.
   */
  usernameChangedAt: Date | null;
  createdAt: Date;
  updatedAt: Date | null;
}

/**
 * The two fields entitlement is computed from.
 */
export type SubscriptionHolder = Pick<
  Principal,
  'isSubscribed' | 'subscriptionExpiry'
>;

export type NewPrincipal = Pick<
  Principal,
  | 'username'
  | 'email'
  | 'firstName'
  | 'lastName'
  | 'phoneNumber'
  | 'passwordHash'
>;

export type PrincipalChanges = Partial<
  Pick<
    Principal,
    | 'username'
    | 'email'
    | 'firstName'
    | 'lastName'
    | 'phoneNumber'
    | 'passwordHash'
    | 'resetToken'
    | 'avatarUrl'
    | 'usernameChangedAt'
  >
>;
