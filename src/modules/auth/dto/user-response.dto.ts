import { Principal } from '../../../domain/users';

/**
 * Public view of an account. Never includes the password hash or reset token.
 */
export interface UserResponseDto {
  id: string;
  username: string;
  email: string;
  first_name: string;
  last_name: string;
  phone_number: string;
  is_admin: boolean;
  is_subscribed: boolean;
  subscription_expiry: string | null;
  avatar_url: string | null;
  created_at: string;
  updated_at: string | null;
}

export const toUserResponse = (principal: Principal): UserResponseDto => ({
  id: principal.id,
  username: principal.username,
  email: principal.email,
  first_name: principal.firstName,
  last_name: principal.lastName,
  phone_number: principal.phoneNumber,
  is_admin: principal.isAdmin,
  is_subscribed: principal.isSubscribed,
  subscription_expiry: principal.subscriptionExpiry?.toISOString() ?? null,
  avatar_url: principal.avatarUrl,
  created_at: principal.createdAt.toISOString(),
  updated_at: principal.updatedAt?.toISOString() ?? null,
});
