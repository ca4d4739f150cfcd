import {
  NewPrincipal,
  Principal,
  PrincipalChanges,
} from '../../domain/users';

/**
 * Credential store.
 *
 * `create` and `update` throw {@link DuplicateIdentityError} when the username
 * or email is already taken by another account.
 */
export abstract class UsersRepository {
  abstract findById(id: string): Promise<Principal | null>;

  /** Case-sensitive */
  abstract findByUsername(username: string): Promise<Principal | null>;

  abstract findByEmail(email: string): Promise<Principal | null>;

  /**
   * Most recent accounts first, without `excludeId`.
   */
  abstract listExcept(excludeId: string, limit: number): Promise<Principal[]>;

  abstract create(data: NewPrincipal): Promise<Principal>;

  abstract update(id: string, changes: PrincipalChanges): Promise<Principal | null>;

  abstract delete(id: string): Promise<boolean>;
}
