import { randomUUID } from 'node:crypto';
import { DuplicateIdentityError } from '../../src/core/errors';
import {
  CompletionOutcome,
  PaymentTransactionsRepository,
  SubscriptionPlansRepository,
  UsersRepository,
} from '../../src/database/repositories';
import {
  NewPaymentTransaction,
  NewSubscriptionPlan,
  PaymentTransaction,
  SubscriptionGrant,
  SubscriptionPlan,
  SubscriptionPlanChanges,
  TransactionStatus,
} from '../../src/domain/subscriptions/models';
import {
  NewPrincipal,
  Principal,
  PrincipalChanges,
  SubscriptionHolder,
} from '../../src/domain/users';
import { Clock } from '../../src/core/time/clock';

const pick = <V>(next: V | undefined, current: V): V =>
  next === undefined ? current : next;

/**
 * Stand-ins for the TypeORM repositories. Rows are copied on the way in and
 * out so callers cannot mutate stored state.
 */
export class InMemoryUsersRepository extends UsersRepository {
  private readonly rows = new Map<string, Principal>();

  constructor(private readonly clock: Clock) {
    super();
  }

  async findById(id: string): Promise<Principal | null> {
    return this.snapshot(id);
  }

  async findByUsername(username: string): Promise<Principal | null> {
    const row = [...this.rows.values()].find((p) => p.username === username);
    return row ? { ...row } : null;
  }

  async findByEmail(email: string): Promise<Principal | null> {
    const row = [...this.rows.values()].find((p) => p.email === email);
    return row ? { ...row } : null;
  }

  async listExcept(excludeId: string, limit: number): Promise<Principal[]> {
    return [...this.rows.values()]
      .filter((p) => p.id !== excludeId)
      .sort((a, b) => b.createdAt.getTime() - a.createdAt.getTime())
      .slice(0, limit)
      .map((p) => ({ ...p }));
  }

  async create(data: NewPrincipal): Promise<Principal> {
    this.assertUnique(null, data.username, data.email);
    const row: Principal = {
      ...data,
      id: randomUUID(),
      isAdmin: false,
      isSubscribed: false,
      subscriptionExpiry: null,
      resetToken: null,
      avatarUrl: null,
      usernameChangedAt: null,
      createdAt: this.clock.now(),
      updatedAt: null,
    };
    this.rows.set(row.id, row);
    return { ...row };
  }

  async update(id: string, changes: PrincipalChanges): Promise<Principal | null> {
    const existing = this.rows.get(id);
    if (!existing) return null;

    this.assertUnique(id, changes.username, changes.email);
    const row: Principal = {
      ...existing,
      username: pick(changes.username, existing.username),
      email: pick(changes.email, existing.email),
      firstName: pick(changes.firstName, existing.firstName),
      lastName: pick(changes.lastName, existing.lastName),
      phoneNumber: pick(changes.phoneNumber, existing.phoneNumber),
      passwordHash: pick(changes.passwordHash, existing.passwordHash),
      resetToken: pick(changes.resetToken, existing.resetToken),
      avatarUrl: pick(changes.avatarUrl, existing.avatarUrl),
      usernameChangedAt: pick(changes.usernameChangedAt, existing.usernameChangedAt),
      updatedAt: this.clock.now(),
    };
    this.rows.set(id, row);
    return { ...row };
  }

  async delete(id: string): Promise<boolean> {
    return this.rows.delete(id);
  }

  /** Synchronous read, for atomic sections of the other stand-ins */
  snapshot(id: string): Principal | null {
    const row = this.rows.get(id);
    return row ? { ...row } : null;
  }

  /** Test helper: set fields no repository operation exposes */
  patch(id: string, fields: Partial<Principal>): Principal {
    const existing = this.rows.get(id);
    if (!existing) throw new Error(`No user ${id}`);
    const row = { ...existing, ...fields };
    this.rows.set(id, row);
    return { ...row };
  }

  private assertUnique(
    selfId: string | null,
    username: string | undefined,
    email: string | undefined,
  ): void {
    for (const row of this.rows.values()) {
      if (row.id === selfId) continue;
      if (username !== undefined && row.username === username) {
        throw new DuplicateIdentityError('username');
      }
      if (email !== undefined && row.email === email) {
        throw new DuplicateIdentityError('email');
      }
    }
  }
}

export class InMemorySubscriptionPlansRepository extends SubscriptionPlansRepository {
  private readonly rows = new Map<string, SubscriptionPlan>();

  constructor(private readonly clock: Clock) {
    super();
  }

  async findById(id: string): Promise<SubscriptionPlan | null> {
    const row = this.rows.get(id);
    return row ? { ...row } : null;
  }

  async list(activeOnly: boolean): Promise<SubscriptionPlan[]> {
    return [...this.rows.values()]
      .filter((plan) => !activeOnly || plan.isActive)
      .sort((a, b) => a.price - b.price)
      .map((plan) => ({ ...plan }));
  }

  async create(data: NewSubscriptionPlan): Promise<SubscriptionPlan> {
    const row: SubscriptionPlan = {
      ...data,
      id: randomUUID(),
      createdAt: this.clock.now(),
      updatedAt: null,
    };
    this.rows.set(row.id, row);
    return { ...row };
  }

  async update(
    id: string,
    changes: SubscriptionPlanChanges,
  ): Promise<SubscriptionPlan | null> {
    const existing = this.rows.get(id);
    if (!existing) return null;

    const row: SubscriptionPlan = {
      ...existing,
      name: pick(changes.name, existing.name),
      description: pick(changes.description, existing.description),
      price: pick(changes.price, existing.price),
      currency: pick(changes.currency, existing.currency),
      durationDays: pick(changes.durationDays, existing.durationDays),
      isActive: pick(changes.isActive, existing.isActive),
      updatedAt: this.clock.now(),
    };
    this.rows.set(id, row);
    return { ...row };
  }
}

export class InMemoryPaymentTransactionsRepository extends PaymentTransactionsRepository {
  private readonly rows = new Map<string, PaymentTransaction>();

  constructor(
    private readonly users: InMemoryUsersRepository,
    private readonly clock: Clock,
  ) {
    super();
  }

  async create(data: NewPaymentTransaction): Promise<PaymentTransaction> {
    if (this.rows.has(data.reference)) {
      throw new Error(`Duplicate reference ${data.reference}`);
    }
    const row: PaymentTransaction = {
      ...data,
      id: randomUUID(),
      status: TransactionStatus.PENDING,
      checkoutUrl: null,
      createdAt: this.clock.now(),
      completedAt: null,
    };
    this.rows.set(row.reference, row);
    return { ...row };
  }

  async findByReference(reference: string): Promise<PaymentTransaction | null> {
    const row = this.rows.get(reference);
    return row ? { ...row } : null;
  }

  async attachCheckoutUrl(reference: string, checkoutUrl: string): Promise<void> {
    const row = this.rows.get(reference);
    if (row) this.rows.set(reference, { ...row, checkoutUrl });
  }

  async markFailed(reference: string): Promise<void> {
    const row = this.rows.get(reference);
    if (row && row.status === TransactionStatus.PENDING) {
      this.rows.set(reference, { ...row, status: TransactionStatus.FAILED });
    }
  }

  /**
   * Runs without yielding, so concurrent calls observe each other's writes
   * the way the row locks make them in PostgreSQL.
   */
  async completeAndGrant(
    reference: string,
    completedAt: Date,
    grant: (owner: SubscriptionHolder) => SubscriptionGrant,
  ): Promise<CompletionOutcome | null> {
    const row = this.rows.get(reference);
    if (!row) return null;
    const owner = this.users.snapshot(row.userId);
    if (!owner) return null;

    if (row.status === TransactionStatus.COMPLETED) {
      return { applied: false, transaction: { ...row }, principal: owner };
    }

    const transaction: PaymentTransaction = {
      ...row,
      status: TransactionStatus.COMPLETED,
      completedAt,
    };
    this.rows.set(reference, transaction);
    const principal = this.users.patch(owner.id, grant(owner));

    return { applied: true, transaction: { ...transaction }, principal };
  }

  async findLatestCompleted(userId: string): Promise<PaymentTransaction | null> {
    const latest = [...this.rows.values()]
      .filter(
        (row) =>
          row.userId === userId && row.status === TransactionStatus.COMPLETED,
      )
      .sort(
        (a, b) => (b.completedAt?.getTime() ?? 0) - (a.completedAt?.getTime() ?? 0),
      )[0];
    return latest ? { ...latest } : null;
  }

  /** Test helper */
  all(): PaymentTransaction[] {
    return [...this.rows.values()].map((row) => ({ ...row }));
  }
}
