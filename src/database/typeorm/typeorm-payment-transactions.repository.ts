import { Injectable } from '@nestjs/common';
import { InjectDataSource, InjectRepository } from '@nestjs/typeorm';
import { DataSource, Not, Repository } from 'typeorm';
import {
  NewPaymentTransaction,
  PaymentTransaction,
  SubscriptionGrant,
  TransactionStatus,
} from '../../domain/subscriptions/models';
import { SubscriptionHolder } from '../../domain/users';
import { PaymentTransactionEntity, UserEntity } from '../entities';
import {
  CompletionOutcome,
  PaymentTransactionsRepository,
} from '../repositories';

@Injectable()
export class TypeOrmPaymentTransactionsRepository extends PaymentTransactionsRepository {
  constructor(
    @InjectRepository(PaymentTransactionEntity)
    private readonly transactions: Repository<PaymentTransactionEntity>,
    @InjectDataSource()
    private readonly dataSource: DataSource,
  ) {
    super();
  }

  create(data: NewPaymentTransaction): Promise<PaymentTransaction> {
    return this.transactions.save(
      this.transactions.create({ ...data, status: TransactionStatus.PENDING }),
    );
  }

  findByReference(reference: string): Promise<PaymentTransaction | null> {
    return this.transactions.findOne({ where: { reference } });
  }

  async attachCheckoutUrl(reference: string, checkoutUrl: string): Promise<void> {
    await this.transactions.update({ reference }, { checkoutUrl });
  }

  async markFailed(reference: string): Promise<void> {
    await this.transactions.update(
      { reference, status: TransactionStatus.PENDING },
      { status: TransactionStatus.FAILED },
    );
  }

  completeAndGrant(
    reference: string,
    completedAt: Date,
    grant: (owner: SubscriptionHolder) => SubscriptionGrant,
  ): Promise<CompletionOutcome | null> {
    return this.dataSource.transaction(async (manager) => {
      // The row lock taken by this update makes a concurrent completion of
      // the same reference wait, then match nothing.
      const completion = await manager.update(
        PaymentTransactionEntity,
        { reference, status: Not(TransactionStatus.COMPLETED) },
        { status: TransactionStatus.COMPLETED, completedAt },
      );

      const transaction = await manager.findOne(PaymentTransactionEntity, {
        where: { reference },
      });
      if (!transaction) return null;

      const owner = await manager.findOne(UserEntity, {
        where: { id: transaction.userId },
        lock: { mode: 'pessimistic_write' },
      });
      if (!owner) return null;

      if ((completion.affected ?? 0) === 0) {
        return { applied: false, transaction, principal: owner };
      }

      const granted = grant(owner);
      await manager.update(
        UserEntity,
        { id: owner.id },
        {
          isSubscribed: granted.isSubscribed,
          subscriptionExpiry: granted.subscriptionExpiry,
        },
      );

      return {
        applied: true,
        transaction,
        principal: { ...owner, ...granted },
      };
    });
  }

  findLatestCompleted(userId: string): Promise<PaymentTransaction | null> {
    return this.transactions.findOne({
      where: { userId, status: TransactionStatus.COMPLETED },
      order: { completedAt: 'DESC' },
    });
  }
}
