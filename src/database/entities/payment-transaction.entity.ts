import {
  Column,
  CreateDateColumn,
  Entity,
  Index,
  JoinColumn,
  ManyToOne,
  PrimaryGeneratedColumn,
} from 'typeorm';
import {
  PaymentTransaction,
  TransactionStatus,
} from '../../domain/subscriptions/models';
import { numericTransformer } from './numeric.transformer';
import { SubscriptionPlanEntity } from './subscription-plan.entity';
import { UserEntity } from './user.entity';

@Entity('payment_transactions')
export class PaymentTransactionEntity implements PaymentTransaction {
  @PrimaryGeneratedColumn('uuid')
  id!: string;

  @Index('uq_payment_transactions_reference', { unique: true })
  @Column({ type: 'varchar', length: 64 })
  reference!: string;

  @Index('idx_payment_transactions_user_id')
  @Column({ name: 'user_id', type: 'uuid' })
  userId!: string;

  @ManyToOne(() => UserEntity, { onDelete: 'CASCADE' })
  @JoinColumn({ name: 'user_id' })
  user?: UserEntity;

  @Column({ name: 'plan_id', type: 'uuid' })
  planId!: string;

  @ManyToOne(() => SubscriptionPlanEntity, { onDelete: 'RESTRICT' })
  @JoinColumn({ name: 'plan_id' })
  plan?: SubscriptionPlanEntity;

  @Column({
    type: 'numeric',
    precision: 12,
    scale: 2,
    transformer: numericTransformer,
  })
  amount!: number;

  @Column({ type: 'varchar', length: 3 })
  currency!: string;

  @Column({ name: 'duration_days', type: 'int' })
  durationDays!: number;

  @Column({ type: 'varchar', length: 16, default: TransactionStatus.PENDING })
  status!: TransactionStatus;

  @Column({ type: 'varchar', length: 32 })
  provider!: string;

  @Column({ name: 'checkout_url', type: 'varchar', nullable: true })
  checkoutUrl!: string | null;

  @CreateDateColumn({ name: 'created_at', type: 'timestamptz' })
  createdAt!: Date;

  @Column({ name: 'completed_at', type: 'timestamptz', nullable: true })
  completedAt!: Date | null;
}
