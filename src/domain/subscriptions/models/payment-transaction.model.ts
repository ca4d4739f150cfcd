/**
 * A checkout opened for one principal and one plan.
 *
 * The unique `reference` is what the provider reports back; moving the row
 * from PENDING to COMPLETED is the single step that grants subscription time,
 * so a reference can never be applied twice.
 */
export enum TransactionStatus {
  PENDING = 'pending',
  COMPLETED = 'completed',
  FAILED = 'failed',
}

export interface PaymentTransaction {
  id: string;
  reference: string;
  userId: string;
  planId: string;
  amount: number;
  currency: string;
  /** Plan duration at the time of checkout */
  durationDays: number;
  status: TransactionStatus;
  provider: string;
  checkoutUrl: string | null;
  createdAt: Date;
  completedAt: Date | null;
}

export type NewPaymentTransaction = Pick<
  PaymentTransaction,
  | 'reference'
  | 'userId'
  | 'planId'
  | 'amount'
  | 'currency'
  | 'durationDays'
  | 'provider'
>;

export const TRANSACTION_REFERENCE_PATTERN =
  /^sub-[0-9a-f]{8}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{12}$/;
