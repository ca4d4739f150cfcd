import { IsEmail, IsNotEmpty, IsOptional, IsString, IsUrl, IsUUID } from 'class-validator';

export class InitiatePaymentDto {
  @IsUUID()
  plan_id!: string;

  /** Checkout email, defaults to the account's */
  @IsOptional()
  @IsEmail()
  email?: string;

  @IsOptional()
  @IsUrl({ require_tld: false })
  callback_url?: string;

  @IsOptional()
  @IsUrl({ require_tld: false })
  return_url?: string;
}

/**
 * PayChangu webhook body. Only the fields read here are declared; the
 * provider sends more.
 */
export class PaychanguWebhookDto {
  @IsString()
  @IsNotEmpty()
  tx_ref!: string;

  @IsString()
  status!: string;
}

export interface PaymentCheckoutDto {
  payment_url: string;
  transaction_reference: string;
  verification_url: string;
  plan_id: string;
}

export interface PaymentVerificationResultDto {
  status: 'success';
  amount: number;
  currency: string;
  transaction_reference: string;
  payment_date: string;
  plan_id: string;
  expiry_date: string | null;
}

export interface WebhookAcknowledgementDto {
  status: 'success';
}
