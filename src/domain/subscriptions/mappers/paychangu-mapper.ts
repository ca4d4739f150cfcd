/**
 * PayChangu Mapper
 *
 * Converts PayChangu API responses to the provider-agnostic payment models.
 * Responses are read defensively: anything that does not have the expected
 * envelope maps to null and is treated by the adapter as a provider fault.
 */

import { PaymentInitiation, PaymentStatus, PaymentVerification } from '../models';

type JsonObject = Record<string, unknown>;

const asObject = (value: unknown): JsonObject | null =>
  typeof value === 'object' && value !== null && !Array.isArray(value)
    ? Object.fromEntries(Object.entries(value))
    : null;

const readString = (source: JsonObject, key: string): string | null => {
  const value = source[key];
  return typeof value === 'string' && value.length > 0 ? value : null;
};

const readNumber = (source: JsonObject, key: string): number | null => {
  const value = source[key];
  if (typeof value === 'number' && Number.isFinite(value)) return value;
  if (typeof value === 'string' && value.trim() !== '') {
    const parsed = Number(value);
    return Number.isFinite(parsed) ? parsed : null;
  }
  return null;
};

const readDate = (source: JsonObject, key: string): Date | null => {
  const value = readString(source, key);
  if (!value) return null;
  const date = new Date(value);
  return Number.isNaN(date.getTime()) ? null : date;
};

/**
 * PayChangu - Static mapper for PayChangu data
 */
export class PaychanguMapper {
  private static readonly SUCCESS_STATUSES = ['success', 'successful', 'succeeded'];
  private static readonly FAILED_STATUSES = [
    'failed',
    'cancelled',
    'canceled',
    'expired',
    'reversed',
  ];

  /**
   * Map the transaction status string reported by PayChangu
   */
  static mapStatus(status: string | null): PaymentStatus {
    const normalized = (status ?? '').toLowerCase();
    if (this.SUCCESS_STATUSES.includes(normalized)) return PaymentStatus.SUCCEEDED;
    if (this.FAILED_STATUSES.includes(normalized)) return PaymentStatus.FAILED;
    return PaymentStatus.PENDING;
  }

  /**
   * Map the `POST /payment` response
   *
   * @param body - Raw response body
   * @param reference - Reference the checkout was opened for
   */
  static toInitiation(body: unknown, reference: string): PaymentInitiation | null {
    const envelope = asObject(body);
    const data = envelope ? asObject(envelope.data) : null;
    if (!data) return null;

    const checkoutUrl = readString(data, 'checkout_url');
    if (!checkoutUrl) return null;

    return { reference, checkoutUrl };
  }

  /**
   * Map the `GET /verify-payment/{tx_ref}` response
   *
   * @param body - Raw response body
   * @param reference - Reference that was queried
   */
  static toVerification(body: unknown, reference: string): PaymentVerification | null {
    const envelope = asObject(body);
    const data = envelope ? asObject(envelope.data) : null;
    if (!data) return null;

    return {
      reference: readString(data, 'tx_ref') ?? reference,
      status: this.mapStatus(readString(data, 'status')),
      amount: readNumber(data, 'amount'),
      currency: readString(data, 'currency'),
      paidAt: readDate(data, 'updated_at') ?? readDate(data, 'created_at'),
      providerData: { raw: data },
    };
  }
}
