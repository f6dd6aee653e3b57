/**
 * Payment Gateway Interface
 * One implementation per payment provider. Ingress selects the gateway by the
 * provider tag in the webhook URL, never by the payload's shape.
 */

import type { PaymentProvider } from '../../config/constants';
import type { Order } from '../../types/domain';
import type { PaymentCandidateQuery } from '../../repositories/types';

export type WebhookHeaders = Record<string, string | string[] | undefined>;

export interface CanonicalPaymentEvent {
  provider: PaymentProvider;
  /** `payment` for a settled payment; anything else is recorded and ignored. */
  kind: 'payment' | 'other';
  eventType: string;
  providerTxId: string;
  /** Order id carried by the payload, when the provider echoes one back. */
  orderRef: string | null;
  amount: number | null;
  currency: string | null;
  occurredAt: Date;
}

/** Read access to the order ledger used for correlation. */
export interface OrderLookup {
  findById(orderId: string): Promise<Order | null>;
  findPaymentCandidates(query: PaymentCandidateQuery): Promise<Order[]>;
}

export interface IPaymentGateway {
  readonly provider: PaymentProvider;

  /**
   * Authenticates the delivery. Returns false when the provider secret is not
   * configured.
   */
  verify(rawBody: Buffer, headers: WebhookHeaders): boolean;

  /**
   * Normalizes a verified payload.
   * @throws MalformedPayloadError
   */
  parse(rawBody: Buffer): CanonicalPaymentEvent;

  /** Order id the payment belongs to, or null when no single order matches. */
  resolveOrder(event: CanonicalPaymentEvent, lookup: OrderLookup): Promise<string | null>;
}

export const headerValue = (headers: WebhookHeaders, name: string): string | null => {
  const value = headers[name.toLowerCase()];
  if (Array.isArray(value)) {
    return value[0] ?? null;
  }
  return value ?? null;
};
