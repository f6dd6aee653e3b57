import { PAYMENT_PROVIDERS } from '../../../config/constants';
import { MalformedPayloadError } from '../../../utils/errors';
import { hmacSha256Hex, safeEqual, sha256Digest } from '../../../utils/crypto';
import {
  headerValue,
  type CanonicalPaymentEvent,
  type IPaymentGateway,
  type OrderLookup,
  type WebhookHeaders,
} from '../IPaymentGateway';
import {
  isRecord,
  parseDate,
  parseJsonObject,
  requireAmount,
  requireString,
  resolveByReference,
  stringField,
} from './gatewayUtils';

export const CRYPTOBOT_SIGNATURE_HEADER = 'crypto-pay-api-signature';

/**
 * Crypto Pay (CryptoBot) invoices. Updates are signed with
 * HMAC-SHA256(body, SHA256(apiToken)); the invoice `payload` carries the order id.
 */
export class CryptobotGateway implements IPaymentGateway {
  readonly provider = PAYMENT_PROVIDERS.CRYPTOBOT;

  constructor(private readonly apiToken: string) {}

  verify(rawBody: Buffer, headers: WebhookHeaders): boolean {
    const signature = headerValue(headers, CRYPTOBOT_SIGNATURE_HEADER);
    if (!this.apiToken || !signature) {
      return false;
    }
    const expected = hmacSha256Hex(sha256Digest(this.apiToken), rawBody);
    return safeEqual(expected, signature.trim().toLowerCase());
  }

  parse(rawBody: Buffer): CanonicalPaymentEvent {
    const body = parseJsonObject(rawBody);
    const eventType = requireString(body, 'update_type', 'update');
    const invoice = body.payload;
    if (!isRecord(invoice)) {
      throw new MalformedPayloadError('update.payload is missing');
    }

    const invoiceId = requireString(invoice, 'invoice_id', 'invoice');
    const occurredAt = parseDate(invoice.paid_at ?? body.request_date, new Date());

    if (eventType !== 'invoice_paid' || invoice.status !== 'paid') {
      return {
        provider: this.provider,
        kind: 'other',
        eventType,
        providerTxId: invoiceId,
        orderRef: null,
        amount: null,
        currency: null,
        occurredAt,
      };
    }

    // Fiat-priced invoices are compared in the fiat currency, crypto ones in the asset
    const fiat = invoice.currency_type === 'fiat';
    const currency = fiat ? requireString(invoice, 'fiat', 'invoice') : requireString(invoice, 'asset', 'invoice');

    return {
      provider: this.provider,
      kind: 'payment',
      eventType,
      providerTxId: invoiceId,
      orderRef: stringField(invoice, 'payload'),
      amount: requireAmount(invoice.amount, 'invoice.amount'),
      currency: currency.toUpperCase(),
      occurredAt,
    };
  }

  resolveOrder(event: CanonicalPaymentEvent, lookup: OrderLookup): Promise<string | null> {
    return resolveByReference(event, lookup);
  }
}
