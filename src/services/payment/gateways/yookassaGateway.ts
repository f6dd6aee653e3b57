import { PAYMENT_PROVIDERS } from '../../../config/constants';
import { MalformedPayloadError } from '../../../utils/errors';
import { safeEqual } from '../../../utils/crypto';
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

export interface YookassaCredentials {
  shopId: string;
  webhookSecret: string;
}

/**
 * YooKassa card and SBP payments. Notifications carry no signature, so the
 * webhook URL is registered with HTTP Basic credentials `shopId:webhookSecret`.
 */
export class YookassaGateway implements IPaymentGateway {
  readonly provider = PAYMENT_PROVIDERS.YOOKASSA;

  constructor(private readonly credentials: YookassaCredentials) {}

  verify(_rawBody: Buffer, headers: WebhookHeaders): boolean {
    const { shopId, webhookSecret } = this.credentials;
    if (!shopId || !webhookSecret) {
      return false;
    }

    const authorization = headerValue(headers, 'authorization');
    const match = authorization?.match(/^Basic\s+(.+)$/i);
    if (!match) {
      return false;
    }
    const presented = Buffer.from(match[1], 'base64').toString('utf8');
    return safeEqual(presented, `${shopId}:${webhookSecret}`);
  }

  parse(rawBody: Buffer): CanonicalPaymentEvent {
    const body = parseJsonObject(rawBody);
    const eventType = requireString(body, 'event', 'notification');
    const object = body.object;
    if (!isRecord(object)) {
      throw new MalformedPayloadError('notification.object is missing');
    }

    const paymentId = requireString(object, 'id', 'object');
    const occurredAt = parseDate(object.captured_at ?? object.created_at, new Date());

    if (eventType !== 'payment.succeeded' || object.status !== 'succeeded') {
      return {
        provider: this.provider,
        kind: 'other',
        eventType,
        providerTxId: paymentId,
        orderRef: null,
        amount: null,
        currency: null,
        occurredAt,
      };
    }

    const amount = object.amount;
    if (!isRecord(amount)) {
      throw new MalformedPayloadError('object.amount is missing');
    }
    const metadata = isRecord(object.metadata) ? object.metadata : {};

    return {
      provider: this.provider,
      kind: 'payment',
      eventType,
      providerTxId: paymentId,
      orderRef: stringField(metadata, 'order_id'),
      amount: requireAmount(amount.value, 'object.amount.value'),
      currency: requireString(amount, 'currency', 'object.amount').toUpperCase(),
      occurredAt,
    };
  }

  resolveOrder(event: CanonicalPaymentEvent, lookup: OrderLookup): Promise<string | null> {
    return resolveByReference(event, lookup);
  }
}
