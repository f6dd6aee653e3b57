import { PAYMENT_PROVIDERS } from '../../../config/constants';
import { md5Hex, safeEqual } from '../../../utils/crypto';
import type { CanonicalPaymentEvent, IPaymentGateway, OrderLookup, WebhookHeaders } from '../IPaymentGateway';
import {
  isRecord,
  parseDate,
  parseJsonObject,
  requireAmount,
  requireString,
  resolveByReference,
  stringField,
} from './gatewayUtils';

const PAID_STATUSES = ['paid', 'paid_over'];

const escapeNonAscii = (json: string): string =>
  json.replace(/[\u007f-\uffff]/g, char => `\\u${char.charCodeAt(0).toString(16).padStart(4, '0')}`);

/**
 * Compact JSON with recursively sorted keys and every non-ASCII character
 * escaped as `\uXXXX`: the byte string Heleket signs.
 */
export const canonicalJson = (value: unknown): string => {
  if (Array.isArray(value)) {
    return `[${value.map(canonicalJson).join(',')}]`;
  }
  if (isRecord(value)) {
    const members = Object.keys(value)
      .sort()
      .map(key => `${escapeNonAscii(JSON.stringify(key))}:${canonicalJson(value[key])}`);
    return `{${members.join(',')}}`;
  }
  if (typeof value === 'string') {
    return escapeNonAscii(JSON.stringify(value));
  }
  return JSON.stringify(value ?? null);
};

/** `md5(base64(canonicalJson(payload without sign)) + apiKey)` */
export const heleketSignature = (payload: Record<string, unknown>, apiKey: string): string => {
  const unsigned = Object.fromEntries(Object.entries(payload).filter(([key]) => key !== 'sign'));
  const encoded = Buffer.from(canonicalJson(unsigned), 'utf8').toString('base64');
  return md5Hex(`${encoded}${apiKey}`);
};

/** Reads the order id from `order_id`, or from JSON metadata in `description`. */
const orderReference = (body: Record<string, unknown>): string | null => {
  const direct = stringField(body, 'order_id');
  if (direct) {
    return direct;
  }
  const description = stringField(body, 'description');
  if (!description) {
    return null;
  }
  try {
    const metadata: unknown = JSON.parse(description);
    return isRecord(metadata) ? stringField(metadata, 'order_id') : null;
  } catch {
    return null;
  }
};

/** Heleket crypto invoices. The signature travels inside the body as `sign`. */
export class HeleketGateway implements IPaymentGateway {
  readonly provider = PAYMENT_PROVIDERS.HELEKET;

  constructor(private readonly apiKey: string) {}

  verify(rawBody: Buffer, _headers: WebhookHeaders): boolean {
    if (!this.apiKey) {
      return false;
    }
    let body: Record<string, unknown>;
    try {
      body = parseJsonObject(rawBody);
    } catch {
      return false;
    }
    const sign = body.sign;
    if (typeof sign !== 'string' || sign === '') {
      return false;
    }
    return safeEqual(heleketSignature(body, this.apiKey), sign.toLowerCase());
  }

  parse(rawBody: Buffer): CanonicalPaymentEvent {
    const body = parseJsonObject(rawBody);
    const uuid = requireString(body, 'uuid', 'payment');
    const status = requireString(body, 'status', 'payment');
    const occurredAt = parseDate(body.updated_at ?? body.created_at, new Date());

    if (!PAID_STATUSES.includes(status)) {
      return {
        provider: this.provider,
        kind: 'other',
        eventType: status,
        providerTxId: uuid,
        orderRef: null,
        amount: null,
        currency: null,
        occurredAt,
      };
    }

    return {
      provider: this.provider,
      kind: 'payment',
      eventType: status,
      providerTxId: uuid,
      orderRef: orderReference(body),
      amount: requireAmount(body.amount, 'payment.amount'),
      currency: requireString(body, 'currency', 'payment').toUpperCase(),
      occurredAt,
    };
  }

  resolveOrder(event: CanonicalPaymentEvent, lookup: OrderLookup): Promise<string | null> {
    return resolveByReference(event, lookup);
  }
}
