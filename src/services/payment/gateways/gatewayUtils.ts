import { MalformedPayloadError } from '../../../utils/errors';
import type { CanonicalPaymentEvent, OrderLookup } from '../IPaymentGateway';

export const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === 'object' && value !== null && !Array.isArray(value);

export const parseJsonObject = (rawBody: Buffer): Record<string, unknown> => {
  let parsed: unknown;
  try {
    parsed = JSON.parse(rawBody.toString('utf8'));
  } catch {
    throw new MalformedPayloadError('Payload is not valid JSON');
  }
  if (!isRecord(parsed)) {
    throw new MalformedPayloadError('Payload must be a JSON object');
  }
  return parsed;
};

export const stringField = (source: Record<string, unknown>, key: string): string | null => {
  const value = source[key];
  if (typeof value === 'string' && value.trim() !== '') {
    return value.trim();
  }
  if (typeof value === 'number' && Number.isFinite(value)) {
    return String(value);
  }
  return null;
};

export const requireString = (source: Record<string, unknown>, key: string, where: string): string => {
  const value = stringField(source, key);
  if (value === null) {
    throw new MalformedPayloadError(`${where}.${key} is missing`);
  }
  return value;
};

export const requireAmount = (value: unknown, where: string): number => {
  const amount = typeof value === 'number' ? value : typeof value === 'string' ? Number(value) : NaN;
  if (!Number.isFinite(amount) || amount < 0) {
    throw new MalformedPayloadError(`${where} is not a valid amount`);
  }
  return amount;
};

export const parseDate = (value: unknown, fallback: Date): Date => {
  if (typeof value !== 'string' && typeof value !== 'number') {
    return fallback;
  }
  const date = new Date(value);
  return Number.isNaN(date.getTime()) ? fallback : date;
};

/** Resolution through an order id the provider echoes back. */
export const resolveByReference = async (
  event: CanonicalPaymentEvent,
  lookup: OrderLookup
): Promise<string | null> => {
  if (!event.orderRef) {
    return null;
  }
  const order = await lookup.findById(event.orderRef);
  return order ? order.orderId : null;
};
