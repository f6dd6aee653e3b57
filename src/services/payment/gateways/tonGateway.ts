import { PAYMENT_PROVIDERS } from '../../../config/constants';
import { logger } from '../../../utils/logger';
import { MalformedPayloadError } from '../../../utils/errors';
import { safeEqual } from '../../../utils/crypto';
import {
  headerValue,
  type CanonicalPaymentEvent,
  type IPaymentGateway,
  type OrderLookup,
  type WebhookHeaders,
} from '../IPaymentGateway';
import { isRecord, parseDate, parseJsonObject, requireString, stringField } from './gatewayUtils';

const NANOTON = 1_000_000_000;

const UUID_PATTERN = /^[0-9a-f]{8}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{12}$/i;

export interface TonSettings {
  webhookToken: string;
  /** Incoming transfers to other accounts are ignored; empty accepts any. */
  walletAddress: string;
  amountTolerance: number;
}

const toNanotons = (value: unknown): bigint => {
  if (typeof value === 'number' && Number.isInteger(value) && value >= 0) {
    return BigInt(value);
  }
  if (typeof value === 'string' && /^\d+$/.test(value)) {
    return BigInt(value);
  }
  throw new MalformedPayloadError('in_msg.value is not a nanoton amount');
};

const listField = (source: Record<string, unknown>, key: string): unknown[] => {
  const value = source[key];
  if (value === undefined || value === null) {
    return [];
  }
  if (!Array.isArray(value)) {
    throw new MalformedPayloadError(`${key} is not a list`);
  }
  return value;
};

const parseUtime = (source: Record<string, unknown>, fallback: Date): Date =>
  parseDate(typeof source.utime === 'number' ? source.utime * 1000 : source.timestamp, fallback);

/**
 * Incoming TON transfers reported by a TonAPI account webhook. The buyer is
 * asked to put the order id in the transfer comment; a transfer without one is
 * matched by amount and time, and only when exactly one open order fits.
 */
export class TonGateway implements IPaymentGateway {
  readonly provider = PAYMENT_PROVIDERS.TON;

  constructor(private readonly settings: TonSettings) {}

  verify(_rawBody: Buffer, headers: WebhookHeaders): boolean {
    const authorization = headerValue(headers, 'authorization');
    const match = authorization?.match(/^Bearer\s+(.+)$/i);
    if (!this.settings.webhookToken || !match) {
      return false;
    }
    return safeEqual(match[1].trim(), this.settings.webhookToken);
  }

  parse(rawBody: Buffer): CanonicalPaymentEvent {
    const body = parseJsonObject(rawBody);
    const account = stringField(body, 'account_id');
    const deliveredAt = parseUtime(body, new Date());

    const batched = 'txs' in body || 'in_progress_txs' in body;
    if (batched || (stringField(body, 'tx_hash') === null && !('in_msg' in body))) {
      return this.parseBatch(body, account, deliveredAt);
    }

    const txHash = stringField(body, 'tx_hash') ?? requireString(body, 'tx_id', 'transaction');
    return this.transfer(txHash, account, body.in_msg, deliveredAt);
  }

  /**
   * Deliveries that list transactions under `in_progress_txs` and `txs`, each
   * with its own `in_msg`. A transaction reported in progress and later as
   * completed keeps its hash, so the second report is a duplicate.
   */
  private parseBatch(
    body: Record<string, unknown>,
    account: string | null,
    deliveredAt: Date
  ): CanonicalPaymentEvent {
    const txId = requireString(body, 'tx_id', 'transaction');
    const listed = [...listField(body, 'in_progress_txs'), ...listField(body, 'txs')];
    if (listed.length === 0) {
      throw new MalformedPayloadError('Delivery lists no transactions');
    }

    const transfers = listed.map((tx, index) => {
      if (!isRecord(tx)) {
        throw new MalformedPayloadError(`Transaction ${index} is not an object`);
      }
      const hash = stringField(tx, 'hash') ?? stringField(tx, 'tx_hash') ?? `${txId}:${index}`;
      return this.transfer(hash, account, tx.in_msg, parseUtime(tx, deliveredAt));
    });

    const payments = transfers.filter(event => event.kind === 'payment');
    const distinct = new Set(payments.map(event => event.providerTxId));
    if (distinct.size > 1) {
      throw new MalformedPayloadError(`Delivery carries ${distinct.size} incoming transfers`);
    }
    return payments[0] ?? { ...transfers[0], providerTxId: txId };
  }

  private transfer(
    txHash: string,
    account: string | null,
    inMsg: unknown,
    occurredAt: Date
  ): CanonicalPaymentEvent {
    const ignored = (eventType: string): CanonicalPaymentEvent => ({
      provider: this.provider,
      kind: 'other',
      eventType,
      providerTxId: txHash,
      orderRef: null,
      amount: null,
      currency: null,
      occurredAt,
    });

    if (!isRecord(inMsg)) {
      return ignored('outgoing');
    }
    if (this.settings.walletAddress && account !== this.settings.walletAddress) {
      return ignored('foreign_account');
    }

    const nanotons = toNanotons(inMsg.value);
    if (nanotons === 0n) {
      return ignored('zero_value');
    }

    const comment = stringField(inMsg, 'decoded_comment');
    return {
      provider: this.provider,
      kind: 'payment',
      eventType: 'incoming_transfer',
      providerTxId: txHash,
      orderRef: comment && UUID_PATTERN.test(comment) ? comment.toLowerCase() : null,
      amount: Number(nanotons) / NANOTON,
      currency: 'TON',
      occurredAt,
    };
  }

  async resolveOrder(event: CanonicalPaymentEvent, lookup: OrderLookup): Promise<string | null> {
    if (event.orderRef) {
      const order = await lookup.findById(event.orderRef);
      return order ? order.orderId : null;
    }
    if (event.amount === null) {
      return null;
    }

    const candidates = await lookup.findPaymentCandidates({
      provider: this.provider,
      amount: event.amount,
      tolerance: this.settings.amountTolerance,
      at: event.occurredAt,
    });
    if (candidates.length !== 1) {
      logger.warn('TON transfer without order comment could not be matched to a single order', {
        providerTxId: event.providerTxId,
        amount: event.amount,
        candidates: candidates.length,
      });
      return null;
    }
    return candidates[0].orderId;
  }
}
