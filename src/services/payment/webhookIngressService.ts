import { v4 as uuidv4 } from 'uuid';
import {
  PAYMENT_EVENT_STATUS,
  REVIEW_KINDS,
  isPaymentProvider,
  type PaymentEventStatus,
  type PaymentProvider,
} from '../../config/constants';
import type { PaymentEventListFilter, PaymentEventRepository } from '../../repositories/types';
import type { Clock, PaymentEvent } from '../../types/domain';
import {
  AmountMismatchError,
  MalformedPayloadError,
  OrderNotFoundError,
  errorMessage,
} from '../../utils/errors';
import { sha256Hex } from '../../utils/crypto';
import { logger } from '../../utils/logger';
import type { ConfirmOutcome, PaymentConfirmation } from '../orders/orderStateMachine';
import type { ReviewQueueService } from '../review/reviewQueueService';
import type { GatewayRegistry } from './gateways';
import type { CanonicalPaymentEvent, OrderLookup, WebhookHeaders } from './IPaymentGateway';

export type IngestOutcome =
  | 'processed'
  | 'duplicate'
  | 'held'
  | 'orphaned'
  | 'ignored'
  | 'rejected'
  | 'malformed'
  | 'unknown_provider'
  | 'retry';

export interface IngestResult {
  httpStatus: 200 | 400 | 401 | 404 | 500;
  outcome: IngestOutcome;
  eventId: string | null;
  orderId: string | null;
}

export interface PaymentConfirmer {
  confirmPayment(orderId: string, payment: PaymentConfirmation): Promise<ConfirmOutcome>;
}

export interface WebhookIngressDeps {
  gateways: GatewayRegistry;
  paymentEvents: PaymentEventRepository;
  orders: OrderLookup;
  confirmer: PaymentConfirmer;
  reviews: ReviewQueueService;
  clock: Clock;
}

const result = (
  httpStatus: IngestResult['httpStatus'],
  outcome: IngestOutcome,
  eventId: string | null = null,
  orderId: string | null = null
): IngestResult => ({ httpStatus, outcome, eventId, orderId });

/**
 * Entry point for provider webhooks. Every delivery leaves exactly one durable
 * record per (provider, transaction id); the response code tells the provider
 * whether to retry.
 */
export class WebhookIngressService {
  constructor(private readonly deps: WebhookIngressDeps) {}

  async ingest(providerTag: string, rawBody: Buffer, headers: WebhookHeaders): Promise<IngestResult> {
    if (!isPaymentProvider(providerTag)) {
      logger.warn('Webhook for unknown provider', { provider: providerTag });
      return result(404, 'unknown_provider');
    }

    const provider = providerTag;
    const gateway = this.deps.gateways[provider];
    const payloadHash = sha256Hex(rawBody);

    if (!gateway.verify(rawBody, headers)) {
      const event = await this.recordRejected(
        provider,
        rawBody,
        payloadHash,
        'unverified',
        'signature verification failed'
      );
      logger.warn('Webhook signature verification failed', { provider, eventId: event.eventId, payloadHash });
      return result(401, 'rejected', event.eventId);
    }

    let canonical: CanonicalPaymentEvent;
    try {
      canonical = this.requirePaymentFields(gateway.parse(rawBody));
    } catch (error) {
      if (!(error instanceof MalformedPayloadError)) {
        throw error;
      }
      const event = await this.recordRejected(provider, rawBody, payloadHash, 'malformed', error.message);
      logger.warn('Malformed webhook payload', { provider, eventId: event.eventId, error: error.message });
      return result(400, 'malformed', event.eventId);
    }

    if (canonical.kind !== 'payment') {
      const { event } = await this.deps.paymentEvents.insertIfAbsent(
        this.newEvent(provider, `${canonical.eventType}:${canonical.providerTxId}`, rawBody, payloadHash, {
          status: PAYMENT_EVENT_STATUS.IGNORED,
          processedAt: this.deps.clock(),
        })
      );
      logger.debug('Non-payment notification ignored', { provider, eventType: canonical.eventType });
      return result(200, 'ignored', event.eventId);
    }

    const { event, created } = await this.deps.paymentEvents.insertIfAbsent(
      this.newEvent(provider, canonical.providerTxId, rawBody, payloadHash, {
        amount: canonical.amount,
        currency: canonical.currency,
      })
    );
    if (!created && event.status !== PAYMENT_EVENT_STATUS.RECEIVED) {
      logger.info('Duplicate payment notification', {
        provider,
        providerTxId: canonical.providerTxId,
        status: event.status,
      });
      return result(200, 'duplicate', event.eventId, event.orderId);
    }

    return this.process(event, canonical);
  }

  /** Processes a stored event that is still `received`, e.g. from the re-drive sweep. */
  async redrive(event: PaymentEvent): Promise<IngestResult> {
    if (event.status !== PAYMENT_EVENT_STATUS.RECEIVED) {
      return result(200, 'duplicate', event.eventId, event.orderId);
    }

    let canonical: CanonicalPaymentEvent;
    try {
      canonical = this.requirePaymentFields(
        this.deps.gateways[event.provider].parse(Buffer.from(event.rawPayload, 'utf8'))
      );
    } catch (error) {
      if (!(error instanceof MalformedPayloadError)) {
        throw error;
      }
      await this.deps.paymentEvents.update(event.eventId, {
        status: PAYMENT_EVENT_STATUS.REJECTED,
        lastError: error.message,
        processedAt: this.deps.clock(),
      });
      return result(400, 'malformed', event.eventId);
    }

    return this.process(event, canonical);
  }

  listEvents(filter: PaymentEventListFilter): Promise<PaymentEvent[]> {
    return this.deps.paymentEvents.list(filter);
  }

  private async process(event: PaymentEvent, canonical: CanonicalPaymentEvent): Promise<IngestResult> {
    const { provider, providerTxId } = canonical;

    try {
      const orderId = await this.deps.gateways[provider].resolveOrder(canonical, this.deps.orders);
      if (!orderId) {
        await this.markOrphaned(event, canonical, 'no matching order');
        return result(200, 'orphaned', event.eventId);
      }

      const outcome = await this.deps.confirmer.confirmPayment(orderId, {
        provider,
        providerTxId,
        amount: canonical.amount ?? 0,
        currency: canonical.currency ?? '',
        paymentEventId: event.eventId,
      });

      logger.info('Payment notification processed', { provider, providerTxId, orderId, outcome });
      if (outcome === 'duplicate_payment' || outcome === 'late_payment') {
        await this.finish(event, PAYMENT_EVENT_STATUS.REVIEW, orderId, outcome);
        return result(200, 'held', event.eventId, orderId);
      }
      await this.finish(event, PAYMENT_EVENT_STATUS.PROCESSED, orderId, null);
      return result(200, outcome === 'confirmed' ? 'processed' : 'duplicate', event.eventId, orderId);
    } catch (error) {
      if (error instanceof AmountMismatchError) {
        await this.finish(event, PAYMENT_EVENT_STATUS.REVIEW, error.orderId, error.message);
        logger.warn('Payment amount mismatch held for review', { provider, providerTxId, orderId: error.orderId });
        return result(200, 'held', event.eventId, error.orderId);
      }
      if (error instanceof OrderNotFoundError) {
        await this.markOrphaned(event, canonical, error.message);
        return result(200, 'orphaned', event.eventId);
      }

      const message = errorMessage(error);
      await this.deps.paymentEvents.update(event.eventId, { lastError: message }, true);
      logger.error('Payment notification processing failed, provider will retry', {
        provider,
        providerTxId,
        eventId: event.eventId,
        error: message,
      });
      return result(500, 'retry', event.eventId);
    }
  }

  private async markOrphaned(event: PaymentEvent, canonical: CanonicalPaymentEvent, reason: string): Promise<void> {
    await this.deps.reviews.open({
      kind: REVIEW_KINDS.ORPHANED_PAYMENT,
      subject: `${canonical.provider}:${canonical.providerTxId}`,
      paymentEventId: event.eventId,
      details: {
        orderRef: canonical.orderRef,
        amount: canonical.amount,
        currency: canonical.currency,
        reason,
      },
    });
    await this.finish(event, PAYMENT_EVENT_STATUS.ORPHANED, null, reason);
    logger.warn('Orphaned payment held for review', {
      provider: canonical.provider,
      providerTxId: canonical.providerTxId,
      orderRef: canonical.orderRef,
    });
  }

  private async finish(
    event: PaymentEvent,
    status: PaymentEventStatus,
    orderId: string | null,
    note: string | null
  ): Promise<void> {
    await this.deps.paymentEvents.update(event.eventId, {
      status,
      orderId,
      lastError: note,
      processedAt: this.deps.clock(),
    });
  }

  private async recordRejected(
    provider: PaymentProvider,
    rawBody: Buffer,
    payloadHash: string,
    prefix: string,
    reason: string
  ): Promise<PaymentEvent> {
    const { event } = await this.deps.paymentEvents.insertIfAbsent(
      this.newEvent(provider, `${prefix}:${payloadHash}`, rawBody, payloadHash, {
        status: PAYMENT_EVENT_STATUS.REJECTED,
        lastError: reason,
        processedAt: this.deps.clock(),
      })
    );
    return event;
  }

  private newEvent(
    provider: PaymentProvider,
    providerTxId: string,
    rawBody: Buffer,
    payloadHash: string,
    overrides: Partial<PaymentEvent>
  ): PaymentEvent {
    return {
      eventId: uuidv4(),
      provider,
      providerTxId,
      amount: null,
      currency: null,
      payloadHash,
      rawPayload: rawBody.toString('utf8'),
      status: PAYMENT_EVENT_STATUS.RECEIVED,
      orderId: null,
      attempts: 0,
      lastError: null,
      receivedAt: this.deps.clock(),
      processedAt: null,
      ...overrides,
    };
  }

  private requirePaymentFields(event: CanonicalPaymentEvent): CanonicalPaymentEvent {
    if (event.kind === 'payment' && (event.amount === null || event.currency === null)) {
      throw new MalformedPayloadError('Payment notification carries no amount');
    }
    return event;
  }
}
