import type { OrderRepository, PaymentEventRepository } from '../../repositories/types';
import type { Clock, Order, PaymentEvent, ProvisioningRecord } from '../../types/domain';
import { errorMessage } from '../../utils/errors';
import { logger } from '../../utils/logger';
import type { ExpiryReminderService } from '../notifications/expiryReminderService';
import type { OrderStateMachine } from '../orders/orderStateMachine';
import type { WebhookIngressService } from '../payment/webhookIngressService';

export interface SweepSettings {
  intervalMs: number;
  batchSize: number;
  /** Events younger than this are left to the request that is handling them. */
  redriveGraceMs: number;
}

export interface SweepReport {
  expired: number;
  provisioningAttempts: number;
  sideEffects: number;
  redriven: number;
  reminders: number;
  errors: number;
}

export interface FulfillmentSweeperDeps {
  orders: OrderRepository;
  paymentEvents: PaymentEventRepository;
  stateMachine: OrderStateMachine;
  ingress: WebhookIngressService;
  reminders: ExpiryReminderService;
  clock: Clock;
  settings: SweepSettings;
  /** Sweeps are skipped while the store is unavailable. */
  isStoreReady: () => boolean;
}

const emptyReport = (): SweepReport => ({
  expired: 0,
  provisioningAttempts: 0,
  sideEffects: 0,
  redriven: 0,
  reminders: 0,
  errors: 0,
});

/**
 * Background recovery: expires unpaid orders, retries due provisioning
 * attempts, finishes pending settlement and notifications, re-drives
 * payment events that never completed and sends expiry reminders. Every order
 * is handled through the state machine, so each step runs under the order lock.
 */
export class FulfillmentSweeper {
  private intervalId: NodeJS.Timeout | null = null;
  private running: Promise<SweepReport> | null = null;

  constructor(private readonly deps: FulfillmentSweeperDeps) {}

  get isRunning(): boolean {
    return this.intervalId !== null;
  }

  start(): void {
    if (this.intervalId) {
      logger.warn('FulfillmentSweeper is already running');
      return;
    }

    this.intervalId = setInterval(() => {
      void this.tick();
    }, this.deps.settings.intervalMs);
    logger.info(`FulfillmentSweeper started - sweeping every ${Math.round(this.deps.settings.intervalMs / 1000)}s`);

    void this.tick();
  }

  async stop(): Promise<void> {
    if (this.intervalId) {
      clearInterval(this.intervalId);
      this.intervalId = null;
      logger.info('FulfillmentSweeper stopped');
    }
    // Let an active run finish before shutdown closes the store
    if (this.running) {
      await this.running;
    }
  }

  /**
   * One full sweep. Returns null when the previous run is still active or the
   * store is not ready.
   */
  async runOnce(): Promise<SweepReport | null> {
    if (this.running) {
      logger.debug('Previous sweep still active, skipping');
      return null;
    }
    if (!this.deps.isStoreReady()) {
      logger.debug('Store not ready, skipping sweep');
      return null;
    }

    this.running = this.sweep();
    try {
      return await this.running;
    } finally {
      this.running = null;
    }
  }

  private async tick(): Promise<void> {
    try {
      const report = await this.runOnce();
      if (report && (report.expired || report.provisioningAttempts || report.redriven || report.reminders || report.errors)) {
        logger.info('Sweep finished', report);
      }
    } catch (error) {
      logger.error('Sweep failed', { error: errorMessage(error) });
    }
  }

  private async sweep(): Promise<SweepReport> {
    const report = emptyReport();
    const { batchSize, redriveGraceMs } = this.deps.settings;
    const now = this.deps.clock();

    const expirable = await this.deps.orders.findExpirable(now, batchSize);
    await this.each(expirable, report, async order => {
      const { expired } = await this.deps.stateMachine.expire(order.orderId, 'payment timeout', true);
      if (expired) {
        report.expired += 1;
      }
    });

    // Concurrent: the per-host limiter queues calls to the same host
    const due = await this.deps.orders.findProvisioningDue(now, batchSize);
    await Promise.all(
      due.map(order =>
        this.each([order], report, async () => {
          await this.deps.stateMachine.provision(order.orderId);
          report.provisioningAttempts += 1;
        })
      )
    );

    const settlement = await this.deps.orders.findSettlementPending(batchSize);
    const notification = await this.deps.orders.findNotificationPending(now, batchSize);
    const pending = new Map<string, Order>();
    for (const order of [...settlement, ...notification]) {
      pending.set(order.orderId, order);
    }
    await this.each([...pending.values()], report, async order => {
      await this.deps.stateMachine.runSideEffects(order.orderId);
      report.sideEffects += 1;
    });

    const stale = await this.deps.paymentEvents.findUnprocessed(
      new Date(now.getTime() - redriveGraceMs),
      batchSize
    );
    await this.eachEvent(stale, report, async event => {
      const outcome = await this.deps.ingress.redrive(event);
      if (outcome.httpStatus === 500) {
        report.errors += 1;
      } else {
        report.redriven += 1;
      }
    });

    const reminders = await this.deps.reminders.findDue(batchSize);
    await this.eachRecord(reminders, report, async record => {
      if (await this.deps.reminders.remind(record)) {
        report.reminders += 1;
      }
    });

    return report;
  }

  private async each(orders: Order[], report: SweepReport, task: (order: Order) => Promise<void>): Promise<void> {
    for (const order of orders) {
      try {
        await task(order);
      } catch (error) {
        report.errors += 1;
        logger.error('Sweep step failed for order', { orderId: order.orderId, error: errorMessage(error) });
      }
    }
  }

  private async eachEvent(
    events: PaymentEvent[],
    report: SweepReport,
    task: (event: PaymentEvent) => Promise<void>
  ): Promise<void> {
    for (const event of events) {
      try {
        await task(event);
      } catch (error) {
        report.errors += 1;
        logger.error('Payment event re-drive failed', { eventId: event.eventId, error: errorMessage(error) });
      }
    }
  }

  private async eachRecord(
    records: ProvisioningRecord[],
    report: SweepReport,
    task: (record: ProvisioningRecord) => Promise<void>
  ): Promise<void> {
    for (const record of records) {
      try {
        await task(record);
      } catch (error) {
        report.errors += 1;
        logger.error('Expiry reminder failed for record', { orderId: record.orderId, error: errorMessage(error) });
      }
    }
  }
}
