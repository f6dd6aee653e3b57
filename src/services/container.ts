import type { Repositories } from '../repositories';
import type { Clock } from '../types/domain';
import type { OrderLock } from './locks/orderLockService';
import type { ChatNotifier } from './notifications/chatNotifier';
import { ExpiryReminderService, type ReminderSettings } from './notifications/expiryReminderService';
import { NotificationDispatcher } from './notifications/notificationDispatcher';
import { OrderService } from './orders/orderService';
import { OrderStateMachine, type StateMachineSettings } from './orders/orderStateMachine';
import type { GatewayRegistry } from './payment/gateways';
import { WebhookIngressService } from './payment/webhookIngressService';
import type { HostProvisioningClient } from './provisioning/hostProvisioningClient';
import { ReferralLedgerService, type ReferralSettings } from './referral/referralLedgerService';
import { ReviewQueueService } from './review/reviewQueueService';
import { FulfillmentSweeper, type SweepSettings } from './sweeps/fulfillmentSweeper';

export interface ServiceSettings {
  stateMachine: StateMachineSettings;
  referral: ReferralSettings;
  sweeps: SweepSettings;
  reminders: ReminderSettings;
  paymentTimeoutMinutes: number;
  supportContact: string;
}

export interface ServiceDeps {
  repositories: Repositories;
  lock: OrderLock;
  withdrawalLock: OrderLock;
  hosts: HostProvisioningClient;
  gateways: GatewayRegistry;
  notifier: ChatNotifier;
  clock: Clock;
  settings: ServiceSettings;
  isStoreReady: () => boolean;
}

export interface Services {
  hosts: HostProvisioningClient;
  reviews: ReviewQueueService;
  referrals: ReferralLedgerService;
  notifications: NotificationDispatcher;
  reminders: ExpiryReminderService;
  stateMachine: OrderStateMachine;
  orders: OrderService;
  ingress: WebhookIngressService;
  sweeper: FulfillmentSweeper;
}

/** Wires the fulfillment pipeline; tests pass in-memory repositories and fakes. */
export const createServices = (deps: ServiceDeps): Services => {
  const { repositories, lock, hosts, clock, settings } = deps;

  const reviews = new ReviewQueueService(repositories.reviewItems, clock);
  const notifications = new NotificationDispatcher(deps.notifier, settings.supportContact);
  const referrals = new ReferralLedgerService(
    repositories.referrals,
    repositories.customers,
    settings.referral,
    clock,
    deps.withdrawalLock,
    notifications
  );

  const stateMachine = new OrderStateMachine({
    orders: repositories.orders,
    provisioningRecords: repositories.provisioningRecords,
    lock,
    hosts,
    referrals,
    notifications,
    reviews,
    clock,
    settings: settings.stateMachine,
  });

  const orders = new OrderService({
    orders: repositories.orders,
    provisioningRecords: repositories.provisioningRecords,
    lock,
    hosts,
    discounts: referrals,
    stateMachine,
    clock,
    paymentTimeoutMinutes: settings.paymentTimeoutMinutes,
  });

  const ingress = new WebhookIngressService({
    gateways: deps.gateways,
    paymentEvents: repositories.paymentEvents,
    orders: repositories.orders,
    confirmer: stateMachine,
    reviews,
    clock,
  });

  const reminders = new ExpiryReminderService(
    repositories.provisioningRecords,
    notifications,
    clock,
    settings.reminders
  );

  const sweeper = new FulfillmentSweeper({
    orders: repositories.orders,
    paymentEvents: repositories.paymentEvents,
    stateMachine,
    ingress,
    reminders,
    clock,
    settings: settings.sweeps,
    isStoreReady: deps.isStoreReady,
  });

  return { hosts, reviews, referrals, notifications, reminders, stateMachine, orders, ingress, sweeper };
};
