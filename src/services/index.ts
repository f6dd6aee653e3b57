import { config } from '../config/env';
import { isDatabaseConnected } from '../config/database';
import { mongoRepositories } from '../repositories';
import { systemClock } from '../types/domain';
import { createServices, type ServiceSettings, type Services } from './container';
import { orderLock, withdrawalLock } from './locks/orderLockService';
import { TelegramNotifier } from './notifications/chatNotifier';
import { createGatewayRegistry } from './payment/gateways';
import { getHostRegistry } from './provisioning/hostProvisioningClient';

export { createServices };
export type { ServiceDeps, ServiceSettings, Services } from './container';

export const settingsFromConfig = (): ServiceSettings => ({
  stateMachine: {
    amountTolerance: config.orders.amountTolerance,
    provisioning: config.provisioning,
    notifications: config.notifications,
  },
  referral: config.referral,
  sweeps: config.sweeps,
  reminders: config.reminders,
  paymentTimeoutMinutes: config.orders.paymentTimeoutMinutes,
  supportContact: config.supportContact,
});

let instance: Services | null = null;

/** Production wiring, built on first use so that importing the app has no side effects. */
export const getServices = (): Services => {
  if (!instance) {
    instance = createServices({
      repositories: mongoRepositories,
      lock: orderLock,
      withdrawalLock,
      hosts: getHostRegistry(),
      gateways: createGatewayRegistry(),
      notifier: new TelegramNotifier(config.telegram),
      clock: systemClock,
      settings: settingsFromConfig(),
      isStoreReady: isDatabaseConnected,
    });
  }
  return instance;
};
