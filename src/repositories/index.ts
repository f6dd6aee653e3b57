import { orderRepository } from './orderRepository';
import { paymentEventRepository } from './paymentEventRepository';
import { provisioningRecordRepository } from './provisioningRecordRepository';
import { referralRepository } from './referralRepository';
import { customerRepository } from './customerRepository';
import { reviewItemRepository } from './reviewItemRepository';
import type { Repositories } from './types';

export * from './types';

export const mongoRepositories: Repositories = {
  orders: orderRepository,
  paymentEvents: paymentEventRepository,
  provisioningRecords: provisioningRecordRepository,
  referrals: referralRepository,
  customers: customerRepository,
  reviewItems: reviewItemRepository,
};
