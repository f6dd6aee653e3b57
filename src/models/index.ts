// Export all models from a single file for easy importing

export { OrderModel } from './Order';
export { PaymentEventModel } from './PaymentEvent';
export { ProvisioningRecordModel } from './ProvisioningRecord';
export type { IOrder } from './Order';
export type { IPaymentEvent } from './PaymentEvent';
export type { IProvisioningRecord } from './ProvisioningRecord';

// Referral ledger
export { ReferralCreditModel } from './ReferralCredit';
export { ReferralWithdrawalModel } from './ReferralWithdrawal';
export { CustomerModel } from './Customer';
export type { IReferralCredit } from './ReferralCredit';
export type { IReferralWithdrawal } from './ReferralWithdrawal';
export type { ICustomer } from './Customer';

// Operator queue
export { ReviewItemModel } from './ReviewItem';
export type { IReviewItem } from './ReviewItem';
