import { v5 as uuidv5 } from 'uuid';
import { CREDENTIAL_NAMESPACE } from '../../config/constants';
import type { HostConfig } from '../../config/hosts';
import type { Order } from '../../types/domain';
import { sha256Hex } from '../../utils/crypto';
import type { CredentialSpec } from './types';

const DAY_MS = 24 * 60 * 60 * 1000;

const safeBuyerId = (buyerId: string): string => buyerId.replace(/[^A-Za-z0-9]/g, '') || 'buyer';

/**
 * Expiry a provisioning attempt asks the host for. A renewal extends from the
 * later of now and the credential's current expiry.
 */
export const computeTargetExpiry = (order: Order, now: Date, currentExpiry: Date | null = null): Date => {
  let base = now.getTime();
  if (order.kind === 'renewal') {
    const current = currentExpiry ?? order.renewal?.expiresAt ?? null;
    if (current && current.getTime() > base) {
      base = current.getTime();
    }
  }
  return new Date(base + order.plan.durationDays * DAY_MS);
};

/**
 * Derives every remote identifier from the order's idempotency key, so any
 * number of attempts for the same order address the same panel client.
 * Renewals address the credential they extend.
 */
export const buildCredentialSpec = (order: Order, host: HostConfig, targetExpiresAt: Date): CredentialSpec => {
  const digest = sha256Hex(order.idempotencyKey);
  const buyer = safeBuyerId(order.buyerId);

  const clientId = order.renewal ? order.renewal.credentialId : uuidv5(order.idempotencyKey, CREDENTIAL_NAMESPACE);
  const email = order.renewal ? order.renewal.email : `u${buyer}-${digest.slice(0, 10)}@${host.emailDomain}`;

  return {
    orderId: order.orderId,
    buyerId: order.buyerId,
    email,
    clientId,
    username: `u${buyer.slice(0, 20)}_${digest.slice(0, 8)}`,
    subscriptionToken: sha256Hex(clientId).slice(0, 16),
    targetExpiresAt,
    renewal: order.renewal !== null,
  };
};
