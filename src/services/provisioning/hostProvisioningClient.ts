import { HOST_TYPES, type HostType } from '../../config/constants';
import { config } from '../../config/env';
import { loadHostsConfig, type HostConfig } from '../../config/hosts';
import { logger } from '../../utils/logger';
import {
  HostAuthFailedError,
  HostError,
  HostRejectedError,
  HostUnreachableError,
  errorMessage,
} from '../../utils/errors';
import { Semaphore } from '../../utils/semaphore';
import type { Order, PlanSnapshot, ProvisioningRecord, ProvisioningResult } from '../../types/domain';
import { buildCredentialSpec } from './credentialSpec';
import { RemnawaveHostClient } from './remnawaveHostClient';
import { XuiHostClient } from './xuiHostClient';
import type { FetchLike, HostClient } from './types';

export type HostClientFactory = (host: HostConfig) => HostClient;

export const createHostClient = (host: HostConfig, fetchImpl: FetchLike = fetch): HostClient => {
  switch (host.type) {
    case HOST_TYPES.XUI:
      return new XuiHostClient(host, fetchImpl);
    case HOST_TYPES.REMNAWAVE:
      return new RemnawaveHostClient(host, fetchImpl);
  }
};

export interface HostStatus {
  hostId: string;
  name: string;
  type: HostType;
  healthy: boolean;
  unhealthySince: Date | null;
  lastError: string | null;
  inFlight: number;
  queued: number;
  plans: PlanSnapshot[];
}

/** What the order state machine needs from the host side. */
export interface ProvisioningClient {
  isHealthy(hostId: string): boolean;
  issueCredential(order: Order): Promise<ProvisioningResult>;
  revokeCredential(record: ProvisioningRecord): Promise<void>;
}

interface HostEntry {
  config: HostConfig;
  client: HostClient;
  limiter: Semaphore;
  unhealthySince: Date | null;
  lastError: string | null;
}

/**
 * Registry of configured hosts. Calls to one host are bounded by its
 * `maxConcurrency` and queue in arrival order; different hosts never wait on
 * each other. Nothing here persists: the caller owns the provisioning record.
 */
export class HostProvisioningClient implements ProvisioningClient {
  private readonly entries = new Map<string, HostEntry>();

  constructor(hosts: HostConfig[], factory: HostClientFactory = host => createHostClient(host)) {
    for (const host of hosts) {
      this.entries.set(host.id, {
        config: host,
        client: factory(host),
        limiter: new Semaphore(host.maxConcurrency),
        unhealthySince: null,
        lastError: null,
      });
    }
  }

  getHost(hostId: string): HostConfig | null {
    return this.entries.get(hostId)?.config ?? null;
  }

  findPlan(hostId: string, planId: string): PlanSnapshot | null {
    return this.getHost(hostId)?.plans.find(plan => plan.planId === planId) ?? null;
  }

  isHealthy(hostId: string): boolean {
    const entry = this.entries.get(hostId);
    return entry !== undefined && entry.unhealthySince === null;
  }

  markUnhealthy(hostId: string, reason: string): void {
    const entry = this.entries.get(hostId);
    if (!entry) {
      return;
    }
    if (entry.unhealthySince === null) {
      entry.unhealthySince = new Date();
      logger.error('Host marked unhealthy, new orders are refused until an operator clears it', {
        hostId,
        reason,
      });
    }
    entry.lastError = reason;
  }

  /** Returns false for an unknown host. */
  markHealthy(hostId: string): boolean {
    const entry = this.entries.get(hostId);
    if (!entry) {
      return false;
    }
    entry.unhealthySince = null;
    entry.lastError = null;
    logger.info('Host marked healthy', { hostId });
    return true;
  }

  listHosts(): HostStatus[] {
    return [...this.entries.values()].map(entry => ({
      hostId: entry.config.id,
      name: entry.config.name,
      type: entry.config.type,
      healthy: entry.unhealthySince === null,
      unhealthySince: entry.unhealthySince,
      lastError: entry.lastError,
      inFlight: entry.limiter.inFlight,
      queued: entry.limiter.queued,
      plans: entry.config.plans,
    }));
  }

  /**
   * Creates or extends the order's credential. Requires
   * `order.provisioning.targetExpiresAt`, set by the caller when it claims the attempt.
   */
  async issueCredential(order: Order): Promise<ProvisioningResult> {
    const entry = this.entries.get(order.hostId);
    if (!entry) {
      throw new HostRejectedError(order.hostId, `Host ${order.hostId} is not configured`);
    }
    const target = order.provisioning.targetExpiresAt;
    if (!target) {
      throw new HostRejectedError(order.hostId, `Order ${order.orderId} has no target expiry`);
    }

    const spec = buildCredentialSpec(order, entry.config, target);
    const result = await this.call(entry, () => entry.client.ensureCredential(spec));

    logger.info('Credential issued', {
      orderId: order.orderId,
      hostId: order.hostId,
      credentialId: result.credentialId,
      expiresAt: result.expiresAt.toISOString(),
    });
    return result;
  }

  async revokeCredential(record: ProvisioningRecord): Promise<void> {
    const entry = this.entries.get(record.hostId);
    if (!entry) {
      throw new HostRejectedError(record.hostId, `Host ${record.hostId} is not configured`);
    }
    await this.call(entry, () => entry.client.revokeCredential(record.remoteCredentialId, record.email));
    logger.info('Credential revoked', { orderId: record.orderId, hostId: record.hostId });
  }

  private async call<T>(entry: HostEntry, task: () => Promise<T>): Promise<T> {
    try {
      return await entry.limiter.run(task);
    } catch (error) {
      if (error instanceof HostAuthFailedError) {
        this.markUnhealthy(entry.config.id, error.message);
      }
      if (error instanceof HostError) {
        throw error;
      }
      // Anything unclassified is treated as transient
      throw new HostUnreachableError(entry.config.id, errorMessage(error));
    }
  }
}

let registry: HostProvisioningClient | null = null;

/** Hosts loaded once from `HOSTS_CONFIG_PATH`. */
export const getHostRegistry = (): HostProvisioningClient => {
  if (!registry) {
    const hosts = loadHostsConfig(config.hostsConfigPath);
    if (hosts.length === 0) {
      logger.warn('No VPN hosts configured', { path: config.hostsConfigPath });
    }
    registry = new HostProvisioningClient(hosts);
  }
  return registry;
};
