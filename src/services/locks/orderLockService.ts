import { randomUUID } from 'crypto';
import { redisClient } from '../../config/redis';
import { config } from '../../config/env';
import { logger } from '../../utils/logger';
import { OrderLockTimeoutError, errorMessage } from '../../utils/errors';
import { KeyedMutex, type MutexWait } from './keyedMutex';

/** Per-order single-writer section around every state transition. */
export interface OrderLock {
  withOrderLock<T>(orderId: string, task: () => Promise<T>): Promise<T>;
}

export interface LockStore {
  readonly isReady: boolean;
  setIfAbsent(key: string, token: string, ttlMs: number): Promise<boolean>;
  deleteIfOwned(key: string, token: string): Promise<boolean>;
}

// Deletes the key only while it still holds our token
const RELEASE_SCRIPT = `
if redis.call("get", KEYS[1]) == ARGV[1] then
  return redis.call("del", KEYS[1])
else
  return 0
end`;

export const redisLockStore: LockStore = {
  get isReady(): boolean {
    return redisClient.isReady;
  },
  async setIfAbsent(key: string, token: string, ttlMs: number): Promise<boolean> {
    const reply = await redisClient.set(key, token, { NX: true, PX: ttlMs });
    return reply === 'OK';
  },
  async deleteIfOwned(key: string, token: string): Promise<boolean> {
    const reply = await redisClient.eval(RELEASE_SCRIPT, { keys: [key], arguments: [token] });
    return reply === 1;
  },
};

export interface OrderLockOptions {
  ttlMs: number;
  waitMs: number;
  pollMs: number;
}

const defaultLockOptions = (): OrderLockOptions => ({
  ttlMs: config.orders.lockTtlMs,
  waitMs: config.orders.lockWaitMs,
  pollMs: 50,
});

const sleep = (ms: number): Promise<void> => new Promise(resolve => setTimeout(resolve, ms));

const localWait = (orderId: string, ms: number): MutexWait => ({
  ms,
  onTimeout: () => {
    logger.warn('Order lock wait timed out in process', { orderId });
    return new OrderLockTimeoutError(orderId);
  },
});

/**
 * Redis lease (`SET NX PX` + owner token) shared by every process, taken inside
 * an in-process mutex. While Redis is not ready only the in-process mutex applies.
 */
export class RedisOrderLock implements OrderLock {
  private readonly local = new KeyedMutex();

  constructor(
    private readonly store: LockStore = redisLockStore,
    private readonly options: OrderLockOptions = defaultLockOptions(),
    private readonly keyPrefix = 'order:lock:'
  ) {}

  async withOrderLock<T>(orderId: string, task: () => Promise<T>): Promise<T> {
    const deadline = Date.now() + this.options.waitMs;

    return this.local.run(
      orderId,
      async () => {
        if (!this.store.isReady) {
          return task();
        }

        const key = `${this.keyPrefix}${orderId}`;
        const token = randomUUID();
        await this.acquire(orderId, key, token, deadline);

        try {
          return await task();
        } finally {
          await this.release(key, token);
        }
      },
      localWait(orderId, this.options.waitMs)
    );
  }

  private async acquire(orderId: string, key: string, token: string, deadline: number): Promise<void> {
    for (;;) {
      if (await this.store.setIfAbsent(key, token, this.options.ttlMs)) {
        return;
      }
      if (Date.now() >= deadline) {
        logger.warn('Order lock wait timed out', { orderId });
        throw new OrderLockTimeoutError(orderId);
      }
      await sleep(this.options.pollMs);
    }
  }

  private async release(key: string, token: string): Promise<void> {
    try {
      const released = await this.store.deleteIfOwned(key, token);
      if (!released) {
        // Lease ran out mid-transition; the CAS on order state still applied
        logger.warn('Order lock expired before release', { key });
      }
    } catch (error) {
      logger.warn('Failed to release order lock', { key, error: errorMessage(error) });
    }
  }
}

/** Lock for a single process; used in tests and when Redis is not configured. */
export class InProcessOrderLock implements OrderLock {
  private readonly mutex = new KeyedMutex();

  constructor(private readonly waitMs: number = config.orders.lockWaitMs) {}

  withOrderLock<T>(orderId: string, task: () => Promise<T>): Promise<T> {
    return this.mutex.run(orderId, task, localWait(orderId, this.waitMs));
  }
}

export const orderLock = new RedisOrderLock();

/** Serializes referral withdrawals of one user across processes. */
export const withdrawalLock = new RedisOrderLock(redisLockStore, defaultLockOptions(), 'referral:withdrawal:lock:');
