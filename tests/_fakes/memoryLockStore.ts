import type { LockStore } from '../../src/services/locks/orderLockService';

/** Single-node stand-in for the SET NX PX lease and its owner-checked release. */
export class MemoryLockStore implements LockStore {
  isReady = true;
  readonly leases = new Map<string, string>();
  readonly ttls: number[] = [];

  async setIfAbsent(key: string, token: string, ttlMs: number): Promise<boolean> {
    if (this.leases.has(key)) {
      return false;
    }
    this.leases.set(key, token);
    this.ttls.push(ttlMs);
    return true;
  }

  async deleteIfOwned(key: string, token: string): Promise<boolean> {
    if (this.leases.get(key) !== token) {
      return false;
    }
    this.leases.delete(key);
    return true;
  }
}
