import { describe, it, expect } from 'vitest';
import { buildCredentialSpec, computeTargetExpiry } from '../../src/services/provisioning/credentialSpec';
import type { Order } from '../../src/types/domain';
import { testHost } from '../_fakes/fakeHosts';
import { buildHarness } from '../_fakes/harness';

const NOW = new Date('2026-03-01T12:00:00.000Z');

const openOrder = async (input: { buyerId?: string; nonce?: string } = {}): Promise<Order> =>
  buildHarness().openOrder({ provider: null, ...input });

describe('computeTargetExpiry', () => {
  it('adds the plan duration to now for a new purchase', async () => {
    const order = await openOrder();
    expect(computeTargetExpiry(order, NOW).toISOString()).toBe('2026-03-31T12:00:00.000Z');
  });

  it('extends a renewal from the later of now and the current expiry', async () => {
    const order = await openOrder();
    const renewal: Order = {
      ...order,
      kind: 'renewal',
      renewal: {
        sourceOrderId: 'source',
        credentialId: 'c-1',
        email: 'e@vpn.test',
        expiresAt: new Date('2026-03-10T12:00:00.000Z'),
      },
    };

    expect(computeTargetExpiry(renewal, NOW).toISOString()).toBe('2026-04-09T12:00:00.000Z');
    expect(computeTargetExpiry(renewal, NOW, new Date('2026-03-20T12:00:00.000Z')).toISOString()).toBe(
      '2026-04-19T12:00:00.000Z'
    );
    expect(computeTargetExpiry(renewal, NOW, new Date('2026-02-01T00:00:00.000Z')).toISOString()).toBe(
      '2026-03-31T12:00:00.000Z'
    );
  });
});

describe('buildCredentialSpec', () => {
  it('derives the same identifiers for the same order', async () => {
    const order = await openOrder();

    const first = buildCredentialSpec(order, testHost(), NOW);
    const second = buildCredentialSpec({ ...order }, testHost(), NOW);

    expect(second).toEqual(first);
    expect(first.clientId).toMatch(/^[0-9a-f]{8}-[0-9a-f]{4}-5[0-9a-f]{3}-[89ab][0-9a-f]{3}-[0-9a-f]{12}$/);
    expect(first.email).toMatch(/^u1001-[0-9a-f]{10}@vpn\.test$/);
    expect(first.username).toMatch(/^u1001_[0-9a-f]{8}$/);
    expect(first.subscriptionToken).toHaveLength(16);
    expect(first.renewal).toBe(false);
  });

  it('derives different identifiers for different purchases', async () => {
    const a = buildCredentialSpec(await openOrder({ nonce: 'a' }), testHost(), NOW);
    const b = buildCredentialSpec(await openOrder({ nonce: 'b' }), testHost(), NOW);

    expect(a.clientId).not.toBe(b.clientId);
    expect(a.email).not.toBe(b.email);
  });

  it('strips characters the panels reject from the buyer id', async () => {
    const spec = buildCredentialSpec(await openOrder({ buyerId: 'tg:42/x' }), testHost(), NOW);

    expect(spec.email.startsWith('utg42x-')).toBe(true);
    expect(spec.username.startsWith('utg42x_')).toBe(true);
  });

  it('addresses the credential being renewed', async () => {
    const order = await openOrder();
    const spec = buildCredentialSpec(
      {
        ...order,
        kind: 'renewal',
        renewal: { sourceOrderId: 'source', credentialId: 'c-1', email: 'old@vpn.test', expiresAt: NOW },
      },
      testHost(),
      NOW
    );

    expect(spec).toMatchObject({ clientId: 'c-1', email: 'old@vpn.test', renewal: true });
  });
});
