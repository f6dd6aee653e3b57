import { describe, it, expect } from 'vitest';
import { XuiHostClient, buildSubscriptionLink, sessionCookieFrom } from '../../src/services/provisioning/xuiHostClient';
import type { CredentialSpec, FetchLike } from '../../src/services/provisioning/types';
import { HostAuthFailedError, HostRejectedError, HostUnreachableError } from '../../src/utils/errors';
import { testHost } from '../_fakes/fakeHosts';

interface PanelClient {
  id: string;
  email: string;
  expiryTime: number;
  subId: string;
}

const json = (payload: unknown, headers: Record<string, string> = {}): Response =>
  new Response(JSON.stringify(payload), { status: 200, headers: { 'content-type': 'application/json', ...headers } });

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === 'object' && value !== null && !Array.isArray(value);

/** Enough of a 3x-ui panel to exercise login, lookup and client upserts. */
class FakeXuiPanel {
  readonly clients = new Map<string, PanelClient>();
  readonly requests: string[] = [];
  logins = 0;
  session = 'session-1';
  password = 'test-password';
  dropNextAddReply = false;
  failNext: number | null = null;

  readonly fetch: FetchLike = async (input, init = {}) => {
    const url = new URL(input);
    const method = init.method ?? 'GET';
    const body = typeof init.body === 'string' ? init.body : '';
    this.requests.push(`${method} ${url.pathname}`);

    if (this.failNext !== null) {
      const status = this.failNext;
      this.failNext = null;
      return new Response('panel error', { status });
    }

    if (url.pathname === '/login') {
      this.logins += 1;
      const form = new URLSearchParams(body);
      if (form.get('password') !== this.password) {
        return json({ success: false, msg: 'wrong username or password', obj: null });
      }
      return json(
        { success: true, msg: 'Login successfully', obj: null },
        { 'set-cookie': `3x-ui=${this.session}; Path=/; HttpOnly` }
      );
    }

    if (new Headers(init.headers).get('cookie') !== `3x-ui=${this.session}`) {
      return new Response(null, { status: 302, headers: { location: '/login' } });
    }

    const traffic = url.pathname.match(/^\/panel\/api\/inbounds\/getClientTraffics\/(.+)$/);
    if (traffic) {
      const client = this.clients.get(decodeURIComponent(traffic[1]));
      return json({
        success: true,
        msg: '',
        obj: client ? { email: client.email, expiryTime: client.expiryTime, enable: true } : null,
      });
    }

    if (url.pathname === '/panel/api/inbounds/addClient') {
      const client = this.clientFrom(body);
      if (this.clients.has(client.email)) {
        return json({ success: false, msg: `Duplicate email: ${client.email}`, obj: null });
      }
      this.clients.set(client.email, client);
      if (this.dropNextAddReply) {
        this.dropNextAddReply = false;
        throw new TypeError('fetch failed');
      }
      return json({ success: true, msg: 'Client(s) added', obj: null });
    }

    if (url.pathname.startsWith('/panel/api/inbounds/updateClient/')) {
      const client = this.clientFrom(body);
      this.clients.set(client.email, client);
      return json({ success: true, msg: 'Client updated', obj: null });
    }

    const del = url.pathname.match(/^\/panel\/api\/inbounds\/1\/delClient\/(.+)$/);
    if (del) {
      const entry = [...this.clients.values()].find(client => client.id === decodeURIComponent(del[1]));
      if (!entry) {
        return json({ success: false, msg: 'Client not found', obj: null });
      }
      this.clients.delete(entry.email);
      return json({ success: true, msg: 'Client deleted', obj: null });
    }

    return new Response('not found', { status: 404 });
  };

  private clientFrom(body: string): PanelClient {
    const outer: unknown = JSON.parse(body);
    const settings: unknown = isRecord(outer) && typeof outer.settings === 'string' ? JSON.parse(outer.settings) : null;
    const first: unknown = isRecord(settings) && Array.isArray(settings.clients) ? settings.clients[0] : null;
    if (!isRecord(first)) {
      throw new Error('unexpected client payload');
    }
    return {
      id: String(first.id),
      email: String(first.email),
      expiryTime: Number(first.expiryTime),
      subId: String(first.subId),
    };
  }
}

const TARGET = new Date('2026-03-31T12:00:00.000Z');

const spec = (overrides: Partial<CredentialSpec> = {}): CredentialSpec => ({
  orderId: 'order-1',
  buyerId: '1001',
  email: 'u1001-0a1b2c3d4e@vpn.test',
  clientId: '3f2b9c1e-7d4a-5e6f-8a9b-0c1d2e3f4a5b',
  username: 'u1001_0a1b2c3d',
  subscriptionToken: 'sub-token-1',
  targetExpiresAt: TARGET,
  renewal: false,
  ...overrides,
});

const setup = () => {
  const panel = new FakeXuiPanel();
  const client = new XuiHostClient(testHost(), panel.fetch);
  return { panel, client };
};

describe('sessionCookieFrom', () => {
  it('keeps only the name=value pairs', () => {
    expect(sessionCookieFrom('3x-ui=abc; Path=/; HttpOnly, lang=en; Path=/')).toBe('3x-ui=abc; lang=en');
    expect(sessionCookieFrom(null)).toBeNull();
  });
});

describe('buildSubscriptionLink', () => {
  it('fills the token placeholder or appends the token', () => {
    expect(buildSubscriptionLink(testHost(), 'abc')).toBe('https://sub.test/abc');
    expect(buildSubscriptionLink(testHost({ subscriptionUrl: 'https://sub.test/s/' }), 'abc')).toBe('https://sub.test/s/abc');
    expect(buildSubscriptionLink(testHost({ subscriptionUrl: null }), 'abc')).toBe('https://panel.test/sub/abc');
  });
});

describe('XuiHostClient', () => {
  it('logs in and creates the client', async () => {
    const { panel, client } = setup();

    const result = await client.ensureCredential(spec());

    expect(result).toEqual({
      credentialId: '3f2b9c1e-7d4a-5e6f-8a9b-0c1d2e3f4a5b',
      email: 'u1001-0a1b2c3d4e@vpn.test',
      connectionString: 'https://sub.test/sub-token-1',
      expiresAt: TARGET,
    });
    expect(panel.requests).toEqual([
      'POST /login',
      'GET /panel/api/inbounds/getClientTraffics/u1001-0a1b2c3d4e%40vpn.test',
      'POST /panel/api/inbounds/addClient',
    ]);
    expect(panel.clients.get('u1001-0a1b2c3d4e@vpn.test')).toEqual({
      id: '3f2b9c1e-7d4a-5e6f-8a9b-0c1d2e3f4a5b',
      email: 'u1001-0a1b2c3d4e@vpn.test',
      expiryTime: TARGET.getTime(),
      subId: 'sub-token-1',
    });
  });

  it('converges on one client when called again', async () => {
    const { panel, client } = setup();

    const first = await client.ensureCredential(spec());
    const second = await client.ensureCredential(spec());

    expect(second).toEqual(first);
    expect(panel.clients.size).toBe(1);
    expect(panel.logins).toBe(1);
    expect(panel.requests.at(-1)).toBe('POST /panel/api/inbounds/updateClient/3f2b9c1e-7d4a-5e6f-8a9b-0c1d2e3f4a5b');
  });

  it('finds the client created by an attempt whose reply was lost', async () => {
    const { panel, client } = setup();
    panel.dropNextAddReply = true;

    await expect(client.ensureCredential(spec())).rejects.toBeInstanceOf(HostUnreachableError);
    const result = await client.ensureCredential(spec());

    expect(result.credentialId).toBe('3f2b9c1e-7d4a-5e6f-8a9b-0c1d2e3f4a5b');
    expect(panel.clients.size).toBe(1);
  });

  it('never shortens a client that already runs longer', async () => {
    const { panel, client } = setup();
    const later = new Date('2026-05-01T00:00:00.000Z').getTime();
    panel.clients.set('u1001-0a1b2c3d4e@vpn.test', {
      id: '3f2b9c1e-7d4a-5e6f-8a9b-0c1d2e3f4a5b',
      email: 'u1001-0a1b2c3d4e@vpn.test',
      expiryTime: later,
      subId: 'sub-token-1',
    });

    const result = await client.ensureCredential(spec());

    expect(result.expiresAt.getTime()).toBe(later);
    expect(panel.clients.get('u1001-0a1b2c3d4e@vpn.test')?.expiryTime).toBe(later);
  });

  it('refuses to renew a client the panel does not have', async () => {
    const { client } = setup();

    await expect(client.ensureCredential(spec({ renewal: true }))).rejects.toBeInstanceOf(HostRejectedError);
  });

  it('logs in again when the session is gone', async () => {
    const { panel, client } = setup();
    await client.ensureCredential(spec());
    panel.session = 'session-2';

    await client.ensureCredential(spec());

    expect(panel.logins).toBe(2);
  });

  it('reports refused credentials as an auth failure', async () => {
    const { panel, client } = setup();
    panel.password = 'rotated';

    await expect(client.ensureCredential(spec())).rejects.toBeInstanceOf(HostAuthFailedError);
  });

  it('classifies panel errors', async () => {
    const { panel, client } = setup();

    panel.failNext = 503;
    await expect(client.ensureCredential(spec())).rejects.toBeInstanceOf(HostUnreachableError);

    panel.failNext = 429;
    await expect(client.ensureCredential(spec())).rejects.toBeInstanceOf(HostUnreachableError);

    panel.failNext = 400;
    await expect(client.ensureCredential(spec())).rejects.toBeInstanceOf(HostRejectedError);
  });

  it('revokes a client and tolerates one that is already gone', async () => {
    const { panel, client } = setup();
    await client.ensureCredential(spec());

    await client.revokeCredential('3f2b9c1e-7d4a-5e6f-8a9b-0c1d2e3f4a5b', 'u1001-0a1b2c3d4e@vpn.test');
    expect(panel.clients.size).toBe(0);

    await expect(
      client.revokeCredential('3f2b9c1e-7d4a-5e6f-8a9b-0c1d2e3f4a5b', 'u1001-0a1b2c3d4e@vpn.test')
    ).resolves.toBeUndefined();
  });
});
