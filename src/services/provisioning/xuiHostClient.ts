import { HOST_TYPES } from '../../config/constants';
import type { XuiHostConfig } from '../../config/hosts';
import { logger } from '../../utils/logger';
import { HostAuthFailedError, HostRejectedError, HostUnreachableError } from '../../utils/errors';
import type { ProvisioningResult } from '../../types/domain';
import { hostRequest, isRecord, readJson } from './hostHttp';
import type { CredentialSpec, FetchLike, HostClient } from './types';

interface XuiReply {
  success: boolean;
  msg: string;
  obj: unknown;
}

interface XuiClientTraffic {
  email: string;
  expiryTime: number;
  enable: boolean;
}

// Session expiry on the panel shows up as a redirect to the login page or a 404 on API routes
const SESSION_LOST_STATUSES = [301, 302, 303, 307, 401, 404] as const;

const toReply = (hostId: string, payload: unknown): XuiReply => {
  if (!isRecord(payload) || typeof payload.success !== 'boolean') {
    throw new HostUnreachableError(hostId, 'Panel returned an unexpected payload');
  }
  return {
    success: payload.success,
    msg: typeof payload.msg === 'string' ? payload.msg : '',
    obj: payload.obj,
  };
};

const toTraffic = (value: unknown): XuiClientTraffic | null => {
  if (!isRecord(value) || typeof value.email !== 'string') {
    return null;
  }
  return {
    email: value.email,
    expiryTime: typeof value.expiryTime === 'number' ? value.expiryTime : 0,
    enable: value.enable !== false,
  };
};

/** `name=value` pairs of every Set-Cookie header, joined for a Cookie header. */
export const sessionCookieFrom = (setCookie: string | null): string | null => {
  if (!setCookie) {
    return null;
  }
  const pairs = setCookie
    .split(/,(?=\s*[A-Za-z0-9_.-]+=)/)
    .map(cookie => cookie.split(';')[0].trim())
    .filter(pair => pair.includes('='));
  return pairs.length > 0 ? pairs.join('; ') : null;
};

export const buildSubscriptionLink = (host: XuiHostConfig, token: string): string => {
  if (host.subscriptionUrl) {
    return host.subscriptionUrl.includes('{token}')
      ? host.subscriptionUrl.replace('{token}', token)
      : `${host.subscriptionUrl.replace(/\/+$/, '')}/${token}`;
  }
  const panel = new URL(host.baseUrl);
  return `${panel.protocol}//${panel.hostname}/sub/${token}`;
};

/**
 * 3x-ui panel. Clients live inside one inbound and are addressed by email;
 * the client UUID and subscription token are derived from the order, so a
 * repeated call finds and updates the client it created before.
 */
export class XuiHostClient implements HostClient {
  readonly type = HOST_TYPES.XUI;
  private sessionCookie: string | null = null;

  constructor(
    private readonly host: XuiHostConfig,
    private readonly fetchImpl: FetchLike = fetch
  ) {}

  get hostId(): string {
    return this.host.id;
  }

  async ensureCredential(spec: CredentialSpec): Promise<ProvisioningResult> {
    const existing = await this.findClient(spec.email);
    let expiryTime = spec.targetExpiresAt.getTime();

    if (existing) {
      // Never shorten a client that already runs past the target
      expiryTime = Math.max(expiryTime, existing.expiryTime);
      await this.updateClient(spec, expiryTime);
    } else if (spec.renewal) {
      throw new HostRejectedError(this.hostId, `Client ${spec.email} to renew does not exist on the panel`);
    } else {
      const reply = await this.call('POST', '/panel/api/inbounds/addClient', this.clientSettings(spec, expiryTime));
      if (!reply.success) {
        if (!/duplicate/i.test(reply.msg)) {
          throw new HostRejectedError(this.hostId, `addClient refused: ${reply.msg || 'no message'}`);
        }
        // Created by an earlier attempt that never saw the reply
        logger.info('3x-ui client already exists, updating instead', { hostId: this.hostId, email: spec.email });
        await this.updateClient(spec, expiryTime);
      }
    }

    return {
      credentialId: spec.clientId,
      email: spec.email,
      connectionString: buildSubscriptionLink(this.host, spec.subscriptionToken),
      expiresAt: new Date(expiryTime),
    };
  }

  async revokeCredential(credentialId: string, email: string): Promise<void> {
    const reply = await this.call(
      'POST',
      `/panel/api/inbounds/${this.host.inboundId}/delClient/${encodeURIComponent(credentialId)}`
    );
    if (!reply.success && !/not found|no client/i.test(reply.msg)) {
      throw new HostRejectedError(this.hostId, `delClient refused for ${email}: ${reply.msg || 'no message'}`);
    }
  }

  private async findClient(email: string): Promise<XuiClientTraffic | null> {
    const reply = await this.call('GET', `/panel/api/inbounds/getClientTraffics/${encodeURIComponent(email)}`);
    return reply.success ? toTraffic(reply.obj) : null;
  }

  private async updateClient(spec: CredentialSpec, expiryTime: number): Promise<void> {
    const reply = await this.call(
      'POST',
      `/panel/api/inbounds/updateClient/${encodeURIComponent(spec.clientId)}`,
      this.clientSettings(spec, expiryTime)
    );
    if (!reply.success) {
      throw new HostRejectedError(this.hostId, `updateClient refused: ${reply.msg || 'no message'}`);
    }
  }

  private clientSettings(spec: CredentialSpec, expiryTime: number): Record<string, unknown> {
    return {
      id: this.host.inboundId,
      settings: JSON.stringify({
        clients: [
          {
            id: spec.clientId,
            email: spec.email,
            enable: true,
            flow: this.host.flow,
            limitIp: 0,
            totalGB: 0,
            expiryTime,
            tgId: '',
            subId: spec.subscriptionToken,
            reset: 0,
          },
        ],
      }),
    };
  }

  private async call(method: 'GET' | 'POST', path: string, body?: Record<string, unknown>): Promise<XuiReply> {
    for (let attempt = 0; attempt < 2; attempt++) {
      const cookie = this.sessionCookie ?? (await this.login());
      const headers: Record<string, string> = { Accept: 'application/json', Cookie: cookie };
      if (body) {
        headers['Content-Type'] = 'application/json';
      }

      const response = await hostRequest({
        hostId: this.hostId,
        fetchImpl: this.fetchImpl,
        timeoutMs: this.host.timeoutMs,
        method,
        url: `${this.host.baseUrl}${path}`,
        headers,
        body: body ? JSON.stringify(body) : undefined,
        passThrough: SESSION_LOST_STATUSES,
      });

      if (!SESSION_LOST_STATUSES.some(status => status === response.status)) {
        return toReply(this.hostId, await readJson(this.hostId, response));
      }
      this.sessionCookie = null;
    }

    throw new HostAuthFailedError(this.hostId, 'Panel session was refused right after login');
  }

  private async login(): Promise<string> {
    const response = await hostRequest({
      hostId: this.hostId,
      fetchImpl: this.fetchImpl,
      timeoutMs: this.host.timeoutMs,
      method: 'POST',
      url: `${this.host.baseUrl}/login`,
      headers: { 'Content-Type': 'application/x-www-form-urlencoded', Accept: 'application/json' },
      body: new URLSearchParams({ username: this.host.username, password: this.host.password }).toString(),
      passThrough: [404],
    });
    if (response.status === 404) {
      throw new HostRejectedError(this.hostId, 'Panel login endpoint not found; check baseUrl');
    }

    const reply = toReply(this.hostId, await readJson(this.hostId, response));
    const cookie = sessionCookieFrom(response.headers.get('set-cookie'));
    if (!reply.success || !cookie) {
      throw new HostAuthFailedError(this.hostId, `Panel login refused: ${reply.msg || 'no session cookie'}`);
    }

    this.sessionCookie = cookie;
    return cookie;
  }
}
