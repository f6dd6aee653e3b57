import { HOST_TYPES } from '../../config/constants';
import type { RemnawaveHostConfig } from '../../config/hosts';
import { logger } from '../../utils/logger';
import { HostRejectedError, HostUnreachableError } from '../../utils/errors';
import type { ProvisioningResult } from '../../types/domain';
import { hostRequest, isRecord, readJson, type HostRequest } from './hostHttp';
import type { CredentialSpec, FetchLike, HostClient } from './types';

interface RemnawaveUser {
  uuid: string;
  email: string | null;
  expireAt: Date | null;
  subscriptionUrl: string | null;
}

const toUser = (value: unknown): RemnawaveUser | null => {
  if (!isRecord(value) || typeof value.uuid !== 'string') {
    return null;
  }
  const expireAt = typeof value.expireAt === 'string' ? new Date(value.expireAt) : null;
  return {
    uuid: value.uuid,
    email: typeof value.email === 'string' ? value.email : null,
    expireAt: expireAt && !Number.isNaN(expireAt.getTime()) ? expireAt : null,
    subscriptionUrl: typeof value.subscriptionUrl === 'string' ? value.subscriptionUrl : null,
  };
};

/** Unwraps `{ response: ... }`; by-email lookups answer with a list. */
const unwrapUser = (payload: unknown): RemnawaveUser | null => {
  const body = isRecord(payload) ? payload.response : undefined;
  if (Array.isArray(body)) {
    return body.length > 0 ? toUser(body[0]) : null;
  }
  return toUser(body);
};

export class RemnawaveHostClient implements HostClient {
  readonly type = HOST_TYPES.REMNAWAVE;

  constructor(
    private readonly host: RemnawaveHostConfig,
    private readonly fetchImpl: FetchLike = fetch
  ) {}

  get hostId(): string {
    return this.host.id;
  }

  async ensureCredential(spec: CredentialSpec): Promise<ProvisioningResult> {
    let user = await this.findUser(spec.email);

    if (!user) {
      if (spec.renewal) {
        throw new HostRejectedError(this.hostId, `User ${spec.email} to renew does not exist on the panel`);
      }
      user = await this.createUser(spec);
    }

    if (!user) {
      // Lost a create race against an earlier attempt; the user exists now
      user = await this.findUser(spec.email);
      if (!user) {
        throw new HostUnreachableError(this.hostId, `User ${spec.email} neither created nor found`);
      }
    }

    const target = spec.targetExpiresAt;
    const alreadyThere = user.expireAt !== null && user.expireAt.getTime() >= target.getTime();
    if (!alreadyThere) {
      user = await this.updateUser(user.uuid, spec, target);
    }

    const expiresAt = user.expireAt ?? target;
    return {
      credentialId: user.uuid,
      email: spec.email,
      connectionString: user.subscriptionUrl ?? '',
      expiresAt,
    };
  }

  async revokeCredential(credentialId: string): Promise<void> {
    await hostRequest({
      ...this.request('DELETE', `/api/users/${encodeURIComponent(credentialId)}`),
      passThrough: [404],
    });
  }

  private async findUser(email: string): Promise<RemnawaveUser | null> {
    const response = await hostRequest({
      ...this.request('GET', `/api/users/by-email/${encodeURIComponent(email)}`),
      passThrough: [404],
    });
    if (response.status === 404) {
      return null;
    }
    return unwrapUser(await readJson(this.hostId, response));
  }

  /** Returns null when the panel reports the user as already existing. */
  private async createUser(spec: CredentialSpec): Promise<RemnawaveUser | null> {
    const response = await hostRequest({
      ...this.request('POST', '/api/users', {
        username: spec.username,
        email: spec.email,
        status: 'ACTIVE',
        expireAt: spec.targetExpiresAt.toISOString(),
        trafficLimitBytes: this.host.trafficLimitBytes,
        trafficLimitStrategy: 'NO_RESET',
        activeInternalSquads: [this.host.squadUuid],
        description: `order ${spec.orderId}`,
      }),
      passThrough: [400, 409],
    });

    if (response.status === 400 || response.status === 409) {
      const detail = await response.text();
      if (/already exists/i.test(detail)) {
        logger.info('Remnawave user already exists, updating instead', { hostId: this.hostId, email: spec.email });
        return null;
      }
      throw new HostRejectedError(this.hostId, `User create refused: ${detail.slice(0, 200)}`);
    }

    return this.requireUser(await readJson(this.hostId, response));
  }

  private async updateUser(uuid: string, spec: CredentialSpec, expireAt: Date): Promise<RemnawaveUser> {
    const response = await hostRequest(
      this.request('PATCH', '/api/users', {
        uuid,
        email: spec.email,
        status: 'ACTIVE',
        expireAt: expireAt.toISOString(),
        trafficLimitBytes: this.host.trafficLimitBytes,
        trafficLimitStrategy: 'NO_RESET',
        activeInternalSquads: [this.host.squadUuid],
      })
    );
    return this.requireUser(await readJson(this.hostId, response));
  }

  private requireUser(payload: unknown): RemnawaveUser {
    const user = unwrapUser(payload);
    if (!user) {
      throw new HostUnreachableError(this.hostId, 'Panel returned an unexpected user payload');
    }
    return user;
  }

  private request(method: string, path: string, body?: Record<string, unknown>): HostRequest {
    const headers: Record<string, string> = {
      Authorization: `Bearer ${this.host.apiToken}`,
      Accept: 'application/json',
    };
    if (body) {
      headers['Content-Type'] = 'application/json';
    }

    return {
      hostId: this.hostId,
      fetchImpl: this.fetchImpl,
      timeoutMs: this.host.timeoutMs,
      method,
      url: `${this.host.baseUrl}${path}`,
      headers,
      body: body ? JSON.stringify(body) : undefined,
    };
  }
}
