import fs from 'fs';
import path from 'path';
import { HOST_TYPES } from './constants';
import type { PlanSnapshot } from '../types/domain';

interface HostConfigBase {
  id: string;
  name: string;
  baseUrl: string;
  /** Concurrent calls allowed against this panel; excess calls queue. */
  maxConcurrency: number;
  timeoutMs: number;
  plans: PlanSnapshot[];
}

export interface XuiHostConfig extends HostConfigBase {
  type: typeof HOST_TYPES.XUI;
  username: string;
  password: string;
  inboundId: number;
  /** Template with a `{token}` placeholder, or a base URL the token is appended to. */
  subscriptionUrl: string | null;
  flow: string;
  emailDomain: string;
}

export interface RemnawaveHostConfig extends HostConfigBase {
  type: typeof HOST_TYPES.REMNAWAVE;
  apiToken: string;
  squadUuid: string;
  trafficLimitBytes: number;
  emailDomain: string;
}

export type HostConfig = XuiHostConfig | RemnawaveHostConfig;

const DEFAULT_MAX_CONCURRENCY = 2;
const DEFAULT_TIMEOUT_MS = 15000;
const DEFAULT_EMAIL_DOMAIN = 'vpn.local';

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === 'object' && value !== null && !Array.isArray(value);

class ConfigReader {
  readonly problems: string[] = [];

  constructor(
    private readonly source: Record<string, unknown>,
    private readonly where: string
  ) {}

  string(key: string): string {
    const value = this.source[key];
    if (typeof value !== 'string' || value.trim() === '') {
      this.problems.push(`${this.where}.${key} must be a non-empty string`);
      return '';
    }
    return value.trim();
  }

  optionalString(key: string): string | null {
    const value = this.source[key];
    if (value === undefined || value === null || value === '') {
      return null;
    }
    if (typeof value !== 'string') {
      this.problems.push(`${this.where}.${key} must be a string`);
      return null;
    }
    return value.trim();
  }

  number(key: string, fallback?: number, min = 0): number {
    const value = this.source[key];
    if (value === undefined && fallback !== undefined) {
      return fallback;
    }
    if (typeof value !== 'number' || !Number.isFinite(value) || value < min) {
      this.problems.push(`${this.where}.${key} must be a number >= ${min}`);
      return fallback ?? min;
    }
    return value;
  }
}

const parsePlans = (raw: unknown, where: string, problems: string[]): PlanSnapshot[] => {
  if (!Array.isArray(raw) || raw.length === 0) {
    problems.push(`${where}.plans must be a non-empty array`);
    return [];
  }

  return raw.map((entry, index) => {
    const planWhere = `${where}.plans[${index}]`;
    if (!isRecord(entry)) {
      problems.push(`${planWhere} must be an object`);
      return { planId: '', name: '', durationDays: 1, price: 0, currency: '' };
    }
    const reader = new ConfigReader(entry, planWhere);
    const plan: PlanSnapshot = {
      planId: reader.string('planId'),
      name: reader.string('name'),
      durationDays: reader.number('durationDays', undefined, 1),
      price: reader.number('price'),
      currency: reader.string('currency').toUpperCase(),
    };
    problems.push(...reader.problems);
    return plan;
  });
};

const parseHost = (raw: unknown, index: number, problems: string[]): HostConfig | null => {
  const where = `hosts[${index}]`;
  if (!isRecord(raw)) {
    problems.push(`${where} must be an object`);
    return null;
  }

  const reader = new ConfigReader(raw, where);
  const base = {
    id: reader.string('id'),
    name: reader.optionalString('name') ?? '',
    baseUrl: reader.string('baseUrl').replace(/\/+$/, ''),
    maxConcurrency: reader.number('maxConcurrency', DEFAULT_MAX_CONCURRENCY, 1),
    timeoutMs: reader.number('timeoutMs', DEFAULT_TIMEOUT_MS, 1),
    plans: parsePlans(raw.plans, where, problems),
  };
  const name = base.name || base.id;
  const emailDomain = reader.optionalString('emailDomain') ?? DEFAULT_EMAIL_DOMAIN;

  let host: HostConfig | null = null;
  if (raw.type === HOST_TYPES.XUI) {
    host = {
      ...base,
      name,
      type: HOST_TYPES.XUI,
      username: reader.string('username'),
      password: reader.string('password'),
      inboundId: reader.number('inboundId', undefined, 1),
      subscriptionUrl: reader.optionalString('subscriptionUrl'),
      flow: reader.optionalString('flow') ?? '',
      emailDomain,
    };
  } else if (raw.type === HOST_TYPES.REMNAWAVE) {
    host = {
      ...base,
      name,
      type: HOST_TYPES.REMNAWAVE,
      apiToken: reader.string('apiToken'),
      squadUuid: reader.string('squadUuid'),
      trafficLimitBytes: reader.number('trafficLimitBytes', 0),
      emailDomain,
    };
  } else {
    problems.push(`${where}.type must be one of: ${Object.values(HOST_TYPES).join(', ')}`);
  }

  problems.push(...reader.problems);
  return host;
};

/** Validates the hosts document and throws listing every problem found. */
export const parseHostsConfig = (raw: unknown): HostConfig[] => {
  const problems: string[] = [];
  const list = isRecord(raw) ? raw.hosts : undefined;

  if (!Array.isArray(list)) {
    throw new Error('Hosts config must be an object with a "hosts" array');
  }

  const hosts: HostConfig[] = [];
  list.forEach((entry, index) => {
    const host = parseHost(entry, index, problems);
    if (host) {
      hosts.push(host);
    }
  });

  const seen = new Set<string>();
  for (const host of hosts) {
    if (seen.has(host.id)) {
      problems.push(`duplicate host id "${host.id}"`);
    }
    seen.add(host.id);
  }

  if (problems.length > 0) {
    throw new Error(`Invalid hosts config: ${problems.join('; ')}`);
  }
  return hosts;
};

export const loadHostsConfig = (filePath: string): HostConfig[] => {
  const resolved = path.resolve(process.cwd(), filePath);
  if (!fs.existsSync(resolved)) {
    return [];
  }
  const raw: unknown = JSON.parse(fs.readFileSync(resolved, 'utf8'));
  return parseHostsConfig(raw);
};
