import { HostAuthFailedError, HostRejectedError, HostUnreachableError, errorMessage } from '../../utils/errors';
import type { FetchLike } from './types';

export interface HostRequest {
  hostId: string;
  fetchImpl: FetchLike;
  timeoutMs: number;
  method: string;
  url: string;
  headers?: Record<string, string>;
  body?: string;
  /** Statuses handed back to the caller instead of being classified. */
  passThrough?: readonly number[];
}

export const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === 'object' && value !== null && !Array.isArray(value);

const describe = (request: HostRequest): string => `${request.method} ${new URL(request.url).pathname}`;

/**
 * Performs one panel call and maps transport failures onto the host error
 * taxonomy: network errors, timeouts, 429 and 5xx are retryable; 401/403 mean
 * the credentials were refused; any other 4xx is a rejection.
 */
export const hostRequest = async (request: HostRequest): Promise<Response> => {
  let response: Response;
  try {
    response = await request.fetchImpl(request.url, {
      method: request.method,
      headers: request.headers,
      body: request.body,
      redirect: 'manual',
      signal: AbortSignal.timeout(request.timeoutMs),
    });
  } catch (error) {
    throw new HostUnreachableError(request.hostId, `${describe(request)} failed: ${errorMessage(error)}`);
  }

  if (request.passThrough?.includes(response.status)) {
    return response;
  }
  if (response.status === 401 || response.status === 403) {
    throw new HostAuthFailedError(request.hostId, `${describe(request)} returned ${response.status}`);
  }
  if (response.status === 429 || response.status >= 500) {
    throw new HostUnreachableError(request.hostId, `${describe(request)} returned ${response.status}`);
  }
  if (response.status >= 400) {
    const detail = await response.text().catch(() => '');
    throw new HostRejectedError(
      request.hostId,
      `${describe(request)} returned ${response.status}${detail ? `: ${detail.slice(0, 200)}` : ''}`
    );
  }
  return response;
};

/** A 2xx body that is not JSON usually comes from a proxy in front of the panel. */
export const readJson = async (hostId: string, response: Response): Promise<unknown> => {
  const text = await response.text();
  try {
    return text === '' ? null : JSON.parse(text);
  } catch {
    throw new HostUnreachableError(hostId, `Panel returned a non-JSON body (status ${response.status})`);
  }
};
