import { signOperatorToken } from '../../src/middleware/auth';
import { buildHarness } from './harness';

/**
 * Pipeline behind the HTTP tests. Each test file mocks `src/services` to
 * return these services, so requests and assertions see the same stores.
 */
export const apiHarness = buildHarness();

export const SERVICE_HEADERS = { 'x-service-token': 'test-service-token' };

export const bearer = (role: 'admin' | 'viewer', operatorId = 'op-1'): { Authorization: string } => ({
  Authorization: `Bearer ${signOperatorToken(operatorId, role)}`,
});
