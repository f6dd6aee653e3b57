/**
 * Mints an operator JWT for the admin API.
 *
 * Usage:
 *   npm run operator-token -- <operatorId> [admin|viewer]
 */

import { USER_ROLES, type UserRole } from '../config/constants';
import { config } from '../config/env';
import { signOperatorToken } from '../middleware/auth';

const roles: readonly UserRole[] = Object.values(USER_ROLES);

const operatorId = process.argv[2];
const role = roles.find(candidate => candidate === (process.argv[3] ?? USER_ROLES.ADMIN));

if (!operatorId || !role) {
  console.log(`Usage: npm run operator-token -- <operatorId> [${roles.join('|')}]`);
  process.exit(1);
}

console.log(`🔑 Token for ${operatorId} (${role}), valid ${Math.round(config.jwt.expiresIn / 3600)}h:`);
console.log('');
console.log(signOperatorToken(operatorId, role));
