/**
 * Re-drives payment events still in `received`, e.g. after an outage.
 *
 * Usage:
 *   npm run replay-events -- [limit]
 */

import { connectDatabase, disconnectDatabase } from '../config/database';
import { connectRedis, disconnectRedis } from '../config/redis';
import { mongoRepositories } from '../repositories';
import { getServices } from '../services';
import { errorMessage } from '../utils/errors';

async function replay(limit: number): Promise<void> {
  await connectDatabase();
  await connectRedis();
  console.log('✅ Connected');

  const events = await mongoRepositories.paymentEvents.findUnprocessed(new Date(), limit);
  console.log(`Found ${events.length} unprocessed event(s)`);

  const { ingress } = getServices();
  for (const event of events) {
    const result = await ingress.redrive(event);
    console.log(`  ${event.provider}:${event.providerTxId} → ${result.outcome} (${result.httpStatus})`);
  }

  await disconnectRedis();
  await disconnectDatabase();
}

const limit = parseInt(process.argv[2] || '100', 10);

replay(Number.isFinite(limit) && limit > 0 ? limit : 100).catch((error: unknown) => {
  console.error('❌ Error:', errorMessage(error));
  process.exit(1);
});
