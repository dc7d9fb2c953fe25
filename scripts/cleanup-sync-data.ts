/**
 * Delete completed sync progress records and expired checkpoints.
 *
 * Usage:
 *   npx tsx scripts/cleanup-sync-data.ts [days]
 */
import { config } from 'dotenv';

import { closeDb } from '@/lib/db';
import { createCanvasSyncService, DEFAULT_RETENTION_DAYS } from '@/lib/sync';

config({ path: '.env.local' });

async function main() {
  const days = process.argv[2] ? Number(process.argv[2]) : DEFAULT_RETENTION_DAYS;
  if (!Number.isInteger(days) || days < 0) {
    throw new Error(`Invalid retention in days: ${process.argv[2]}`);
  }

  try {
    const { deletedRecords, deletedCheckpoints, cutoff } =
      await createCanvasSyncService().cleanupOldSyncData(days);
    console.log(`Removed ${deletedRecords} progress records created before ${cutoff.toISOString()}`);
    console.log(`Removed ${deletedCheckpoints} expired checkpoints`);
  } finally {
    await closeDb();
  }
}

main().catch((e) => {
  console.error('Error:', e);
  process.exit(1);
});
