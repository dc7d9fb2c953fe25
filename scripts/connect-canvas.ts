/**
 * Store a Canvas access token for an owner after checking it against Canvas.
 *
 * Usage:
 *   CANVAS_ACCESS_TOKEN=... npx tsx scripts/connect-canvas.ts <ownerId> <canvasUrl> [timezone]
 */
import { config } from 'dotenv';

import { closeDb } from '@/lib/db';
import { createCanvasSyncService } from '@/lib/sync';

config({ path: '.env.local' });

async function main() {
  const [ownerId, baseUrl, timezone] = process.argv.slice(2);
  const accessToken = process.env.CANVAS_ACCESS_TOKEN;

  if (!ownerId || !baseUrl) {
    throw new Error('Usage: connect-canvas.ts <ownerId> <canvasUrl> [timezone]');
  }
  if (!accessToken) {
    throw new Error('CANVAS_ACCESS_TOKEN not set');
  }

  try {
    const identity = await createCanvasSyncService().connectAccount(ownerId, {
      baseUrl,
      accessToken,
      timezone,
    });
    console.log(`Connected ${ownerId} to ${baseUrl} as ${identity.name} (${identity.id})`);
  } finally {
    await closeDb();
  }
}

main().catch((e) => {
  console.error('Error:', e);
  process.exit(1);
});
