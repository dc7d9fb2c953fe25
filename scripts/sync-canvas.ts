/**
 * Run a Canvas sync from the command line.
 *
 * Usage:
 *   npx tsx scripts/sync-canvas.ts <ownerId> [all|term|course] [targetId] [--full] [--incremental]
 */
import { config } from 'dotenv';

import { closeDb } from '@/lib/db';
import { createCanvasSyncService, type SyncRequest } from '@/lib/sync';

config({ path: '.env.local' });

function parseArgs(argv: string[]): { ownerId: string; request: SyncRequest } {
  const flags = new Set(argv.filter((arg) => arg.startsWith('--')));
  const [ownerId, scope = 'all', targetId] = argv.filter((arg) => !arg.startsWith('--'));

  if (!ownerId) {
    throw new Error('Usage: sync-canvas.ts <ownerId> [all|term|course] [targetId] [--full] [--incremental]');
  }

  switch (scope) {
    case 'all':
      return { ownerId, request: { scope: 'all', incremental: flags.has('--incremental') } };
    case 'term':
      if (!targetId) throw new Error('Term sync needs a term id');
      return { ownerId, request: { scope: 'term', termId: targetId, forceFull: flags.has('--full') } };
    case 'course':
      if (!targetId) throw new Error('Course sync needs a course id');
      return { ownerId, request: { scope: 'course', courseId: targetId } };
    default:
      throw new Error(`Unknown scope "${scope}" (expected all, term or course)`);
  }
}

async function main() {
  const { ownerId, request } = parseArgs(process.argv.slice(2));
  const service = createCanvasSyncService();

  const unsubscribe = service.subscribe(ownerId, (snapshot) => {
    const item = snapshot.currentItem ? ` - ${snapshot.currentItem}` : '';
    console.log(
      `[${String(snapshot.progressPercent).padStart(3)}%] ${snapshot.currentOperation}${item} (${snapshot.completedItems}/${snapshot.totalItems})`
    );
  });

  try {
    const result = await service.runSync(ownerId, request);
    console.log('\nSync complete:');
    console.log('  Courses:', result.coursesProcessed, `(${result.coursesCreated} new, ${result.coursesUpdated} updated)`);
    console.log('  Assignments:', result.assignmentsProcessed, `(${result.assignmentsCreated} new, ${result.assignmentsUpdated} updated)`);
    console.log('  Categories created:', result.categoriesCreated);
    if (result.errors.length > 0) {
      console.log(`  Errors (${result.errors.length}):`);
      for (const error of result.errors) {
        console.log('   -', error);
      }
    }
  } finally {
    unsubscribe();
    await closeDb();
  }
}

main().catch((e) => {
  console.error('Error:', e);
  process.exit(1);
});
