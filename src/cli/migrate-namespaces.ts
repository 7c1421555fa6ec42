/**
 * Namespace migration CLI
 *
 * Usage:
 *   cortex-memory migrate-namespaces [options]
 *
 * Options:
 *   --dry-run         Report the changes without writing them
 *   --brain-dir=X     Brain directory (default: .cortex/brain or CORTEX_BRAIN_DIR)
 *
 * Prints the migration report as JSON.
 *
 * @module cortex-memory/cli/migrate-namespaces
 */

import { createCortexMemory } from '../index.js';
import { parseArgs, printError, stringFlag } from './args.js';

export async function runMigrateNamespaces(args: readonly string[], cwd: string = process.cwd()): Promise<number> {
  const parsed = parseArgs(args);
  const dryRun = parsed.flags['dry-run'] === true;

  try {
    const cortex = createCortexMemory(cwd, { brainDir: stringFlag(parsed, 'brain-dir') });
    try {
      await cortex.initialize();
      const report = await cortex.migrator.run({ dryRun });
      console.log(JSON.stringify({ success: true, ...report }, null, 2));
    } finally {
      await cortex.shutdown();
    }
    return 0;
  } catch (error) {
    printError(error);
    return 1;
  }
}
