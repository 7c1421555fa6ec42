/**
 * File hotspot CLI
 *
 * Usage:
 *   cortex-memory hotspots [options]
 *
 * Options:
 *   --repo=X          Repository to analyze (default: cwd)
 *   --days=N          Window size in days (default: 30 or settings.json)
 *   --save            Persist hotspots and daily git metrics
 *   --brain-dir=X     Brain directory (default: .cortex/brain or CORTEX_BRAIN_DIR)
 *
 * @module cortex-memory/cli/hotspots
 */

import * as path from 'node:path';
import { createCortexMemory, type GitService } from '../index.js';
import { intFlag, parseArgs, printError, stringFlag } from './args.js';

export interface HotspotsCommandOptions {
  cwd?: string;
  git?: GitService;
}

export async function runHotspots(args: readonly string[], options: HotspotsCommandOptions = {}): Promise<number> {
  const parsed = parseArgs(args);
  const cwd = options.cwd ?? process.cwd();

  try {
    const repoPath = path.resolve(cwd, stringFlag(parsed, 'repo') ?? '.');
    const cortex = createCortexMemory(cwd, { brainDir: stringFlag(parsed, 'brain-dir') }, { git: options.git });

    try {
      await cortex.initialize();
      const days = intFlag(parsed, 'days') ?? cortex.config.hotspotWindowDays;

      if (parsed.flags.save === true) {
        const saved = await cortex.metrics.updateAllMetrics(repoPath, days);
        const hotspots = await cortex.metrics.getHotspots();
        console.log(JSON.stringify({ success: true, repo: repoPath, days, saved, hotspots }, null, 2));
      } else {
        const hotspots = await cortex.metrics.analyzeHotspots(repoPath, days);
        console.log(JSON.stringify({ success: true, repo: repoPath, days, hotspots }, null, 2));
      }
    } finally {
      await cortex.shutdown();
    }
    return 0;
  } catch (error) {
    printError(error);
    return 1;
  }
}
