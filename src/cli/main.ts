#!/usr/bin/env node
/**
 * cortex-memory CLI router
 *
 * Routes subcommands to the appropriate handler module.
 *
 * Subcommands:
 *   migrate-namespaces   Classify patterns into cortex.* / workspace.* namespaces
 *   hotspots             Analyze file churn in a git repository
 *   session              Start, end and inspect working-memory sessions
 *
 * Examples:
 *   cortex-memory migrate-namespaces --dry-run
 *   cortex-memory hotspots --repo=. --days=14 --save
 *   cortex-memory session start --intent="fix login"
 *   cortex-memory session active
 *
 * @module cortex-memory/cli/main
 */

const subcommand = process.argv.at(2);
const restArgs = process.argv.slice(3);

const USAGE = `
cortex-memory: tiered memory for AI coding assistants

Usage: cortex-memory <command> [options]

Commands:
  migrate-namespaces   Classify patterns into namespaces [--dry-run] [--brain-dir=X]
  hotspots             File churn report [--repo=X] [--days=N] [--save]
  session              start|end|active|info|list

Environment:
  CORTEX_BRAIN_DIR     Brain directory (default: .cortex/brain)
  CORTEX_VERBOSE       1 or true for diagnostic logging
`;

switch (subcommand) {
  case 'migrate-namespaces': {
    const { runMigrateNamespaces } = await import('./migrate-namespaces.js');
    process.exitCode = await runMigrateNamespaces(restArgs);
    break;
  }

  case 'hotspots': {
    const { runHotspots } = await import('./hotspots.js');
    process.exitCode = await runHotspots(restArgs);
    break;
  }

  case 'session': {
    const { runSession } = await import('./session.js');
    process.exitCode = await runSession(restArgs);
    break;
  }

  case undefined:
  case 'help':
  case '--help':
  case '-h':
    console.log(USAGE);
    break;

  default:
    console.error(`Unknown command: ${subcommand}`);
    console.error('Run "cortex-memory help" for usage.');
    process.exitCode = 1;
}
