/**
 * Session CLI
 *
 * Usage:
 *   cortex-memory session start [--intent=X]
 *   cortex-memory session end <conversation-id>
 *   cortex-memory session active
 *   cortex-memory session info <conversation-id>
 *   cortex-memory session list [--status=active|completed] [--limit=N]
 *
 * Every command accepts --brain-dir=X and prints JSON.
 *
 * @module cortex-memory/cli/session
 */

import { createCortexMemory, ValidationError, type CortexMemory } from '../index.js';
import { ParsedArgs, intFlag, parseArgs, printError, stringFlag } from './args.js';

function requireId(parsed: ParsedArgs, action: string): string {
  const id = parsed.positionals[1];
  if (!id) throw new ValidationError(`session ${action} requires a conversation id`);
  return id;
}

async function dispatch(cortex: CortexMemory, parsed: ParsedArgs): Promise<Record<string, unknown>> {
  const action = parsed.positionals[0] ?? 'active';
  const sessions = cortex.sessions;

  switch (action) {
    case 'start': {
      const conversationId = await sessions.startSession({ intent: stringFlag(parsed, 'intent') });
      return { conversationId };
    }
    case 'end': {
      const conversationId = requireId(parsed, 'end');
      await sessions.endSession(conversationId);
      return { conversationId, session: await sessions.getSessionInfo(conversationId) };
    }
    case 'active':
      return { conversationId: await sessions.getActiveSession() };
    case 'info': {
      const conversationId = requireId(parsed, 'info');
      return { session: await sessions.getSessionInfo(conversationId) };
    }
    case 'list': {
      const status = stringFlag(parsed, 'status');
      if (status !== undefined && status !== 'active' && status !== 'completed') {
        throw new ValidationError(`Unknown status: ${status}`);
      }
      return { sessions: await sessions.getAllSessions({ status, limit: intFlag(parsed, 'limit') }) };
    }
    default:
      throw new ValidationError(`Unknown session command: ${action}`);
  }
}

export async function runSession(args: readonly string[], cwd: string = process.cwd()): Promise<number> {
  const parsed = parseArgs(args);

  try {
    const cortex = createCortexMemory(cwd, { brainDir: stringFlag(parsed, 'brain-dir') });
    try {
      await cortex.initialize();
      const result = await dispatch(cortex, parsed);
      console.log(JSON.stringify({ success: true, ...result }));
    } finally {
      await cortex.shutdown();
    }
    return 0;
  } catch (error) {
    printError(error);
    return 1;
  }
}
