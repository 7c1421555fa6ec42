/**
 * Error types for the CORTEX memory core.
 *
 * Store errors propagate to the caller; only the file metrics analyzer
 * degrades failures to empty results.
 *
 * @module cortex-memory/errors
 */

export type CortexErrorCode =
  | 'QUERY_SYNTAX'
  | 'NOT_INITIALIZED'
  | 'VALIDATION'
  | 'CONFIG';

/**
 * Base class for every error raised by this package
 */
export class CortexError extends Error {
  readonly code: CortexErrorCode;

  constructor(code: CortexErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'CortexError';
    this.code = code;
  }
}

/**
 * Malformed full-text query (unbalanced quotes, dangling operators, unknown column filters)
 */
export class QuerySyntaxError extends CortexError {
  readonly query: string;

  constructor(query: string, cause?: unknown) {
    const detail = cause instanceof Error ? `: ${cause.message}` : '';
    super('QUERY_SYNTAX', `Invalid full-text query "${query}"${detail}`, { cause });
    this.name = 'QuerySyntaxError';
    this.query = query;
  }
}

export class NotInitializedError extends CortexError {
  constructor(component: string) {
    super('NOT_INITIALIZED', `${component} is not initialized`);
    this.name = 'NotInitializedError';
  }
}

export class ValidationError extends CortexError {
  constructor(message: string) {
    super('VALIDATION', message);
    this.name = 'ValidationError';
  }
}

export class ConfigError extends CortexError {
  readonly source: string;

  constructor(source: string, message: string) {
    super('CONFIG', `${source}: ${message}`);
    this.name = 'ConfigError';
    this.source = source;
  }
}

/**
 * FTS5 reports query parse failures as generic SQLITE_ERRORs;
 * these message fragments identify them.
 */
const FTS_SYNTAX_MESSAGES = [
  'fts5: syntax error',
  'unterminated string',
  'no such column',
  'unknown special query',
];

export function isFtsSyntaxError(error: unknown): boolean {
  if (!(error instanceof Error)) return false;
  const message = error.message.toLowerCase();
  return FTS_SYNTAX_MESSAGES.some((fragment) => message.includes(fragment));
}
