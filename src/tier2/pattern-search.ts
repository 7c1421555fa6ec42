/**
 * Pattern Search Engine
 *
 * Read-only queries over the Tier 2 store:
 * - FTS5 search ranked by BM25, with confidence/scope/namespace filters
 * - Namespace-priority re-ranking over an over-fetched candidate set
 * - Plain namespace listing ordered by confidence
 *
 * The query string is passed to FTS5 unchanged (AND/OR/NOT, "phrases",
 * prefix*). Malformed queries raise QuerySyntaxError.
 *
 * @module cortex-memory/tier2/pattern-search
 */

import { CortexConfig } from '../config.js';
import { QuerySyntaxError, ValidationError, isFtsSyntaxError } from '../errors.js';
import {
  CORE_NAMESPACE,
  NamespacePrioritySearchOptions,
  Pattern,
  PatternSearchOptions,
  PatternSearchResult,
  PrioritizedSearchResult,
} from '../types.js';
import { NamespaceClassifier } from './namespace-classifier.js';
import { PATTERN_COLUMNS, PatternRow, PatternStore, rowToPattern } from './pattern-store.js';

/**
 * Namespace weights for priority search. Higher weight, better position.
 */
export const NAMESPACE_WEIGHTS = {
  current: 2.0,
  core: 1.5,
  other: 0.5,
} as const;

/** Candidates fetched per requested result before re-ranking */
export const OVERFETCH_FACTOR = 3;

export const DEFAULT_SEARCH_LIMIT = 10;

/**
 * Map a raw bm25() score (negative, more negative = better) to a
 * non-negative cost in (0, 1] where lower is better
 */
export function bm25ToRank(bm25: number): number {
  return 1 / (1 + Math.max(0, -bm25));
}

/**
 * Weight of a pattern's namespaces relative to the caller's context.
 * A `currentWorkspace` prefix also counts every namespace beneath it.
 */
export function namespaceWeight(
  namespaces: readonly string[],
  currentNamespace: string | undefined,
  includeCortex: boolean,
  currentWorkspace?: string
): number {
  if (currentNamespace !== undefined && namespaces.includes(currentNamespace)) {
    return NAMESPACE_WEIGHTS.current;
  }
  if (
    currentWorkspace !== undefined &&
    namespaces.some((ns) => ns === currentWorkspace || ns.startsWith(`${currentWorkspace}.`))
  ) {
    return NAMESPACE_WEIGHTS.current;
  }
  if (includeCortex && namespaces.includes(CORE_NAMESPACE)) {
    return NAMESPACE_WEIGHTS.core;
  }
  return NAMESPACE_WEIGHTS.other;
}

interface RankedPatternRow extends PatternRow {
  bm25: number;
}

function validateLimit(limit: number): number {
  if (!Number.isInteger(limit) || limit < 1) {
    throw new ValidationError(`limit must be a positive integer, got ${limit}`);
  }
  return limit;
}

/**
 * Search engine over a PatternStore
 */
export class PatternSearchEngine {
  constructor(
    private readonly store: PatternStore,
    private readonly config: CortexConfig,
    private readonly classifier: NamespaceClassifier = new NamespaceClassifier()
  ) {}

  /**
   * Full-text search, best match first. Ties keep insertion order.
   */
  async search(query: string, options: PatternSearchOptions = {}): Promise<PatternSearchResult[]> {
    const limit = validateLimit(options.limit ?? DEFAULT_SEARCH_LIMIT);
    const minConfidence = options.minConfidence ?? this.config.defaultMinConfidence;

    if (!query.trim()) return [];
    if (options.namespaces && options.namespaces.length === 0) return [];

    const conditions = ['patterns_fts MATCH ?', 'p.confidence >= ?'];
    const params: (string | number)[] = [query, minConfidence];

    if (options.scope) {
      conditions.push('p.scope = ?');
      params.push(options.scope);
    }
    if (options.patternType) {
      conditions.push('p.pattern_type = ?');
      params.push(options.patternType);
    }
    if (options.namespaces) {
      const placeholders = options.namespaces.map(() => '?').join(', ');
      conditions.push(`EXISTS (
        SELECT 1 FROM pattern_namespaces pn
        WHERE pn.pattern_id = p.pattern_id AND pn.namespace IN (${placeholders})
      )`);
      params.push(...options.namespaces);
    }
    params.push(limit);

    const sql = `
      SELECT ${PATTERN_COLUMNS}, bm25(patterns_fts) AS bm25
      FROM patterns_fts
      JOIN patterns p ON p.id = patterns_fts.rowid
      WHERE ${conditions.join(' AND ')}
      ORDER BY bm25, p.id
      LIMIT ?
    `;

    let rows: RankedPatternRow[];
    try {
      rows = this.store.getDatabase().prepare<(string | number)[], RankedPatternRow>(sql).all(...params);
    } catch (error) {
      if (isFtsSyntaxError(error)) throw new QuerySyntaxError(query, error);
      throw error;
    }

    if (this.config.verbose) {
      console.log(`[PatternSearch] "${query}" matched ${rows.length} pattern(s)`);
    }

    return rows.map((row) => ({
      pattern: rowToPattern(row),
      rank: bm25ToRank(row.bm25),
    }));
  }

  /**
   * Search biased toward the caller's namespace. Over-fetches
   * `limit * OVERFETCH_FACTOR` candidates, divides each rank by its
   * namespace weight and keeps the `limit` lowest. Without a
   * `currentNamespace`, a `workspacePath` is classified into its
   * workspace namespace instead.
   */
  async searchWithNamespacePriority(
    query: string,
    options: NamespacePrioritySearchOptions = {}
  ): Promise<PrioritizedSearchResult[]> {
    const limit = validateLimit(options.limit ?? DEFAULT_SEARCH_LIMIT);
    const includeCortex = options.includeCortex ?? true;
    const currentWorkspace =
      options.currentNamespace === undefined && options.workspacePath !== undefined
        ? this.classifier.workspaceNamespace(options.workspacePath)
        : undefined;

    const candidates = await this.search(query, {
      minConfidence: options.minConfidence,
      limit: limit * OVERFETCH_FACTOR,
    });

    return candidates
      .map((candidate) => {
        const weight = namespaceWeight(
          candidate.pattern.namespaces,
          options.currentNamespace,
          includeCortex,
          currentWorkspace
        );
        return { ...candidate, weight, weightedRank: candidate.rank / weight };
      })
      .sort((a, b) => a.weightedRank - b.weightedRank)
      .slice(0, limit);
  }

  /**
   * Every pattern in a namespace, most confident and most recently used first
   */
  async getPatternsByNamespace(
    namespace: string,
    minConfidence: number = this.config.defaultMinConfidence,
    limit: number = 100
  ): Promise<Pattern[]> {
    validateLimit(limit);

    const rows = this.store
      .getDatabase()
      .prepare<[string, number, number], PatternRow>(`
        SELECT ${PATTERN_COLUMNS}
        FROM patterns p
        JOIN pattern_namespaces pn ON pn.pattern_id = p.pattern_id
        WHERE pn.namespace = ? AND p.confidence >= ?
        ORDER BY p.confidence DESC, p.last_accessed DESC, p.id
        LIMIT ?
      `)
      .all(namespace, minConfidence, limit);

    return rows.map(rowToPattern);
  }
}

/**
 * Create a search engine bound to a store
 */
export function createPatternSearchEngine(
  store: PatternStore,
  config: CortexConfig,
  classifier?: NamespaceClassifier
): PatternSearchEngine {
  return new PatternSearchEngine(store, config, classifier);
}
