/**
 * PatternStore - Tier 2 knowledge graph persistence
 *
 * Stores learned patterns in SQLite with:
 * - FTS5 external-content index over (title, content), kept in sync by triggers
 * - Normalized namespace memberships (ordered, exact-match)
 * - Confidence reinforcement and age-based decay with an audit log
 * - Typed relationships between patterns
 * - Free-form tags with a tag cloud
 *
 * Patterns are never deleted by this core; `deletePattern` exists for
 * collaborators that own a cleanup policy.
 *
 * @module cortex-memory/tier2/pattern-store
 */

import { EventEmitter } from 'node:events';
import { CortexConfig } from '../config.js';
import { BetterDatabase, DatabaseHandle } from '../database.js';
import { NotInitializedError, ValidationError } from '../errors.js';
import {
  CORE_NAMESPACE,
  DAY_MS,
  DecayLogEntry,
  DecayResult,
  NamespaceCount,
  PATTERN_SCOPES,
  PATTERN_TYPES,
  Pattern,
  PatternInput,
  PatternRelationship,
  PatternScope,
  PatternStats,
  PatternType,
  RELATIONSHIP_TYPES,
  RelationshipType,
  TagCount,
  clampConfidence,
} from '../types.js';

/** Days without access before decay starts */
export const DECAY_THRESHOLD_DAYS = 60;

/** Confidence lost per day beyond the threshold */
export const DECAY_RATE_PER_DAY = 0.01;

/** Decay never pushes confidence below this */
export const DECAY_FLOOR = 0.3;

export const DEFAULT_REINFORCEMENT = 0.05;

// ===== Row mapping =====

/**
 * Raw row shape produced by PATTERN_COLUMNS
 */
export interface PatternRow {
  id: number;
  pattern_id: string;
  title: string;
  content: string;
  pattern_type: string;
  confidence: number;
  created_at: number;
  last_accessed: number;
  access_count: number;
  source: string | null;
  metadata: string | null;
  is_pinned: number;
  scope: string;
  namespaces: string | null;
  tags: string | null;
}

/**
 * Pattern columns plus the ordered namespace list, aliased `p`.
 * Callers append FROM/JOIN/WHERE clauses.
 */
export const PATTERN_COLUMNS = `
  p.id, p.pattern_id, p.title, p.content, p.pattern_type, p.confidence,
  p.created_at, p.last_accessed, p.access_count, p.source, p.metadata,
  p.is_pinned, p.scope,
  (SELECT json_group_array(namespace) FROM (
    SELECT namespace FROM pattern_namespaces
    WHERE pattern_id = p.pattern_id
    ORDER BY position
  )) AS namespaces,
  (SELECT json_group_array(tag) FROM (
    SELECT tag FROM pattern_tags
    WHERE pattern_id = p.pattern_id
    ORDER BY tag
  )) AS tags
`;

export function isPatternType(value: string): value is PatternType {
  return PATTERN_TYPES.some((type) => type === value);
}

export function isPatternScope(value: string): value is PatternScope {
  return PATTERN_SCOPES.some((scope) => scope === value);
}

export function isRelationshipType(value: string): value is RelationshipType {
  return RELATIONSHIP_TYPES.some((type) => type === value);
}

function parseMetadata(text: string | null): Record<string, unknown> {
  if (!text) return {};
  const parsed: unknown = JSON.parse(text);
  if (typeof parsed !== 'object' || parsed === null || Array.isArray(parsed)) return {};
  return Object.fromEntries(Object.entries(parsed));
}

function parseStringList(text: string | null): string[] {
  if (!text) return [];
  const parsed: unknown = JSON.parse(text);
  return Array.isArray(parsed)
    ? parsed.filter((value): value is string => typeof value === 'string')
    : [];
}

function parseNamespaces(text: string | null): string[] {
  const namespaces = parseStringList(text);
  return namespaces.length > 0 ? namespaces : [CORE_NAMESPACE];
}

/**
 * Convert a database row to a Pattern
 */
export function rowToPattern(row: PatternRow): Pattern {
  return {
    patternId: row.pattern_id,
    title: row.title,
    content: row.content,
    patternType: isPatternType(row.pattern_type) ? row.pattern_type : 'context',
    confidence: row.confidence,
    createdAt: row.created_at,
    lastAccessed: row.last_accessed,
    accessCount: row.access_count,
    source: row.source,
    metadata: parseMetadata(row.metadata),
    isPinned: row.is_pinned === 1,
    scope: isPatternScope(row.scope) ? row.scope : 'cortex',
    namespaces: parseNamespaces(row.namespaces),
    tags: parseStringList(row.tags),
  };
}

/**
 * Trim, drop empties and duplicates, keeping first-seen order
 */
export function normalizeNamespaces(namespaces: readonly string[] | undefined): string[] {
  const seen = new Set<string>();
  for (const raw of namespaces ?? []) {
    const namespace = raw.trim();
    if (namespace) seen.add(namespace);
  }
  return seen.size > 0 ? [...seen] : [CORE_NAMESPACE];
}

/**
 * Trim and lowercase tags, dropping empties and duplicates
 */
export function normalizeTags(tags: readonly string[]): string[] {
  const seen = new Set<string>();
  for (const raw of tags) {
    const tag = raw.trim().toLowerCase();
    if (tag) seen.add(tag);
  }
  return [...seen];
}

interface RelationshipRow {
  from_pattern: string;
  to_pattern: string;
  relationship_type: string;
  strength: number;
  created_at: number;
}

interface DecayLogRow {
  pattern_id: string;
  old_confidence: number;
  new_confidence: number;
  decayed_at: number;
  reason: string;
}

// ===== Store =====

/**
 * Tier 2 pattern store
 *
 * Emits `initialized`, `shutdown`, `pattern:stored`, `pattern:deleted`
 * and `patterns:decayed`.
 */
export class PatternStore extends EventEmitter {
  private readonly config: CortexConfig;
  private readonly handle: DatabaseHandle;
  private db: BetterDatabase | null = null;
  private closed = false;

  constructor(config: CortexConfig, db?: BetterDatabase) {
    super();
    this.config = config;
    this.handle = new DatabaseHandle(config, db);
  }

  /**
   * Open the database and create the Tier 2 schema
   */
  async initialize(): Promise<void> {
    this.open();
  }

  async shutdown(): Promise<void> {
    if (this.closed) return;
    this.closed = true;
    this.handle.release();
    this.db = null;
    this.emit('shutdown');
  }

  /**
   * Underlying database, for components that query Tier 2 tables directly
   */
  getDatabase(): BetterDatabase {
    return this.open();
  }

  private open(): BetterDatabase {
    if (this.db) return this.db;
    if (this.closed) throw new NotInitializedError('PatternStore');

    const db = this.handle.acquire();
    this.createSchema(db);
    this.createFtsTable(db);
    this.db = db;

    if (this.config.verbose) {
      console.log('[PatternStore] Initialized');
    }
    this.emit('initialized');
    return db;
  }

  /**
   * Create the Tier 2 tables
   */
  private createSchema(db: BetterDatabase): void {
    db.exec(`
      CREATE TABLE IF NOT EXISTS patterns (
        id INTEGER PRIMARY KEY AUTOINCREMENT,
        pattern_id TEXT NOT NULL UNIQUE,
        title TEXT NOT NULL,
        content TEXT NOT NULL,
        pattern_type TEXT NOT NULL DEFAULT 'context'
          CHECK (pattern_type IN ('workflow', 'principle', 'anti_pattern', 'solution', 'context')),
        confidence REAL NOT NULL DEFAULT 1.0
          CHECK (confidence >= 0.0 AND confidence <= 1.0),
        created_at INTEGER NOT NULL,
        last_accessed INTEGER NOT NULL,
        access_count INTEGER NOT NULL DEFAULT 0,
        source TEXT,
        metadata TEXT NOT NULL DEFAULT '{}',
        is_pinned INTEGER NOT NULL DEFAULT 0,
        scope TEXT NOT NULL DEFAULT 'cortex'
          CHECK (scope IN ('cortex', 'application'))
      );

      CREATE TABLE IF NOT EXISTS pattern_namespaces (
        pattern_id TEXT NOT NULL REFERENCES patterns(pattern_id) ON DELETE CASCADE,
        namespace TEXT NOT NULL,
        position INTEGER NOT NULL,
        PRIMARY KEY (pattern_id, namespace)
      );

      CREATE TABLE IF NOT EXISTS pattern_tags (
        pattern_id TEXT NOT NULL REFERENCES patterns(pattern_id) ON DELETE CASCADE,
        tag TEXT NOT NULL,
        PRIMARY KEY (pattern_id, tag)
      );

      CREATE TABLE IF NOT EXISTS pattern_relationships (
        from_pattern TEXT NOT NULL REFERENCES patterns(pattern_id) ON DELETE CASCADE,
        to_pattern TEXT NOT NULL REFERENCES patterns(pattern_id) ON DELETE CASCADE,
        relationship_type TEXT NOT NULL
          CHECK (relationship_type IN ('extends', 'relates_to', 'contradicts', 'supersedes')),
        strength REAL NOT NULL DEFAULT 1.0,
        created_at INTEGER NOT NULL,
        PRIMARY KEY (from_pattern, to_pattern, relationship_type)
      );

      CREATE TABLE IF NOT EXISTS confidence_decay_log (
        id INTEGER PRIMARY KEY AUTOINCREMENT,
        pattern_id TEXT NOT NULL,
        old_confidence REAL NOT NULL,
        new_confidence REAL NOT NULL,
        decayed_at INTEGER NOT NULL,
        reason TEXT NOT NULL
      );
    `);

    db.exec(`
      CREATE INDEX IF NOT EXISTS idx_patterns_scope ON patterns(scope);
      CREATE INDEX IF NOT EXISTS idx_patterns_confidence ON patterns(confidence);
      CREATE INDEX IF NOT EXISTS idx_pattern_namespaces_ns ON pattern_namespaces(namespace);
      CREATE INDEX IF NOT EXISTS idx_pattern_tags_tag ON pattern_tags(tag);
      CREATE INDEX IF NOT EXISTS idx_relationships_to ON pattern_relationships(to_pattern);
      CREATE INDEX IF NOT EXISTS idx_decay_log_pattern ON confidence_decay_log(pattern_id);
    `);
  }

  /**
   * FTS5 index over title and content, synced by triggers
   */
  private createFtsTable(db: BetterDatabase): void {
    db.exec(`
      CREATE VIRTUAL TABLE IF NOT EXISTS patterns_fts USING fts5(
        title,
        content,
        content=patterns,
        content_rowid=id,
        tokenize='porter unicode61'
      )
    `);

    db.exec(`
      CREATE TRIGGER IF NOT EXISTS patterns_fts_insert AFTER INSERT ON patterns BEGIN
        INSERT INTO patterns_fts(rowid, title, content)
        VALUES (NEW.id, NEW.title, NEW.content);
      END
    `);

    db.exec(`
      CREATE TRIGGER IF NOT EXISTS patterns_fts_delete AFTER DELETE ON patterns BEGIN
        INSERT INTO patterns_fts(patterns_fts, rowid, title, content)
        VALUES ('delete', OLD.id, OLD.title, OLD.content);
      END
    `);

    db.exec(`
      CREATE TRIGGER IF NOT EXISTS patterns_fts_update AFTER UPDATE OF title, content ON patterns BEGIN
        INSERT INTO patterns_fts(patterns_fts, rowid, title, content)
        VALUES ('delete', OLD.id, OLD.title, OLD.content);
        INSERT INTO patterns_fts(rowid, title, content)
        VALUES (NEW.id, NEW.title, NEW.content);
      END
    `);
  }

  // ===== Write path =====

  /**
   * Create a pattern, or update an existing one. Title and content are
   * always written; every other field the input leaves out keeps its
   * stored value on update and its default on create. The row, its
   * namespaces, tags and the FTS index change in one transaction.
   */
  async insertOrUpdate(input: PatternInput): Promise<Pattern> {
    const db = this.open();

    const patternId = input.patternId.trim();
    if (!patternId) throw new ValidationError('patternId must not be empty');
    if (!input.title.trim()) throw new ValidationError('title must not be empty');

    if (input.patternType !== undefined && !isPatternType(input.patternType)) {
      throw new ValidationError(`Unknown pattern type: ${input.patternType}`);
    }
    if (input.scope !== undefined && !isPatternScope(input.scope)) {
      throw new ValidationError(`Unknown scope: ${input.scope}`);
    }

    const now = this.config.clock();

    const upsert = db.prepare(`
      INSERT INTO patterns
        (pattern_id, title, content, pattern_type, confidence, created_at,
         last_accessed, access_count, source, metadata, is_pinned, scope)
      VALUES
        (@patternId, @title, @content, @patternType, @confidence, @now,
         @now, 0, @source, @metadata, @isPinned, @scope)
      ON CONFLICT(pattern_id) DO UPDATE SET
        title = excluded.title,
        content = excluded.content,
        pattern_type = CASE WHEN @hasPatternType THEN excluded.pattern_type ELSE pattern_type END,
        confidence = CASE WHEN @hasConfidence THEN excluded.confidence ELSE confidence END,
        source = CASE WHEN @hasSource THEN excluded.source ELSE source END,
        metadata = CASE WHEN @hasMetadata THEN excluded.metadata ELSE metadata END,
        is_pinned = CASE WHEN @hasIsPinned THEN excluded.is_pinned ELSE is_pinned END,
        scope = CASE WHEN @hasScope THEN excluded.scope ELSE scope END
    `);
    const exists = db.prepare<[string], { one: number }>('SELECT 1 AS one FROM patterns WHERE pattern_id = ?');
    const clearNamespaces = db.prepare('DELETE FROM pattern_namespaces WHERE pattern_id = ?');
    const addNamespace = db.prepare(
      'INSERT INTO pattern_namespaces (pattern_id, namespace, position) VALUES (?, ?, ?)'
    );
    const clearTags = db.prepare('DELETE FROM pattern_tags WHERE pattern_id = ?');
    const addTag = db.prepare('INSERT INTO pattern_tags (pattern_id, tag) VALUES (?, ?)');

    db.transaction(() => {
      const created = !exists.get(patternId);

      upsert.run({
        patternId,
        title: input.title,
        content: input.content,
        patternType: input.patternType ?? 'context',
        confidence: clampConfidence(input.confidence ?? 1.0),
        now,
        source: input.source ?? null,
        metadata: JSON.stringify(input.metadata ?? {}),
        isPinned: input.isPinned ? 1 : 0,
        scope: input.scope ?? 'cortex',
        hasPatternType: input.patternType !== undefined ? 1 : 0,
        hasConfidence: input.confidence !== undefined ? 1 : 0,
        hasSource: input.source !== undefined ? 1 : 0,
        hasMetadata: input.metadata !== undefined ? 1 : 0,
        hasIsPinned: input.isPinned !== undefined ? 1 : 0,
        hasScope: input.scope !== undefined ? 1 : 0,
      });

      if (created || input.namespaces !== undefined) {
        clearNamespaces.run(patternId);
        normalizeNamespaces(input.namespaces).forEach((namespace, position) => {
          addNamespace.run(patternId, namespace, position);
        });
      }
      if (input.tags !== undefined) {
        clearTags.run(patternId);
        for (const tag of normalizeTags(input.tags)) addTag.run(patternId, tag);
      }
    })();

    const pattern = this.findPattern(db, patternId);
    if (!pattern) throw new Error(`Pattern ${patternId} vanished after write`);

    this.emit('pattern:stored', { pattern });
    return pattern;
  }

  /**
   * Replace a pattern's namespace list and scope
   */
  async setNamespaces(patternId: string, namespaces: string[], scope?: PatternScope): Promise<boolean> {
    const db = this.open();
    const normalized = normalizeNamespaces(namespaces);

    const exists = db.prepare<[string], { one: number }>('SELECT 1 AS one FROM patterns WHERE pattern_id = ?');
    const clearNamespaces = db.prepare('DELETE FROM pattern_namespaces WHERE pattern_id = ?');
    const addNamespace = db.prepare(
      'INSERT INTO pattern_namespaces (pattern_id, namespace, position) VALUES (?, ?, ?)'
    );
    const updateScope = db.prepare('UPDATE patterns SET scope = ? WHERE pattern_id = ?');

    return db.transaction(() => {
      if (!exists.get(patternId)) return false;
      clearNamespaces.run(patternId);
      normalized.forEach((namespace, position) => {
        addNamespace.run(patternId, namespace, position);
      });
      if (scope) updateScope.run(scope, patternId);
      return true;
    })();
  }

  /**
   * Remove a pattern with its memberships, relationships and index entry
   */
  async deletePattern(patternId: string): Promise<boolean> {
    const db = this.open();
    const result = db.prepare('DELETE FROM patterns WHERE pattern_id = ?').run(patternId);
    const deleted = result.changes > 0;
    if (deleted) this.emit('pattern:deleted', { patternId });
    return deleted;
  }

  // ===== Read path =====

  /**
   * Fetch a pattern and record the access
   */
  async getPattern(patternId: string): Promise<Pattern | null> {
    const db = this.open();
    const now = this.config.clock();

    db.prepare(`
      UPDATE patterns
      SET access_count = access_count + 1, last_accessed = ?
      WHERE pattern_id = ?
    `).run(now, patternId);

    return this.findPattern(db, patternId);
  }

  /**
   * Fetch a pattern without touching its access stats
   */
  async peekPattern(patternId: string): Promise<Pattern | null> {
    return this.findPattern(this.open(), patternId);
  }

  /**
   * Every pattern, oldest first
   */
  async listPatterns(): Promise<Pattern[]> {
    const rows = this.open()
      .prepare<[], PatternRow>(`SELECT ${PATTERN_COLUMNS} FROM patterns p ORDER BY p.id`)
      .all();
    return rows.map(rowToPattern);
  }

  /**
   * Patterns of one type, by confidence then recent use
   */
  async getPatternsByType(patternType: PatternType): Promise<Pattern[]> {
    if (!isPatternType(patternType)) {
      throw new ValidationError(`Unknown pattern type: ${patternType}`);
    }
    const rows = this.open()
      .prepare<[string], PatternRow>(`
        SELECT ${PATTERN_COLUMNS}
        FROM patterns p
        WHERE p.pattern_type = ?
        ORDER BY p.confidence DESC, p.last_accessed DESC, p.id
      `)
      .all(patternType);
    return rows.map(rowToPattern);
  }

  private findPattern(db: BetterDatabase, patternId: string): Pattern | null {
    const row = db
      .prepare<[string], PatternRow>(`SELECT ${PATTERN_COLUMNS} FROM patterns p WHERE p.pattern_id = ?`)
      .get(patternId);
    return row ? rowToPattern(row) : null;
  }

  // ===== Confidence =====

  /**
   * Raise confidence (capped at 1.0) and record a use
   */
  async reinforce(patternId: string, amount: number = DEFAULT_REINFORCEMENT): Promise<Pattern | null> {
    const db = this.open();
    const result = db.prepare(`
      UPDATE patterns
      SET confidence = MIN(1.0, MAX(0.0, confidence + ?)),
          access_count = access_count + 1,
          last_accessed = ?
      WHERE pattern_id = ?
    `).run(amount, this.config.clock(), patternId);

    return result.changes > 0 ? this.findPattern(db, patternId) : null;
  }

  async pinPattern(patternId: string): Promise<boolean> {
    return this.setPinned(patternId, true);
  }

  async unpinPattern(patternId: string): Promise<boolean> {
    return this.setPinned(patternId, false);
  }

  private setPinned(patternId: string, pinned: boolean): boolean {
    const result = this.open()
      .prepare('UPDATE patterns SET is_pinned = ? WHERE pattern_id = ?')
      .run(pinned ? 1 : 0, patternId);
    return result.changes > 0;
  }

  /**
   * Lower the confidence of unpinned patterns idle for more than
   * DECAY_THRESHOLD_DAYS, by DECAY_RATE_PER_DAY for each further day,
   * stopping at DECAY_FLOOR. Every change is logged.
   */
  async applyConfidenceDecay(): Promise<DecayResult> {
    const db = this.open();
    const now = this.config.clock();
    const cutoff = now - DECAY_THRESHOLD_DAYS * DAY_MS;

    const stale = db.prepare<[number], { pattern_id: string; confidence: number; last_accessed: number; is_pinned: number }>(`
      SELECT pattern_id, confidence, last_accessed, is_pinned
      FROM patterns
      WHERE last_accessed < ?
      ORDER BY id
    `);
    const update = db.prepare('UPDATE patterns SET confidence = ? WHERE pattern_id = ?');
    const log = db.prepare(`
      INSERT INTO confidence_decay_log (pattern_id, old_confidence, new_confidence, decayed_at, reason)
      VALUES (?, ?, ?, ?, ?)
    `);

    const result = db.transaction((): DecayResult => {
      let decayed = 0;
      let skippedPinned = 0;

      for (const row of stale.all(cutoff)) {
        if (row.is_pinned === 1) {
          skippedPinned++;
          continue;
        }
        if (row.confidence <= DECAY_FLOOR) continue;

        const idleDays = Math.floor((now - row.last_accessed) / DAY_MS);
        const daysToDecay = idleDays - DECAY_THRESHOLD_DAYS;
        if (daysToDecay <= 0) continue;

        const newConfidence = Math.max(DECAY_FLOOR, row.confidence - DECAY_RATE_PER_DAY * daysToDecay);
        update.run(newConfidence, row.pattern_id);
        log.run(
          row.pattern_id,
          row.confidence,
          newConfidence,
          now,
          `Decayed: ${daysToDecay} days beyond ${DECAY_THRESHOLD_DAYS}-day threshold`
        );
        decayed++;
      }

      return { decayed, skippedPinned };
    })();

    if (this.config.verbose) {
      console.log(`[PatternStore] Decay applied: ${result.decayed} decayed, ${result.skippedPinned} pinned skipped`);
    }
    this.emit('patterns:decayed', result);
    return result;
  }

  /**
   * Decay history, newest first
   */
  async getDecayLog(patternId?: string, limit: number = 100): Promise<DecayLogEntry[]> {
    const db = this.open();
    const rows = patternId
      ? db.prepare<[string, number], DecayLogRow>(`
          SELECT pattern_id, old_confidence, new_confidence, decayed_at, reason
          FROM confidence_decay_log
          WHERE pattern_id = ?
          ORDER BY decayed_at DESC, id DESC
          LIMIT ?
        `).all(patternId, limit)
      : db.prepare<[number], DecayLogRow>(`
          SELECT pattern_id, old_confidence, new_confidence, decayed_at, reason
          FROM confidence_decay_log
          ORDER BY decayed_at DESC, id DESC
          LIMIT ?
        `).all(limit);

    return rows.map((row) => ({
      patternId: row.pattern_id,
      oldConfidence: row.old_confidence,
      newConfidence: row.new_confidence,
      decayedAt: row.decayed_at,
      reason: row.reason,
    }));
  }

  // ===== Relationships =====

  /**
   * Link two patterns. Returns false when the link already exists.
   */
  async linkPatterns(
    fromPattern: string,
    toPattern: string,
    relationshipType: RelationshipType,
    strength: number = 1.0
  ): Promise<boolean> {
    if (!isRelationshipType(relationshipType)) {
      throw new ValidationError(`Unknown relationship type: ${relationshipType}`);
    }
    if (fromPattern === toPattern) {
      throw new ValidationError('A pattern cannot be linked to itself');
    }

    const db = this.open();
    for (const id of [fromPattern, toPattern]) {
      if (!this.findPattern(db, id)) throw new ValidationError(`Unknown pattern: ${id}`);
    }

    const result = db.prepare(`
      INSERT OR IGNORE INTO pattern_relationships
        (from_pattern, to_pattern, relationship_type, strength, created_at)
      VALUES (?, ?, ?, ?, ?)
    `).run(fromPattern, toPattern, relationshipType, clampConfidence(strength), this.config.clock());

    return result.changes > 0;
  }

  /**
   * Outgoing edges of a pattern
   */
  async getRelationships(patternId: string): Promise<PatternRelationship[]> {
    const rows = this.open()
      .prepare<[string], RelationshipRow>(`
        SELECT from_pattern, to_pattern, relationship_type, strength, created_at
        FROM pattern_relationships
        WHERE from_pattern = ?
        ORDER BY created_at, to_pattern
      `)
      .all(patternId);

    return rows.flatMap((row) =>
      isRelationshipType(row.relationship_type)
        ? [{
            fromPattern: row.from_pattern,
            toPattern: row.to_pattern,
            relationshipType: row.relationship_type,
            strength: row.strength,
            createdAt: row.created_at,
          }]
        : []
    );
  }

  /**
   * Breadth-first walk along outgoing edges, in discovery order
   */
  async getRelatedPatterns(
    patternId: string,
    maxDepth: number = 1,
    minStrength: number = 0.5
  ): Promise<Pattern[]> {
    const db = this.open();
    const neighbours = db.prepare<[string, number], { to_pattern: string }>(`
      SELECT to_pattern FROM pattern_relationships
      WHERE from_pattern = ? AND strength >= ?
      ORDER BY strength DESC, to_pattern
    `);

    const visited = new Set<string>([patternId]);
    const related: string[] = [];
    let frontier = [patternId];

    for (let depth = 0; depth < maxDepth && frontier.length > 0; depth++) {
      const next: string[] = [];
      for (const current of frontier) {
        for (const { to_pattern } of neighbours.all(current, minStrength)) {
          if (visited.has(to_pattern)) continue;
          visited.add(to_pattern);
          related.push(to_pattern);
          next.push(to_pattern);
        }
      }
      frontier = next;
    }

    const patterns: Pattern[] = [];
    for (const id of related) {
      const pattern = this.findPattern(db, id);
      if (pattern) patterns.push(pattern);
    }
    return patterns;
  }

  // ===== Tags =====

  /**
   * Tags of a pattern, alphabetical
   */
  async getPatternTags(patternId: string): Promise<string[]> {
    return this.open()
      .prepare<[string], { tag: string }>('SELECT tag FROM pattern_tags WHERE pattern_id = ? ORDER BY tag')
      .all(patternId)
      .map((row) => row.tag);
  }

  /**
   * Patterns carrying a tag, by confidence then recent use
   */
  async findPatternsByTag(tag: string): Promise<Pattern[]> {
    const [normalized] = normalizeTags([tag]);
    if (!normalized) return [];

    const rows = this.open()
      .prepare<[string], PatternRow>(`
        SELECT ${PATTERN_COLUMNS}
        FROM patterns p
        JOIN pattern_tags t ON t.pattern_id = p.pattern_id
        WHERE t.tag = ?
        ORDER BY p.confidence DESC, p.last_accessed DESC, p.id
      `)
      .all(normalized);
    return rows.map(rowToPattern);
  }

  /**
   * Tag frequencies, most used first
   */
  async getTagCloud(limit: number = 50): Promise<TagCount[]> {
    return this.open()
      .prepare<[number], TagCount>(`
        SELECT tag, COUNT(*) AS count
        FROM pattern_tags
        GROUP BY tag
        ORDER BY count DESC, tag
        LIMIT ?
      `)
      .all(limit);
  }

  // ===== Namespaces & stats =====

  /**
   * Every namespace with its pattern count, alphabetical
   */
  async listNamespaces(): Promise<NamespaceCount[]> {
    return this.open()
      .prepare<[], NamespaceCount>(`
        SELECT namespace, COUNT(*) AS count
        FROM pattern_namespaces
        GROUP BY namespace
        ORDER BY namespace
      `)
      .all();
  }

  async count(): Promise<number> {
    const row = this.open().prepare<[], { count: number }>('SELECT COUNT(*) AS count FROM patterns').get();
    return row?.count ?? 0;
  }

  async getStats(): Promise<PatternStats> {
    const db = this.open();

    const totals = db
      .prepare<[], { total: number; pinned: number | null }>(
        'SELECT COUNT(*) AS total, SUM(is_pinned) AS pinned FROM patterns'
      )
      .get();

    const byScope: Record<PatternScope, number> = { cortex: 0, application: 0 };
    for (const row of db
      .prepare<[], { scope: string; count: number }>('SELECT scope, COUNT(*) AS count FROM patterns GROUP BY scope')
      .all()) {
      if (isPatternScope(row.scope)) byScope[row.scope] = row.count;
    }

    const byType: Record<PatternType, number> = {
      workflow: 0,
      principle: 0,
      anti_pattern: 0,
      solution: 0,
      context: 0,
    };
    for (const row of db
      .prepare<[], { pattern_type: string; count: number }>(
        'SELECT pattern_type, COUNT(*) AS count FROM patterns GROUP BY pattern_type'
      )
      .all()) {
      if (isPatternType(row.pattern_type)) byType[row.pattern_type] = row.count;
    }

    const namespaces = db
      .prepare<[], { count: number }>('SELECT COUNT(DISTINCT namespace) AS count FROM pattern_namespaces')
      .get();

    return {
      total: totals?.total ?? 0,
      pinned: totals?.pinned ?? 0,
      byScope,
      byType,
      namespaces: namespaces?.count ?? 0,
    };
  }

  /**
   * Rebuild the FTS index from the patterns table
   */
  async rebuildFtsIndex(): Promise<void> {
    this.open().exec("INSERT INTO patterns_fts(patterns_fts) VALUES('rebuild')");

    if (this.config.verbose) {
      console.log('[PatternStore] FTS index rebuilt');
    }
  }
}

/**
 * Create a pattern store
 */
export function createPatternStore(config: CortexConfig, db?: BetterDatabase): PatternStore {
  return new PatternStore(config, db);
}
