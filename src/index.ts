/**
 * cortex-memory - Tiered memory core
 *
 * Three tiers in one SQLite database (.cortex/brain/cortex-brain.db):
 * - Tier 1: working-memory conversations with FIFO retention and idle boundaries
 * - Tier 2: knowledge-graph patterns with namespace-aware BM25 search
 * - Tier 3: development context (file hotspots, git activity)
 *
 * @module cortex-memory
 *
 * @example
 * ```typescript
 * import { createCortexMemory } from 'cortex-memory';
 *
 * const cortex = createCortexMemory(process.cwd());
 * await cortex.initialize();
 *
 * await cortex.patterns.insertOrUpdate({
 *   patternId: 'tdd-loop',
 *   title: 'Red green refactor',
 *   content: 'Write a failing test before the implementation',
 *   namespaces: ['workspace.myapp.patterns'],
 * });
 * const hits = await cortex.search.searchWithNamespacePriority('failing test', {
 *   currentNamespace: 'workspace.myapp.patterns',
 * });
 *
 * const sessionId = await cortex.sessions.startSession({ intent: 'fix login bug' });
 * await cortex.sessions.addMessage(sessionId, 'user', 'Login fails on refresh');
 *
 * await cortex.shutdown();
 * ```
 */

import { EventEmitter } from 'node:events';
import { ConfigOverrides, CortexConfig, createConfig, loadConfig, resolveDatabasePath } from './config.js';
import { BetterDatabase, openDatabase } from './database.js';
import { NotInitializedError } from './errors.js';
import type { ConversationStats, PatternStats } from './types.js';
import { SessionManager } from './tier1/session-manager.js';
import { NamespaceClassifier, NamespaceClassifierOptions } from './tier2/namespace-classifier.js';
import { NamespaceMigrator } from './tier2/namespace-migrator.js';
import { PatternSearchEngine } from './tier2/pattern-search.js';
import { PatternStore } from './tier2/pattern-store.js';
import { FileMetricsAnalyzer } from './tier3/file-metrics.js';
import type { GitService } from './tier3/git-service.js';

// Re-export public surface
export * from './types.js';
export * from './errors.js';
export {
  DEFAULT_CONFIG,
  SETTINGS_FILENAME,
  createConfig,
  loadConfig,
  parseSettings,
  resolveDatabasePath,
} from './config.js';
export type { Clock, ConfigOverrides, CortexConfig, CortexSettings } from './config.js';
export { openDatabase } from './database.js';
export type { BetterDatabase } from './database.js';
export { PatternStore, createPatternStore, normalizeNamespaces, normalizeTags } from './tier2/pattern-store.js';
export {
  PatternSearchEngine,
  createPatternSearchEngine,
  bm25ToRank,
  namespaceWeight,
  NAMESPACE_WEIGHTS,
} from './tier2/pattern-search.js';
export {
  NamespaceClassifier,
  createNamespaceClassifier,
  DEFAULT_RULES,
  DEFAULT_VOCABULARY,
  UNCATEGORIZED_NAMESPACE,
} from './tier2/namespace-classifier.js';
export type {
  ClassifiableRecord,
  ClassificationResult,
  ClassificationRule,
  NamespaceVocabulary,
} from './tier2/namespace-classifier.js';
export { NamespaceMigrator, createNamespaceMigrator } from './tier2/namespace-migrator.js';
export type { MigrationChange, MigrationReport } from './tier2/namespace-migrator.js';
export { SessionManager, createSessionManager } from './tier1/session-manager.js';
export { FileMetricsAnalyzer, createFileMetricsAnalyzer, classifyStability } from './tier3/file-metrics.js';
export { realGitService, fakeGitService, parseGitLog } from './tier3/git-service.js';
export type { GitCommit, GitFileChange, GitService } from './tier3/git-service.js';

export interface CortexMemoryOptions {
  /** Version-control boundary for Tier 3 */
  git?: GitService;

  classifier?: NamespaceClassifierOptions;
}

export interface CortexStats {
  patterns: PatternStats;
  conversations: ConversationStats;
  hotspots: number;
}

/**
 * Tiered memory facade
 *
 * Opens one database and shares it with every tier. Component events are
 * forwarded unchanged.
 */
export class CortexMemory extends EventEmitter {
  readonly config: CortexConfig;
  readonly patterns: PatternStore;
  readonly search: PatternSearchEngine;
  readonly classifier: NamespaceClassifier;
  readonly migrator: NamespaceMigrator;
  readonly sessions: SessionManager;
  readonly metrics: FileMetricsAnalyzer;

  private db: BetterDatabase | null;
  private initialized: boolean = false;

  constructor(config: CortexConfig | ConfigOverrides = {}, options: CortexMemoryOptions = {}) {
    super();
    this.config = createConfig(config);
    this.db = openDatabase(this.config);

    this.patterns = new PatternStore(this.config, this.db);
    this.classifier = new NamespaceClassifier(options.classifier);
    this.search = new PatternSearchEngine(this.patterns, this.config, this.classifier);
    this.migrator = new NamespaceMigrator(this.patterns, this.classifier, this.config);
    this.sessions = new SessionManager(this.config, this.db);
    this.metrics = new FileMetricsAnalyzer(this.config, { git: options.git, db: this.db });

    // Forward component events
    this.patterns.on('pattern:stored', (data) => this.emit('pattern:stored', data));
    this.patterns.on('pattern:deleted', (data) => this.emit('pattern:deleted', data));
    this.patterns.on('patterns:decayed', (data) => this.emit('patterns:decayed', data));
    this.sessions.on('session:started', (data) => this.emit('session:started', data));
    this.sessions.on('session:ended', (data) => this.emit('session:ended', data));
    this.sessions.on('session:boundary', (data) => this.emit('session:boundary', data));
    this.sessions.on('conversation:evicted', (data) => this.emit('conversation:evicted', data));
    this.metrics.on('hotspots:saved', (data) => this.emit('hotspots:saved', data));
    this.metrics.on('metrics:saved', (data) => this.emit('metrics:saved', data));
  }

  // ===== Lifecycle =====

  async initialize(): Promise<void> {
    if (this.initialized) return;
    if (!this.db) throw new NotInitializedError('CortexMemory');

    await this.patterns.initialize();
    await this.sessions.initialize();
    await this.metrics.initialize();

    this.initialized = true;
    this.emit('initialized', { dbPath: resolveDatabasePath(this.config) });
  }

  async shutdown(): Promise<void> {
    if (!this.db) return;

    await this.metrics.shutdown();
    await this.sessions.shutdown();
    await this.patterns.shutdown();

    this.db.close();
    this.db = null;
    this.initialized = false;
    this.emit('shutdown');
  }

  /**
   * Counts across all tiers
   */
  async getStats(): Promise<CortexStats> {
    return {
      patterns: await this.patterns.getStats(),
      conversations: await this.sessions.getStats(),
      hotspots: await this.metrics.countHotspots(),
    };
  }
}

/**
 * Create a memory core for a working directory, reading
 * <brainDir>/settings.json and CORTEX_* environment variables
 */
export function createCortexMemory(
  cwd: string = process.cwd(),
  overrides: ConfigOverrides = {},
  options: CortexMemoryOptions = {}
): CortexMemory {
  return new CortexMemory(loadConfig(cwd, overrides), options);
}

export default CortexMemory;
