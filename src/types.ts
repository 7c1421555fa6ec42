/**
 * Tiered Memory Types
 *
 * Type definitions for the CORTEX memory core:
 * - Tier 1: working-memory conversations and messages
 * - Tier 2: knowledge-graph patterns and namespaces
 * - Tier 3: development-context metrics (file hotspots, git activity)
 *
 * @module cortex-memory/types
 */

import { randomUUID } from 'node:crypto';

// ===== Tier 2: Patterns =====

/**
 * Pattern category tag
 */
export type PatternType =
  | 'workflow'      // Recurring successful workflows
  | 'principle'     // Core principles
  | 'anti_pattern'  // What to avoid
  | 'solution'      // Proven solutions to problems
  | 'context';      // Contextual knowledge

export const PATTERN_TYPES: readonly PatternType[] = [
  'workflow',
  'principle',
  'anti_pattern',
  'solution',
  'context',
];

/**
 * Boundary between framework knowledge and application knowledge
 */
export type PatternScope = 'cortex' | 'application';

export const PATTERN_SCOPES: readonly PatternScope[] = ['cortex', 'application'];

/** Namespace given to patterns stored without one */
export const CORE_NAMESPACE = 'CORTEX-core';

/**
 * Learned pattern stored in the knowledge graph
 */
export interface Pattern {
  /** Unique identifier */
  patternId: string;

  title: string;

  /** Free-text body, indexed together with the title */
  content: string;

  patternType: PatternType;

  /** Confidence score, always within [0, 1] */
  confidence: number;

  createdAt: number;

  lastAccessed: number;

  /** Incremented on every direct read */
  accessCount: number;

  /** Provenance (conversation id, file, import script) */
  source: string | null;

  metadata: Record<string, unknown>;

  /** Pinned patterns are exempt from confidence decay */
  isPinned: boolean;

  scope: PatternScope;

  /** Ordered memberships; never empty */
  namespaces: string[];

  /** Lowercase, alphabetical */
  tags: string[];
}

/**
 * Input for creating or updating a pattern. On update, omitted
 * optional fields keep their stored values.
 */
export interface PatternInput {
  patternId: string;
  title: string;
  content: string;
  patternType?: PatternType;
  confidence?: number;
  source?: string | null;
  metadata?: Record<string, unknown>;
  isPinned?: boolean;
  scope?: PatternScope;
  namespaces?: string[];
  tags?: string[];
}

/**
 * Full-text search hit. `rank` is a non-negative relevance cost:
 * lower means a better match.
 */
export interface PatternSearchResult {
  pattern: Pattern;
  rank: number;
}

/**
 * Search hit re-ranked by namespace priority
 */
export interface PrioritizedSearchResult extends PatternSearchResult {
  /** 2.0 current namespace, 1.5 core, 0.5 anything else */
  weight: number;

  /** rank / weight, lower is better */
  weightedRank: number;
}

export interface PatternSearchOptions {
  /** Minimum confidence (default 0.5) */
  minConfidence?: number;

  /** Exact scope filter */
  scope?: PatternScope;

  /** A pattern matches when any of its namespaces is listed */
  namespaces?: string[];

  patternType?: PatternType;

  /** Maximum results (default 10) */
  limit?: number;
}

export interface NamespacePrioritySearchOptions {
  currentNamespace?: string;

  /** Project directory, classified into a workspace namespace when no currentNamespace is given */
  workspacePath?: string;

  /** Boost CORTEX-core patterns above unrelated namespaces (default true) */
  includeCortex?: boolean;

  minConfidence?: number;

  limit?: number;
}

/**
 * Knowledge-graph edge types
 */
export type RelationshipType =
  | 'extends'
  | 'relates_to'
  | 'contradicts'
  | 'supersedes';

export const RELATIONSHIP_TYPES: readonly RelationshipType[] = [
  'extends',
  'relates_to',
  'contradicts',
  'supersedes',
];

export interface PatternRelationship {
  fromPattern: string;
  toPattern: string;
  relationshipType: RelationshipType;
  strength: number;
  createdAt: number;
}

export interface DecayLogEntry {
  patternId: string;
  oldConfidence: number;
  newConfidence: number;
  decayedAt: number;
  reason: string;
}

export interface DecayResult {
  decayed: number;
  skippedPinned: number;
}

export interface NamespaceCount {
  namespace: string;
  count: number;
}

export interface TagCount {
  tag: string;
  count: number;
}

export interface PatternStats {
  total: number;
  pinned: number;
  byScope: Record<PatternScope, number>;
  byType: Record<PatternType, number>;
  namespaces: number;
}

// ===== Tier 1: Conversations =====

export type ConversationStatus = 'active' | 'completed';

export interface Conversation {
  /** UUID */
  conversationId: string;
  startTime: number;
  endTime: number | null;
  intent: string | null;
  status: ConversationStatus;

  /** Never earlier than the newest message timestamp */
  lastActivity: number;
}

export interface Message {
  messageId: number;
  conversationId: string;
  timestamp: number;

  /** Free-form, e.g. "user" or "agent" */
  role: string;

  content: string;
}

/**
 * Conversation summary returned by the session manager
 */
export interface SessionInfo {
  conversationId: string;
  status: ConversationStatus;
  intent: string | null;
  startTime: number;
  endTime: number | null;
  lastActivity: number;
  messageCount: number;
}

export interface StartSessionOptions {
  intent?: string;

  /** Supplied id; a UUID is generated otherwise */
  conversationId?: string;
}

export interface SessionListOptions {
  status?: ConversationStatus;
  limit?: number;
}

export interface EvictionLogEntry {
  conversationId: string;
  evictedAt: number;
  startTime: number;
  messageCount: number;
  reason: string;
}

export interface ConversationStats {
  total: number;
  active: number;
  completed: number;
  messages: number;
}

// ===== Tier 3: Development Context =====

/**
 * File stability classification by churn rate
 */
export type Stability =
  | 'STABLE'     // churn < 0.10
  | 'MODERATE'   // 0.10 <= churn < 0.20
  | 'UNSTABLE';  // churn >= 0.20

export const STABILITY_LEVELS: readonly Stability[] = ['STABLE', 'MODERATE', 'UNSTABLE'];

/**
 * File churn within one analysis window. Keyed by
 * (filePath, periodStart, periodEnd).
 */
export interface FileHotspot {
  filePath: string;

  /** YYYY-MM-DD */
  periodStart: string;

  /** YYYY-MM-DD */
  periodEnd: string;

  /** Commits in the window */
  totalCommits: number;

  /** Commits in the window that touched this file */
  fileEdits: number;

  /** fileEdits / totalCommits */
  churnRate: number;

  stability: Stability;

  /** Lines added plus deleted in the window */
  linesChanged: number;

  /** Latest commit touching the file (ms) */
  lastModified: number | null;
}

/**
 * Daily git activity for one contributor
 */
export interface GitMetric {
  /** YYYY-MM-DD */
  metricDate: string;
  commitsCount: number;
  linesAdded: number;
  linesDeleted: number;
  netGrowth: number;
  filesChanged: number;

  /** null when aggregated across contributors */
  contributor: string | null;
}

export type VelocityTrend = 'increasing' | 'declining' | 'stable' | 'unknown';

export interface CommitVelocity {
  currentVelocity: number;
  previousVelocity: number;
  trend: VelocityTrend;
  changePercent: number;
  windowDays: number;
}

export type InsightSeverity = 'INFO' | 'WARNING' | 'ERROR' | 'CRITICAL';

export interface Insight {
  insightType: 'file_hotspot' | 'velocity_drop';
  severity: InsightSeverity;
  title: string;
  description: string;
  recommendation: string;
  relatedEntity: string | null;
  data: Record<string, unknown>;
}

// ===== Utilities =====

/**
 * Generates a conversation ID
 */
export function generateConversationId(): string {
  return randomUUID();
}

/**
 * Clamp a confidence value into [0, 1]; NaN becomes 0
 */
export function clampConfidence(value: number): number {
  if (Number.isNaN(value)) return 0;
  return Math.min(1, Math.max(0, value));
}

/**
 * Format a millisecond timestamp as a UTC calendar date (YYYY-MM-DD)
 */
export function toDateString(timestamp: number): string {
  return new Date(timestamp).toISOString().slice(0, 10);
}

export const DAY_MS = 86_400_000;
