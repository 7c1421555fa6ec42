/**
 * FileMetricsAnalyzer - Tier 3 development context
 *
 * Derives advisory metrics from version control:
 * - File hotspots: per-file churn over a sliding window
 * - Daily git activity per contributor
 * - Commit velocity trend and insights built on both
 *
 * Version-control failures never reach the caller: they are logged and
 * the analysis returns an empty result.
 *
 * @module cortex-memory/tier3/file-metrics
 */

import { EventEmitter } from 'node:events';
import * as path from 'node:path';
import { CortexConfig } from '../config.js';
import { BetterDatabase, DatabaseHandle } from '../database.js';
import { NotInitializedError, ValidationError } from '../errors.js';
import {
  CommitVelocity,
  DAY_MS,
  FileHotspot,
  GitMetric,
  Insight,
  STABILITY_LEVELS,
  Stability,
  toDateString,
} from '../types.js';
import { GitCommit, GitService, realGitService } from './git-service.js';

/** Churn below this is STABLE */
export const STABLE_THRESHOLD = 0.1;

/** Churn below this (and at least STABLE_THRESHOLD) is MODERATE */
export const MODERATE_THRESHOLD = 0.2;

/** Unstable files above this churn produce an insight */
export const HIGH_CHURN_THRESHOLD = 0.3;

/** Relative change that turns a velocity trend */
export const VELOCITY_CHANGE_THRESHOLD = 0.3;

/** Earlier windows averaged for the velocity baseline */
const VELOCITY_BASELINE_WINDOWS = 3;

export function classifyStability(churnRate: number): Stability {
  if (churnRate < STABLE_THRESHOLD) return 'STABLE';
  if (churnRate < MODERATE_THRESHOLD) return 'MODERATE';
  return 'UNSTABLE';
}

function isStability(value: string): value is Stability {
  return STABILITY_LEVELS.some((level) => level === value);
}

interface HotspotRow {
  file_path: string;
  period_start: string;
  period_end: string;
  total_commits: number;
  file_edits: number;
  churn_rate: number;
  stability: string;
  lines_changed: number;
  last_modified: number | null;
}

interface GitMetricRow {
  metric_date: string;
  commits_count: number;
  lines_added: number;
  lines_deleted: number;
  net_growth: number;
  files_changed: number;
  contributor: string | null;
}

function rowToHotspot(row: HotspotRow): FileHotspot {
  return {
    filePath: row.file_path,
    periodStart: row.period_start,
    periodEnd: row.period_end,
    totalCommits: row.total_commits,
    fileEdits: row.file_edits,
    churnRate: row.churn_rate,
    stability: isStability(row.stability) ? row.stability : classifyStability(row.churn_rate),
    linesChanged: row.lines_changed,
    lastModified: row.last_modified,
  };
}

function rowToGitMetric(row: GitMetricRow): GitMetric {
  return {
    metricDate: row.metric_date,
    commitsCount: row.commits_count,
    linesAdded: row.lines_added,
    linesDeleted: row.lines_deleted,
    netGrowth: row.net_growth,
    filesChanged: row.files_changed,
    contributor: row.contributor === '' ? null : row.contributor,
  };
}

function validatePositive(value: number, name: string): number {
  if (!Number.isInteger(value) || value < 1) {
    throw new ValidationError(`${name} must be a positive integer, got ${value}`);
  }
  return value;
}

/**
 * Aggregate commits into per-day, per-contributor activity (UTC dates)
 */
export function aggregateCommits(commits: readonly GitCommit[]): GitMetric[] {
  const byKey = new Map<string, GitMetric & { files: Set<string> }>();

  for (const commit of commits) {
    const metricDate = toDateString(commit.date);
    const key = `${metricDate}\x1f${commit.author}`;
    let entry = byKey.get(key);
    if (!entry) {
      entry = {
        metricDate,
        commitsCount: 0,
        linesAdded: 0,
        linesDeleted: 0,
        netGrowth: 0,
        filesChanged: 0,
        contributor: commit.author || null,
        files: new Set<string>(),
      };
      byKey.set(key, entry);
    }

    entry.commitsCount++;
    for (const file of commit.files) {
      entry.linesAdded += file.added;
      entry.linesDeleted += file.deleted;
      entry.files.add(file.path);
    }
  }

  return [...byKey.values()]
    .map(({ files, ...metric }) => ({
      ...metric,
      netGrowth: metric.linesAdded - metric.linesDeleted,
      filesChanged: files.size,
    }))
    .sort((a, b) => a.metricDate.localeCompare(b.metricDate) || (a.contributor ?? '').localeCompare(b.contributor ?? ''));
}

export interface FileMetricsOptions {
  /** Version-control boundary (default: git CLI) */
  git?: GitService;

  /** Shared database handle */
  db?: BetterDatabase;
}

export interface UpdateMetricsResult {
  gitMetrics: number;
  hotspots: number;
}

/**
 * Emits `initialized`, `shutdown`, `hotspots:saved` and `metrics:saved`.
 */
export class FileMetricsAnalyzer extends EventEmitter {
  private readonly config: CortexConfig;
  private readonly git: GitService;
  private readonly handle: DatabaseHandle;
  private db: BetterDatabase | null = null;
  private closed = false;

  constructor(config: CortexConfig, options: FileMetricsOptions = {}) {
    super();
    this.config = config;
    this.git = options.git ?? realGitService;
    this.handle = new DatabaseHandle(config, options.db);
  }

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

  private open(): BetterDatabase {
    if (this.db) return this.db;
    if (this.closed) throw new NotInitializedError('FileMetricsAnalyzer');

    const db = this.handle.acquire();
    this.createSchema(db);
    this.db = db;

    if (this.config.verbose) {
      console.log('[FileMetrics] Initialized');
    }
    this.emit('initialized');
    return db;
  }

  private createSchema(db: BetterDatabase): void {
    db.exec(`
      CREATE TABLE IF NOT EXISTS file_hotspots (
        id INTEGER PRIMARY KEY AUTOINCREMENT,
        file_path TEXT NOT NULL,
        period_start TEXT NOT NULL,
        period_end TEXT NOT NULL,
        total_commits INTEGER NOT NULL,
        file_edits INTEGER NOT NULL,
        churn_rate REAL NOT NULL,
        stability TEXT NOT NULL
          CHECK (stability IN ('STABLE', 'MODERATE', 'UNSTABLE')),
        lines_changed INTEGER NOT NULL DEFAULT 0,
        last_modified INTEGER,
        analyzed_at INTEGER NOT NULL,
        UNIQUE (file_path, period_start, period_end)
      );

      CREATE TABLE IF NOT EXISTS git_metrics (
        metric_date TEXT NOT NULL,
        contributor TEXT NOT NULL DEFAULT '',
        commits_count INTEGER NOT NULL,
        lines_added INTEGER NOT NULL,
        lines_deleted INTEGER NOT NULL,
        net_growth INTEGER NOT NULL,
        files_changed INTEGER NOT NULL,
        PRIMARY KEY (metric_date, contributor)
      );

      CREATE INDEX IF NOT EXISTS idx_hotspots_churn ON file_hotspots(churn_rate DESC);
      CREATE INDEX IF NOT EXISTS idx_hotspots_stability ON file_hotspots(stability);
    `);
  }

  private windowStart(days: number): string {
    return toDateString(this.config.clock() - days * DAY_MS);
  }

  // ===== Hotspots =====

  /**
   * Per-file churn over the last `days`, most volatile first.
   * Returns [] for a quiet repository or any version-control failure.
   */
  async analyzeHotspots(repoPath: string, days: number = this.config.hotspotWindowDays): Promise<FileHotspot[]> {
    validatePositive(days, 'days');
    const periodEnd = toDateString(this.config.clock());
    const periodStart = this.windowStart(days);
    const timeout = this.config.gitTimeoutMs;

    try {
      const totalCommits = await this.git.countCommits(repoPath, periodStart, timeout);
      if (totalCommits === 0) return [];

      const commits = await this.git.listCommits(repoPath, periodStart, timeout);
      const perFile = new Map<string, { edits: number; linesChanged: number; lastModified: number | null }>();

      for (const commit of commits) {
        const touched = new Set<string>();
        for (const file of commit.files) {
          const stats = perFile.get(file.path) ?? { edits: 0, linesChanged: 0, lastModified: null };
          stats.linesChanged += file.added + file.deleted;
          if (!touched.has(file.path)) {
            touched.add(file.path);
            stats.edits++;
            stats.lastModified = stats.lastModified === null ? commit.date : Math.max(stats.lastModified, commit.date);
          }
          perFile.set(file.path, stats);
        }
      }

      const hotspots = [...perFile.entries()].map(([filePath, stats]): FileHotspot => {
        const churnRate = stats.edits / totalCommits;
        return {
          filePath,
          periodStart,
          periodEnd,
          totalCommits,
          fileEdits: stats.edits,
          churnRate,
          stability: classifyStability(churnRate),
          linesChanged: stats.linesChanged,
          lastModified: stats.lastModified,
        };
      });

      hotspots.sort((a, b) => b.churnRate - a.churnRate || a.filePath.localeCompare(b.filePath));

      if (this.config.verbose) {
        console.log(`[FileMetrics] ${hotspots.length} file(s) changed across ${totalCommits} commit(s) since ${periodStart}`);
      }
      return hotspots;
    } catch (error) {
      console.warn(`[FileMetrics] Hotspot analysis failed for ${repoPath}: ${error instanceof Error ? error.message : String(error)}`);
      return [];
    }
  }

  /**
   * Upsert hotspots keyed by (file, periodStart, periodEnd)
   */
  async saveHotspots(hotspots: readonly FileHotspot[]): Promise<number> {
    const db = this.open();
    const analyzedAt = this.config.clock();
    const upsert = db.prepare(`
      INSERT INTO file_hotspots
        (file_path, period_start, period_end, total_commits, file_edits, churn_rate,
         stability, lines_changed, last_modified, analyzed_at)
      VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?)
      ON CONFLICT(file_path, period_start, period_end) DO UPDATE SET
        total_commits = excluded.total_commits,
        file_edits = excluded.file_edits,
        churn_rate = excluded.churn_rate,
        stability = excluded.stability,
        lines_changed = excluded.lines_changed,
        last_modified = excluded.last_modified,
        analyzed_at = excluded.analyzed_at
    `);

    db.transaction(() => {
      for (const hotspot of hotspots) {
        upsert.run(
          hotspot.filePath,
          hotspot.periodStart,
          hotspot.periodEnd,
          hotspot.totalCommits,
          hotspot.fileEdits,
          hotspot.churnRate,
          hotspot.stability,
          hotspot.linesChanged,
          hotspot.lastModified,
          analyzedAt
        );
      }
    })();

    this.emit('hotspots:saved', { count: hotspots.length });
    return hotspots.length;
  }

  /**
   * Stored hotspots, most volatile first
   */
  async getHotspots(limit: number = 20): Promise<FileHotspot[]> {
    validatePositive(limit, 'limit');
    return this.open()
      .prepare<[number], HotspotRow>(`
        SELECT * FROM file_hotspots
        ORDER BY churn_rate DESC, period_end DESC, file_path
        LIMIT ?
      `)
      .all(limit)
      .map(rowToHotspot);
  }

  async countHotspots(): Promise<number> {
    const row = this.open().prepare<[], { count: number }>('SELECT COUNT(*) AS count FROM file_hotspots').get();
    return row?.count ?? 0;
  }

  async getUnstableFiles(limit: number = 10): Promise<FileHotspot[]> {
    return (await this.getHotspotsByStability('UNSTABLE')).slice(0, validatePositive(limit, 'limit'));
  }

  async getHotspotsByStability(stability: Stability): Promise<FileHotspot[]> {
    if (!isStability(stability)) {
      throw new ValidationError(`Unknown stability: ${stability}`);
    }
    return this.open()
      .prepare<[string], HotspotRow>(`
        SELECT * FROM file_hotspots
        WHERE stability = ?
        ORDER BY churn_rate DESC, period_end DESC, file_path
      `)
      .all(stability)
      .map(rowToHotspot);
  }

  // ===== Git activity =====

  /**
   * Daily activity per contributor over the last `days`.
   * Returns [] on any version-control failure.
   */
  async collectGitMetrics(repoPath: string, days: number = this.config.hotspotWindowDays): Promise<GitMetric[]> {
    validatePositive(days, 'days');
    const since = this.windowStart(days);

    try {
      const commits = await this.git.listCommits(repoPath, since, this.config.gitTimeoutMs);
      return aggregateCommits(commits);
    } catch (error) {
      console.warn(`[FileMetrics] Git metrics collection failed for ${repoPath}: ${error instanceof Error ? error.message : String(error)}`);
      return [];
    }
  }

  /**
   * Upsert metrics keyed by (date, contributor)
   */
  async saveGitMetrics(metrics: readonly GitMetric[]): Promise<number> {
    const db = this.open();
    const upsert = db.prepare(`
      INSERT INTO git_metrics
        (metric_date, contributor, commits_count, lines_added, lines_deleted, net_growth, files_changed)
      VALUES (?, ?, ?, ?, ?, ?, ?)
      ON CONFLICT(metric_date, contributor) DO UPDATE SET
        commits_count = excluded.commits_count,
        lines_added = excluded.lines_added,
        lines_deleted = excluded.lines_deleted,
        net_growth = excluded.net_growth,
        files_changed = excluded.files_changed
    `);

    db.transaction(() => {
      for (const metric of metrics) {
        upsert.run(
          metric.metricDate,
          metric.contributor ?? '',
          metric.commitsCount,
          metric.linesAdded,
          metric.linesDeleted,
          metric.netGrowth,
          metric.filesChanged
        );
      }
    })();

    this.emit('metrics:saved', { count: metrics.length });
    return metrics.length;
  }

  /**
   * Stored metrics for the last `days`, newest first. Without a
   * contributor, each day is summed across contributors.
   */
  async getGitMetrics(days: number = 30, contributor?: string): Promise<GitMetric[]> {
    validatePositive(days, 'days');
    const db = this.open();
    const since = this.windowStart(days);

    if (contributor !== undefined) {
      return db
        .prepare<[string, string], GitMetricRow>(`
          SELECT * FROM git_metrics
          WHERE metric_date >= ? AND contributor = ?
          ORDER BY metric_date DESC
        `)
        .all(since, contributor)
        .map(rowToGitMetric);
    }

    return db
      .prepare<[string], GitMetricRow>(`
        SELECT metric_date,
          SUM(commits_count) AS commits_count,
          SUM(lines_added) AS lines_added,
          SUM(lines_deleted) AS lines_deleted,
          SUM(net_growth) AS net_growth,
          SUM(files_changed) AS files_changed,
          NULL AS contributor
        FROM git_metrics
        WHERE metric_date >= ?
        GROUP BY metric_date
        ORDER BY metric_date DESC
      `)
      .all(since)
      .map(rowToGitMetric);
  }

  /**
   * Commits in the latest window against the average of the three
   * windows before it
   */
  async calculateCommitVelocity(windowDays: number = 7): Promise<CommitVelocity> {
    validatePositive(windowDays, 'windowDays');
    const metrics = await this.getGitMetrics(windowDays * (VELOCITY_BASELINE_WINDOWS + 1));

    if (metrics.length === 0) {
      return { currentVelocity: 0, previousVelocity: 0, trend: 'unknown', changePercent: 0, windowDays };
    }

    const cutoff = this.windowStart(windowDays);
    let current = 0;
    let previous = 0;
    for (const metric of metrics) {
      if (metric.metricDate >= cutoff) current += metric.commitsCount;
      else previous += metric.commitsCount;
    }
    const previousVelocity = previous / VELOCITY_BASELINE_WINDOWS;

    if (previousVelocity === 0) {
      return { currentVelocity: current, previousVelocity, trend: 'stable', changePercent: 0, windowDays };
    }

    const changePercent = ((current - previousVelocity) / previousVelocity) * 100;
    const trend =
      changePercent < -VELOCITY_CHANGE_THRESHOLD * 100
        ? 'declining'
        : changePercent > VELOCITY_CHANGE_THRESHOLD * 100
          ? 'increasing'
          : 'stable';

    return { currentVelocity: current, previousVelocity, trend, changePercent, windowDays };
  }

  async generateInsights(): Promise<Insight[]> {
    const insights: Insight[] = [];

    const velocity = await this.calculateCommitVelocity();
    if (velocity.trend === 'declining') {
      insights.push({
        insightType: 'velocity_drop',
        severity: 'WARNING',
        title: `Commit velocity decreased ${Math.abs(velocity.changePercent).toFixed(1)}%`,
        description:
          `Commits dropped from ${velocity.previousVelocity.toFixed(1)} to ${velocity.currentVelocity} ` +
          `per ${velocity.windowDays}-day window.`,
        recommendation: 'Break work into smaller, more frequent commits to keep progress visible.',
        relatedEntity: null,
        data: { ...velocity },
      });
    }

    for (const hotspot of await this.getUnstableFiles(5)) {
      if (hotspot.churnRate <= HIGH_CHURN_THRESHOLD) continue;
      insights.push({
        insightType: 'file_hotspot',
        severity: 'WARNING',
        title: `High churn detected: ${path.basename(hotspot.filePath)}`,
        description:
          `${hotspot.filePath} changed in ${hotspot.fileEdits} of ${hotspot.totalCommits} commits ` +
          `(${(hotspot.churnRate * 100).toFixed(1)}% churn).`,
        recommendation: 'Consider refactoring or splitting this file into smaller, focused modules.',
        relatedEntity: hotspot.filePath,
        data: {
          churnRate: hotspot.churnRate,
          fileEdits: hotspot.fileEdits,
          totalCommits: hotspot.totalCommits,
        },
      });
    }

    return insights;
  }

  /**
   * Collect activity and hotspots for a repository and persist both
   */
  async updateAllMetrics(repoPath: string, days: number = this.config.hotspotWindowDays): Promise<UpdateMetricsResult> {
    const gitMetrics = await this.saveGitMetrics(await this.collectGitMetrics(repoPath, days));
    const hotspots = await this.saveHotspots(await this.analyzeHotspots(repoPath, days));

    if (this.config.verbose) {
      console.log(`[FileMetrics] Updated ${gitMetrics} daily metric(s) and ${hotspots} hotspot(s)`);
    }
    return { gitMetrics, hotspots };
  }
}

export function createFileMetricsAnalyzer(config: CortexConfig, options?: FileMetricsOptions): FileMetricsAnalyzer {
  return new FileMetricsAnalyzer(config, options);
}
