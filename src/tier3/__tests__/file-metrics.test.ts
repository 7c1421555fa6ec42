/**
 * Tests for FileMetricsAnalyzer
 */

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import * as os from 'node:os';
import * as path from 'node:path';
import { CortexConfig, createConfig } from '../../config.js';
import { ValidationError } from '../../errors.js';
import { DAY_MS, FileHotspot, GitMetric } from '../../types.js';
import { FileMetricsAnalyzer, aggregateCommits, classifyStability } from '../file-metrics.js';
import { GitCommit, GitService, fakeGitService } from '../git-service.js';

const NOW = Date.UTC(2026, 2, 31, 12, 0, 0);

const COMMITS: GitCommit[] = [
  {
    hash: 'c1',
    date: NOW - 1 * DAY_MS,
    author: 'Ada',
    files: [
      { path: 'src/a.ts', added: 10, deleted: 2 },
      { path: 'src/b.ts', added: 1, deleted: 1 },
    ],
  },
  {
    hash: 'c2',
    date: NOW - 2 * DAY_MS,
    author: 'Ada',
    files: [
      { path: 'src/a.ts', added: 5, deleted: 0 },
      { path: 'src/b.ts', added: 3, deleted: 3 },
    ],
  },
  {
    hash: 'c3',
    date: NOW - 3 * DAY_MS,
    author: 'Bob',
    files: [{ path: 'src/a.ts', added: 1, deleted: 1 }],
  },
  {
    hash: 'c4',
    date: NOW - 4 * DAY_MS,
    author: 'Bob',
    files: [
      { path: 'src/a.ts', added: 2, deleted: 2 },
      { path: 'src/c.ts', added: 4, deleted: 0 },
    ],
  },
  {
    hash: 'c0',
    date: NOW - 40 * DAY_MS,
    author: 'Ada',
    files: [{ path: 'src/d.ts', added: 100, deleted: 0 }],
  },
];

function hotspot(overrides: Partial<FileHotspot>): FileHotspot {
  return {
    filePath: 'src/x.ts',
    periodStart: '2026-03-01',
    periodEnd: '2026-03-31',
    totalCommits: 10,
    fileEdits: 1,
    churnRate: 0.1,
    stability: 'MODERATE',
    linesChanged: 0,
    lastModified: null,
    ...overrides,
  };
}

function metric(overrides: Partial<GitMetric>): GitMetric {
  return {
    metricDate: '2026-03-30',
    commitsCount: 1,
    linesAdded: 0,
    linesDeleted: 0,
    netGrowth: 0,
    filesChanged: 1,
    contributor: 'Ada',
    ...overrides,
  };
}

describe('classifyStability', () => {
  it('should classify at the thresholds', () => {
    expect(classifyStability(0)).toBe('STABLE');
    expect(classifyStability(0.099)).toBe('STABLE');
    expect(classifyStability(0.1)).toBe('MODERATE');
    expect(classifyStability(0.199)).toBe('MODERATE');
    expect(classifyStability(0.2)).toBe('UNSTABLE');
    expect(classifyStability(1)).toBe('UNSTABLE');
  });
});

describe('aggregateCommits', () => {
  it('should group by UTC day and author', () => {
    const metrics = aggregateCommits([
      {
        hash: 'x1',
        date: Date.UTC(2026, 2, 30, 10),
        author: 'Ada',
        files: [
          { path: 'a', added: 10, deleted: 2 },
          { path: 'b', added: 1, deleted: 1 },
        ],
      },
      { hash: 'x2', date: Date.UTC(2026, 2, 30, 15), author: 'Ada', files: [{ path: 'a', added: 5, deleted: 0 }] },
      { hash: 'x3', date: Date.UTC(2026, 2, 30, 16), author: 'Bob', files: [{ path: 'c', added: 4, deleted: 4 }] },
      { hash: 'x4', date: Date.UTC(2026, 2, 29, 9), author: 'Ada', files: [{ path: 'a', added: 1, deleted: 0 }] },
    ]);

    expect(metrics).toEqual([
      metric({ metricDate: '2026-03-29', commitsCount: 1, linesAdded: 1, netGrowth: 1, filesChanged: 1 }),
      metric({ commitsCount: 2, linesAdded: 16, linesDeleted: 3, netGrowth: 13, filesChanged: 2 }),
      metric({ contributor: 'Bob', commitsCount: 1, linesAdded: 4, linesDeleted: 4, netGrowth: 0, filesChanged: 1 }),
    ]);
  });
});

describe('FileMetricsAnalyzer', () => {
  let config: CortexConfig;
  let analyzer: FileMetricsAnalyzer;

  function createAnalyzer(git: GitService): FileMetricsAnalyzer {
    return new FileMetricsAnalyzer(config, { git });
  }

  beforeEach(async () => {
    config = createConfig({ dbFilename: ':memory:', clock: () => NOW });
    analyzer = createAnalyzer(fakeGitService({ commits: COMMITS, totalCommits: 20 }));
    await analyzer.initialize();
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    await analyzer.shutdown();
  });

  describe('analyzeHotspots', () => {
    it('should compute churn per file over the window', async () => {
      const hotspots = await analyzer.analyzeHotspots('/repo');

      expect(hotspots).toEqual([
        {
          filePath: 'src/a.ts',
          periodStart: '2026-03-01',
          periodEnd: '2026-03-31',
          totalCommits: 20,
          fileEdits: 4,
          churnRate: 0.2,
          stability: 'UNSTABLE',
          linesChanged: 23,
          lastModified: NOW - 1 * DAY_MS,
        },
        {
          filePath: 'src/b.ts',
          periodStart: '2026-03-01',
          periodEnd: '2026-03-31',
          totalCommits: 20,
          fileEdits: 2,
          churnRate: 0.1,
          stability: 'MODERATE',
          linesChanged: 8,
          lastModified: NOW - 1 * DAY_MS,
        },
        {
          filePath: 'src/c.ts',
          periodStart: '2026-03-01',
          periodEnd: '2026-03-31',
          totalCommits: 20,
          fileEdits: 1,
          churnRate: 0.05,
          stability: 'STABLE',
          linesChanged: 4,
          lastModified: NOW - 4 * DAY_MS,
        },
      ]);
    });

    it('should use the requested window', async () => {
      const hotspots = await analyzer.analyzeHotspots('/repo', 2);

      expect(hotspots.map((h) => h.filePath)).toEqual(['src/a.ts', 'src/b.ts']);
      expect(hotspots[0].periodStart).toBe('2026-03-29');
    });

    it('should return nothing for a quiet repository without listing commits', async () => {
      const git = fakeGitService({ commits: COMMITS, totalCommits: 0 });
      const listCommits = vi.spyOn(git, 'listCommits');
      const quiet = createAnalyzer(git);

      expect(await quiet.analyzeHotspots('/repo')).toEqual([]);
      expect(listCommits).not.toHaveBeenCalled();
      await quiet.shutdown();
    });

    it('should degrade version-control failures to an empty result', async () => {
      const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});
      const broken = createAnalyzer(fakeGitService({ error: new Error('not a git repository') }));

      expect(await broken.analyzeHotspots('/repo')).toEqual([]);
      expect(warn).toHaveBeenCalledWith('[FileMetrics] Hotspot analysis failed for /repo: not a git repository');
      await broken.shutdown();
    });

    it('should survive a missing repository with the git CLI', async () => {
      vi.spyOn(console, 'warn').mockImplementation(() => {});
      const real = new FileMetricsAnalyzer(config);

      const missing = path.join(os.tmpdir(), 'cortex-no-such-repo', String(NOW));
      expect(await real.analyzeHotspots(missing)).toEqual([]);
      await real.shutdown();
    });

    it('should reject a non-positive window', async () => {
      await expect(analyzer.analyzeHotspots('/repo', 0)).rejects.toThrow(ValidationError);
    });
  });

  describe('stored hotspots', () => {
    beforeEach(async () => {
      await analyzer.saveHotspots(await analyzer.analyzeHotspots('/repo'));
    });

    it('should upsert by file and window', async () => {
      await analyzer.saveHotspots(await analyzer.analyzeHotspots('/repo'));
      expect(await analyzer.countHotspots()).toBe(3);

      await analyzer.saveHotspots([
        hotspot({ filePath: 'src/c.ts', fileEdits: 5, churnRate: 0.25, stability: 'UNSTABLE' }),
      ]);

      expect(await analyzer.countHotspots()).toBe(3);
      expect((await analyzer.getUnstableFiles()).map((h) => [h.filePath, h.churnRate])).toEqual([
        ['src/c.ts', 0.25],
        ['src/a.ts', 0.2],
      ]);
    });

    it('should list most volatile first', async () => {
      const paths = (await analyzer.getHotspots()).map((h) => h.filePath);
      expect(paths).toEqual(['src/a.ts', 'src/b.ts', 'src/c.ts']);
    });

    it('should filter by stability', async () => {
      expect((await analyzer.getHotspotsByStability('MODERATE')).map((h) => h.filePath)).toEqual(['src/b.ts']);
      expect((await analyzer.getUnstableFiles()).map((h) => h.filePath)).toEqual(['src/a.ts']);
    });

    it('should emit hotspots:saved', async () => {
      const listener = vi.fn();
      analyzer.on('hotspots:saved', listener);

      await analyzer.saveHotspots([hotspot({})]);

      expect(listener).toHaveBeenCalledWith({ count: 1 });
    });
  });

  describe('git metrics', () => {
    it('should collect daily activity in the window', async () => {
      const metrics = await analyzer.collectGitMetrics('/repo');

      expect(metrics.map((m) => [m.metricDate, m.contributor, m.commitsCount])).toEqual([
        ['2026-03-27', 'Bob', 1],
        ['2026-03-28', 'Bob', 1],
        ['2026-03-29', 'Ada', 1],
        ['2026-03-30', 'Ada', 1],
      ]);
    });

    it('should degrade collection failures to an empty result', async () => {
      const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});
      const broken = createAnalyzer(fakeGitService({ error: new Error('timed out') }));

      expect(await broken.collectGitMetrics('/repo')).toEqual([]);
      expect(warn).toHaveBeenCalledWith('[FileMetrics] Git metrics collection failed for /repo: timed out');
      await broken.shutdown();
    });

    it('should sum contributors per day unless one is named', async () => {
      await analyzer.saveGitMetrics([
        metric({ commitsCount: 2, linesAdded: 16, linesDeleted: 3, netGrowth: 13, filesChanged: 2 }),
        metric({ contributor: 'Bob', commitsCount: 1, linesAdded: 4, linesDeleted: 4, netGrowth: 0, filesChanged: 1 }),
        metric({ metricDate: '2026-02-01', commitsCount: 9 }),
      ]);

      expect(await analyzer.getGitMetrics(30)).toEqual([
        {
          metricDate: '2026-03-30',
          commitsCount: 3,
          linesAdded: 20,
          linesDeleted: 7,
          netGrowth: 13,
          filesChanged: 3,
          contributor: null,
        },
      ]);
      expect((await analyzer.getGitMetrics(30, 'Bob')).map((m) => m.commitsCount)).toEqual([1]);
    });

    it('should replace a day on save', async () => {
      await analyzer.saveGitMetrics([metric({ commitsCount: 2 })]);
      await analyzer.saveGitMetrics([metric({ commitsCount: 5 })]);

      expect((await analyzer.getGitMetrics(30, 'Ada')).map((m) => m.commitsCount)).toEqual([5]);
    });

    it('should store metrics without a contributor', async () => {
      await analyzer.saveGitMetrics([metric({ contributor: null, commitsCount: 4 })]);

      const [stored] = await analyzer.getGitMetrics(30);
      expect(stored.contributor).toBeNull();
      expect(stored.commitsCount).toBe(4);
    });
  });

  describe('calculateCommitVelocity', () => {
    it('should report unknown without data', async () => {
      expect(await analyzer.calculateCommitVelocity()).toEqual({
        currentVelocity: 0,
        previousVelocity: 0,
        trend: 'unknown',
        changePercent: 0,
        windowDays: 7,
      });
    });

    it('should compare the latest window with the average of the three before', async () => {
      await analyzer.saveGitMetrics([
        metric({ metricDate: '2026-03-30', commitsCount: 2 }),
        metric({ metricDate: '2026-03-20', commitsCount: 6 }),
        metric({ metricDate: '2026-03-12', commitsCount: 6 }),
        metric({ metricDate: '2026-03-05', commitsCount: 6 }),
        metric({ metricDate: '2026-03-01', commitsCount: 100 }),
      ]);

      const velocity = await analyzer.calculateCommitVelocity();

      expect(velocity.currentVelocity).toBe(2);
      expect(velocity.previousVelocity).toBe(6);
      expect(velocity.trend).toBe('declining');
      expect(velocity.changePercent).toBeCloseTo(-66.667, 2);
    });

    it('should report an increase', async () => {
      await analyzer.saveGitMetrics([
        metric({ metricDate: '2026-03-30', commitsCount: 10 }),
        metric({ metricDate: '2026-03-20', commitsCount: 18 }),
      ]);

      const velocity = await analyzer.calculateCommitVelocity();

      expect(velocity.previousVelocity).toBe(6);
      expect(velocity.trend).toBe('increasing');
    });

    it('should call a window with no history stable', async () => {
      await analyzer.saveGitMetrics([metric({ metricDate: '2026-03-30', commitsCount: 3 })]);

      const velocity = await analyzer.calculateCommitVelocity();

      expect(velocity).toMatchObject({ currentVelocity: 3, previousVelocity: 0, trend: 'stable', changePercent: 0 });
    });
  });

  describe('generateInsights', () => {
    it('should flag files above the high churn threshold', async () => {
      await analyzer.saveHotspots([
        hotspot({ filePath: 'src/auth/session.ts', fileEdits: 4, churnRate: 0.4, stability: 'UNSTABLE' }),
        hotspot({ filePath: 'src/util.ts', fileEdits: 2, churnRate: 0.25, stability: 'UNSTABLE' }),
      ]);

      const insights = await analyzer.generateInsights();

      expect(insights).toHaveLength(1);
      expect(insights[0]).toMatchObject({
        insightType: 'file_hotspot',
        severity: 'WARNING',
        title: 'High churn detected: session.ts',
        description: 'src/auth/session.ts changed in 4 of 10 commits (40.0% churn).',
        relatedEntity: 'src/auth/session.ts',
      });
    });

    it('should flag a declining velocity', async () => {
      await analyzer.saveGitMetrics([
        metric({ metricDate: '2026-03-30', commitsCount: 2 }),
        metric({ metricDate: '2026-03-20', commitsCount: 18 }),
      ]);

      const [insight] = await analyzer.generateInsights();

      expect(insight.insightType).toBe('velocity_drop');
      expect(insight.title).toBe('Commit velocity decreased 66.7%');
      expect(insight.description).toBe('Commits dropped from 6.0 to 2 per 7-day window.');
    });
  });

  describe('updateAllMetrics', () => {
    it('should persist activity and hotspots', async () => {
      const listener = vi.fn();
      analyzer.on('metrics:saved', listener);

      expect(await analyzer.updateAllMetrics('/repo')).toEqual({ gitMetrics: 4, hotspots: 3 });
      expect(listener).toHaveBeenCalledWith({ count: 4 });
      expect(await analyzer.countHotspots()).toBe(3);
    });
  });
});
