// Version-control boundary: isolates git subprocess calls from metrics logic.
// Inject fakeGitService in tests for determinism; realGitService in production.

import { execFile } from 'node:child_process';
import { promisify } from 'node:util';

const execFileAsync = promisify(execFile);

const RECORD_SEPARATOR = '\x1e';
const FIELD_SEPARATOR = '\x1f';
const LOG_FORMAT = '--pretty=format:%x1e%H%x1f%aI%x1f%an';
const MAX_BUFFER = 64 * 1024 * 1024;

export interface GitFileChange {
  path: string;
  /** 0 for binary files */
  added: number;
  deleted: number;
}

export interface GitCommit {
  hash: string;
  /** Author date, ms since epoch */
  date: number;
  author: string;
  files: GitFileChange[];
}

/**
 * Everything the metrics analyzer needs from version control.
 * `since` is a YYYY-MM-DD date; failures (missing binary, not a
 * repository, timeout) reject.
 */
export interface GitService {
  countCommits(repoPath: string, since: string, timeoutMs: number): Promise<number>;
  listCommits(repoPath: string, since: string, timeoutMs: number): Promise<GitCommit[]>;
}

function parseCount(text: string): number {
  const value = Number.parseInt(text, 10);
  return Number.isNaN(value) ? 0 : value;
}

/**
 * Parse `git log -z --numstat` output written with LOG_FORMAT.
 * Under -z each numstat entry ends in NUL and paths are left unquoted.
 */
export function parseGitLog(stdout: string): GitCommit[] {
  const commits: GitCommit[] = [];

  for (const record of stdout.split(RECORD_SEPARATOR)) {
    const headerEnd = record.search(/[\n\0]/);
    const header = headerEnd === -1 ? record : record.slice(0, headerEnd);
    const [hash, isoDate, author] = header.split(FIELD_SEPARATOR);
    if (!hash || !isoDate) continue;

    const files: GitFileChange[] = [];
    const entries = headerEnd === -1 ? [] : record.slice(headerEnd).split('\0');
    for (const raw of entries) {
      const entry = raw.replace(/^\n+/, '');
      const firstTab = entry.indexOf('\t');
      const secondTab = entry.indexOf('\t', firstTab + 1);
      if (firstTab === -1 || secondTab === -1) continue;

      const added = entry.slice(0, firstTab);
      const deleted = entry.slice(firstTab + 1, secondTab);
      files.push({
        path: entry.slice(secondTab + 1),
        added: added === '-' ? 0 : parseCount(added),
        deleted: deleted === '-' ? 0 : parseCount(deleted),
      });
    }

    commits.push({ hash, date: Date.parse(isoDate), author: author ?? '', files });
  }

  return commits;
}

/** Production git service using the git CLI */
export const realGitService: GitService = {
  async countCommits(repoPath: string, since: string, timeoutMs: number): Promise<number> {
    const { stdout } = await execFileAsync(
      'git', ['rev-list', '--count', `--since=${since}`, 'HEAD'],
      { cwd: repoPath, timeout: timeoutMs },
    );
    return parseCount(stdout.trim());
  },

  async listCommits(repoPath: string, since: string, timeoutMs: number): Promise<GitCommit[]> {
    const { stdout } = await execFileAsync(
      'git', ['log', '-z', `--since=${since}`, '--numstat', '--no-renames', LOG_FORMAT],
      { cwd: repoPath, timeout: timeoutMs, maxBuffer: MAX_BUFFER },
    );
    return parseGitLog(stdout);
  },
};

export interface FakeGitData {
  commits?: GitCommit[];
  /** Overrides the count derived from `commits` */
  totalCommits?: number;
  /** Every call rejects with this */
  error?: Error;
}

/** Fake git service for deterministic testing; spawns no subprocesses */
export function fakeGitService(data: FakeGitData = {}): GitService {
  const inWindow = (since: string): GitCommit[] => {
    const from = Date.parse(since);
    return (data.commits ?? []).filter((commit) => commit.date >= from);
  };

  return {
    async countCommits(_repoPath: string, since: string): Promise<number> {
      if (data.error) throw data.error;
      return data.totalCommits ?? inWindow(since).length;
    },
    async listCommits(_repoPath: string, since: string): Promise<GitCommit[]> {
      if (data.error) throw data.error;
      return inWindow(since);
    },
  };
}
