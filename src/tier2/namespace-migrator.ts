/**
 * Namespace Migrator
 *
 * Batch pass over the pattern store that classifies every pattern not yet
 * carrying a `cortex.*` / `workspace.*` namespace, appends the result to
 * its memberships and aligns its scope. Dry runs only report.
 *
 * @module cortex-memory/tier2/namespace-migrator
 */

import { CortexConfig } from '../config.js';
import type { PatternScope } from '../types.js';
import { NamespaceClassifier, UNCATEGORIZED_NAMESPACE } from './namespace-classifier.js';
import { PatternStore } from './pattern-store.js';

export interface MigrationChange {
  patternId: string;
  title: string;
  namespace: string;
  rule: string;
  scope: PatternScope;
}

export interface MigrationReport {
  dryRun: boolean;
  scanned: number;
  migrated: number;
  /** Already classified */
  skipped: number;
  /** Ids assigned the uncategorized namespace, for manual review */
  uncategorized: string[];
  changes: MigrationChange[];
}

export interface MigrationOptions {
  dryRun?: boolean;
}

export function scopeForNamespace(namespace: string): PatternScope {
  return namespace.startsWith('cortex.') ? 'cortex' : 'application';
}

export class NamespaceMigrator {
  constructor(
    private readonly store: PatternStore,
    private readonly classifier: NamespaceClassifier,
    private readonly config: CortexConfig
  ) {}

  async run(options: MigrationOptions = {}): Promise<MigrationReport> {
    const dryRun = options.dryRun ?? false;
    const patterns = await this.store.listPatterns();

    const report: MigrationReport = {
      dryRun,
      scanned: patterns.length,
      migrated: 0,
      skipped: 0,
      uncategorized: [],
      changes: [],
    };

    for (const pattern of patterns) {
      const { namespace, rule } = this.classifier.classifyWithReason(pattern);
      if (namespace === null) {
        report.skipped++;
        continue;
      }

      const scope = scopeForNamespace(namespace);
      report.changes.push({ patternId: pattern.patternId, title: pattern.title, namespace, rule, scope });
      if (namespace === UNCATEGORIZED_NAMESPACE) {
        report.uncategorized.push(pattern.patternId);
      }

      if (!dryRun) {
        await this.store.setNamespaces(pattern.patternId, [...pattern.namespaces, namespace], scope);
      }
      report.migrated++;
    }

    if (this.config.verbose) {
      console.log(
        `[NamespaceMigrator] ${dryRun ? 'Dry run: ' : ''}${report.migrated} migrated, ` +
          `${report.skipped} skipped, ${report.uncategorized.length} uncategorized`
      );
    }
    if (report.uncategorized.length > 0) {
      console.warn(
        `[NamespaceMigrator] ${report.uncategorized.length} pattern(s) need manual review: ` +
          report.uncategorized.join(', ')
      );
    }

    return report;
  }
}

export function createNamespaceMigrator(
  store: PatternStore,
  classifier: NamespaceClassifier,
  config: CortexConfig
): NamespaceMigrator {
  return new NamespaceMigrator(store, classifier, config);
}
