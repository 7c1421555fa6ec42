/**
 * Namespace Classifier
 *
 * Assigns a `cortex.*` or `workspace.<project>.*` namespace to a pattern
 * by walking an ordered rule list; the first rule that produces an
 * outcome wins. Vocabularies come from namespace-rules.json and can be
 * overridden per instance.
 *
 * Ambiguous records get `workspace.default.uncategorized` so that
 * downstream tooling can flag them for review.
 *
 * @module cortex-memory/tier2/namespace-classifier
 */

import { z } from 'zod';
import { ConfigError } from '../errors.js';
import type { Pattern } from '../types.js';
import defaultRules from './namespace-rules.json' with { type: 'json' };

export const UNCATEGORIZED_NAMESPACE = 'workspace.default.uncategorized';

export const CLASSIFIED_PREFIXES = ['cortex.', 'workspace.'] as const;

const vocabularySchema = z.object({
  /** Matched against id/title; yields cortex.<keyword> */
  cortexKeywords: z.array(z.string().min(1)),
  /** Matched against source; yields cortex.framework_patterns */
  frameworkIndicators: z.array(z.string().min(1)),
  /** Matched against source; marks application knowledge */
  workspaceIndicators: z.array(z.string().min(1)),
  /** Project names recognised in source or id */
  knownWorkspaces: z.array(z.string().min(1)),
  /** Matched against id/title to name the workspace sub-namespace */
  workspacePatternKeys: z.array(z.string().min(1)),
  fallbackWorkspace: z.string().min(1),
});

export type NamespaceVocabulary = z.infer<typeof vocabularySchema>;

/**
 * Fields the classifier looks at
 */
export type ClassifiableRecord = Pick<Pattern, 'patternId' | 'title' | 'source' | 'namespaces'>;

/**
 * Outcome of a rule that fired. `namespace: null` means the record is
 * already classified and should be left alone.
 */
export interface ClassificationResult {
  namespace: string | null;
  rule: string;
}

export interface ClassificationRule {
  name: string;
  apply(record: ClassifiableRecord, vocabulary: NamespaceVocabulary): string | null | undefined;
}

/**
 * Load and validate a vocabulary. Throws ConfigError on a malformed one.
 */
export function parseVocabulary(raw: unknown, source: string = 'namespace-rules.json'): NamespaceVocabulary {
  const result = vocabularySchema.safeParse(raw);
  if (!result.success) {
    const issue = result.error.issues[0];
    throw new ConfigError(source, `${issue.path.join('.') || '(root)'}: ${issue.message}`);
  }
  return result.data;
}

export const DEFAULT_VOCABULARY: NamespaceVocabulary = parseVocabulary(defaultRules);

function findIn(haystacks: readonly string[], needles: readonly string[]): string | undefined {
  const lowered = haystacks.map((text) => text.toLowerCase());
  return needles.find((needle) => {
    const target = needle.toLowerCase();
    return lowered.some((text) => text.includes(target));
  });
}

/**
 * Default rule cascade
 */
export const DEFAULT_RULES: readonly ClassificationRule[] = [
  {
    name: 'already-classified',
    apply: (record) =>
      record.namespaces.some((ns) => CLASSIFIED_PREFIXES.some((prefix) => ns.startsWith(prefix)))
        ? null
        : undefined,
  },
  {
    name: 'cortex-keyword',
    apply: (record, vocabulary) => {
      const keyword = findIn([record.patternId, record.title], vocabulary.cortexKeywords);
      return keyword === undefined ? undefined : `cortex.${keyword}`;
    },
  },
  {
    name: 'framework-source',
    apply: (record, vocabulary) => {
      if (!record.source) return undefined;
      return findIn([record.source], vocabulary.frameworkIndicators) === undefined
        ? undefined
        : 'cortex.framework_patterns';
    },
  },
  {
    name: 'workspace-source',
    apply: (record, vocabulary) => {
      if (!record.source) return undefined;
      if (findIn([record.source], vocabulary.workspaceIndicators) === undefined) return undefined;

      const workspace =
        findIn([record.source, record.patternId], vocabulary.knownWorkspaces) ?? vocabulary.fallbackWorkspace;
      const key = findIn([record.title, record.patternId], vocabulary.workspacePatternKeys) ?? 'patterns';
      return `workspace.${workspace}.${key}`;
    },
  },
  {
    name: 'uncategorized',
    apply: () => UNCATEGORIZED_NAMESPACE,
  },
];

export interface NamespaceClassifierOptions {
  vocabulary?: Partial<NamespaceVocabulary>;
  rules?: readonly ClassificationRule[];
}

export class NamespaceClassifier {
  private readonly vocabulary: NamespaceVocabulary;
  private readonly rules: readonly ClassificationRule[];

  constructor(options: NamespaceClassifierOptions = {}) {
    this.vocabulary = parseVocabulary({ ...DEFAULT_VOCABULARY, ...options.vocabulary }, 'classifier options');
    this.rules = options.rules ?? DEFAULT_RULES;
  }

  /**
   * Namespace for a record, or null when it is already classified
   */
  classify(record: ClassifiableRecord): string | null {
    return this.classifyWithReason(record).namespace;
  }

  /**
   * Workspace namespace prefix (`workspace.<name>`) for a project
   * directory. The deepest path segment naming a known workspace wins.
   */
  workspaceNamespace(workspacePath: string): string {
    const known = new Set(this.vocabulary.knownWorkspaces.map((name) => name.toLowerCase()));
    const segments = workspacePath.split(/[\\/]+/).map((segment) => segment.toLowerCase());
    const name = segments.reverse().find((segment) => known.has(segment)) ?? this.vocabulary.fallbackWorkspace;
    return `workspace.${name}`;
  }

  /**
   * Namespace plus the name of the rule that decided it
   */
  classifyWithReason(record: ClassifiableRecord): ClassificationResult {
    for (const rule of this.rules) {
      const outcome = rule.apply(record, this.vocabulary);
      if (outcome !== undefined) {
        return { namespace: outcome, rule: rule.name };
      }
    }
    return { namespace: UNCATEGORIZED_NAMESPACE, rule: 'uncategorized' };
  }
}

export function createNamespaceClassifier(options?: NamespaceClassifierOptions): NamespaceClassifier {
  return new NamespaceClassifier(options);
}
