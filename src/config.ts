/**
 * Configuration for the CORTEX memory core.
 *
 * Priority: explicit overrides → environment → <brainDir>/settings.json → defaults.
 * The resolved value is frozen and handed to each component's constructor.
 *
 * @module cortex-memory/config
 */

import { existsSync, readFileSync } from 'node:fs';
import * as path from 'node:path';
import { z } from 'zod';
import { ConfigError } from './errors.js';

/** Millisecond clock, injectable for deterministic tests */
export type Clock = () => number;

export interface CortexConfig {
  /** Directory holding the brain database and settings.json */
  readonly brainDir: string;

  /** Database filename (":memory:" keeps everything in process) */
  readonly dbFilename: string;

  /** Maximum conversations kept in working memory */
  readonly conversationCapacity: number;

  /** Idle time after which an active conversation is closed */
  readonly sessionTimeoutMs: number;

  /** Sliding window for file churn analysis */
  readonly hotspotWindowDays: number;

  /** Upper bound for every version-control subprocess */
  readonly gitTimeoutMs: number;

  /** Default confidence floor for pattern search */
  readonly defaultMinConfidence: number;

  readonly verbose: boolean;

  readonly clock: Clock;
}

export const DEFAULT_CONFIG: CortexConfig = Object.freeze({
  brainDir: '.cortex/brain',
  dbFilename: 'cortex-brain.db',
  conversationCapacity: 50,
  sessionTimeoutMs: 30 * 60 * 1000,
  hotspotWindowDays: 30,
  gitTimeoutMs: 10_000,
  defaultMinConfidence: 0.5,
  verbose: false,
  clock: Date.now,
});

export const SETTINGS_FILENAME = 'settings.json';

/**
 * Persisted settings; every field is optional and unknown keys are rejected
 */
const settingsSchema = z
  .object({
    dbFilename: z.string().min(1),
    conversationCapacity: z.number().int().positive(),
    sessionTimeoutMinutes: z.number().positive(),
    hotspotWindowDays: z.number().int().positive(),
    gitTimeoutMs: z.number().int().positive(),
    defaultMinConfidence: z.number().min(0).max(1),
    verbose: z.boolean(),
  })
  .partial()
  .strict();

export type CortexSettings = z.infer<typeof settingsSchema>;

export type ConfigOverrides = Partial<CortexConfig>;

/**
 * Parse raw settings JSON. Throws ConfigError naming the first bad field.
 */
export function parseSettings(raw: unknown, source: string = SETTINGS_FILENAME): CortexSettings {
  const result = settingsSchema.safeParse(raw);
  if (!result.success) {
    const issue = result.error.issues[0];
    const field = issue.path.length > 0 ? issue.path.join('.') : '(root)';
    throw new ConfigError(source, `${field}: ${issue.message}`);
  }
  return result.data;
}

function readSettingsFile(brainDir: string): CortexSettings {
  const settingsPath = path.join(brainDir, SETTINGS_FILENAME);
  if (!existsSync(settingsPath)) return {};

  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(settingsPath, 'utf-8'));
  } catch (error) {
    throw new ConfigError(settingsPath, `not valid JSON (${error instanceof Error ? error.message : String(error)})`);
  }
  return parseSettings(raw, settingsPath);
}

function settingsToConfig(settings: CortexSettings): ConfigOverrides {
  const { sessionTimeoutMinutes, ...rest } = settings;
  return sessionTimeoutMinutes === undefined
    ? rest
    : { ...rest, sessionTimeoutMs: sessionTimeoutMinutes * 60 * 1000 };
}

function envToConfig(env: NodeJS.ProcessEnv): ConfigOverrides {
  const fromEnv: { brainDir?: string; verbose?: boolean } = {};
  if (env.CORTEX_BRAIN_DIR) fromEnv.brainDir = env.CORTEX_BRAIN_DIR;
  if (env.CORTEX_VERBOSE !== undefined) {
    fromEnv.verbose = env.CORTEX_VERBOSE === '1' || env.CORTEX_VERBOSE.toLowerCase() === 'true';
  }
  return fromEnv;
}

/**
 * Build an immutable config from defaults plus overrides, without touching disk
 */
export function createConfig(overrides: ConfigOverrides = {}): CortexConfig {
  const config = mergeDefined(DEFAULT_CONFIG, overrides);

  if (config.conversationCapacity < 1) {
    throw new ConfigError('config', 'conversationCapacity must be at least 1');
  }
  if (config.sessionTimeoutMs <= 0) {
    throw new ConfigError('config', 'sessionTimeoutMs must be positive');
  }
  if (config.hotspotWindowDays < 1) {
    throw new ConfigError('config', 'hotspotWindowDays must be at least 1');
  }

  return Object.freeze(config);
}

/**
 * Resolve configuration for a working directory
 */
export function loadConfig(
  cwd: string = process.cwd(),
  overrides: ConfigOverrides = {},
  env: NodeJS.ProcessEnv = process.env,
): CortexConfig {
  const fromEnv = envToConfig(env);
  const brainDirSetting = overrides.brainDir ?? fromEnv.brainDir ?? DEFAULT_CONFIG.brainDir;
  const brainDir = path.resolve(cwd, brainDirSetting);

  const fromFile = settingsToConfig(readSettingsFile(brainDir));

  const merged = mergeDefined(mergeDefined(mergeDefined(DEFAULT_CONFIG, fromFile), fromEnv), overrides);
  return createConfig({ ...merged, brainDir });
}

/**
 * Absolute or in-memory database location for a config
 */
export function resolveDatabasePath(config: CortexConfig): string {
  return config.dbFilename === ':memory:'
    ? ':memory:'
    : path.join(config.brainDir, config.dbFilename);
}

function mergeDefined(base: CortexConfig, overrides: ConfigOverrides): CortexConfig {
  return {
    brainDir: overrides.brainDir ?? base.brainDir,
    dbFilename: overrides.dbFilename ?? base.dbFilename,
    conversationCapacity: overrides.conversationCapacity ?? base.conversationCapacity,
    sessionTimeoutMs: overrides.sessionTimeoutMs ?? base.sessionTimeoutMs,
    hotspotWindowDays: overrides.hotspotWindowDays ?? base.hotspotWindowDays,
    gitTimeoutMs: overrides.gitTimeoutMs ?? base.gitTimeoutMs,
    defaultMinConfidence: overrides.defaultMinConfidence ?? base.defaultMinConfidence,
    verbose: overrides.verbose ?? base.verbose,
    clock: overrides.clock ?? base.clock,
  };
}
