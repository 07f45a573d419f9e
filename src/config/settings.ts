/**
 * treesync Config — Settings resolution.
 *
 * Resolution order (highest to lowest priority):
 *   1. Explicit flags (CLI only, never persisted)
 *   2. TREESYNC_* environment variables
 *   3. Project settings: <workspace>/.treesync/config.json
 *   4. Global settings: ~/.config/treesync/config.json
 *   5. Built-in defaults
 */

import { existsSync, mkdirSync, readFileSync, writeFileSync } from 'node:fs';
import { homedir } from 'node:os';
import { dirname, join } from 'node:path';
import { z } from 'zod';
import type { InstallMode } from '../types/index.js';
import { ConfigurationError } from '../errors/index.js';
import { DEFAULT_MAX_CONCURRENCY } from '../work/distributor.js';

// ─── Types ───────────────────────────────────────────────────────────

export const SavedSettingsSchema = z.object({
  /** Max work units in flight */
  jobs: z.number().int().positive().optional(),
  /** Default conflict mode for install */
  mode: z.enum(['abort', 'delete', 'backup', 'skip', 'prompt']).optional(),
  /** Continue with the other elements when one fails */
  robust: z.boolean().optional(),
  /** Backup directory, relative to the workspace */
  backupDir: z.string().min(1).optional(),
  /** Manifest file name inside the workspace */
  manifest: z.string().min(1).optional(),
}).strict();

export type SavedSettings = z.infer<typeof SavedSettingsSchema>;

export interface Settings {
  jobs: number;
  mode: InstallMode;
  robust: boolean;
  backupDir?: string;
  manifest: string;
}

export type SettingsKey = keyof Settings;

export const DEFAULT_MANIFEST = '.treesync.yaml';

export const DEFAULT_SETTINGS: Settings = {
  jobs: DEFAULT_MAX_CONCURRENCY,
  mode: 'abort',
  robust: false,
  manifest: DEFAULT_MANIFEST,
};

const SETTINGS_FILE = 'config.json';

export interface ResolveSettingsOptions {
  /** Explicit overrides from the command line */
  flags?: SavedSettings;
  env?: NodeJS.ProcessEnv;
  /** Home directory holding ~/.config/treesync (default: os.homedir()) */
  home?: string;
}

// ─── Settings file paths ─────────────────────────────────────────────

/** Project-level settings: <root>/.treesync/config.json */
export function projectSettingsPath(root: string): string {
  return join(root, '.treesync', SETTINGS_FILE);
}

/** Global settings: ~/.config/treesync/config.json */
export function globalSettingsPath(home: string = homedir()): string {
  return join(home, '.config', 'treesync', SETTINGS_FILE);
}

// ─── Read/write helpers ──────────────────────────────────────────────

function readSettingsFile(path: string): SavedSettings | null {
  if (!existsSync(path)) return null;
  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(path, 'utf-8'));
  } catch (err) {
    throw new ConfigurationError(`Invalid JSON in ${path}`, { cause: err });
  }
  const parsed = SavedSettingsSchema.safeParse(raw);
  if (!parsed.success) {
    throw new ConfigurationError(`Invalid settings in ${path}: ${formatIssues(parsed.error)}`);
  }
  return parsed.data;
}

function writeSettingsFile(path: string, data: SavedSettings): void {
  const parsed = SavedSettingsSchema.safeParse(data);
  if (!parsed.success) {
    throw new ConfigurationError(`Refusing to save invalid settings: ${formatIssues(parsed.error)}`);
  }
  mkdirSync(dirname(path), { recursive: true });
  writeFileSync(path, JSON.stringify(parsed.data, null, 2) + '\n');
}

function formatIssues(error: z.ZodError): string {
  return error.issues
    .map(issue => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
    .join('; ');
}

/** TREESYNC_* variables as saved-settings shape */
export function settingsFromEnv(env: NodeJS.ProcessEnv): SavedSettings {
  const raw: Record<string, unknown> = {};
  if (env.TREESYNC_JOBS) raw.jobs = Number(env.TREESYNC_JOBS);
  if (env.TREESYNC_MODE) raw.mode = env.TREESYNC_MODE;
  if (env.TREESYNC_ROBUST) raw.robust = ['1', 'true', 'yes'].includes(env.TREESYNC_ROBUST.toLowerCase());
  if (env.TREESYNC_BACKUP_DIR) raw.backupDir = env.TREESYNC_BACKUP_DIR;
  if (env.TREESYNC_MANIFEST) raw.manifest = env.TREESYNC_MANIFEST;

  const parsed = SavedSettingsSchema.safeParse(raw);
  if (!parsed.success) {
    throw new ConfigurationError(`Invalid TREESYNC_* environment: ${formatIssues(parsed.error)}`);
  }
  return parsed.data;
}

// ─── Unified resolution ──────────────────────────────────────────────

interface Layer {
  source: string;
  values: SavedSettings;
}

function settingsLayers(root: string, options: ResolveSettingsOptions): Layer[] {
  const layers: Layer[] = [];
  if (options.flags) layers.push({ source: 'CLI flags', values: options.flags });
  layers.push({ source: 'TREESYNC_* env vars', values: settingsFromEnv(options.env ?? process.env) });
  const project = readSettingsFile(projectSettingsPath(root));
  if (project) layers.push({ source: '.treesync/config.json', values: project });
  const global = readSettingsFile(globalSettingsPath(options.home));
  if (global) layers.push({ source: '~/.config/treesync/config.json', values: global });
  return layers;
}

function pick<K extends keyof SavedSettings>(layers: Layer[], key: K): { value: SavedSettings[K]; source: string } | null {
  for (const layer of layers) {
    const value = layer.values[key];
    if (value !== undefined) return { value, source: layer.source };
  }
  return null;
}

/**
 * Resolve settings for the workspace at `root` using the priority chain.
 */
export function resolveSettings(root: string, options: ResolveSettingsOptions = {}): Settings {
  const layers = settingsLayers(root, options);
  const settings: Settings = {
    jobs: pick(layers, 'jobs')?.value ?? DEFAULT_SETTINGS.jobs,
    mode: pick(layers, 'mode')?.value ?? DEFAULT_SETTINGS.mode,
    robust: pick(layers, 'robust')?.value ?? DEFAULT_SETTINGS.robust,
    manifest: pick(layers, 'manifest')?.value ?? DEFAULT_SETTINGS.manifest,
  };
  const backupDir = pick(layers, 'backupDir')?.value;
  if (backupDir) settings.backupDir = backupDir;
  return settings;
}

/** Where each resolved setting came from */
export function describeSettingsSource(
  root: string,
  options: ResolveSettingsOptions = {},
): Record<SettingsKey, string> {
  const layers = settingsLayers(root, options);
  const sourceOf = (key: SettingsKey) => pick(layers, key)?.source ?? 'default';
  return {
    jobs: sourceOf('jobs'),
    mode: sourceOf('mode'),
    robust: sourceOf('robust'),
    backupDir: sourceOf('backupDir'),
    manifest: sourceOf('manifest'),
  };
}

// ─── Save/load for `treesync config` ─────────────────────────────────

export function loadProjectSettings(root: string): SavedSettings | null {
  return readSettingsFile(projectSettingsPath(root));
}

export function loadGlobalSettings(home?: string): SavedSettings | null {
  return readSettingsFile(globalSettingsPath(home));
}

export function saveProjectSettings(root: string, settings: SavedSettings): void {
  writeSettingsFile(projectSettingsPath(root), settings);
}

export function saveGlobalSettings(settings: SavedSettings, home?: string): void {
  writeSettingsFile(globalSettingsPath(home), settings);
}
