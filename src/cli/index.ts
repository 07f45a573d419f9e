#!/usr/bin/env node

/**
 * treesync CLI
 *
 * Usage:
 *   treesync install            Check out or update every declared tree
 *   treesync status [name]      Change status of the version-controlled trees
 *   treesync diff [name]        Uncommitted changes of the version-controlled trees
 *   treesync list               Declared elements
 *   treesync merge <uri...>     Add declarations to the workspace manifest
 *   treesync discover           Trees on disk the manifest does not declare
 *   treesync versions           Versions of the installed VCS tools
 *   treesync config <action>    Manage saved settings
 */

import { Command, InvalidArgumentError } from 'commander';
import { readFileSync } from 'node:fs';
import { join, resolve } from 'node:path';
import gradient from 'gradient-string';
import { z } from 'zod';
import type { ElementOutcome, InstallMode } from '../types/index.js';
import { ConfigurationError, isWorkspaceError } from '../errors/index.js';
import { C, createConsoleLog, type Log } from '../log/index.js';
import {
  SavedSettingsSchema,
  describeSettingsSource,
  loadGlobalSettings,
  loadProjectSettings,
  resolveSettings,
  saveGlobalSettings,
  saveProjectSettings,
  type SavedSettings,
  type Settings,
} from '../config/index.js';
import {
  diff,
  getConfig,
  mergeConfig,
  persistConfig,
  status,
  syncWorkspace,
  versions,
} from '../commands/index.js';
import { findUndeclaredTrees } from '../workspace/index.js';
import { createDefaultRegistry } from '../vcs/index.js';
import { createTerminalPrompter } from '../prompt/index.js';

const program = new Command();

const ASCII_LOGO = `
 ▀█▀ █▀█ █▀▀ █▀▀ █▀ █▄█ █▄ █ █▀▀
  █  █▀▄ ██▄ ██▄ ▄█  █  █ ▀█ █▄▄
`;

const PackageJsonSchema = z.object({ version: z.string() });

function packageVersion(): string {
  const raw: unknown = JSON.parse(readFileSync(new URL('../../package.json', import.meta.url), 'utf-8'));
  const parsed = PackageJsonSchema.safeParse(raw);
  return parsed.success ? parsed.data.version : '0.0.0';
}

program
  .name('treesync')
  .description('Keep a workspace of version-controlled source trees in sync with a manifest')
  .version(packageVersion())
  .option('-v, --verbose', 'Print debug output')
  .addHelpText('before', gradient(['#00ff41', '#00d4ff'])(ASCII_LOGO));

// ─── Shared helpers ──────────────────────────────────────────────────

interface WorkspaceOpts {
  targetWorkspace: string;
  config?: string[];
  jobs?: number;
}

function withWorkspaceOptions(command: Command): Command {
  return command
    .option('-t, --target-workspace <dir>', 'Workspace directory', '.')
    .option('-c, --config <uri...>', 'Manifest files, directories or URLs to read instead of the workspace manifest')
    .option('-j, --jobs <n>', 'Maximum parallel jobs', parseIntegerOption);
}

function parseIntegerOption(value: string): number {
  const n = Number(value);
  if (!Number.isInteger(n)) throw new InvalidArgumentError('Not an integer.');
  return n;
}

function parseInteger(value: string): number {
  const n = Number(value);
  if (!Number.isInteger(n)) {
    throw new ConfigurationError(`Not an integer: ${value}`);
  }
  return n;
}

function cliLog(): Log {
  return createConsoleLog({ verbose: program.opts<{ verbose?: boolean }>().verbose ?? false });
}

/** User-supplied paths are relative to the current directory; URLs pass through */
function resolveUris(uris: readonly string[] | undefined): string[] | undefined {
  return uris?.map(uri => (/^https?:\/\//i.test(uri) ? uri : resolve(uri)));
}

function settingsFor(root: string, flags: SavedSettings): Settings {
  const parsed = SavedSettingsSchema.safeParse(flags);
  if (!parsed.success) {
    throw new ConfigurationError(`Invalid option: ${parsed.error.issues.map(i => i.message).join('; ')}`);
  }
  return resolveSettings(root, { flags: parsed.data });
}

async function loadWorkspace(opts: WorkspaceOpts) {
  const root = resolve(opts.targetWorkspace);
  const settings = settingsFor(root, opts.jobs === undefined ? {} : { jobs: opts.jobs });
  const config = await getConfig(root, resolveUris(opts.config), settings.manifest);
  return { root, settings, config };
}

/** Run an action; engine errors print one line and exit 1 */
function action<A extends unknown[]>(fn: (...args: A) => Promise<void>): (...args: A) => Promise<void> {
  return async (...args: A) => {
    try {
      await fn(...args);
    } catch (err) {
      if (!isWorkspaceError(err)) throw err;
      cliLog().error(err.message);
      process.exit(1);
    }
  };
}

// ─── install ─────────────────────────────────────────────────────────

interface InstallOpts extends WorkspaceOpts {
  backupDir?: string;
  deleteChanged?: boolean;
  abortChanged?: boolean;
  skipChanged?: boolean;
  prompt?: boolean;
  continueOnError?: boolean;
}

function modeFromFlags(opts: InstallOpts): InstallMode | undefined {
  const chosen: InstallMode[] = [];
  if (opts.deleteChanged) chosen.push('delete');
  if (opts.abortChanged) chosen.push('abort');
  if (opts.skipChanged) chosen.push('skip');
  if (opts.prompt) chosen.push('prompt');
  if (chosen.length > 1) {
    throw new ConfigurationError(`Conflicting options: choose one of ${chosen.join(', ')}`);
  }
  if (chosen.length === 0 && opts.backupDir !== undefined) return 'backup';
  return chosen[0];
}

withWorkspaceOptions(
  program
    .command('install')
    .description('Check out missing trees and update existing ones'),
)
  .option('--backup-dir <dir>', 'Move conflicting trees here (relative to the workspace) before checkout')
  .option('--delete-changed', 'Delete conflicting trees')
  .option('--abort-changed', 'Stop at the first conflicting tree')
  .option('--skip-changed', 'Leave conflicting trees alone')
  .option('--prompt', 'Ask what to do with each conflicting tree')
  .option('--continue-on-error', 'Keep going when a tree fails')
  .action(action(async (opts: InstallOpts) => {
    const log = cliLog();
    const root = resolve(opts.targetWorkspace);
    const mode = modeFromFlags(opts);
    const settings = settingsFor(root, {
      ...(opts.jobs !== undefined ? { jobs: opts.jobs } : {}),
      ...(mode ? { mode } : {}),
      ...(opts.continueOnError ? { robust: true } : {}),
      ...(opts.backupDir !== undefined ? { backupDir: opts.backupDir } : {}),
    });

    const uris = resolveUris(opts.config);
    const config = uris && uris.length > 0
      ? await mergeConfig(root, settings.manifest, uris)
      : await getConfig(root, undefined, settings.manifest);
    if (uris && uris.length > 0) {
      await persistConfig(config, join(root, settings.manifest));
      log.debug(`Wrote ${join(root, settings.manifest)}`);
    }

    const result = await syncWorkspace(config, {
      backupDir: settings.backupDir,
      mode: settings.mode,
      robust: settings.robust,
      prompter: settings.mode === 'prompt' ? createTerminalPrompter() : undefined,
      maxConcurrency: settings.jobs,
      log,
    });

    for (const outcome of result.outcomes) log.info(formatOutcome(outcome));
    if (!result.success) {
      log.error('Install finished with errors.');
      process.exit(1);
    }
    log.info(C.success('✓ Workspace up to date.'));
  }));

function formatOutcome(outcome: ElementOutcome): string {
  const label = `${C.name(outcome.localName.padEnd(20))} ${outcome.status.padEnd(10)}`;
  const line = outcome.message ? `${label} ${C.dim(outcome.message)}` : label;
  return outcome.status === 'failed' || outcome.status === 'aborted' ? C.error(line) : line;
}

// ─── status / diff ───────────────────────────────────────────────────

withWorkspaceOptions(
  program
    .command('status')
    .description('Show changed files of every version-controlled tree')
    .argument('[localName]', 'Only this element (local name or path)'),
)
  .option('-u, --untracked', 'Include untracked files')
  .action(action(async (localName: string | undefined, opts: WorkspaceOpts & { untracked?: boolean }) => {
    const { settings, config } = await loadWorkspace(opts);
    const entries = await status(config, {
      localName,
      untracked: opts.untracked ?? false,
      maxConcurrency: settings.jobs,
    });
    for (const entry of entries) {
      if (entry.status) process.stdout.write(entry.status);
    }
  }));

withWorkspaceOptions(
  program
    .command('diff')
    .description('Show uncommitted changes of every version-controlled tree')
    .argument('[localName]', 'Only this element (local name or path)'),
)
  .action(action(async (localName: string | undefined, opts: WorkspaceOpts) => {
    const { settings, config } = await loadWorkspace(opts);
    const entries = await diff(config, {
      localName,
      maxConcurrency: settings.jobs,
    });
    for (const entry of entries) {
      if (!entry.diff) continue;
      process.stdout.write(entry.diff.endsWith('\n') ? entry.diff : entry.diff + '\n');
    }
  }));

// ─── list ────────────────────────────────────────────────────────────

withWorkspaceOptions(
  program
    .command('list')
    .description('List the declared elements'),
)
  .action(action(async (opts: WorkspaceOpts) => {
    const { root, config } = await loadWorkspace(opts);
    console.log(C.bold(`Workspace: ${root}`));
    console.log(`${'─'.repeat(40)}`);
    for (const element of config.getElements()) {
      const version = element.version ? ` ${C.dim(`(${element.version})`)}` : '';
      const uri = element.uri ? ` ${element.uri}` : '';
      console.log(`${C.name(element.localName.padEnd(20))} ${element.scmType.padEnd(5)}${uri}${version}`);
    }
  }));

// ─── merge ───────────────────────────────────────────────────────────

program
  .command('merge')
  .description('Merge manifests, directories or URLs into the workspace manifest')
  .argument('<uri...>', 'Sources to merge; later declarations override earlier ones')
  .option('-t, --target-workspace <dir>', 'Workspace directory', '.')
  .action(action(async (uris: string[], opts: { targetWorkspace: string }) => {
    const root = resolve(opts.targetWorkspace);
    const settings = settingsFor(root, {});
    const config = await mergeConfig(root, settings.manifest, resolveUris(uris) ?? []);
    const target = join(root, settings.manifest);
    await persistConfig(config, target);
    console.log(`✓ Wrote ${config.size} element(s) to ${target}`);
  }));

// ─── discover ────────────────────────────────────────────────────────

withWorkspaceOptions(
  program
    .command('discover')
    .description('List version-controlled trees in the workspace that are not declared'),
)
  .option('-d, --depth <n>', 'Directory levels to search', parseIntegerOption, 3)
  .action(action(async (opts: WorkspaceOpts & { depth: number }) => {
    const { root, config } = await loadWorkspace(opts);
    const trees = await findUndeclaredTrees(root, config.getElements(), { depth: opts.depth });
    if (trees.length === 0) {
      console.log('No undeclared trees found.');
      return;
    }
    for (const tree of trees) {
      console.log(`${tree.scmType.padEnd(5)} ${tree.relativePath}`);
    }
  }));

// ─── versions ────────────────────────────────────────────────────────

program
  .command('versions')
  .description('Show the versions of the VCS tools treesync drives')
  .action(action(async () => {
    for (const backend of await versions(createDefaultRegistry())) {
      const detail = backend.details.error ? ` ${C.dim(backend.details.error)}` : '';
      console.log(`${backend.scmType.padEnd(5)} ${backend.version}${detail}`);
    }
  }));

// ─── config ──────────────────────────────────────────────────────────

const SETTING_KEYS = ['jobs', 'mode', 'robust', 'backup-dir', 'manifest'] as const;
type SettingName = typeof SETTING_KEYS[number];

function isSettingName(key: string): key is SettingName {
  return SETTING_KEYS.some(k => k === key);
}

function applySetting(existing: SavedSettings, key: SettingName, value: string): SavedSettings {
  switch (key) {
    case 'jobs':
      return { ...existing, jobs: parseInteger(value) };
    case 'mode': {
      const mode = SavedSettingsSchema.shape.mode.safeParse(value);
      if (!mode.success || mode.data === undefined) {
        throw new ConfigurationError(`Unknown mode: ${value}. Use: abort, delete, backup, skip, prompt`);
      }
      return { ...existing, mode: mode.data };
    }
    case 'robust':
      return { ...existing, robust: ['1', 'true', 'yes'].includes(value.toLowerCase()) };
    case 'backup-dir':
      return { ...existing, backupDir: value };
    case 'manifest':
      return { ...existing, manifest: value };
  }
}

program
  .command('config')
  .description('Manage saved settings')
  .argument('<action>', 'Action: show, set, clear')
  .argument('[key]', `Setting: ${SETTING_KEYS.join(', ')}`)
  .argument('[value]', 'Value to set')
  .option('-t, --target-workspace <dir>', 'Workspace directory', '.')
  .option('--global', 'Use global settings (~/.config/treesync/) instead of the workspace')
  .action(action(async (
    actionName: string,
    key: string | undefined,
    value: string | undefined,
    opts: { targetWorkspace: string; global?: boolean },
  ) => {
    const root = resolve(opts.targetWorkspace);
    const isGlobal = opts.global ?? false;

    switch (actionName) {
      case 'show': {
        const settings = resolveSettings(root);
        const source = describeSettingsSource(root);
        console.log(`Jobs:        ${settings.jobs}  ${C.dim(source.jobs)}`);
        console.log(`Mode:        ${settings.mode}  ${C.dim(source.mode)}`);
        console.log(`Robust:      ${settings.robust}  ${C.dim(source.robust)}`);
        console.log(`Backup dir:  ${settings.backupDir ?? '(none)'}  ${C.dim(source.backupDir)}`);
        console.log(`Manifest:    ${settings.manifest}  ${C.dim(source.manifest)}`);
        break;
      }

      case 'set': {
        if (!key || value === undefined) {
          throw new ConfigurationError(`Usage: treesync config set <key> <value> (keys: ${SETTING_KEYS.join(', ')})`);
        }
        if (!isSettingName(key)) {
          throw new ConfigurationError(`Unknown setting: ${key}. Use: ${SETTING_KEYS.join(', ')}`);
        }
        if (isGlobal) {
          saveGlobalSettings(applySetting(loadGlobalSettings() ?? {}, key, value));
          console.log('✓ Saved to ~/.config/treesync/config.json');
        } else {
          saveProjectSettings(root, applySetting(loadProjectSettings(root) ?? {}, key, value));
          console.log('✓ Saved to .treesync/config.json');
        }
        break;
      }

      case 'clear':
        if (isGlobal) {
          saveGlobalSettings({});
          console.log('✓ Global settings cleared.');
        } else {
          saveProjectSettings(root, {});
          console.log('✓ Workspace settings cleared.');
        }
        break;

      default:
        throw new ConfigurationError(`Unknown action: ${actionName}. Use: show, set, clear`);
    }
  }));

program.parseAsync().catch((err: unknown) => {
  console.error(err);
  process.exit(1);
});
