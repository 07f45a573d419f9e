/**
 * treesync Commands — Install or update every element of a Config.
 *
 * Two phases:
 *   1. Prepare, sequentially and in config order: each element compares its
 *      tree with the declaration and may ask the prompter what to do.
 *   2. Install, in parallel: every prepared element checks out or updates.
 *
 * In robust mode a failing element is logged and the run continues; the
 * overall result then reports success=false.
 */

import { mkdir } from 'node:fs/promises';
import { join } from 'node:path';
import type {
  ConfigElement,
  ElementOutcome,
  InstallMode,
  PreparationReport,
  Prompter,
  SyncResult,
} from '../types/index.js';
import type { Config } from '../config/index.js';
import { InstallError, PreparationError, errorMessage } from '../errors/index.js';
import { silentLog, type Log } from '../log/index.js';
import { DistributedWork } from '../work/index.js';

export interface InstallOptions {
  /** Backup directory relative to the workspace base path */
  backupDir?: string;
  mode?: InstallMode;
  /** Continue with the remaining elements when one fails */
  robust?: boolean;
  prompter?: Prompter;
  maxConcurrency?: number;
  log?: Log;
  /** Stops install units that have not started yet */
  signal?: AbortSignal;
}

type OutcomeMap = Map<ConfigElement, Omit<ElementOutcome, 'localName' | 'path'>>;

/**
 * Bring every element's tree in line with its declaration.
 *
 * @throws PreparationError - a conflict or preparation failure outside robust mode
 * @throws InstallError - an install unit failed outside robust mode
 */
export async function syncWorkspace(config: Config, options: InstallOptions = {}): Promise<SyncResult> {
  const { mode = 'abort', robust = false, log = silentLog } = options;
  const basePath = config.getBasePath();
  const elements = config.getElements();
  const outcomes: OutcomeMap = new Map();
  let success = true;

  await mkdir(basePath, { recursive: true });

  // ── Phase 1: prepare ──
  const absoluteBackupPath = options.backupDir !== undefined ? join(basePath, options.backupDir) : undefined;
  const claimedBackupTargets = new Set<string>();
  const reports: PreparationReport[] = [];

  for (const element of elements) {
    let report: PreparationReport | null = null;
    try {
      report = await element.prepareInstall({
        backupPath: absoluteBackupPath,
        mode,
        robust,
        prompter: options.prompter,
        claimedBackupTargets,
      });
      if (!report) {
        outcomes.set(element, { status: 'unchanged' });
        continue;
      }
      if (report.abort) {
        throw new PreparationError(`Aborting install because of ${report.error ?? 'a conflict'}`);
      }
      if (report.skip) {
        log.warn(`Skipping install of ${element.localName} because: ${report.error ?? 'no reason given'}`);
        outcomes.set(element, { status: 'skipped', message: report.error });
        continue;
      }
      reports.push(report);
    } catch (err) {
      const failure = `Failed to install tree '${element.path}': ${errorMessage(err)}`;
      if (!robust) {
        throw new PreparationError(failure, { cause: err });
      }
      success = false;
      log.error(`Continuing despite ${failure}`);
      outcomes.set(element, {
        status: report?.abort ? 'aborted' : 'failed',
        message: errorMessage(err),
      });
    }
  }

  // ── Phase 2: install ──
  const work = new DistributedWork<PreparationReport>({
    maxConcurrency: options.maxConcurrency,
    signal: options.signal,
  });
  for (const report of reports) {
    work.add({
      label: report.element.localName,
      execute: () => installOne(report, log),
    });
  }

  const results = await work.settle();
  const failures: InstallError[] = [];
  results.forEach((result, index) => {
    const report = reports[index];
    if (result.ok) {
      outcomes.set(report.element, { status: report.checkout ? 'installed' : 'updated' });
      return;
    }
    const error = asInstallError(result.error, report.element);
    failures.push(error);
    outcomes.set(report.element, { status: 'failed', message: error.message });
  });

  if (failures.length > 0) {
    if (!robust) throw failures[0];
    success = false;
    log.error(`Errors during install: ${failures.map(f => f.message).join('; ')}`);
  }

  return {
    success,
    outcomes: elements.map(element => ({
      localName: element.localName,
      path: element.path,
      ...(outcomes.get(element) ?? { status: 'unchanged' as const }),
    })),
  };
}

/**
 * Boolean form of syncWorkspace: true when every element succeeded.
 */
export async function installOrUpdate(config: Config, options: InstallOptions = {}): Promise<boolean> {
  const result = await syncWorkspace(config, options);
  return result.success;
}

async function installOne(report: PreparationReport, log: Log): Promise<PreparationReport> {
  const { element } = report;
  if (report.checkout) {
    log.info(`[${element.localName}] Fetching ${element.uri ?? element.path} (version ${element.version ?? 'default'}) to ${element.path}`);
  } else {
    log.info(`[${element.localName}] Updating ${element.path}`);
  }
  await element.install(report);
  log.info(`[${element.localName}] Done.`);
  return report;
}

function asInstallError(error: unknown, element: ConfigElement): InstallError {
  if (error instanceof InstallError) return error;
  return new InstallError(`[${element.localName}] ${errorMessage(error)}`, { cause: error });
}
