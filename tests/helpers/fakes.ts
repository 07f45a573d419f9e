import { mkdtempSync } from 'node:fs';
import { mkdir } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import type {
  ConfigElement,
  ConflictChoice,
  ElementDeclaration,
  PreparationReport,
  PrepareInstallOptions,
  Prompter,
  ScmType,
} from '../../src/types/index.js';
import { createPreparationReport } from '../../src/types/index.js';
import type { VcsClient } from '../../src/vcs/index.js';
import type { CommandResult, CommandRunner } from '../../src/vcs/runner.js';

export function makeTempDir(prefix = 'treesync-'): string {
  return mkdtempSync(join(tmpdir(), prefix));
}

// ─── Elements ────────────────────────────────────────────────────────

export interface FakeElementBehaviour {
  /** Report overrides; null means "nothing to do" */
  report?: Partial<Omit<PreparationReport, 'element'>> | null;
  prepareError?: Error;
  installError?: Error;
  status?: string | null;
  diff?: string | null;
  scmType?: ScmType;
}

/** ConfigElement whose prepare/install outcome is scripted */
export class FakeElement implements ConfigElement {
  readonly scmType: ScmType;
  readonly uri: string;
  readonly version?: string;
  readonly prepareCalls: PrepareInstallOptions[] = [];
  readonly installCalls: PreparationReport[] = [];

  constructor(
    readonly localName: string,
    readonly path: string,
    private readonly behaviour: FakeElementBehaviour = {},
  ) {
    this.scmType = behaviour.scmType ?? 'git';
    this.uri = `https://example.com/${localName}.git`;
  }

  isVcsElement(): boolean {
    return this.scmType !== 'none';
  }

  async getStatus(): Promise<string | null> {
    return this.behaviour.status ?? null;
  }

  async getDiff(): Promise<string | null> {
    return this.behaviour.diff ?? null;
  }

  async prepareInstall(options: PrepareInstallOptions): Promise<PreparationReport | null> {
    this.prepareCalls.push(options);
    if (this.behaviour.prepareError) throw this.behaviour.prepareError;
    if (this.behaviour.report === null) return null;
    return createPreparationReport(this, this.behaviour.report ?? {});
  }

  async install(report: PreparationReport): Promise<void> {
    this.installCalls.push(report);
    if (this.behaviour.installError) throw this.behaviour.installError;
  }

  async getVersion(): Promise<string | null> {
    return null;
  }

  toDeclaration(): ElementDeclaration {
    return { localName: this.localName, path: this.path, scmType: this.scmType, uri: this.uri };
  }
}

// ─── VCS client ──────────────────────────────────────────────────────

export interface FakeClientOptions {
  present?: boolean;
  url?: string | null;
  checkoutError?: Error;
  updateError?: Error;
}

/** In-memory VcsClient; checkout creates the tree directory */
export class FakeVcsClient implements VcsClient {
  readonly scmType: ScmType = 'git';
  present: boolean;
  readonly calls: string[] = [];

  constructor(readonly path: string, private readonly options: FakeClientOptions = {}) {
    this.present = options.present ?? false;
  }

  async detectPresence(): Promise<boolean> {
    return this.present;
  }

  async getUrl(): Promise<string | null> {
    return this.options.url ?? null;
  }

  urlMatches(actual: string, requested: string): boolean {
    return actual === requested;
  }

  async checkout(uri: string, version?: string): Promise<void> {
    this.calls.push(`checkout ${uri} ${version ?? '-'}`);
    if (this.options.checkoutError) throw this.options.checkoutError;
    await mkdir(this.path, { recursive: true });
    this.present = true;
  }

  async update(version?: string): Promise<void> {
    this.calls.push(`update ${version ?? '-'}`);
    if (this.options.updateError) throw this.options.updateError;
  }

  async getStatus(): Promise<string> {
    return 'M  file.txt\n';
  }

  async getDiff(): Promise<string> {
    return '';
  }

  async getVersion(): Promise<string | null> {
    return 'abc123';
  }
}

// ─── Prompter ────────────────────────────────────────────────────────

export class ScriptedPrompter implements Prompter {
  readonly messages: string[] = [];

  constructor(private readonly choice: ConflictChoice, private readonly backupPath = '') {}

  async chooseConflictResolution(message: string): Promise<ConflictChoice> {
    this.messages.push(message);
    return this.choice;
  }

  async askBackupPath(): Promise<string> {
    return this.backupPath;
  }
}

// ─── Command runner ──────────────────────────────────────────────────

export interface RecordedCommand {
  command: string;
  args: string[];
  cwd?: string;
}

/**
 * Runner that answers from `respond` (keyed by the joined arguments) and
 * records every invocation. Unscripted commands succeed with empty output.
 */
export function scriptedRunner(
  respond: Record<string, Partial<CommandResult>> = {},
): CommandRunner & { calls: RecordedCommand[] } {
  const calls: RecordedCommand[] = [];
  const runner = async (command: string, args: readonly string[], options: { cwd?: string } = {}) => {
    calls.push({ command, args: [...args], cwd: options.cwd });
    const scripted = respond[args.join(' ')] ?? {};
    return { stdout: scripted.stdout ?? '', stderr: scripted.stderr ?? '', exitCode: scripted.exitCode ?? 0 };
  };
  return Object.assign(runner, { calls });
}
