/**
 * treesync — Library entry point.
 *
 * Usage:
 *   import { getConfig, syncWorkspace, status } from 'treesync';
 *   import type { ConfigElement, SyncResult } from 'treesync';
 */

export * from './types/index.js';
export * from './errors/index.js';
export { createConsoleLog, createMemoryLog, silentLog } from './log/index.js';
export type { Log, LogLevel, LogRecord, ConsoleLogOptions } from './log/index.js';
export * from './config/index.js';
export * from './commands/index.js';
export * from './workspace/index.js';
export * from './vcs/index.js';
export * from './work/index.js';
export { createTerminalPrompter, parseConflictAnswer } from './prompt/index.js';
export type { TerminalPrompterOptions } from './prompt/index.js';
