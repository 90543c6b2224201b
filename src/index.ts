/**
 * gcl - Gerrit changes from a git working copy
 *
 * Maps local commits to review changes by Change-Id, works out which ones
 * moved on the server or locally, and rebases whole stacks of changes.
 *
 * @example
 * ```typescript
 * import { GerritClient, GitLocalRepository, loadConfig, loadSnapshot, RebaseOrchestrator } from 'gerrit-cl';
 *
 * const { config } = loadConfig();
 * const repo = GitLocalRepository.find();
 * const client = new GerritClient(config);
 *
 * const snapshot = await loadSnapshot(repo, client, config);
 * for (const chain of snapshot.reconciliation.chains()) {
 *   console.log(new RebaseOrchestrator(repo, client).plan(chain, snapshot.base));
 * }
 * ```
 */

// Model
export * from './core/types';
export * from './core/errors';
export * from './core/change-id';

// Engine
export * from './core/change-index';
export * from './core/patch';
export * from './core/reconcile';
export * from './core/rebase';
export * from './core/workspace';

// Boundaries
export * from './core/remote';
export * from './core/local-repository';
export * from './core/config';
export * from './core/gerrit/http';
export * from './core/gerrit/schemas';
export * from './core/gerrit/client';
export * from './core/gerrit/upload';

// Utilities
export { Logger, logger, setLogLevel, setLogFormat, setLogSink } from './utils/logger';
export type { LogLevel, LogEntry, LogSink } from './utils/logger';
