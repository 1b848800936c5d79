export { GitHostRepository, GitNestedRepository } from './git-host.js';
export type { HostRepository, NestedRepository, ResolvedRevision } from './host.js';
export { Reconciler, type ReconcilePlan, type ReconcileRequest } from './reconciler.js';
export { OperationExecutor, resolveWithFallback, type ExecutorOptions } from './executor.js';
export { RollbackCoordinator } from './rollback.js';
export { StateSnapshot, type RestoreResult } from './snapshot.js';
export { classify, isUnderPrefix } from './classifier.js';
export { selectRepositories, desiredRepositories, hostPath, type SelectionFilters } from './selector.js';
export { validateHost, assessSubmodule } from './validator.js';
export { teardownSubmodule, type TeardownStepOutcome } from './teardown.js';
export type { SyncReporter } from './reporter.js';
export * from './errors.js';
