/**
 * Error classes for subsync.
 * Every error carries a `kind` discriminant; control flow (the origin
 * fallback, rollback triggering, exit codes) switches on it, never on messages.
 */

export type SyncErrorKind =
  | 'configuration'
  | 'selection'
  | 'precondition'
  | 'resolution'
  | 'reference-not-found'
  | 'vcs-operation'
  | 'snapshot'
  | 'rollback'
  | 'rolled-back';

/** Base class for all subsync errors. */
export class SyncError extends Error {
  readonly kind: SyncErrorKind;

  constructor(kind: SyncErrorKind, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'SyncError';
    this.kind = kind;
  }
}

/** Malformed repos file entry, bad prefix, or mutually exclusive filters. */
export class ConfigurationError extends SyncError {
  constructor(message: string) {
    super('configuration', message);
    this.name = 'ConfigurationError';
  }
}

/** `--only` / `--ignore` entries that are unknown or contradict each other. */
export class SelectionError extends SyncError {
  readonly entries: string[];

  constructor(message: string, entries: string[]) {
    super('selection', message);
    this.name = 'SelectionError';
    this.entries = entries;
  }
}

/** The host or one of its submodules is not in a state the engine can start from. */
export class PreconditionError extends SyncError {
  constructor(message: string) {
    super('precondition', message);
    this.name = 'PreconditionError';
  }
}

/** A version could not be resolved, neither directly nor as `origin/<version>`. */
export class ResolutionError extends SyncError {
  readonly version: string;

  constructor(version: string, repoPath: string) {
    super('resolution', `Cannot resolve version '${version}' in ${repoPath} (also tried origin/${version})`);
    this.name = 'ResolutionError';
    this.version = version;
  }
}

/**
 * Raised by `NestedRepository.resolve` when the spec names no object.
 * The only error kind that triggers the origin fallback.
 */
export class ReferenceNotFoundError extends SyncError {
  readonly spec: string;

  constructor(spec: string) {
    super('reference-not-found', `Reference not found: ${spec}`);
    this.name = 'ReferenceNotFoundError';
    this.spec = spec;
  }
}

/** Any underlying git primitive failure not otherwise classified. */
export class VcsOperationError extends SyncError {
  readonly command?: string;

  constructor(message: string, options?: { command?: string; cause?: unknown }) {
    super('vcs-operation', message, { cause: options?.cause });
    this.name = 'VcsOperationError';
    this.command = options?.command;
  }
}

/** The pre-run state could not be captured. */
export class SnapshotError extends SyncError {
  constructor(message: string) {
    super('snapshot', message);
    this.name = 'SnapshotError';
  }
}

export interface RollbackFailure {
  target: string;
  message: string;
}

/** Best-effort restoration could not complete for some entries. */
export class RollbackError extends SyncError {
  readonly failures: RollbackFailure[];

  constructor(failures: RollbackFailure[]) {
    super('rollback', `Rollback incomplete for ${failures.length} entr${failures.length === 1 ? 'y' : 'ies'}: `
      + failures.map((f) => `${f.target} (${f.message})`).join('; '));
    this.name = 'RollbackError';
    this.failures = failures;
  }
}

/** Which operation was running, and on which path, when a run failed. */
export interface FailedOperation {
  action: 'add' | 'update' | 'remove';
  path: string;
}

/**
 * Surfaced after a failed run was rolled back. `cause` is the original error;
 * `rollbackError` is set when restoration was only partial.
 */
export class RolledBackError extends SyncError {
  readonly operation?: FailedOperation;
  readonly rollbackError?: RollbackError;

  constructor(cause: unknown, operation: FailedOperation | undefined, rollbackError?: RollbackError) {
    const during = operation ? ` while ${operation.action === 'add' ? 'adding' : operation.action === 'update' ? 'updating' : 'removing'} ${operation.path}` : '';
    const state = rollbackError ? 'rollback was incomplete' : 'all changes were rolled back';
    super('rolled-back', `Operation failed${during} and ${state}: ${errorMessage(cause)}`, { cause });
    this.name = 'RolledBackError';
    this.operation = operation;
    this.rollbackError = rollbackError;
  }

  get fullyRestored(): boolean {
    return this.rollbackError === undefined;
  }
}

export function isSyncError<K extends SyncErrorKind>(err: unknown, kind: K): err is SyncError & { kind: K } {
  return err instanceof SyncError && err.kind === kind;
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
