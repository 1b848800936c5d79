import { z } from 'zod';

// ─── Repos File ────────────────────────────────────────────────────

/**
 * One entry of the `repositories` mapping. `type` stays a free string here so
 * an unsupported kind is reported by name rather than as a schema mismatch.
 */
export const RepoEntrySchema = z.object({
  type: z.string(),
  url: z.string().min(1),
  version: z.string().min(1),
});

export type RepoEntry = z.infer<typeof RepoEntrySchema>;

/** Root of a `.repos` file: `repositories` keyed by path relative to the prefix. */
export const ReposFileSchema = z.object({
  repositories: z.record(z.string(), RepoEntrySchema).default({}),
});

export type ReposFile = z.infer<typeof ReposFileSchema>;

/** A validated desired-state entry, keyed by its path below the prefix. */
export interface RepositorySpec {
  readonly key: string;
  readonly kind: 'git';
  readonly url: string;
  readonly version: string;
}

// ─── Run Options ───────────────────────────────────────────────────

export const SyncOptionsSchema = z
  .object({
    only: z.array(z.string()).optional(),
    ignore: z.array(z.string()).optional(),
    skipCheckout: z.boolean().default(false),
    skipExisting: z.boolean().default(false),
    syncSelection: z.boolean().default(false),
    dryRun: z.boolean().default(false),
  });

export type SyncOptions = z.infer<typeof SyncOptionsSchema>;

// ─── Host State ────────────────────────────────────────────────────

/** A submodule the host already knows about, as observed at run start. */
export interface RegisteredEntry {
  name: string;
  path: string;
  url?: string;
  /** HEAD of the nested repository; absent when it is not initialized. */
  commit?: string;
  /** Gitlink recorded in the host index; absent when the path is not staged. */
  recordedCommit?: string;
}

/** Pre-run state of one submodule, consumed only by rollback. */
export interface SnapshotEntry {
  readonly name: string;
  readonly path: string;
  readonly commit: string;
  readonly url: string;
}

// ─── Classification ────────────────────────────────────────────────

export interface DesiredRepository {
  /** Host-relative path: `<prefix>/<key>`. */
  path: string;
  spec: RepositorySpec;
}

export interface UpdatedRepository extends DesiredRepository {
  entry: RegisteredEntry;
}

export interface ClassificationResult {
  new: DesiredRepository[];
  updated: UpdatedRepository[];
  removed: RegisteredEntry[];
}

// ─── Operation Results ─────────────────────────────────────────────

export type SyncAction = 'add' | 'update' | 'remove';

export interface PlannedOperation {
  action: SyncAction;
  path: string;
}

export type RunOutcome = 'applied-dry-run' | 'applied-and-committed' | 'up-to-date' | 'rolled-back';

export interface RunReport {
  outcome: Exclude<RunOutcome, 'rolled-back'>;
  operations: PlannedOperation[];
  /** Registered submodules under the prefix that the selection no longer names. */
  extras: string[];
}

// ─── Submodule Health (status) ─────────────────────────────────────

export type SubmoduleHealth = 'clean' | 'dirty' | 'drifted' | 'uninitialized' | 'unopenable';

export interface SubmoduleState {
  entry: RegisteredEntry;
  health: SubmoduleHealth;
}
