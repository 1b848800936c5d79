import type { RegisteredEntry } from '../config/schema.js';

/** A revision resolved inside a nested repository. */
export interface ResolvedRevision {
  /** Full object id of the commit. */
  oid: string;
  /** Full ref name when the spec named a local branch (`refs/heads/...`). */
  branch?: string;
}

/** A repository checked out at a submodule path. */
export interface NestedRepository {
  readonly path: string;

  /** Fetch branches and tags (and `version` itself) from `remote`. */
  fetch(remote: string, version: string): Promise<void>;

  /**
   * Resolve a revision spec to a commit.
   * Throws `ReferenceNotFoundError` when nothing matches; anything else is a
   * `VcsOperationError`.
   */
  resolve(spec: string): Promise<ResolvedRevision>;

  /**
   * Point HEAD at `revision` (attached when it names a local branch, detached
   * otherwise) and, when `materialize` is set, update the working tree to match.
   */
  checkout(revision: ResolvedRevision, materialize: boolean): Promise<void>;

  headCommit(): Promise<string | undefined>;
  hasLocalChanges(): Promise<boolean>;
  hasCommit(oid: string): Promise<boolean>;
  setOriginUrl(url: string): Promise<void>;
}

/**
 * The host repository handle threaded through every component.
 * Only `listSubmodules` reads the set of registered entries.
 */
export interface HostRepository {
  readonly root: string;

  listSubmodules(): Promise<RegisteredEntry[]>;

  /** Paths with staged additions, modifications or deletions relative to HEAD. */
  stagedChanges(): Promise<string[]>;

  /** True when `path` exists below the root and is not an empty directory. */
  isOccupied(path: string): Promise<boolean>;

  // ─── Add / Update ─────────────────────────────────────────────────

  /** Write the submodule's host config and `.gitmodules` section. */
  registerSubmodule(name: string, path: string, url: string): Promise<void>;

  /** Clone `url` into `path` without materializing files. */
  cloneSubmodule(name: string, path: string, url: string): Promise<NestedRepository>;

  /** Open the nested repository at `path`, or `null` when there is none. */
  openSubmodule(path: string): Promise<NestedRepository | null>;

  /** Rewrite the recorded URL in host config and `.gitmodules`. */
  setSubmoduleUrl(name: string, url: string): Promise<void>;

  /** Stage `.gitmodules` and the gitlink, and move the git dir into the module store. */
  finalizeSubmodule(name: string, path: string): Promise<void>;

  /** Re-stage a submodule path so the index records its current HEAD. */
  stagePath(path: string): Promise<void>;

  // ─── Teardown ─────────────────────────────────────────────────────

  /** Strip `submodule.<name>.*` keys from host config; absent keys are fine. */
  unsetSubmoduleConfig(name: string): Promise<void>;

  /** Remove `path` from the index; a path that is not staged is fine. */
  unstagePath(path: string): Promise<void>;

  /**
   * Drop the `[submodule "<name>"]` section from `.gitmodules`, deleting the
   * file when nothing remains, and stage the result.
   */
  dropGitmodulesSection(name: string): Promise<void>;

  /** Delete the submodule's git dir under the host's module store. */
  deleteModuleStore(name: string): Promise<void>;

  /** Delete the submodule's working tree directory. */
  deleteWorktree(path: string): Promise<void>;

  // ─── .gitmodules ──────────────────────────────────────────────────

  /** Working-tree text of `.gitmodules`, or `null` when the file is absent. */
  readGitmodules(): Promise<string | null>;

  /**
   * Write `.gitmodules` back to `content` (deleting it for `null`) and reset
   * its index entry to the committed version.
   */
  restoreGitmodules(content: string | null): Promise<void>;

  /** Create a directory (and parents) below the host root. */
  ensureDirectory(path: string): Promise<void>;
}
