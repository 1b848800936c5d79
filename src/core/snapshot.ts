import { GITMODULES_FILE, ORIGIN_REMOTE } from '../config/branding.js';
import type { RegisteredEntry, SnapshotEntry } from '../config/schema.js';
import { SnapshotError, errorMessage, type RollbackFailure } from './errors.js';
import type { HostRepository } from './host.js';
import type { SyncReporter } from './reporter.js';
import { describeFailures, teardownSubmodule } from './teardown.js';

export interface RestoreResult {
  restored: string[];
  recreated: string[];
  failures: RollbackFailure[];
}

/**
 * Pre-run record of every registered submodule (name, path, commit, URL)
 * and of the `.gitmodules` text. Taken once before any mutation and only
 * read by rollback.
 */
export class StateSnapshot {
  readonly entries: readonly SnapshotEntry[];
  /** `.gitmodules` as it was, `null` when the host had none. */
  readonly gitmodules: string | null;

  private constructor(entries: SnapshotEntry[], gitmodules: string | null) {
    this.entries = entries;
    this.gitmodules = gitmodules;
  }

  /**
   * Capture the registered entries. An entry rollback could not rebuild
   * (no name, no checked-out commit, no URL) is a SnapshotError.
   */
  static capture(registered: readonly RegisteredEntry[], gitmodules: string | null): StateSnapshot {
    const entries: SnapshotEntry[] = [];
    for (const e of registered) {
      if (!e.name) throw new SnapshotError(`Submodule at ${e.path} has no name`);
      if (!e.commit) throw new SnapshotError(`Submodule ${e.name} has no workdir commit`);
      if (!e.url) throw new SnapshotError(`Submodule ${e.name} has no URL`);
      entries.push({ name: e.name, path: e.path, commit: e.commit, url: e.url });
    }
    return new StateSnapshot(entries, gitmodules);
  }

  /**
   * Put every captured submodule back at its commit. Entries that are gone or
   * damaged (unregistered, unopenable, or missing the commit) are scrubbed
   * and recreated from the snapshot; intact ones are reset in place.
   * `.gitmodules` is then written back verbatim, which restores section
   * order and keys recreation does not know about.
   * Every step is attempted; failures are collected, not thrown.
   */
  async rollback(host: HostRepository, reporter: SyncReporter): Promise<RestoreResult> {
    const result: RestoreResult = { restored: [], recreated: [], failures: [] };

    for (const entry of this.entries) {
      reporter.info(`  Restoring ${entry.name} to commit ${entry.commit}`);
      try {
        if (await this.restoreInPlace(host, entry)) {
          result.restored.push(entry.path);
        } else {
          await this.recreate(host, entry, reporter);
          result.recreated.push(entry.path);
        }
      } catch (err) {
        reporter.warn(`  Failed to restore ${entry.name}: ${errorMessage(err)}`);
        result.failures.push({ target: entry.path, message: errorMessage(err) });
      }
    }

    reporter.info(`  Restoring ${GITMODULES_FILE}`);
    try {
      await host.restoreGitmodules(this.gitmodules);
    } catch (err) {
      reporter.warn(`  Failed to restore ${GITMODULES_FILE}: ${errorMessage(err)}`);
      result.failures.push({ target: GITMODULES_FILE, message: errorMessage(err) });
    }
    return result;
  }

  /** Reset an intact submodule. Returns false when it needs recreating. */
  private async restoreInPlace(host: HostRepository, entry: SnapshotEntry): Promise<boolean> {
    const current = (await host.listSubmodules()).find((e) => e.name === entry.name && e.path === entry.path);
    if (!current) return false;

    const nested = await host.openSubmodule(entry.path);
    if (!nested || !(await nested.hasCommit(entry.commit))) return false;

    if (current.url !== entry.url) {
      await host.setSubmoduleUrl(entry.name, entry.url);
      await nested.setOriginUrl(entry.url);
    }
    await nested.checkout({ oid: entry.commit }, true);
    await host.stagePath(entry.path);
    return true;
  }

  private async recreate(host: HostRepository, entry: SnapshotEntry, reporter: SyncReporter): Promise<void> {
    const leftovers = describeFailures(await teardownSubmodule(host, entry));
    if (leftovers) reporter.warn(`  Could not fully clear ${entry.path} before recreating it: ${leftovers}`);

    await host.registerSubmodule(entry.name, entry.path, entry.url);
    const nested = await host.cloneSubmodule(entry.name, entry.path, entry.url);
    await nested.fetch(ORIGIN_REMOTE, entry.commit);
    await nested.checkout({ oid: entry.commit }, true);
    await host.finalizeSubmodule(entry.name, entry.path);
  }
}
