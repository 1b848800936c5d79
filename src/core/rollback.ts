import { RollbackError, type RollbackFailure } from './errors.js';
import type { HostRepository } from './host.js';
import type { SyncReporter } from './reporter.js';
import type { StateSnapshot } from './snapshot.js';
import { describeFailures, teardownSubmodule } from './teardown.js';

/**
 * Undoes a failed run:
 * 1. tears down every submodule the run created, even partially;
 * 2. restores every pre-existing submodule and `.gitmodules` from the snapshot.
 *
 * Returns a RollbackError describing what could not be restored, or
 * undefined when the host is back to its pre-run state.
 */
export class RollbackCoordinator {
  private host: HostRepository;
  private snapshot: StateSnapshot;
  private reporter: SyncReporter;

  constructor(host: HostRepository, snapshot: StateSnapshot, reporter: SyncReporter) {
    this.host = host;
    this.snapshot = snapshot;
    this.reporter = reporter;
  }

  async rollback(createdPaths: readonly string[]): Promise<RollbackError | undefined> {
    const failures: RollbackFailure[] = [];
    this.reporter.error('Operation failed. Rolling back all changes...');

    for (const path of [...createdPaths].reverse()) {
      this.reporter.info(`  Removing ${path}`);
      const problems = describeFailures(await teardownSubmodule(this.host, { name: path, path }));
      if (problems) {
        this.reporter.warn(`  Failed to remove ${path}: ${problems}`);
        failures.push({ target: path, message: problems });
      }
    }

    if (this.snapshot.entries.length > 0) {
      this.reporter.info('Rolling back submodule changes...');
    }
    const restore = await this.snapshot.rollback(this.host, this.reporter);
    failures.push(...restore.failures);

    if (failures.length > 0) {
      this.reporter.error(`Rollback incomplete: ${failures.length} entr${failures.length === 1 ? 'y' : 'ies'} could not be restored`);
      return new RollbackError(failures);
    }
    this.reporter.info('Rollback complete. All submodules restored to original state.');
    return undefined;
  }
}
