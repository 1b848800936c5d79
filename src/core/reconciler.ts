import { validatePrefix } from '../config/repos-file.js';
import type {
  ClassificationResult, PlannedOperation, RegisteredEntry, RepositorySpec, RunReport, SyncOptions,
} from '../config/schema.js';
import { classify } from './classifier.js';
import { RolledBackError } from './errors.js';
import { OperationExecutor } from './executor.js';
import type { HostRepository } from './host.js';
import { silentReporter, type SyncReporter } from './reporter.js';
import { RollbackCoordinator } from './rollback.js';
import { desiredRepositories, selectRepositories } from './selector.js';
import { StateSnapshot } from './snapshot.js';
import { validateHost } from './validator.js';

export interface ReconcileRequest {
  /** Declared repositories, keyed by path below the prefix. */
  declared: ReadonlyMap<string, RepositorySpec>;
  /** Destination directory, relative to the host root. */
  prefix: string;
  options: SyncOptions;
}

export interface ReconcilePlan {
  prefix: string;
  registered: RegisteredEntry[];
  classification: ClassificationResult;
}

/**
 * Runs one reconciliation against a host repository:
 * validate → select → classify → snapshot → execute → (on failure) roll back.
 * The result is all-or-nothing.
 */
export class Reconciler {
  private host: HostRepository;
  private reporter: SyncReporter;

  constructor(host: HostRepository, reporter: SyncReporter = silentReporter) {
    this.host = host;
    this.reporter = reporter;
  }

  /**
   * Compute what a run would do, without checking preconditions or touching
   * the host.
   */
  async plan(request: ReconcileRequest): Promise<ReconcilePlan> {
    const prefix = validatePrefix(request.prefix);
    const registered = await this.host.listSubmodules();
    return { prefix, registered, classification: this.classifyRequest(request, prefix, registered) };
  }

  async run(request: ReconcileRequest): Promise<RunReport> {
    const { options } = request;
    const prefix = validatePrefix(request.prefix);

    // One view of the registered entries, shared by every component below.
    const registered = await this.host.listSubmodules();

    this.reporter.info('Checking existing submodule states...');
    await validateHost(this.host, registered);
    this.reporter.info('All validation checks passed.');

    const classification = this.classifyRequest(request, prefix, registered);
    const snapshot = StateSnapshot.capture(registered, await this.host.readGitmodules());
    const extras = options.syncSelection ? [] : classification.removed.map((e) => e.path);

    const executor = new OperationExecutor(this.host, this.reporter, options);
    const total = executor.countOperations(classification);
    if (total === 0) {
      this.reportExtras(extras);
      this.reporter.info('No operations to perform - all repositories are up to date');
      return { outcome: options.dryRun ? 'applied-dry-run' : 'up-to-date', operations: [], extras };
    }

    if (!options.dryRun) await this.host.ensureDirectory(prefix);

    this.reporter.begin(total);
    let operations: PlannedOperation[];
    try {
      operations = await executor.execute(classification);
    } catch (err) {
      if (options.dryRun) throw err;
      const coordinator = new RollbackCoordinator(this.host, snapshot, this.reporter);
      const rollbackError = await coordinator.rollback(executor.createdPaths);
      throw new RolledBackError(err, executor.failedOperation, rollbackError);
    }

    this.reportExtras(extras);
    this.reporter.finish(options.dryRun ? 'Dry run complete, no changes made.' : 'All operations completed successfully!');
    return { outcome: options.dryRun ? 'applied-dry-run' : 'applied-and-committed', operations, extras };
  }

  private classifyRequest(
    request: ReconcileRequest,
    prefix: string,
    registered: readonly RegisteredEntry[],
  ): ClassificationResult {
    const selected = selectRepositories(request.declared, {
      only: request.options.only,
      ignore: request.options.ignore,
    });
    return classify(desiredRepositories(request.declared, selected, prefix), registered, prefix);
  }

  private reportExtras(extras: string[]): void {
    for (const path of extras) this.reporter.info(`Found extra submodule ${path}`);
  }
}
