import { ORIGIN_REMOTE } from '../config/branding.js';
import type {
  ClassificationResult, DesiredRepository, PlannedOperation, RegisteredEntry, SyncOptions, UpdatedRepository,
} from '../config/schema.js';
import {
  ResolutionError, VcsOperationError, isSyncError, type FailedOperation,
} from './errors.js';
import type { HostRepository, NestedRepository, ResolvedRevision } from './host.js';
import type { SyncReporter } from './reporter.js';
import { describeFailures, teardownSubmodule } from './teardown.js';

export type ExecutorOptions = Pick<SyncOptions, 'skipCheckout' | 'skipExisting' | 'syncSelection' | 'dryRun'>;

/**
 * Resolve `version` inside a nested repository. Only a reference-not-found
 * error triggers the retry against `origin/<version>`; every other error
 * propagates unchanged.
 */
export async function resolveWithFallback(nested: NestedRepository, version: string): Promise<ResolvedRevision> {
  try {
    return await nested.resolve(version);
  } catch (err) {
    if (!isSyncError(err, 'reference-not-found')) throw err;
  }

  try {
    return await nested.resolve(`${ORIGIN_REMOTE}/${version}`);
  } catch (err) {
    if (isSyncError(err, 'reference-not-found')) throw new ResolutionError(version, nested.path);
    throw err;
  }
}

/**
 * Applies a classification to the host: adds, then updates, then removes,
 * each in path order. Stops at the first failure.
 *
 * `createdPaths` is the compensation list for rollback: a path is recorded
 * before its registration starts, so an add that fails anywhere after that
 * point is still torn down.
 */
export class OperationExecutor {
  private host: HostRepository;
  private reporter: SyncReporter;
  private options: ExecutorOptions;
  private created: string[] = [];
  private inProgress: FailedOperation | undefined;

  constructor(host: HostRepository, reporter: SyncReporter, options: ExecutorOptions) {
    this.host = host;
    this.reporter = reporter;
    this.options = options;
  }

  get createdPaths(): readonly string[] {
    return this.created;
  }

  /** The operation that was running when `execute` threw. */
  get failedOperation(): FailedOperation | undefined {
    return this.inProgress;
  }

  /** Number of operations `execute` will run (or report, in dry-run) for this plan. */
  countOperations(plan: ClassificationResult): number {
    return plan.new.length
      + (this.options.skipExisting ? 0 : plan.updated.length)
      + (this.options.syncSelection ? plan.removed.length : 0);
  }

  async execute(plan: ClassificationResult): Promise<PlannedOperation[]> {
    const done: PlannedOperation[] = [];

    for (const repo of plan.new) {
      await this.step({ action: 'add', path: repo.path }, () => this.add(repo), done);
    }

    for (const repo of plan.updated) {
      if (this.options.skipExisting) {
        this.reporter.skipped(repo.path, 'existing');
        continue;
      }
      await this.step({ action: 'update', path: repo.path }, () => this.update(repo), done);
    }

    if (this.options.syncSelection) {
      for (const entry of plan.removed) {
        await this.step({ action: 'remove', path: entry.path }, () => this.remove(entry), done);
      }
    }

    this.inProgress = undefined;
    return done;
  }

  private async step(op: PlannedOperation, run: () => Promise<void>, done: PlannedOperation[]): Promise<void> {
    if (this.options.dryRun) {
      this.reporter.planned(op);
      done.push(op);
      return;
    }

    this.inProgress = op;
    this.reporter.start(op);
    try {
      await run();
    } catch (err) {
      this.reporter.fail(op, err);
      throw err;
    }
    this.reporter.succeed(op);
    done.push(op);
  }

  // ─── Add ──────────────────────────────────────────────────────────

  async add(repo: DesiredRepository): Promise<void> {
    const { path, spec } = repo;
    const name = path;

    // Never adopt a directory the run did not create: rollback would delete it.
    if (await this.host.isOccupied(path)) {
      throw new VcsOperationError(`Cannot add submodule at ${path}: the directory already exists and is not empty`);
    }

    this.created.push(path);
    await this.host.registerSubmodule(name, path, spec.url);
    const nested = await this.host.cloneSubmodule(name, path, spec.url);
    await this.checkoutVersion(nested, spec.version);
    await this.host.finalizeSubmodule(name, path);
  }

  // ─── Update ───────────────────────────────────────────────────────

  async update(repo: UpdatedRepository): Promise<void> {
    const { path, spec, entry } = repo;
    const urlChanged = entry.url !== spec.url;

    if (urlChanged) await this.host.setSubmoduleUrl(entry.name, spec.url);

    const nested = await this.host.openSubmodule(path);
    if (!nested) {
      throw new VcsOperationError(`Cannot open submodule '${entry.name}' at ${path}`);
    }
    if (urlChanged) await nested.setOriginUrl(spec.url);

    await this.checkoutVersion(nested, spec.version);
    await this.host.finalizeSubmodule(entry.name, path);
  }

  // ─── Remove ───────────────────────────────────────────────────────

  async remove(entry: RegisteredEntry): Promise<void> {
    const failures = describeFailures(await teardownSubmodule(this.host, entry));
    if (failures) {
      throw new VcsOperationError(`Failed to remove submodule ${entry.path}: ${failures}`);
    }
  }

  // ─── Shared ───────────────────────────────────────────────────────

  private async checkoutVersion(nested: NestedRepository, version: string): Promise<void> {
    await nested.fetch(ORIGIN_REMOTE, version);
    const revision = await resolveWithFallback(nested, version);
    await nested.checkout(revision, !this.options.skipCheckout);
  }
}
