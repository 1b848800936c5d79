import { describe, it, expect, beforeEach } from 'vitest';
import { Reconciler, type ReconcileRequest } from '../../src/core/reconciler.js';
import {
  PreconditionError, ResolutionError, RolledBackError, SelectionError, VcsOperationError,
} from '../../src/core/errors.js';
import { SyncOptionsSchema } from '../../src/config/schema.js';
import { FakeHostRepository, oid } from '../helpers/fake-host.js';
import { RecordingReporter } from '../helpers/recording-reporter.js';
import { declare } from '../helpers/specs.js';

const URL_A = 'https://example.com/a.git';
const URL_B = 'https://example.com/b.git';
const MISSING = 'https://example.com/missing.git';

function request(
  entries: Record<string, [string, string]>,
  options: Record<string, unknown> = {},
  prefix = 'libs',
): ReconcileRequest {
  return { declared: declare(entries), prefix, options: SyncOptionsSchema.parse(options) };
}

async function failure(run: Promise<unknown>): Promise<RolledBackError> {
  const err = await run.then(() => undefined, (e: unknown) => e);
  if (!(err instanceof RolledBackError)) throw new Error(`expected RolledBackError, got ${String(err)}`);
  return err;
}

describe('Reconciler', () => {
  let host: FakeHostRepository;
  let reporter: RecordingReporter;
  let reconciler: Reconciler;

  beforeEach(() => {
    host = new FakeHostRepository()
      .addRemote(URL_A, { head: 'main', branches: { main: oid(2), stable: oid(1) } })
      .addRemote(URL_B, { head: 'main', branches: { main: oid(3) } });
    reporter = new RecordingReporter();
    reconciler = new Reconciler(host, reporter);
  });

  it('adds declared repositories under the prefix', async () => {
    const report = await reconciler.run(request({ a: [URL_A, 'main'], b: [URL_B, 'main'] }));

    expect(report).toEqual({
      outcome: 'applied-and-committed',
      operations: [{ action: 'add', path: 'libs/a' }, { action: 'add', path: 'libs/b' }],
      extras: [],
    });
    expect(host.directories.has('libs')).toBe(true);
    expect(await host.listSubmodules()).toEqual([
      { name: 'libs/a', path: 'libs/a', url: URL_A, commit: oid(2), recordedCommit: oid(2) },
      { name: 'libs/b', path: 'libs/b', url: URL_B, commit: oid(3), recordedCommit: oid(3) },
    ]);
    expect(reporter.events.at(-1)).toBe('finish All operations completed successfully!');
  });

  it('is idempotent', async () => {
    const req = request({ a: [URL_A, 'stable'], b: [URL_B, 'main'] });
    await reconciler.run(req);
    host.commit();
    const afterFirst = host.state();

    const second = await reconciler.run(req);
    expect(second.operations).toEqual([
      { action: 'update', path: 'libs/a' },
      { action: 'update', path: 'libs/b' },
    ]);
    expect(host.state()).toEqual(afterFirst);
  });

  it('reports up-to-date when there is nothing to do', async () => {
    const report = await reconciler.run(request({}));
    expect(report).toEqual({ outcome: 'up-to-date', operations: [], extras: [] });
    expect(host.mutations).toBe(0);
    expect(reporter.events).toContain('info No operations to perform - all repositories are up to date');
  });

  it('rolls back every add when a later one fails', async () => {
    const before = host.state();
    const err = await failure(reconciler.run(request({
      a: [URL_A, 'main'],
      b: [URL_B, 'main'],
      'zz-broken': [MISSING, 'main'],
    })));

    expect(err.fullyRestored).toBe(true);
    expect(err.operation).toEqual({ action: 'add', path: 'libs/zz-broken' });
    expect(err.cause).toBeInstanceOf(VcsOperationError);
    expect(err.message).toBe(
      'Operation failed while adding libs/zz-broken and all changes were rolled back: '
      + `Failed to clone ${MISSING} into libs/zz-broken: repository does not exist`,
    );
    expect(host.state()).toEqual(before);
    expect(await host.listSubmodules()).toEqual([]);
  });

  it('restores updated submodules when a later update fails', async () => {
    host.seedSubmodule('libs/keep', URL_A, oid(1));
    host.seedSubmodule('libs/other', URL_B, oid(3));
    const before = host.state();

    const err = await failure(reconciler.run(request({ keep: [URL_A, 'main'], other: [URL_B, 'no-such-ref'] })));

    expect(err.operation).toEqual({ action: 'update', path: 'libs/other' });
    expect(err.cause).toBeInstanceOf(ResolutionError);
    expect(reporter.only('succeed')).toEqual(['succeed update libs/keep']);
    expect(host.state()).toEqual(before);
    expect(host.nested('libs/keep')?.head).toEqual({ oid: oid(1) });
  });

  it('leaves no staged .gitmodules after undoing a URL change', async () => {
    host.seedSubmodule('libs/a', URL_A, oid(1));
    host.seedSubmodule('libs/b', URL_B, oid(3));
    const before = host.state();

    const err = await failure(reconciler.run(request({ a: [URL_B, 'main'], b: [URL_B, 'no-such-ref'] })));

    expect(err.fullyRestored).toBe(true);
    expect(reporter.only('succeed')).toEqual(['succeed update libs/a']);
    expect(await host.stagedChanges()).toEqual([]);
    expect(host.state()).toEqual(before);
  });

  it('recreates submodules removed before the failure', async () => {
    host.seedSubmodule('libs/a', URL_A, oid(1));
    host.seedSubmodule('libs/b', URL_A, oid(1));
    const before = host.state();
    host.failOnce('deleteWorktree', 'libs/b', new Error('device busy'));

    const err = await failure(reconciler.run(request({ c: [URL_B, 'main'] }, { syncSelection: true })));

    expect(err.operation).toEqual({ action: 'remove', path: 'libs/b' });
    expect(err.cause).toBeInstanceOf(VcsOperationError);
    expect(err.fullyRestored).toBe(true);
    expect(host.state()).toEqual(before);
  });

  it('reports an incomplete rollback', async () => {
    host.failOnce('deleteWorktree', 'libs/a', new Error('device busy'));

    const err = await failure(reconciler.run(request({ a: [URL_A, 'main'], zz: [MISSING, 'main'] })));

    expect(err.fullyRestored).toBe(false);
    expect(err.rollbackError?.failures).toEqual([{ target: 'libs/a', message: 'worktree: device busy' }]);
    expect(err.message).toBe(
      'Operation failed while adding libs/zz and rollback was incomplete: '
      + `Failed to clone ${MISSING} into libs/zz: repository does not exist`,
    );
  });

  it('changes nothing in dry-run', async () => {
    host.seedSubmodule('libs/keep', URL_A, oid(1));
    host.seedSubmodule('libs/old', URL_A, oid(1));
    const before = host.state();

    const report = await reconciler.run(request(
      { keep: [URL_A, 'main'], broken: [MISSING, 'main'] },
      { dryRun: true, syncSelection: true },
    ));

    expect(report).toEqual({
      outcome: 'applied-dry-run',
      operations: [
        { action: 'add', path: 'libs/broken' },
        { action: 'update', path: 'libs/keep' },
        { action: 'remove', path: 'libs/old' },
      ],
      extras: [],
    });
    expect(host.mutations).toBe(0);
    expect(host.state()).toEqual(before);
    expect(reporter.events.at(-1)).toBe('finish Dry run complete, no changes made.');
  });

  it('reports extras instead of removing them by default', async () => {
    host.seedSubmodule('libs/old', URL_A, oid(1));
    host.seedSubmodule('vendor/other', URL_A, oid(1));

    const report = await reconciler.run(request({ a: [URL_B, 'main'] }));

    expect(report.extras).toEqual(['libs/old']);
    expect(reporter.events).toContain('info Found extra submodule libs/old');
    expect((await host.listSubmodules()).map((e) => e.path)).toEqual(['libs/old', 'vendor/other', 'libs/a']);
  });

  it('removes unselected submodules under the prefix with syncSelection', async () => {
    host.seedSubmodule('libs/old', URL_A, oid(1));
    host.seedSubmodule('vendor/other', URL_A, oid(1));

    const report = await reconciler.run(request({ a: [URL_B, 'main'] }, { syncSelection: true }));

    expect(report.extras).toEqual([]);
    expect(report.operations).toEqual([{ action: 'add', path: 'libs/a' }, { action: 'remove', path: 'libs/old' }]);
    expect((await host.listSubmodules()).map((e) => e.path)).toEqual(['vendor/other', 'libs/a']);
  });

  it('treats ignored repositories as unselected', async () => {
    host.seedSubmodule('libs/a', URL_A, oid(1));

    const report = await reconciler.run(request(
      { a: [URL_A, 'main'], b: [URL_B, 'main'] },
      { ignore: ['a'], syncSelection: true },
    ));

    expect(report.operations).toEqual([{ action: 'add', path: 'libs/b' }, { action: 'remove', path: 'libs/a' }]);
  });

  it('leaves existing submodules alone with skipExisting', async () => {
    host.seedSubmodule('libs/keep', URL_A, oid(1));

    const report = await reconciler.run(request(
      { keep: [URL_A, 'main'], b: [URL_B, 'main'] },
      { skipExisting: true },
    ));

    expect(report.operations).toEqual([{ action: 'add', path: 'libs/b' }]);
    expect(reporter.only('skipped')).toEqual(['skipped existing libs/keep']);
    expect(host.nested('libs/keep')?.head).toEqual({ oid: oid(1) });
  });

  it('refuses to start from a drifted submodule', async () => {
    const nested = host.seedSubmodule('libs/a', URL_A, oid(1));
    nested.head = { oid: oid(2) };

    await expect(reconciler.run(request({ a: [URL_A, 'main'] }))).rejects.toThrow(PreconditionError);
    expect(host.mutations).toBe(0);
  });

  it('rejects unknown selections before touching the host', async () => {
    await expect(reconciler.run(request({ a: [URL_A, 'main'] }, { only: ['nope'] })))
      .rejects.toThrow(SelectionError);
    expect(host.mutations).toBe(0);
  });

  it('plans without checking preconditions', async () => {
    const nested = host.seedSubmodule('libs/a', URL_A, oid(1));
    nested.dirty = true;

    const plan = await reconciler.plan(request({ a: [URL_A, 'main'], b: [URL_B, 'main'] }, {}, 'libs/'));

    expect(plan.prefix).toBe('libs');
    expect(plan.classification.new.map((d) => d.path)).toEqual(['libs/b']);
    expect(plan.classification.updated.map((d) => d.path)).toEqual(['libs/a']);
    expect(host.mutations).toBe(0);
  });
});
