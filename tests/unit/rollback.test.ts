import { describe, it, expect, beforeEach } from 'vitest';
import { RollbackCoordinator } from '../../src/core/rollback.js';
import { StateSnapshot } from '../../src/core/snapshot.js';
import { RollbackError } from '../../src/core/errors.js';
import { FakeHostRepository, oid } from '../helpers/fake-host.js';
import { RecordingReporter } from '../helpers/recording-reporter.js';

const URL_A = 'https://example.com/a.git';

describe('RollbackCoordinator', () => {
  let host: FakeHostRepository;
  let reporter: RecordingReporter;

  beforeEach(() => {
    host = new FakeHostRepository().addRemote(URL_A, { head: 'main', branches: { main: oid(1) } });
    reporter = new RecordingReporter();
  });

  it('tears down created paths in reverse order', async () => {
    await host.registerSubmodule('libs/a', 'libs/a', URL_A);
    await host.cloneSubmodule('libs/a', 'libs/a', URL_A);
    await host.finalizeSubmodule('libs/a', 'libs/a');
    await host.registerSubmodule('libs/b', 'libs/b', URL_A);

    const coordinator = new RollbackCoordinator(host, StateSnapshot.capture([], null), reporter);
    const result = await coordinator.rollback(['libs/a', 'libs/b']);

    expect(result).toBeUndefined();
    expect(reporter.events).toEqual([
      'error Operation failed. Rolling back all changes...',
      'info   Removing libs/b',
      'info   Removing libs/a',
      'info   Restoring .gitmodules',
      'info Rollback complete. All submodules restored to original state.',
    ]);
    expect(host.gitmodules).toBeNull();
    expect(host.config.size).toBe(0);
    expect(host.index.size).toBe(0);
    expect(host.moduleStore.size).toBe(0);
    expect(host.worktrees.size).toBe(0);
  });

  it('puts .gitmodules back to its pre-run text and unstages it', async () => {
    host.gitmodules = '# no submodules yet\n';
    host.indexGitmodules = host.gitmodules;
    host.committedGitmodules = host.gitmodules;
    const snapshot = StateSnapshot.capture([], host.gitmodules);
    await host.registerSubmodule('libs/a', 'libs/a', URL_A);
    await host.cloneSubmodule('libs/a', 'libs/a', URL_A);
    await host.finalizeSubmodule('libs/a', 'libs/a');
    expect(await host.stagedChanges()).toEqual(['.gitmodules']);

    const result = await new RollbackCoordinator(host, snapshot, reporter).rollback(['libs/a']);
    expect(result).toBeUndefined();
    expect(host.gitmodules).toBe('# no submodules yet\n');
    expect(await host.stagedChanges()).toEqual([]);
  });

  it('deletes a .gitmodules the run created', async () => {
    const snapshot = StateSnapshot.capture([], null);
    await host.registerSubmodule('libs/a', 'libs/a', URL_A);
    host.gitmodules = `# edited\n${host.gitmodules ?? ''}`;

    const result = await new RollbackCoordinator(host, snapshot, reporter).rollback([]);
    expect(result).toBeUndefined();
    expect(host.gitmodules).toBeNull();
  });

  it('reports a .gitmodules it could not restore', async () => {
    host.failOnce('restoreGitmodules', '.gitmodules', new Error('permission denied'));

    const result = await new RollbackCoordinator(host, StateSnapshot.capture([], null), reporter).rollback([]);
    expect(result?.failures).toEqual([{ target: '.gitmodules', message: 'permission denied' }]);
    expect(reporter.only('warn')).toEqual(['warn   Failed to restore .gitmodules: permission denied']);
  });

  it('restores pre-existing submodules from the snapshot', async () => {
    host.seedSubmodule('libs/keep', URL_A, oid(1));
    const snapshot = StateSnapshot.capture(await host.listSubmodules(), host.gitmodules);
    const before = host.state();
    await host.unstagePath('libs/keep');

    const result = await new RollbackCoordinator(host, snapshot, reporter).rollback([]);
    expect(result).toBeUndefined();
    expect(host.state()).toEqual(before);
    expect(reporter.events).toContain('info Rolling back submodule changes...');
  });

  it('keeps going after a failed teardown and reports it', async () => {
    await host.registerSubmodule('libs/a', 'libs/a', URL_A);
    await host.registerSubmodule('libs/b', 'libs/b', URL_A);
    host.failOnce('unstagePath', 'libs/b', new Error('index.lock exists'));

    const result = await new RollbackCoordinator(host, StateSnapshot.capture([], null), reporter)
      .rollback(['libs/a', 'libs/b']);

    expect(result).toBeInstanceOf(RollbackError);
    expect(result?.failures).toEqual([{ target: 'libs/b', message: 'index: index.lock exists' }]);
    expect(result?.message).toBe('Rollback incomplete for 1 entry: libs/b (index: index.lock exists)');
    expect(host.gitmodules).toBeNull();
    expect(reporter.events).toContain('error Rollback incomplete: 1 entry could not be restored');
  });
});
