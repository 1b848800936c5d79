import { errorMessage } from './errors.js';
import type { HostRepository } from './host.js';

export type TeardownStepName = 'config' | 'index' | 'gitmodules' | 'module-store' | 'worktree';

export interface TeardownStepOutcome {
  step: TeardownStepName;
  ok: boolean;
  error?: string;
}

/**
 * Remove every trace of a submodule from the host, in fixed order:
 * host config keys, index entry, `.gitmodules` section, module store,
 * working tree.
 *
 * Steps are independent. Each runs whatever happened to the previous one and
 * its outcome is collected; nothing is thrown. Works on partially-created
 * entries since every step tolerates the piece it removes being absent.
 */
export async function teardownSubmodule(
  host: HostRepository,
  target: { name: string; path: string },
): Promise<TeardownStepOutcome[]> {
  const steps: Array<[TeardownStepName, () => Promise<unknown>]> = [
    ['config', () => host.unsetSubmoduleConfig(target.name)],
    ['index', () => host.unstagePath(target.path)],
    ['gitmodules', () => host.dropGitmodulesSection(target.name)],
    ['module-store', () => host.deleteModuleStore(target.name)],
    ['worktree', () => host.deleteWorktree(target.path)],
  ];

  const outcomes: TeardownStepOutcome[] = [];
  for (const [step, action] of steps) {
    try {
      await action();
      outcomes.push({ step, ok: true });
    } catch (err) {
      outcomes.push({ step, ok: false, error: errorMessage(err) });
    }
  }
  return outcomes;
}

/** Summarize failed steps as `step: message; ...`, or null when all succeeded. */
export function describeFailures(outcomes: TeardownStepOutcome[]): string | null {
  const failed = outcomes.filter((o) => !o.ok);
  if (failed.length === 0) return null;
  return failed.map((o) => `${o.step}: ${o.error ?? 'failed'}`).join('; ');
}
