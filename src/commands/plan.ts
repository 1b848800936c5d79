import type { Command } from 'commander';
import { resolve } from 'node:path';
import { ReposFileLoader } from '../config/repos-file.js';
import { SyncOptionsSchema } from '../config/schema.js';
import { GitHostRepository, Reconciler } from '../core/index.js';
import { Dashboard } from '../ui/dashboard.js';
import { resolveHostRoot } from '../utils/git.js';

export function registerPlan(program: Command): void {
  program
    .command('plan')
    .description('Show which submodules a sync would add, update or remove')
    .argument('<repos-file>', 'YAML file listing the repositories')
    .argument('<prefix>', 'Directory, relative to the host root, submodules live under')
    .option('--only <repo...>', 'Consider only these repositories')
    .option('--ignore <repo...>', 'Consider all repositories except these')
    .option('--skip-existing', 'Show existing submodules as skipped')
    .option('--sync-selection', 'Show extra submodules as removals')
    .option('-C, --cwd <dir>', 'Top-level directory of the host repository', '.')
    .action(async (reposFile: string, prefix: string, opts: {
      only?: string[]; ignore?: string[]; skipExisting?: boolean; syncSelection?: boolean; cwd: string;
    }) => {
      try {
        const options = SyncOptionsSchema.parse({
          only: opts.only,
          ignore: opts.ignore,
          skipExisting: opts.skipExisting ?? false,
          syncSelection: opts.syncSelection ?? false,
        });
        const declared = new ReposFileLoader(resolve(reposFile)).load();
        const host = new GitHostRepository(resolveHostRoot(opts.cwd));
        const { classification } = await new Reconciler(host).plan({ declared, prefix, options });
        Dashboard.renderPlan(classification, options);
      } catch (err) {
        Dashboard.renderFailure(err);
        process.exit(1);
      }
    });
}
