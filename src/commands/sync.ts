import type { Command } from 'commander';
import { resolve } from 'node:path';
import { ReposFileLoader } from '../config/repos-file.js';
import { SyncOptionsSchema } from '../config/schema.js';
import { GitHostRepository, Reconciler } from '../core/index.js';
import { ConsoleReporter } from '../ui/progress.js';
import { Dashboard } from '../ui/dashboard.js';
import { resolveHostRoot } from '../utils/git.js';

interface SyncCommandOptions {
  only?: string[];
  ignore?: string[];
  checkout: boolean;
  skipExisting?: boolean;
  syncSelection?: boolean;
  dryRun?: boolean;
  cwd: string;
}

export function registerSync(program: Command): void {
  program
    .command('sync')
    .description('Add, update and remove submodules so the host matches a repos file')
    .argument('<repos-file>', 'YAML file listing the repositories')
    .argument('<prefix>', 'Directory, relative to the host root, to add submodules under')
    .option('--only <repo...>', 'Process only these repositories (mutually exclusive with --ignore)')
    .option('--ignore <repo...>', 'Process all repositories except these (mutually exclusive with --only)')
    .option('--no-checkout', 'Do not checkout the files in each submodule')
    .option('--skip-existing', 'Skip updating submodules that already exist')
    .option('--sync-selection', 'Remove submodules under the prefix that are not in the current selection')
    .option('--dry-run', 'Preview what would be done without making changes')
    .option('-C, --cwd <dir>', 'Top-level directory of the host repository', '.')
    .action(async (reposFile: string, prefix: string, opts: SyncCommandOptions) => {
      try {
        const options = SyncOptionsSchema.parse({
          only: opts.only,
          ignore: opts.ignore,
          skipCheckout: !opts.checkout,
          skipExisting: opts.skipExisting ?? false,
          syncSelection: opts.syncSelection ?? false,
          dryRun: opts.dryRun ?? false,
        });
        const declared = new ReposFileLoader(resolve(reposFile)).load();
        const host = new GitHostRepository(resolveHostRoot(opts.cwd));

        const reconciler = new Reconciler(host, new ConsoleReporter());
        await reconciler.run({ declared, prefix, options });
      } catch (err) {
        Dashboard.renderFailure(err);
        process.exit(1);
      }
    });
}
