import type { Command } from 'commander';
import ora from 'ora';
import type { SubmoduleState } from '../config/schema.js';
import { GitHostRepository, assessSubmodule } from '../core/index.js';
import { Dashboard } from '../ui/dashboard.js';
import { resolveHostRoot } from '../utils/git.js';

export function registerStatus(program: Command): void {
  program
    .command('status')
    .alias('dash')
    .description('Show registered submodules and whether a sync could start from them')
    .option('-C, --cwd <dir>', 'Top-level directory of the host repository', '.')
    .action(async (opts: { cwd: string }) => {
      try {
        const host = new GitHostRepository(resolveHostRoot(opts.cwd));
        const spinner = ora('Inspecting submodules...').start();
        const states: SubmoduleState[] = [];
        for (const entry of await host.listSubmodules()) {
          states.push({ entry, health: await assessSubmodule(host, entry) });
        }
        spinner.stop();
        Dashboard.renderStatus(states);
      } catch (err) {
        Dashboard.renderFailure(err);
        process.exit(1);
      }
    });
}
