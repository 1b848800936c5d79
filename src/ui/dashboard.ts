import chalk from 'chalk';
import Table from 'cli-table3';
import type { ClassificationResult, SubmoduleState, SyncOptions } from '../config/schema.js';
import { RolledBackError, SyncError, errorMessage } from '../core/errors.js';

const TABLE_CHARS = {
  top: '', 'top-mid': '', 'top-left': '', 'top-right': '',
  bottom: '', 'bottom-mid': '', 'bottom-left': '', 'bottom-right': '',
  left: '  ', 'left-mid': '', mid: '', 'mid-mid': '',
  right: '', 'right-mid': '', middle: chalk.dim(' │ '),
};

function shortOid(oid?: string): string {
  return oid ? oid.substring(0, 8) : '-';
}

/**
 * Terminal rendering for plans, submodule status and run failures.
 */
export class Dashboard {
  /** Render what a sync would do with the given flags. */
  static renderPlan(plan: ClassificationResult, options: Pick<SyncOptions, 'skipExisting' | 'syncSelection'>): void {
    const total = plan.new.length + plan.updated.length + plan.removed.length;
    console.log(chalk.bold.white(`\n  SYNC PLAN  │  ${total} submodule(s)\n`));
    if (total === 0) {
      console.log(chalk.dim('  Nothing declared or registered under the prefix.\n'));
      return;
    }

    const table = new Table({
      head: [chalk.dim('Path'), chalk.dim('Action'), chalk.dim('URL'), chalk.dim('Version')],
      chars: TABLE_CHARS,
    });

    for (const repo of plan.new) {
      table.push([chalk.white(repo.path), chalk.green('+ add'), repo.spec.url, repo.spec.version]);
    }
    for (const repo of plan.updated) {
      const action = options.skipExisting ? chalk.dim('= skip') : chalk.cyan('~ update');
      const url = repo.entry.url === repo.spec.url ? repo.spec.url : `${chalk.dim(repo.entry.url ?? '?')} → ${repo.spec.url}`;
      table.push([chalk.white(repo.path), action, url, repo.spec.version]);
    }
    for (const entry of plan.removed) {
      const action = options.syncSelection ? chalk.red('- remove') : chalk.yellow('? extra');
      table.push([chalk.white(entry.path), action, entry.url ?? '-', chalk.dim(shortOid(entry.commit))]);
    }

    console.log(table.toString());
    const summary = [
      chalk.green(`${plan.new.length} to add`),
      options.skipExisting ? chalk.dim(`${plan.updated.length} skipped`) : chalk.cyan(`${plan.updated.length} to update`),
      options.syncSelection ? chalk.red(`${plan.removed.length} to remove`) : chalk.yellow(`${plan.removed.length} extra`),
    ];
    console.log(chalk.dim(`\n  Summary: ${summary.join(' │ ')}\n`));
  }

  /** Render registered submodules with their recorded and checked-out commits. */
  static renderStatus(states: SubmoduleState[]): void {
    console.log(chalk.bold.white(`\n  SUBMODULES  │  ${states.length} registered\n`));
    if (states.length === 0) return;

    const table = new Table({
      head: [chalk.dim('Path'), chalk.dim('Name'), chalk.dim('Recorded'), chalk.dim('Checked out'), chalk.dim('Status')],
      chars: TABLE_CHARS,
    });

    for (const { entry, health } of states) {
      const status = health === 'clean' ? chalk.green('✓ clean')
        : health === 'dirty' ? chalk.yellow('●dirty')
          : health === 'drifted' ? chalk.magenta('↕drifted')
            : chalk.red(`⚠ ${health}`);
      table.push([chalk.white(entry.path), chalk.dim(entry.name), shortOid(entry.recordedCommit), shortOid(entry.commit), status]);
    }
    console.log(table.toString() + '\n');
  }

  /** Final failure summary for a run. */
  static renderFailure(err: unknown): void {
    if (err instanceof RolledBackError) {
      console.error(chalk.red.bold(`\n✗ ${err.message}`));
      if (err.rollbackError) {
        console.error(chalk.yellow('  Entries that could not be restored:'));
        for (const f of err.rollbackError.failures) {
          console.error(chalk.yellow(`    ${f.target}: ${f.message}`));
        }
      }
      return;
    }
    const label = err instanceof SyncError ? `${err.name}: ` : '';
    console.error(chalk.red(`\n✗ ${label}${errorMessage(err)}`));
  }
}
