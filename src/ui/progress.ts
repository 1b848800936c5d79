import chalk from 'chalk';
import ora, { type Ora } from 'ora';
import type { PlannedOperation } from '../config/schema.js';
import type { SyncReporter } from '../core/reporter.js';
import { errorMessage } from '../core/errors.js';

const VERB: Record<PlannedOperation['action'], { doing: string; done: string }> = {
  add: { doing: 'Adding', done: 'Added' },
  update: { doing: 'Updating', done: 'Updated' },
  remove: { doing: 'Removing', done: 'Removed' },
};

/**
 * Terminal reporter: one ora spinner per operation with a `[n/total]`
 * counter, chalk-colored log lines for everything else.
 */
export class ConsoleReporter implements SyncReporter {
  private spinner: Ora | null = null;
  private total = 0;
  private done = 0;

  begin(total: number): void {
    this.total = total;
    this.done = 0;
  }

  private counter(): string {
    return chalk.dim(`[${this.done}/${this.total}]`);
  }

  start(op: PlannedOperation): void {
    this.spinner = ora(`${this.counter()} ${VERB[op.action].doing} ${op.path}...`).start();
  }

  succeed(op: PlannedOperation): void {
    this.done++;
    const text = `${this.counter()} ${VERB[op.action].done} ${op.path}`;
    if (this.spinner) this.spinner.succeed(text);
    else console.log(chalk.green(`✓ ${text}`));
    this.spinner = null;
  }

  fail(op: PlannedOperation, err: unknown): void {
    const text = `Failed to ${op.action} ${op.path}: ${errorMessage(err)}`;
    if (this.spinner) this.spinner.fail(chalk.red(text));
    else console.error(chalk.red(`✗ ${text}`));
    this.spinner = null;
  }

  planned(op: PlannedOperation): void {
    this.done++;
    console.log(`${this.counter()} ${chalk.cyan('[DRY RUN]')} Would ${op.action} ${op.path}`);
  }

  skipped(path: string, reason: string): void {
    console.log(chalk.dim(`  Skip ${reason} ${path}`));
  }

  info(message: string): void {
    console.log(chalk.dim(message));
  }

  warn(message: string): void {
    console.log(chalk.yellow(message));
  }

  error(message: string): void {
    console.error(chalk.red(message));
  }

  finish(message: string): void {
    console.log(chalk.green(`\n✓ ${message}`));
  }
}
