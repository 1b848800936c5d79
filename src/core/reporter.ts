import type { PlannedOperation } from '../config/schema.js';

/**
 * Progress / log sink the engine reports to. The engine never decides how
 * anything is rendered; see `ConsoleReporter` for the terminal version.
 */
export interface SyncReporter {
  /** A run with `total` operations is about to start. */
  begin(total: number): void;
  start(op: PlannedOperation): void;
  succeed(op: PlannedOperation): void;
  fail(op: PlannedOperation, err: unknown): void;
  /** Dry-run: report the action without running it. */
  planned(op: PlannedOperation): void;
  /** An operation the flags turned off, e.g. updates under `--skip-existing`. */
  skipped(path: string, reason: string): void;
  info(message: string): void;
  warn(message: string): void;
  error(message: string): void;
  finish(message: string): void;
}

/** Reporter that drops everything. */
export const silentReporter: SyncReporter = {
  begin: () => {},
  start: () => {},
  succeed: () => {},
  fail: () => {},
  planned: () => {},
  skipped: () => {},
  info: () => {},
  warn: () => {},
  error: () => {},
  finish: () => {},
};
