import { APP_NAME } from '../config/branding.js';
import type { RegisteredEntry, SubmoduleHealth } from '../config/schema.js';
import { PreconditionError } from './errors.js';
import type { HostRepository } from './host.js';

/** Classify the state of one registered submodule. */
export async function assessSubmodule(host: HostRepository, entry: RegisteredEntry): Promise<SubmoduleHealth> {
  if (!entry.commit) return 'uninitialized';
  const nested = await host.openSubmodule(entry.path);
  if (!nested) return 'unopenable';
  if (await nested.hasLocalChanges()) return 'dirty';
  if (entry.commit !== entry.recordedCommit) return 'drifted';
  return 'clean';
}

/**
 * Refuse to start unless the host has nothing staged and every registered
 * submodule is initialized, openable, clean, and checked out at the commit
 * the host index records.
 */
export async function validateHost(host: HostRepository, entries: readonly RegisteredEntry[]): Promise<void> {
  const staged = await host.stagedChanges();
  if (staged.length > 0) {
    throw new PreconditionError(
      `The repository has staged changes (${staged.join(', ')}). `
      + `Please commit or reset staged changes before running ${APP_NAME}.`,
    );
  }

  for (const entry of entries) {
    const health = await assessSubmodule(host, entry);
    switch (health) {
      case 'clean':
        break;
      case 'uninitialized':
        throw new PreconditionError(
          `Submodule '${entry.name}' at ${entry.path} is not initialized. Please run 'git submodule update --init' first.`,
        );
      case 'unopenable':
        throw new PreconditionError(
          `Cannot open submodule '${entry.name}' at ${entry.path}. It may be deinitialized or corrupted.`,
        );
      case 'dirty':
        throw new PreconditionError(
          `Submodule '${entry.name}' at ${entry.path} has uncommitted changes. `
          + `Please commit or stash changes before running ${APP_NAME}.`,
        );
      case 'drifted':
        throw new PreconditionError(
          `Submodule '${entry.name}' at ${entry.path} is checked out to a different commit than expected. `
          + `Expected: ${entry.recordedCommit ?? '(not recorded in the index)'}, Actual: ${entry.commit}. `
          + `Please run 'git submodule update' to synchronize.`,
        );
    }
  }
}
