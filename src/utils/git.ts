import { execFileSync } from 'node:child_process';
import { realpathSync } from 'node:fs';
import { resolve } from 'node:path';
import { PreconditionError } from '../core/errors.js';

/**
 * Detect the git repository root for the given directory.
 * Returns null if not inside a git repository.
 */
export function detectGitRoot(cwd?: string): string | null {
  try {
    const stdout = execFileSync('git', ['rev-parse', '--show-toplevel'], {
      cwd: cwd ?? process.cwd(),
      encoding: 'utf-8',
      stdio: ['pipe', 'pipe', 'pipe'],
    });
    return stdout.trim();
  } catch {
    return null;
  }
}

/**
 * Resolve the host repository root, requiring `dir` to be its top level:
 * every path the engine handles is relative to it.
 */
export function resolveHostRoot(dir: string): string {
  const target = resolve(dir);
  const root = detectGitRoot(target);
  if (root === null) {
    throw new PreconditionError(`${target} is not inside a git repository`);
  }
  if (realpathSync(root) !== realpathSync(target)) {
    throw new PreconditionError(`Please run in the top-level directory of the git repository (${root})`);
  }
  return root;
}
