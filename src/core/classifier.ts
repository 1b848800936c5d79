import type {
  ClassificationResult, DesiredRepository, RegisteredEntry, UpdatedRepository,
} from '../config/schema.js';

/**
 * Diff the desired repositories against the registered submodules.
 *
 * - `new`: desired, not registered
 * - `updated`: desired and registered
 * - `removed`: registered under `prefix`, not desired
 *
 * Submodules outside the prefix are never proposed for removal.
 * Each list is sorted by path.
 */
export function classify(
  desired: readonly DesiredRepository[],
  registered: readonly RegisteredEntry[],
  prefix: string,
): ClassificationResult {
  const registeredByPath = new Map(registered.map((e) => [e.path, e]));
  const desiredPaths = new Set(desired.map((d) => d.path));

  const added: DesiredRepository[] = [];
  const updated: UpdatedRepository[] = [];
  for (const d of desired) {
    const entry = registeredByPath.get(d.path);
    if (entry) updated.push({ ...d, entry });
    else added.push(d);
  }

  const removed = registered.filter((e) => !desiredPaths.has(e.path) && isUnderPrefix(e.path, prefix));

  return {
    new: added.sort(byPath),
    updated: updated.sort(byPath),
    removed: [...removed].sort(byPath),
  };
}

/** Component-wise prefix test: `src/a` is under `src`, `src2/a` is not. */
export function isUnderPrefix(path: string, prefix: string): boolean {
  if (prefix === '' || prefix === '.') return true;
  return path === prefix || path.startsWith(`${prefix}/`);
}

function byPath(a: { path: string }, b: { path: string }): number {
  return a.path < b.path ? -1 : a.path > b.path ? 1 : 0;
}
