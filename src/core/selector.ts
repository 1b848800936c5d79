import { ConfigurationError, SelectionError } from './errors.js';
import { normalizeRepoPath } from '../config/repos-file.js';
import type { DesiredRepository, RepositorySpec } from '../config/schema.js';

export interface SelectionFilters {
  only?: string[];
  ignore?: string[];
}

/**
 * Resolve the set of repository keys to process from the declared mapping
 * and the mutually exclusive `only` / `ignore` filters. Unknown entries are
 * reported first, then entries named by both filters, then any use of both.
 * Returned keys keep declaration order.
 */
export function selectRepositories(declared: ReadonlyMap<string, RepositorySpec>, filters: SelectionFilters): string[] {
  const ignore = new Set((filters.ignore ?? []).map(normalizeRepoPath));
  const only = filters.only ? new Set(filters.only.map(normalizeRepoPath)) : undefined;

  const unknown = [...(only ?? []), ...ignore].filter((key) => !declared.has(key));
  if (unknown.length > 0) {
    throw new SelectionError(`Repositories not found: ${[...new Set(unknown)].join(', ')}`, [...new Set(unknown)]);
  }

  if (only) {
    const conflicting = [...only].filter((key) => ignore.has(key));
    if (conflicting.length > 0) {
      throw new SelectionError(
        `Conflicting selection: repositories cannot be selected and ignored at the same time: ${conflicting.join(', ')}`,
        conflicting,
      );
    }
  }

  if (filters.only !== undefined && filters.ignore !== undefined) {
    throw new ConfigurationError('--only and --ignore are mutually exclusive');
  }

  const base = only ?? new Set(declared.keys());
  return [...declared.keys()].filter((key) => base.has(key) && !ignore.has(key));
}

/** Join a repository key to the destination prefix, giving its host-relative path. */
export function hostPath(prefix: string, key: string): string {
  return prefix === '.' || prefix === '' ? key : `${prefix}/${key}`;
}

/** Map selected keys to their host-relative paths under the prefix. */
export function desiredRepositories(
  declared: ReadonlyMap<string, RepositorySpec>,
  selected: string[],
  prefix: string,
): DesiredRepository[] {
  const desired: DesiredRepository[] = [];
  for (const key of selected) {
    const spec = declared.get(key);
    if (spec) desired.push({ path: hostPath(prefix, key), spec });
  }
  return desired;
}
