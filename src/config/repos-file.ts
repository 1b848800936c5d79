import { readFileSync, existsSync } from 'node:fs';
import { isAbsolute, posix } from 'node:path';
import yaml from 'js-yaml';
import { ZodError } from 'zod';
import { ReposFileSchema } from './schema.js';
import type { ReposFile, RepositorySpec } from './schema.js';
import { ALLOWED_URL_SCHEMES, SUPPORTED_REPO_KIND } from './branding.js';
import { ConfigurationError } from '../core/errors.js';

/**
 * Loads a `.repos` file (vcstool layout) and turns it into validated
 * RepositorySpecs, keyed by path below the destination prefix.
 * Declaration order is preserved.
 */
export class ReposFileLoader {
  private filePath: string;

  constructor(filePath: string) {
    this.filePath = filePath;
  }

  get path(): string {
    return this.filePath;
  }

  load(): Map<string, RepositorySpec> {
    if (!existsSync(this.filePath)) {
      throw new ConfigurationError(`Repos file not found: ${this.filePath}`);
    }
    const raw = readFileSync(this.filePath, 'utf-8');
    return parseReposFile(raw, this.filePath);
  }
}

/** Parse and validate the YAML text of a repos file. */
export function parseReposFile(raw: string, source = '<repos file>'): Map<string, RepositorySpec> {
  let parsed: unknown;
  try {
    parsed = yaml.load(raw);
  } catch (err) {
    throw new ConfigurationError(`${source} is not valid YAML: ${err instanceof Error ? err.message : String(err)}`);
  }

  let file: ReposFile;
  try {
    file = ReposFileSchema.parse(parsed ?? {});
  } catch (err) {
    if (err instanceof ZodError) {
      const issues = err.issues.map((i) => `${i.path.join('.') || '(root)'}: ${i.message}`).join('; ');
      throw new ConfigurationError(`${source} is malformed: ${issues}`);
    }
    throw err;
  }

  return validateRepositories(file);
}

/**
 * Semantic checks the schema cannot express: relative paths without `..`,
 * unique normalized paths, an allowed URL scheme and the supported kind.
 */
export function validateRepositories(file: ReposFile): Map<string, RepositorySpec> {
  const specs = new Map<string, RepositorySpec>();

  for (const [key, entry] of Object.entries(file.repositories)) {
    if (isAbsolute(key) || posix.isAbsolute(key)) {
      throw new ConfigurationError(`Repository path must be relative: ${key}`);
    }
    if (key.split(/[\\/]/).includes('..')) {
      throw new ConfigurationError(`Repository path cannot contain '..' components: ${key}`);
    }

    const normalized = normalizeRepoPath(key);
    if (normalized === '' || normalized === '.') {
      throw new ConfigurationError(`Repository path cannot be empty: '${key}'`);
    }
    if (specs.has(normalized)) {
      throw new ConfigurationError(`Duplicate submodule path: ${normalized}`);
    }

    if (entry.type !== SUPPORTED_REPO_KIND) {
      throw new ConfigurationError(
        `Repository type '${entry.type}' is not supported. Only '${SUPPORTED_REPO_KIND}' repositories are supported.`,
      );
    }

    const scheme = urlScheme(entry.url);
    if (scheme === null) {
      throw new ConfigurationError(`Invalid repository URL '${entry.url}' for ${normalized}`);
    }
    if (!(ALLOWED_URL_SCHEMES as readonly string[]).includes(scheme)) {
      throw new ConfigurationError(
        `Invalid repository URL scheme '${scheme}' for ${entry.url}. Supported schemes: ${ALLOWED_URL_SCHEMES.join(', ')}`,
      );
    }

    specs.set(normalized, { key: normalized, kind: SUPPORTED_REPO_KIND, url: entry.url, version: entry.version });
  }

  return specs;
}

/** Check that the destination prefix is usable and return its normalized form. */
export function validatePrefix(prefix: string): string {
  if (isAbsolute(prefix) || posix.isAbsolute(prefix)) {
    throw new ConfigurationError('The prefix must be a relative path');
  }
  if (prefix.split(/[\\/]/).includes('..')) {
    throw new ConfigurationError(`The prefix cannot contain '..' components: ${prefix}`);
  }
  return normalizeRepoPath(prefix);
}

/** POSIX-normalize a relative path and drop any trailing slash. */
export function normalizeRepoPath(p: string): string {
  const normalized = posix.normalize(p.replace(/\\/g, '/'));
  return normalized.length > 1 ? normalized.replace(/\/+$/, '') : normalized;
}

function urlScheme(url: string): string | null {
  try {
    return new URL(url).protocol.replace(/:$/, '');
  } catch {
    return null;
  }
}
