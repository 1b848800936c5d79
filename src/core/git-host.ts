import { simpleGit, type SimpleGit } from 'simple-git';
import { existsSync, readFileSync } from 'node:fs';
import { mkdir, readdir, rm, stat, unlink, writeFile } from 'node:fs/promises';
import { isAbsolute, join, posix, relative, resolve } from 'node:path';
import {
  GITMODULES_FILE, MODULE_STORE_DIR, ORIGIN_REMOTE, SUBMODULE_CONFIG_KEYS,
} from '../config/branding.js';
import type { RegisteredEntry } from '../config/schema.js';
import { ReferenceNotFoundError, VcsOperationError, errorMessage } from './errors.js';
import { parseGitmodules, removeSubmoduleSection } from './gitmodules.js';
import type { HostRepository, NestedRepository, ResolvedRevision } from './host.js';

/** Run a raw git command, wrapping failures as VcsOperationError. */
async function runGit(git: SimpleGit, cwd: string, args: string[]): Promise<string> {
  try {
    return await git.raw(args);
  } catch (err) {
    const command = `git ${args.join(' ')}`;
    throw new VcsOperationError(`${command} failed in ${cwd}: ${errorMessage(err).trim()}`, { command, cause: err });
  }
}

const CHANGE_CODES = new Set(['M', 'A', 'R', 'C', 'T', 'U', '?']);

// ─── Nested Repository ───────────────────────────────────────────────

/**
 * A submodule's own repository. Wraps simple-git with the fetch / resolve /
 * checkout steps the executor composes.
 */
export class GitNestedRepository implements NestedRepository {
  private git: SimpleGit;
  private absPath: string;
  readonly path: string;

  constructor(absPath: string, path: string) {
    this.absPath = absPath;
    this.path = path;
    this.git = simpleGit(absPath);
  }

  private run(args: string[]): Promise<string> {
    return runGit(this.git, this.absPath, args);
  }

  async fetch(remote: string, version: string): Promise<void> {
    await this.run(['fetch', '--tags', '--force', remote]);
    // A full commit id not reachable from any fetched ref has to be asked for by name.
    if (/^[0-9a-f]{40}$/i.test(version) && !(await this.hasCommit(version))) {
      await this.run(['fetch', remote, version]);
    }
  }

  async resolve(spec: string): Promise<ResolvedRevision> {
    const oid = (await this.run(['rev-parse', '--verify', '--quiet', `${spec}^{commit}`])).trim();
    if (oid === '') throw new ReferenceNotFoundError(spec);

    const symbolic = (await this.run(['rev-parse', '--symbolic-full-name', spec])).trim();
    return symbolic.startsWith('refs/heads/') ? { oid, branch: symbolic } : { oid };
  }

  async checkout(revision: ResolvedRevision, materialize: boolean): Promise<void> {
    if (revision.branch) {
      if (materialize) {
        await this.run(['checkout', '--force', revision.branch.slice('refs/heads/'.length), '--']);
      } else {
        await this.run(['symbolic-ref', 'HEAD', revision.branch]);
      }
      return;
    }

    if (materialize) {
      await this.run(['checkout', '--force', '--detach', revision.oid, '--']);
    } else {
      await this.run(['update-ref', '--no-deref', 'HEAD', revision.oid]);
    }
  }

  async headCommit(): Promise<string | undefined> {
    const oid = (await this.run(['rev-parse', '--verify', '--quiet', 'HEAD'])).trim();
    return oid === '' ? undefined : oid;
  }

  /**
   * Modified, added, renamed or untracked files. Deletions do not count: a
   * repository whose files were never checked out lists every file as deleted.
   */
  async hasLocalChanges(): Promise<boolean> {
    try {
      const status = await this.git.status();
      return status.files.some((f) => CHANGE_CODES.has(f.index) || CHANGE_CODES.has(f.working_dir));
    } catch (err) {
      throw new VcsOperationError(`git status failed in ${this.absPath}: ${errorMessage(err)}`, { command: 'git status', cause: err });
    }
  }

  async hasCommit(oid: string): Promise<boolean> {
    const found = (await this.run(['rev-parse', '--verify', '--quiet', `${oid}^{commit}`])).trim();
    return found !== '';
  }

  async setOriginUrl(url: string): Promise<void> {
    await this.run(['remote', 'set-url', ORIGIN_REMOTE, url]);
  }
}

// ─── Host Repository ─────────────────────────────────────────────────

/**
 * The top-level repository submodules are registered into.
 * Mutations go through git itself, except the `.gitmodules` section edits
 * made during teardown.
 */
export class GitHostRepository implements HostRepository {
  private git: SimpleGit;
  private gitDir: string | null = null;
  readonly root: string;

  constructor(root: string) {
    this.root = root;
    this.git = simpleGit(root);
  }

  private run(args: string[]): Promise<string> {
    return runGit(this.git, this.root, args);
  }

  private abs(path: string): string {
    const target = resolve(this.root, path);
    const rel = relative(this.root, target);
    if (rel === '' || rel.startsWith('..') || isAbsolute(rel)) {
      throw new VcsOperationError(`Refusing to touch ${path}: not below ${this.root}`);
    }
    return target;
  }

  private get gitmodulesPath(): string {
    return join(this.root, GITMODULES_FILE);
  }

  private async absoluteGitDir(): Promise<string> {
    if (this.gitDir === null) {
      this.gitDir = (await this.run(['rev-parse', '--absolute-git-dir'])).trim();
    }
    return this.gitDir;
  }

  // ─── State Inspection ──────────────────────────────────────────────

  async listSubmodules(): Promise<RegisteredEntry[]> {
    if (!existsSync(this.gitmodulesPath)) return [];
    const sections = parseGitmodules(readFileSync(this.gitmodulesPath, 'utf-8'));
    const entries: RegisteredEntry[] = [];

    for (const section of sections) {
      if (!section.path) continue;
      const path = posix.normalize(section.path).replace(/\/+$/, '');
      const configUrl = (await this.run(['config', '--get', `submodule.${section.name}.url`])).trim();
      const nested = await this.openSubmodule(path);

      entries.push({
        name: section.name,
        path,
        url: section.url ?? (configUrl || undefined),
        commit: nested ? await nested.headCommit() : undefined,
        recordedCommit: await this.recordedCommit(path),
      });
    }
    return entries;
  }

  /** Gitlink the index records for `path`, if it is staged as a submodule. */
  private async recordedCommit(path: string): Promise<string | undefined> {
    const line = (await this.run(['ls-files', '--stage', '--', path])).trim().split('\n')[0] ?? '';
    const match = /^160000 ([0-9a-f]+) \d+\t/.exec(line);
    return match ? match[1] : undefined;
  }

  async stagedChanges(): Promise<string[]> {
    try {
      const status = await this.git.status();
      return status.files
        .filter((f) => ['A', 'M', 'D', 'R', 'C', 'T'].includes(f.index))
        .map((f) => f.path);
    } catch (err) {
      throw new VcsOperationError(`git status failed in ${this.root}: ${errorMessage(err)}`, { command: 'git status', cause: err });
    }
  }

  async isOccupied(path: string): Promise<boolean> {
    const target = this.abs(path);
    if (!existsSync(target)) return false;
    const info = await stat(target);
    return !info.isDirectory() || (await readdir(target)).length > 0;
  }

  // ─── Add / Update ─────────────────────────────────────────────────

  async registerSubmodule(name: string, path: string, url: string): Promise<void> {
    await this.run(['config', '-f', GITMODULES_FILE, `submodule.${name}.path`, path]);
    await this.run(['config', '-f', GITMODULES_FILE, `submodule.${name}.url`, url]);
    await this.run(['config', `submodule.${name}.url`, url]);
    await this.run(['config', `submodule.${name}.active`, 'true']);
  }

  async cloneSubmodule(_name: string, path: string, url: string): Promise<NestedRepository> {
    const target = this.abs(path);
    try {
      await this.git.clone(url, target, ['--no-checkout']);
    } catch (err) {
      throw new VcsOperationError(`Failed to clone ${url} into ${path}: ${errorMessage(err).trim()}`, { command: 'git clone', cause: err });
    }
    return new GitNestedRepository(target, path);
  }

  async openSubmodule(path: string): Promise<NestedRepository | null> {
    const target = this.abs(path);
    if (!existsSync(join(target, '.git'))) return null;
    const nested = new GitNestedRepository(target, path);
    try {
      await nested.headCommit();
    } catch {
      return null;
    }
    return nested;
  }

  async setSubmoduleUrl(name: string, url: string): Promise<void> {
    await this.run(['config', '-f', GITMODULES_FILE, `submodule.${name}.url`, url]);
    await this.run(['config', `submodule.${name}.url`, url]);
  }

  async finalizeSubmodule(_name: string, path: string): Promise<void> {
    await this.run(['add', '--', GITMODULES_FILE, path]);
    await this.run(['submodule', 'absorbgitdirs', '--', path]);
  }

  async stagePath(path: string): Promise<void> {
    await this.run(['add', '--', path]);
  }

  // ─── Teardown ─────────────────────────────────────────────────────

  async unsetSubmoduleConfig(name: string): Promise<void> {
    for (const key of SUBMODULE_CONFIG_KEYS) {
      const present = (await this.run(['config', '--get-all', `submodule.${name}.${key}`])).trim();
      if (present !== '') {
        await this.run(['config', '--unset-all', `submodule.${name}.${key}`]);
      }
    }
  }

  async unstagePath(path: string): Promise<void> {
    await this.run(['rm', '--cached', '-r', '-f', '-q', '--ignore-unmatch', '--', path]);
  }

  async dropGitmodulesSection(name: string): Promise<void> {
    if (!existsSync(this.gitmodulesPath)) return;
    const remaining = removeSubmoduleSection(readFileSync(this.gitmodulesPath, 'utf-8'), name);
    if (remaining === '') {
      await unlink(this.gitmodulesPath);
      await this.run(['rm', '--cached', '-q', '--ignore-unmatch', '--', GITMODULES_FILE]);
    } else {
      await writeFile(this.gitmodulesPath, remaining, 'utf-8');
      await this.run(['add', '--', GITMODULES_FILE]);
    }
  }

  async deleteModuleStore(name: string): Promise<void> {
    const store = join(await this.absoluteGitDir(), MODULE_STORE_DIR);
    const target = resolve(store, name);
    const rel = relative(store, target);
    if (rel === '' || rel.startsWith('..') || isAbsolute(rel)) {
      throw new VcsOperationError(`Refusing to delete ${target}: not inside ${store}`);
    }
    await rm(target, { recursive: true, force: true });
  }

  async deleteWorktree(path: string): Promise<void> {
    await rm(this.abs(path), { recursive: true, force: true });
  }

  // ─── .gitmodules ──────────────────────────────────────────────────

  async readGitmodules(): Promise<string | null> {
    return existsSync(this.gitmodulesPath) ? readFileSync(this.gitmodulesPath, 'utf-8') : null;
  }

  async restoreGitmodules(content: string | null): Promise<void> {
    if (content === null) {
      if (existsSync(this.gitmodulesPath)) await unlink(this.gitmodulesPath);
    } else {
      await writeFile(this.gitmodulesPath, content, 'utf-8');
    }

    const born = (await this.run(['rev-parse', '--verify', '--quiet', 'HEAD'])).trim() !== '';
    // `<mode> blob <oid>\t.gitmodules`, or nothing when HEAD has no such file.
    const tree = born ? await this.run(['ls-tree', 'HEAD', '--', GITMODULES_FILE]) : '';
    const committed = /^(\d+) blob ([0-9a-f]+)\t/.exec(tree.trim());
    if (committed) {
      await this.run(['update-index', '--add', '--cacheinfo', `${committed[1]},${committed[2]},${GITMODULES_FILE}`]);
    } else {
      await this.run(['rm', '--cached', '-q', '--ignore-unmatch', '--', GITMODULES_FILE]);
    }
  }

  async ensureDirectory(path: string): Promise<void> {
    if (path === '' || path === '.') return;
    await mkdir(this.abs(path), { recursive: true });
  }
}
