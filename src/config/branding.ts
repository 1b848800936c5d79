// ─── Root Brand Primitives ──────────────────────────────────────────

/** This tool's name (CLI command, log prefix). */
export const APP_NAME = 'subsync';

/** Version reported by `--version`. */
export const APP_VERSION = '0.1.0';

// ─── Git Layout ─────────────────────────────────────────────────────

/** Submodule declarations file at the host root. */
export const GITMODULES_FILE = '.gitmodules';

/** Directory under the host git dir holding each submodule's git dir. */
export const MODULE_STORE_DIR = 'modules';

/** Remote every nested repository is fetched from. */
export const ORIGIN_REMOTE = 'origin';

/**
 * Host config keys living under `submodule.<name>.` that a removal strips.
 * Absent keys are tolerated.
 */
export const SUBMODULE_CONFIG_KEYS = [
  'url',
  'update',
  'branch',
  'fetchRecurseSubmodules',
  'ignore',
  'active',
  'shallow',
] as const;

// ─── Repos File ─────────────────────────────────────────────────────

/** The only repository kind the engine manages. */
export const SUPPORTED_REPO_KIND = 'git';

/** URL schemes accepted for a repository's remote. */
export const ALLOWED_URL_SCHEMES = ['git', 'ssh', 'https', 'http', 'file'] as const;
