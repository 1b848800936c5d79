import { describe, it, expect } from 'vitest';
import { RepoEntrySchema, ReposFileSchema, SyncOptionsSchema } from '../../src/config/schema.js';

describe('RepoEntry schema', () => {
  it('validates a git entry', () => {
    const result = RepoEntrySchema.safeParse({
      type: 'git',
      url: 'https://example.com/org/core.git',
      version: 'main',
    });
    expect(result.success).toBe(true);
  });

  it('keeps unknown types for later reporting', () => {
    const result = RepoEntrySchema.safeParse({ type: 'hg', url: 'https://example.com/x', version: 'default' });
    expect(result.success).toBe(true);
  });

  it('rejects an empty version', () => {
    const result = RepoEntrySchema.safeParse({ type: 'git', url: 'https://example.com/x', version: '' });
    expect(result.success).toBe(false);
  });

  it('rejects a missing url', () => {
    const result = RepoEntrySchema.safeParse({ type: 'git', version: 'main' });
    expect(result.success).toBe(false);
  });
});

describe('ReposFile schema', () => {
  it('defaults repositories to an empty mapping', () => {
    const result = ReposFileSchema.parse({});
    expect(result.repositories).toEqual({});
  });

  it('rejects repositories given as a list', () => {
    const result = ReposFileSchema.safeParse({ repositories: [{ type: 'git' }] });
    expect(result.success).toBe(false);
  });
});

describe('SyncOptions schema', () => {
  it('applies defaults', () => {
    const result = SyncOptionsSchema.parse({});
    expect(result).toEqual({
      skipCheckout: false,
      skipExisting: false,
      syncSelection: false,
      dryRun: false,
    });
  });

  it('keeps selection filters', () => {
    const result = SyncOptionsSchema.parse({ only: ['core'], dryRun: true });
    expect(result.only).toEqual(['core']);
    expect(result.ignore).toBeUndefined();
    expect(result.dryRun).toBe(true);
  });
});
