/**
 * Text-level handling of `.gitmodules`.
 * Each submodule is one `[submodule "<name>"]` block running until the next
 * line that opens a section, or end of file.
 */

export interface GitmodulesSection {
  name: string;
  path?: string;
  url?: string;
}

const SECTION_HEADER = /^\s*\[\s*submodule\s+"((?:[^"\\]|\\.)*)"\s*\]\s*$/;
const KEY_VALUE = /^\s*([A-Za-z][A-Za-z0-9-]*)\s*=\s*(.*?)\s*$/;

export function sectionHeader(name: string): string {
  return `[submodule "${name.replace(/\\/g, '\\\\').replace(/"/g, '\\"')}"]`;
}

/** Parse the submodule sections of a `.gitmodules` file. Other sections are ignored. */
export function parseGitmodules(content: string): GitmodulesSection[] {
  const sections: GitmodulesSection[] = [];
  let current: GitmodulesSection | null = null;

  for (const line of content.split(/\r?\n/)) {
    const trimmed = line.trim();
    if (trimmed === '' || trimmed.startsWith('#') || trimmed.startsWith(';')) continue;

    const header = SECTION_HEADER.exec(line);
    if (header) {
      current = { name: header[1].replace(/\\(.)/g, '$1') };
      sections.push(current);
      continue;
    }
    if (trimmed.startsWith('[')) {
      current = null;
      continue;
    }

    const kv = current ? KEY_VALUE.exec(line) : null;
    if (current && kv) {
      const key = kv[1].toLowerCase();
      const value = unquote(kv[2]);
      if (key === 'path') current.path = value;
      else if (key === 'url') current.url = value;
    }
  }
  return sections;
}

/**
 * Remove the block for `name`, from its header through the next line starting
 * with `[` (or end of file). Returns the remaining text, trimmed, with a
 * trailing newline; an empty string means no content is left.
 */
export function removeSubmoduleSection(content: string, name: string): string {
  const header = sectionHeader(name);
  const kept: string[] = [];
  let inSection = false;

  for (const line of content.split(/\r?\n/)) {
    if (line.trim() === header) {
      inSection = true;
      continue;
    }
    if (inSection && line.startsWith('[')) inSection = false;
    if (!inSection) kept.push(line);
  }

  const rest = kept.join('\n').trim();
  return rest === '' ? '' : `${rest}\n`;
}

function unquote(value: string): string {
  if (value.length >= 2 && value.startsWith('"') && value.endsWith('"')) {
    return value.slice(1, -1).replace(/\\(.)/g, '$1');
  }
  return value;
}
