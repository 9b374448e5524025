import { readdirSync, realpathSync, statSync, type Dirent } from 'node:fs';
import { sep } from 'node:path';
import type { Candidate, EntryKind, ProcessConfig } from '../types/index.js';
import { EntryFilter, matchesExtension } from './filter.js';
import { loadGitignore } from './gitignore.js';
import { TraversalError } from './errors.js';

export interface WalkOptions {
  /** `.gitignore` rules already in force above the walked directory. */
  inheritedRules?: readonly string[];
  onExclude?: (entry: Candidate, reason: string) => void;
}

function resolveKind(dirent: Dirent, path: string): EntryKind {
  if (dirent.isSymbolicLink()) {
    try {
      const target = statSync(path);
      if (target.isDirectory()) return 'directory';
      if (target.isFile()) return 'file';
    } catch {
      // Dangling, looping or unreadable link targets are neither file nor directory
    }
    return 'other';
  }
  if (dirent.isDirectory()) return 'directory';
  if (dirent.isFile()) return 'file';
  return 'other';
}

export function compareNames(a: string, b: string): number {
  return Buffer.compare(Buffer.from(a), Buffer.from(b));
}

/** Appends `name` to `dir` as typed, so `./src` stays `./src/a.ts` and `.` gives `./a.ts`. */
export function joinEntry(dir: string, name: string): string {
  return dir.endsWith(sep) || dir.endsWith('/') ? `${dir}${name}` : `${dir}${sep}${name}`;
}

function readEntries(dir: string): Candidate[] {
  let dirents: Dirent[];
  try {
    dirents = readdirSync(dir, { withFileTypes: true });
  } catch (error) {
    throw new TraversalError(dir, error);
  }

  return dirents.map((dirent) => {
    const path = joinEntry(dir, dirent.name);
    return { path, name: dirent.name, kind: resolveKind(dirent, path) };
  });
}

function realPath(dir: string): string {
  try {
    return realpathSync(dir);
  } catch (error) {
    throw new TraversalError(dir, error);
  }
}

function* walk(
  dir: string,
  config: ProcessConfig,
  inheritedRules: readonly string[],
  ancestors: ReadonlySet<string>,
  onExclude: WalkOptions['onExclude']
): Generator<Candidate> {
  const rules = config.ignoreGitignore ? inheritedRules : [...inheritedRules, ...loadGitignore(dir)];

  const filter = new EntryFilter(config, rules);
  const entries = readEntries(dir)
    .filter((entry) => {
      if (entry.kind === 'other') return false;
      const result = filter.shouldInclude(entry);
      if (!result.passes) {
        onExclude?.(entry, result.reason);
      }
      return result.passes;
    })
    .sort((a, b) => compareNames(a.name, b.name));

  const visited = new Set(ancestors).add(realPath(dir));

  for (const entry of entries) {
    if (entry.kind === 'directory') {
      // Symlink cycle
      if (visited.has(realPath(entry.path))) {
        continue;
      }
      yield* walk(entry.path, config, rules, visited, onExclude);
    } else if (matchesExtension(entry.name, config.extensions)) {
      yield entry;
    } else {
      onExclude?.(entry, `Extension not listed: ${entry.name}`);
    }
  }
}

/**
 * Walks `dir` depth-first, yielding the files that survive every filter, sorted
 * by name at each level. Each directory appends its own `.gitignore` rules to a
 * fresh copy of the inherited ones, so they never reach siblings.
 */
export function walkDirectory(dir: string, config: ProcessConfig, options: WalkOptions = {}): Generator<Candidate> {
  return walk(dir, config, options.inheritedRules ?? [], new Set(), options.onExclude);
}
