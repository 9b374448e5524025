import { readFileSync, statSync } from 'node:fs';
import { dirname, join, resolve } from 'node:path';
import { Defaults } from '../constants/defaults.js';
import { TraversalError } from './errors.js';

export function parseGitignore(content: string): string[] {
  const rules: string[] = [];
  for (const line of content.split('\n')) {
    const trimmed = line.trim();
    if (trimmed && !trimmed.startsWith('#')) {
      rules.push(trimmed);
    }
  }
  return rules;
}

export function loadGitignore(dir: string): string[] {
  const gitignorePath = join(dir, Defaults.GITIGNORE_FILE);

  try {
    const stat = statSync(gitignorePath, { throwIfNoEntry: false });
    if (!stat?.isFile()) {
      return [];
    }
    return parseGitignore(readFileSync(gitignorePath, 'utf-8'));
  } catch (error) {
    throw new TraversalError(gitignorePath, error);
  }
}

/**
 * Rules a top-level directory argument inherits from the directory that holds it.
 * Empty when the path has no distinct parent (`.` or the filesystem root).
 */
export function loadParentGitignore(path: string): string[] {
  const parent = dirname(path);
  if (resolve(parent) === resolve(path)) {
    return [];
  }
  return loadGitignore(parent);
}
