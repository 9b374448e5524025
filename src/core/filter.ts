import { extname } from 'node:path';
import { minimatch, type MinimatchOptions } from 'minimatch';
import type { Candidate, FilterResult, ProcessConfig } from '../types/index.js';

// Plain shell globs: `*` also matches a leading dot, and `!`/`#` are literal.
const GLOB_OPTIONS: MinimatchOptions = {
  dot: true,
  nonegate: true,
  nocomment: true,
};

export function matchesGlob(name: string, pattern: string): boolean {
  return minimatch(name, pattern, GLOB_OPTIONS);
}

export function getExtension(name: string): string {
  return extname(name).slice(1);
}

export function matchesExtension(name: string, extensions: ReadonlySet<string>): boolean {
  return extensions.size === 0 || extensions.has(getExtension(name));
}

export interface FilterRule {
  check(entry: Candidate, config: ProcessConfig): FilterResult;
}

class HiddenRule implements FilterRule {
  check(entry: Candidate, config: ProcessConfig): FilterResult {
    if (!config.includeHidden && entry.name.startsWith('.')) {
      return { passes: false, reason: `Hidden: ${entry.name}` };
    }
    return { passes: true, reason: '' };
  }
}

class GitignoreRule implements FilterRule {
  private rules: readonly string[];

  constructor(rules: readonly string[]) {
    this.rules = rules;
  }

  check(entry: Candidate, _config: ProcessConfig): FilterResult {
    for (const rule of this.rules) {
      if (matchesGlob(entry.name, rule)) {
        return { passes: false, reason: `Matched .gitignore: ${rule}` };
      }
      // Lets `build/` style rules catch directories
      if (entry.kind === 'directory' && matchesGlob(`${entry.name}/`, rule)) {
        return { passes: false, reason: `Matched .gitignore: ${rule}` };
      }
    }
    return { passes: true, reason: '' };
  }
}

class IgnorePatternRule implements FilterRule {
  check(entry: Candidate, config: ProcessConfig): FilterResult {
    if (entry.kind === 'directory' && config.ignoreFilesOnly) {
      return { passes: true, reason: '' };
    }

    for (const pattern of config.ignorePatterns) {
      if (matchesGlob(entry.name, pattern)) {
        return { passes: false, reason: `Matches --ignore: ${pattern}` };
      }
    }
    return { passes: true, reason: '' };
  }
}

/** Directory-level filter; built once per directory with the rules in scope there. */
export class EntryFilter {
  private rules: FilterRule[];
  private config: ProcessConfig;

  constructor(config: ProcessConfig, gitignoreRules: readonly string[] = []) {
    this.config = config;
    this.rules = this.buildRules(gitignoreRules);
  }

  private buildRules(gitignoreRules: readonly string[]): FilterRule[] {
    const rules: FilterRule[] = [new HiddenRule()];

    if (!this.config.ignoreGitignore) {
      rules.push(new GitignoreRule(gitignoreRules));
    }

    if (this.config.ignorePatterns.length > 0) {
      rules.push(new IgnorePatternRule());
    }

    return rules;
  }

  shouldInclude(entry: Candidate): FilterResult {
    for (const rule of this.rules) {
      const result = rule.check(entry, this.config);
      if (!result.passes) {
        return result;
      }
    }
    return { passes: true, reason: 'Passed all filters' };
  }
}
