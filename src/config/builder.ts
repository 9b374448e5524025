import type { CLIOptions, OutputFormat, ProcessConfig } from '../types/index.js';

export function resolveFormat(options: Pick<CLIOptions, 'cxml' | 'markdown'>): OutputFormat {
  if (options.cxml) return 'xml';
  if (options.markdown) return 'markdown';
  return 'default';
}

export function normalizeExtension(ext: string): string {
  return ext.startsWith('.') ? ext.slice(1) : ext;
}

export function buildConfig(options: CLIOptions): ProcessConfig {
  const extensions = new Set<string>();
  for (const ext of options.extension) {
    extensions.add(normalizeExtension(ext));
  }

  return {
    extensions,
    includeHidden: options.includeHidden,
    ignoreFilesOnly: options.ignoreFilesOnly,
    ignoreGitignore: options.ignoreGitignore,
    ignorePatterns: [...options.ignore],
    format: resolveFormat(options),
    lineNumbers: options.lineNumbers,
  };
}

export function getDefaultOptions(): CLIOptions {
  return {
    extension: [],
    ignore: [],
    includeHidden: false,
    ignoreFilesOnly: false,
    ignoreGitignore: false,
    cxml: false,
    markdown: false,
    lineNumbers: false,
    null: false,
    verbose: false,
  };
}
