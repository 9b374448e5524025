export type OutputFormat = 'default' | 'xml' | 'markdown';
export type EntryKind = 'file' | 'directory' | 'other';

export interface ProcessConfig {
  extensions: ReadonlySet<string>;
  includeHidden: boolean;
  ignoreFilesOnly: boolean;
  ignoreGitignore: boolean;
  ignorePatterns: readonly string[];
  format: OutputFormat;
  lineNumbers: boolean;
}

export interface Candidate {
  path: string;
  name: string;
  kind: EntryKind;
}

export interface CLIOptions {
  output?: string | undefined;
  extension: string[];
  ignore: string[];
  includeHidden: boolean;
  ignoreFilesOnly: boolean;
  ignoreGitignore: boolean;
  cxml: boolean;
  markdown: boolean;
  lineNumbers: boolean;
  null: boolean;
  verbose: boolean;
}

export interface FilterResult {
  passes: boolean;
  reason: string;
}

export type ReadResult =
  | { ok: true; content: string }
  | { ok: false; kind: 'decode' | 'io'; message: string };

export interface ProcessSummary {
  documents: number;
  skipped: number;
  missing: number;
}
