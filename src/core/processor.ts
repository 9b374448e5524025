import { statSync, type Stats } from 'node:fs';
import type { ProcessConfig, ProcessSummary } from '../types/index.js';
import { XmlTags } from '../constants/defaults.js';
import { DocumentRenderer } from '../formatters/renderer.js';
import type { OutputSink } from '../output/writer.js';
import type { DiagnosticReporter } from '../output/diagnostics.js';
import { describeReadFailure, readTextFile } from './reader.js';
import { loadParentGitignore } from './gitignore.js';
import { walkDirectory } from './scanner.js';

function statPath(path: string): Stats | undefined {
  try {
    return statSync(path);
  } catch {
    // Unreachable paths (ENOENT, ENOTDIR, EACCES) all count as missing
    return undefined;
  }
}

class Session {
  private renderer: DocumentRenderer;
  private sink: OutputSink;
  private reporter: DiagnosticReporter;
  readonly summary: ProcessSummary = { documents: 0, skipped: 0, missing: 0 };

  constructor(config: ProcessConfig, sink: OutputSink, reporter: DiagnosticReporter) {
    this.sink = sink;
    this.reporter = reporter;
    this.renderer = new DocumentRenderer({ format: config.format, lineNumbers: config.lineNumbers });
  }

  emit(path: string): void {
    const result = readTextFile(path);
    if (!result.ok) {
      this.reporter.warn(describeReadFailure(path, result));
      this.summary.skipped++;
      return;
    }

    this.sink.writeLine(this.renderer.render(path, result.content));
    this.summary.documents++;
  }

  missing(path: string): void {
    this.reporter.warn(`Path does not exist: ${path}`);
    this.summary.missing++;
  }
}

/**
 * Renders every input path to `sink` in order. Files given directly are always
 * emitted; directories are walked through the configured filters.
 */
export function processPaths(
  inputs: readonly string[],
  config: ProcessConfig,
  sink: OutputSink,
  reporter: DiagnosticReporter
): ProcessSummary {
  const session = new Session(config, sink, reporter);
  const wrapXml = config.format === 'xml' && inputs.length > 0;

  if (wrapXml) {
    sink.writeLine(XmlTags.DOCUMENTS_OPEN);
  }

  for (const input of inputs) {
    const stat = statPath(input);

    if (!stat) {
      session.missing(input);
    } else if (stat.isFile()) {
      session.emit(input);
    } else if (stat.isDirectory()) {
      const seed = config.ignoreGitignore ? [] : loadParentGitignore(input);
      const walk = walkDirectory(input, config, {
        inheritedRules: seed,
        onExclude: (entry, reason) => reporter.excluded?.(entry.path, reason),
      });
      for (const candidate of walk) {
        session.emit(candidate.path);
      }
    }
  }

  if (wrapXml) {
    sink.writeLine(XmlTags.DOCUMENTS_CLOSE);
  }

  return session.summary;
}
