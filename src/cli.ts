#!/usr/bin/env node
import { Command, Option } from 'commander';
import chalk from 'chalk';
import ora from 'ora';

import type { CLIOptions } from './types/index.js';
import { buildConfig, getDefaultOptions } from './config/builder.js';
import { processPaths } from './core/processor.js';
import { errorMessage } from './core/errors.js';
import { readPathsFromStdin } from './input/stdin.js';
import { createSink } from './output/writer.js';
import { consoleReporter, verboseReporter } from './output/diagnostics.js';
import { Defaults } from './constants/defaults.js';

const VERSION = '1.0.0';

function collect(value: string, previous: string[]): string[] {
  return [...previous, value];
}

const program = new Command();

program
  .name(Defaults.PROGRAM_NAME)
  .description('Concatenate a directory full of files into a single prompt for use with LLMs')
  .version(VERSION)
  .argument('[paths...]', 'Paths to files or directories')

  // Filtering
  .option('-e, --extension <ext>', 'File extension to include (repeatable)', collect, [])
  .option('--include-hidden', 'Include files and folders starting with .')
  .option('--ignore-files-only', '--ignore option only ignores files')
  .option('--ignore-gitignore', 'Ignore .gitignore files and include all files')
  .option('--ignore <pattern>', 'Pattern to ignore (repeatable)', collect, [])

  // Output
  .option('-o, --output <file>', 'Output to a file instead of stdout')
  .addOption(new Option('-c, --cxml', "Output in XML-ish format suitable for Claude's long context window"))
  .addOption(new Option('-m, --markdown', 'Output Markdown with fenced code blocks').conflicts('cxml'))
  .option('-n, --line-numbers', 'Add line numbers to the output')

  // Input
  .option('-0, --null', 'Use NUL character as separator when reading from stdin')
  .option('-v, --verbose', 'Report entries left out by the filters on stderr')

  .action((paths: string[], opts: Record<string, unknown>) => {
    try {
      run(paths, opts);
    } catch (error) {
      console.error(chalk.red(`Error: ${errorMessage(error)}`));
      process.exit(1);
    }
  });

function toStringList(value: unknown): string[] {
  return Array.isArray(value) ? value.filter((item): item is string => typeof item === 'string') : [];
}

function run(paths: string[], opts: Record<string, unknown>): void {
  const options: CLIOptions = {
    ...getDefaultOptions(),
    output: typeof opts.output === 'string' ? opts.output : undefined,
    extension: toStringList(opts.extension),
    ignore: toStringList(opts.ignore),
    includeHidden: Boolean(opts.includeHidden),
    ignoreFilesOnly: Boolean(opts.ignoreFilesOnly),
    ignoreGitignore: Boolean(opts.ignoreGitignore),
    cxml: Boolean(opts.cxml),
    markdown: Boolean(opts.markdown),
    lineNumbers: Boolean(opts.lineNumbers),
    null: Boolean(opts.null),
    verbose: Boolean(opts.verbose),
  };

  const config = buildConfig(options);
  const inputs = [...paths, ...readPathsFromStdin(options.null)];
  const sink = createSink(options.output);

  // Only worth a spinner when stdout is free and someone is watching stderr
  const spinner =
    options.output && process.stderr.isTTY ? ora(`Writing documents to ${options.output}...`).start() : null;

  const base = options.verbose ? verboseReporter : consoleReporter;
  const aroundSpinner = (print: () => void): void => {
    spinner?.clear();
    print();
    spinner?.render();
  };

  try {
    const summary = processPaths(inputs, config, sink, {
      warn: (message) => aroundSpinner(() => base.warn(message)),
      excluded: (path, reason) => aroundSpinner(() => base.excluded?.(path, reason)),
    });
    spinner?.succeed(`Wrote ${summary.documents.toLocaleString()} documents to ${options.output}`);
  } catch (error) {
    spinner?.fail('Failed to write documents');
    throw error;
  } finally {
    sink.close();
  }
}

program.parse();
