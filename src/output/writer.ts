import { closeSync, openSync, writeSync } from 'node:fs';
import { OutputError } from '../core/errors.js';

export interface OutputSink {
  /** Appends `text` followed by a newline. */
  writeLine(text: string): void;
  close(): void;
}

class StdoutSink implements OutputSink {
  writeLine(text: string): void {
    console.log(text);
  }

  close(): void {}
}

class FileSink implements OutputSink {
  private fd: number | null;
  readonly path: string;

  constructor(path: string) {
    this.path = path;
    try {
      this.fd = openSync(path, 'w');
    } catch (error) {
      throw new OutputError(path, error);
    }
  }

  writeLine(text: string): void {
    if (this.fd === null) {
      throw new OutputError(this.path, new Error('sink is closed'));
    }
    try {
      writeSync(this.fd, `${text}\n`);
    } catch (error) {
      throw new OutputError(this.path, error);
    }
  }

  close(): void {
    if (this.fd !== null) {
      closeSync(this.fd);
      this.fd = null;
    }
  }
}

/** Opens (and truncates) the destination immediately; a bad path throws `OutputError`. */
export function createSink(outputFile?: string): OutputSink {
  return outputFile ? new FileSink(outputFile) : new StdoutSink();
}
