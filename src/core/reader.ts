import { readFileSync } from 'node:fs';
import type { ReadResult } from '../types/index.js';
import { errorMessage } from './errors.js';

export function readTextFile(path: string): ReadResult {
  let bytes: Buffer;
  try {
    bytes = readFileSync(path);
  } catch (error) {
    return { ok: false, kind: 'io', message: errorMessage(error) };
  }

  try {
    // fatal: invalid UTF-8 throws instead of producing U+FFFD; ignoreBOM keeps a BOM in the text
    const decoder = new TextDecoder('utf-8', { fatal: true, ignoreBOM: true });
    return { ok: true, content: decoder.decode(bytes) };
  } catch (error) {
    return { ok: false, kind: 'decode', message: errorMessage(error) };
  }
}

export function describeReadFailure(path: string, result: Extract<ReadResult, { ok: false }>): string {
  const cause = result.kind === 'decode' ? 'UnicodeDecodeError' : `error: ${result.message}`;
  return `Warning: Skipping file ${path} due to ${cause}`;
}
