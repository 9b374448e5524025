import { readFileSync } from 'node:fs';
import { TraversalError } from '../core/errors.js';

export function parsePathList(text: string, nullSeparated: boolean): string[] {
  const pieces = nullSeparated ? text.split('\0') : text.split(/\s+/);
  return pieces.filter((piece) => piece.length > 0);
}

/** Extra input paths piped on stdin. Nothing is read from an interactive terminal. */
export function readPathsFromStdin(nullSeparated: boolean): string[] {
  if (process.stdin.isTTY) {
    return [];
  }

  let text: string;
  try {
    text = readFileSync(process.stdin.fd, 'utf-8');
  } catch (error) {
    throw new TraversalError('<stdin>', error);
  }
  return parsePathList(text, nullSeparated);
}
