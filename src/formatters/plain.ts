import { PLAIN_SEPARATOR } from '../constants/defaults.js';

export function formatPlain(path: string, content: string): string {
  const lines: string[] = [path, PLAIN_SEPARATOR, content, '', PLAIN_SEPARATOR];
  return lines.join('\n');
}
