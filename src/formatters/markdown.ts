import { Defaults } from '../constants/defaults.js';
import { getLanguage } from '../constants/languages.js';
import { getExtension } from '../core/filter.js';

/** Shortest backtick fence that cannot close early inside `content`. */
export function chooseFence(content: string): string {
  let fence = '`'.repeat(Defaults.MIN_FENCE_LENGTH);
  while (content.includes(fence)) {
    fence += '`';
  }
  return fence;
}

export function formatMarkdown(path: string, content: string): string {
  const fence = chooseFence(content);
  const language = getLanguage(getExtension(path));

  const lines: string[] = [path, `${fence}${language}`, content, fence];
  return lines.join('\n');
}
