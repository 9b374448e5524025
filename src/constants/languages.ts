// Fence tags for the markdown envelope, keyed by extension without the dot.
export const EXT_TO_LANG: Readonly<Record<string, string>> = {
  py: 'python',
  c: 'c',
  cpp: 'cpp',
  java: 'java',
  js: 'javascript',
  ts: 'typescript',
  html: 'html',
  css: 'css',
  xml: 'xml',
  json: 'json',
  yaml: 'yaml',
  yml: 'yaml',
  sh: 'bash',
  rb: 'ruby',
};

export function getLanguage(ext: string): string {
  return Object.hasOwn(EXT_TO_LANG, ext) ? (EXT_TO_LANG[ext] ?? '') : '';
}
