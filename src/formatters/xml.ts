import { XmlTags } from '../constants/defaults.js';

export function formatXml(path: string, content: string, index: number): string {
  const lines: string[] = [
    `<document index="${index}">`,
    `<source>${path}</source>`,
    XmlTags.CONTENT_OPEN,
    content,
    XmlTags.CONTENT_CLOSE,
    XmlTags.DOCUMENT_CLOSE,
  ];
  return lines.join('\n');
}
