import type { OutputFormat } from '../types/index.js';
import { addLineNumbers } from './lineNumbers.js';
import { formatMarkdown } from './markdown.js';
import { formatPlain } from './plain.js';
import { formatXml } from './xml.js';

export interface RendererOptions {
  format: OutputFormat;
  lineNumbers: boolean;
}

/**
 * One rendering session. XML documents are numbered from 1 in the order they are
 * rendered; a new run gets a new renderer.
 */
export class DocumentRenderer {
  private nextIndex = 1;
  private readonly options: RendererOptions;

  constructor(options: RendererOptions) {
    this.options = options;
  }

  render(path: string, content: string): string {
    const body = this.options.lineNumbers ? addLineNumbers(content) : content;

    switch (this.options.format) {
      case 'xml':
        return formatXml(path, body, this.nextIndex++);
      case 'markdown':
        return formatMarkdown(path, body);
      case 'default':
        return formatPlain(path, body);
    }
  }
}
