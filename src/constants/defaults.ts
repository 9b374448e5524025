export const Defaults = {
  PROGRAM_NAME: 'files-to-prompt',
  GITIGNORE_FILE: '.gitignore',
  MIN_FENCE_LENGTH: 3,
} as const;

export const PLAIN_SEPARATOR = '---';

export const XmlTags = {
  DOCUMENTS_OPEN: '<documents>',
  DOCUMENTS_CLOSE: '</documents>',
  CONTENT_OPEN: '<document_content>',
  CONTENT_CLOSE: '</document_content>',
  DOCUMENT_CLOSE: '</document>',
} as const;
