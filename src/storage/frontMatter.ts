import { parse as yamlParse, stringify as yamlStringify } from 'yaml';

const FRONT_MATTER = /^---\r?\n([\s\S]*?)\r?\n---\r?\n/;

/**
 * Render a YAML header block followed by a blank line and the raw body.
 */
export function renderDocument(header: object, body: string): string {
  return `---\n${yamlStringify(header)}---\n\n${body}`;
}

export interface ParsedDocument {
  header: unknown;
  body: string;
}

/**
 * Split a document into its parsed YAML header and body.
 * Returns null when the text has no header block; throws if the YAML is malformed.
 */
export function splitDocument(text: string): ParsedDocument | null {
  const match = FRONT_MATTER.exec(text);
  if (!match) return null;
  const header: unknown = yamlParse(match[1] ?? '');
  const body = text.slice(match[0].length).replace(/^\r?\n/, '');
  return { header, body };
}
