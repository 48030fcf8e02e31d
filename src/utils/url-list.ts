import fs from 'fs';
import { InputMissingError } from './errors';

const BOM = '\uFEFF';

/**
 * Pull target URLs out of a line-oriented list. Blank lines, headers and
 * anything else that does not start with "http" are ignored.
 */
export function parseUrlList(content: string): string[] {
  const text = content.startsWith(BOM) ? content.slice(BOM.length) : content;
  return text
    .split(/\r\n|\n|\r/)
    .map(line => line.trim())
    .filter(line => line.toLowerCase().startsWith('http'));
}

/**
 * Read the URL list file (UTF-8, with or without a byte order mark).
 * @throws InputMissingError when the file is missing or unreadable
 */
export function readUrlList(path: string): string[] {
  let content: string;
  try {
    content = fs.readFileSync(path, 'utf8');
  } catch (error) {
    throw new InputMissingError(path, error);
  }
  return parseUrlList(content);
}
