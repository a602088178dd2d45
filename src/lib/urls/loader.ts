/**
 * URL Loader
 *
 * Reads the list of pages to capture from a plain-text file (one URL per
 * line) or a CSV file (URL in the first column).
 */

import { readFile } from 'fs/promises';
import { extname } from 'path';

// ============================================================================
// Types
// ============================================================================

export type UrlListKind = 'text' | 'csv';

export class UrlFileNotFoundError extends Error {
  readonly code = 'ENOENT';

  constructor(readonly path: string) {
    super(`File not found: ${path}`);
    this.name = 'UrlFileNotFoundError';
  }
}

// ============================================================================
// Parsing
// ============================================================================

export function isHttpUrl(value: string): boolean {
  return value.startsWith('http://') || value.startsWith('https://');
}

/**
 * Extract URLs from file content. Order is kept and duplicates are not
 * removed.
 */
export function parseUrlList(content: string, kind: UrlListKind = 'text'): string[] {
  const candidates = kind === 'csv'
    ? readCsvRecords(content).map(record => record[0] ?? '')
    : content.split(/\r\n|\r|\n/);

  return candidates
    .map(candidate => candidate.trim())
    .filter(candidate => candidate.length > 0 && isHttpUrl(candidate));
}

/**
 * Minimal RFC 4180 reader: quoted fields may hold commas, newlines and
 * doubled quotes. A quote only opens a quoted field at the start of the
 * field; elsewhere it is kept as a literal character.
 */
export function readCsvRecords(content: string): string[][] {
  const records: string[][] = [];
  let record: string[] = [];
  let field = '';
  let quoted = false;

  for (let i = 0; i < content.length; i++) {
    const char = content[i];

    if (quoted) {
      if (char === '"') {
        if (content[i + 1] === '"') {
          field += '"';
          i++;
        } else {
          quoted = false;
        }
      } else {
        field += char;
      }
      continue;
    }

    if (char === '"' && field.length === 0) {
      quoted = true;
    } else if (char === ',') {
      record.push(field);
      field = '';
    } else if (char === '\n' || char === '\r') {
      if (char === '\r' && content[i + 1] === '\n') i++;
      record.push(field);
      records.push(record);
      record = [];
      field = '';
    } else {
      field += char;
    }
  }

  if (field.length > 0 || record.length > 0) {
    record.push(field);
    records.push(record);
  }

  return records;
}

// ============================================================================
// Loading
// ============================================================================

export function detectListKind(path: string): UrlListKind {
  return extname(path).toLowerCase() === '.csv' ? 'csv' : 'text';
}

/**
 * Load URLs from a .txt or .csv file. The file must be valid UTF-8.
 */
export async function loadUrlsFromFile(path: string): Promise<string[]> {
  let bytes: Buffer;
  try {
    bytes = await readFile(path);
  } catch (error) {
    if (isErrnoException(error) && error.code === 'ENOENT') {
      throw new UrlFileNotFoundError(path);
    }
    throw error;
  }

  const content = new TextDecoder('utf-8', { fatal: true }).decode(bytes);
  return parseUrlList(content, detectListKind(path));
}

function isErrnoException(error: unknown): error is NodeJS.ErrnoException {
  return error instanceof Error && 'code' in error;
}
