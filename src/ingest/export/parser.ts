/**
 * Chat export JSON parser
 * Loads the raw export document and checks its root shape
 */

import { readFile } from 'fs/promises';

/**
 * Fatal problem with the export file itself
 */
export class ExportFileError extends Error {
  constructor(
    message: string,
    public readonly filePath?: string,
    public readonly reason: 'not_found' | 'invalid_json' | 'not_array' | 'unreadable' = 'unreadable'
  ) {
    super(message);
    this.name = 'ExportFileError';
  }
}

/**
 * Parse an export document. Elements are left unvalidated;
 * the normalizer checks each record on its own.
 */
export function parseExport(jsonContent: string, filePath?: string): unknown[] {
  let rawData: unknown;
  try {
    rawData = JSON.parse(jsonContent);
  } catch (err) {
    const detail = err instanceof Error ? err.message : String(err);
    throw new ExportFileError(`Error parsing JSON: ${detail}`, filePath, 'invalid_json');
  }

  if (!Array.isArray(rawData)) {
    throw new ExportFileError('Expected JSON array at root level', filePath, 'not_array');
  }

  return rawData;
}

/**
 * Read and parse an export file
 */
export async function readExportFile(filePath: string): Promise<unknown[]> {
  let content: string;
  try {
    content = await readFile(filePath, 'utf-8');
  } catch (err) {
    if (isNotFound(err)) {
      throw new ExportFileError(`File not found: ${filePath}`, filePath, 'not_found');
    }
    const detail = err instanceof Error ? err.message : String(err);
    throw new ExportFileError(`Cannot read ${filePath}: ${detail}`, filePath, 'unreadable');
  }

  return parseExport(content, filePath);
}

function isNotFound(err: unknown): boolean {
  return err instanceof Error && 'code' in err && err.code === 'ENOENT';
}
