/**
 * Utility functions
 */

import { randomBytes } from 'crypto';
import { rename, rm, writeFile } from 'fs/promises';

export { getLogger, createLogger, createSilentLogger, type Logger } from './logger.js';

/**
 * Sleep for the given number of milliseconds
 */
export function sleep(ms: number): Promise<void> {
  return new Promise(resolve => setTimeout(resolve, ms));
}

/**
 * Serialize a value as 2-space indented JSON.
 * Non-ASCII characters are written as-is.
 */
export function toPrettyJson(value: unknown): string {
  return JSON.stringify(value, null, 2);
}

/**
 * Write JSON to a sibling temp file and rename it over the target
 */
export async function writeJsonFileAtomic(filePath: string, value: unknown): Promise<number> {
  const content = toPrettyJson(value);
  const tempPath = `${filePath}.${randomBytes(4).toString('hex')}.tmp`;

  try {
    await writeFile(tempPath, content, 'utf-8');
    await rename(tempPath, filePath);
  } catch (error) {
    await rm(tempPath, { force: true });
    throw error;
  }

  return Buffer.byteLength(content, 'utf-8');
}

/**
 * Percentage of part in whole, 0 when whole is 0
 */
export function percentage(part: number, whole: number): number {
  return whole === 0 ? 0 : (part / whole) * 100;
}

/**
 * Uppercase the first character
 */
export function capitalize(text: string): string {
  return text.charAt(0).toUpperCase() + text.slice(1);
}

/**
 * Get a message from an unknown thrown value
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
