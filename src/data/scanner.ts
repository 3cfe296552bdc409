/**
 * RPS Export - Directory Scanner
 * ==============================
 * Lists the session files an export run should read
 */

import * as fs from 'fs';
import * as path from 'path';
import { FileSystemError } from '../core/errors';

/** Name fragments marking test games and exit-survey exports */
export const DEFAULT_EXCLUSION_MARKERS: readonly string[] = ['TEST', 'freeResp', 'sliderData'];

/**
 * Whether a file name is a session document to export
 */
export function isSessionFile(fileName: string, markers: readonly string[] = DEFAULT_EXCLUSION_MARKERS): boolean {
  return fileName.endsWith('.json') && !markers.some(marker => fileName.includes(marker));
}

/**
 * List session file names in directory listing order
 */
export function scanDirectory(inputDir: string, markers: readonly string[] = DEFAULT_EXCLUSION_MARKERS): string[] {
  const dirPath = path.resolve(inputDir);

  let entries: fs.Dirent[];
  try {
    entries = fs.readdirSync(dirPath, { withFileTypes: true });
  } catch (error) {
    throw new FileSystemError(`Cannot list input directory ${dirPath}`, dirPath, error);
  }

  return entries
    .filter(entry => !entry.isDirectory() && isSessionFile(entry.name, markers))
    .map(entry => entry.name);
}

/**
 * Read one session file as text. Invalid UTF-8 sequences are replaced.
 */
export function readSessionFile(inputDir: string, fileName: string): string {
  const filePath = path.join(path.resolve(inputDir), fileName);
  try {
    return fs.readFileSync(filePath).toString('utf-8');
  } catch (error) {
    throw new FileSystemError(`Cannot read ${filePath}`, filePath, error);
  }
}
