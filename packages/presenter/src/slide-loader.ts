/**
 * Slide loader - reads slide documents from a directory in presentation
 * order.
 *
 * File names are the ordering contract: `01-intro.md` comes before
 * `02-architecture.md`. Names are compared by code unit, never by locale,
 * so the order is the same on every machine.
 */

import { readdir, readFile, stat } from 'fs/promises';
import { join } from 'path';
import type { SlideDocument } from './deck.js';

export function compareNames(a: string, b: string): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}

/**
 * True when `dir` exists and is a directory.
 */
export async function isDirectory(dir: string): Promise<boolean> {
  try {
    return (await stat(dir)).isDirectory();
  } catch {
    return false;
  }
}

/**
 * Names of the slide files in `dir`, sorted.
 */
export async function listSlideFiles(dir: string, extension: string = '.md'): Promise<string[]> {
  const entries = await readdir(dir, { withFileTypes: true });
  return entries
    .filter((entry) => entry.isFile() && entry.name.endsWith(extension))
    .map((entry) => entry.name)
    .sort(compareNames);
}

/**
 * Read every slide file in `dir`, in presentation order.
 */
export async function loadSlideDocuments(dir: string, extension: string = '.md'): Promise<SlideDocument[]> {
  const names = await listSlideFiles(dir, extension);
  return Promise.all(
    names.map(async (name) => ({ name, text: await readFile(join(dir, name), 'utf-8') }))
  );
}
