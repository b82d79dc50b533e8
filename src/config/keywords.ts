/**
 * Search keyword list, one keyword per line
 */

import { readFile } from 'node:fs/promises';

export function parseKeywords(text: string): string[] {
  return text
    .split(/\r?\n/)
    .map((line) => line.trim())
    .filter((line) => line.length > 0 && !line.startsWith('#'));
}

export async function loadKeywords(path: string): Promise<string[]> {
  return parseKeywords(await readFile(path, 'utf-8'));
}
