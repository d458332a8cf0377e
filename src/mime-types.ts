import { readFileSync } from 'node:fs';
import * as path from 'node:path';
import { z } from 'zod';

export const DEFAULT_MIME_TYPE = 'application/octet-stream';

// data/ sits beside both src/ and dist/
const MIME_TYPES_FILE = new URL('../data/mime-types.json', import.meta.url);

let mimeTypes: Readonly<Record<string, string>> | undefined;

function loadMimeTypes(): Readonly<Record<string, string>> {
  if (!mimeTypes) {
    const raw: unknown = JSON.parse(readFileSync(MIME_TYPES_FILE, 'utf8'));
    mimeTypes = Object.freeze(z.record(z.string()).parse(raw));
  }
  return mimeTypes;
}

/**
 * Guess the content type of an upload from its file extension.
 */
export function guessMimeType(fileName: string): string {
  const ext = path.extname(fileName).toLowerCase();
  return loadMimeTypes()[ext] ?? DEFAULT_MIME_TYPE;
}
