import fs from 'fs-extra';

import { extractJsonObject, parseFieldGuess, toFieldDictionary } from './field_guess.js';
import { toPosixRelative } from './io.js';
import type { FieldDictionary } from './suggestions.js';

export type FieldFileFormat = 'fields' | 'guess';

/**
 * Reads a field dictionary saved by an earlier step (`fields`) or the raw reply
 * of the field guesser (`guess`), which is limited to the form vocabulary.
 */
export async function readFieldFile(
  filePath: string,
  formatName: FieldFileFormat = 'fields'
): Promise<FieldDictionary> {
  if (!(await fs.pathExists(filePath))) {
    throw new Error(`${toPosixRelative(filePath)}: field file not found`);
  }

  const raw = await fs.readFile(filePath, 'utf8');
  if (formatName === 'guess') {
    const guessed = parseFieldGuess(raw);
    if (!guessed.ok) {
      throw new Error(`${toPosixRelative(filePath)}: no field object found (${guessed.reason})`);
    }
    return guessed.value;
  }

  const parsed = extractJsonObject(raw);
  if (!parsed.ok) {
    throw new Error(`${toPosixRelative(filePath)}: ${parsed.reason}`);
  }
  return toFieldDictionary(parsed.value);
}

export function parseFieldFileFormat(value: string | undefined): FieldFileFormat {
  if (value === undefined || value === 'fields') {
    return 'fields';
  }
  if (value === 'guess') {
    return 'guess';
  }
  throw new Error(`Invalid --format '${value}'. Expected 'fields' or 'guess'`);
}
