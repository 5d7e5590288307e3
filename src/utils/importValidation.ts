import { isRecord } from './guards';

// Version written by exportJSON. Version 1 backups carry flat "<page>_<collection>_<index>" answers.
export const CURRENT_EXPORT_VERSION = 2;
export const SUPPORTED_VERSIONS: readonly number[] = [1, 2];
export const MAX_IMPORT_BYTES = 1024 * 1024;

export interface ImportPayload {
  version: number;
  answers: Record<string, unknown>;
}

export type ImportValidationResult =
  | { isValid: true; data: ImportPayload }
  | { isValid: false; error: string };

const invalid = (error: string): ImportValidationResult => ({ isValid: false, error });

/**
 * Checks an answers backup before anything is imported. A missing version is read as version 1.
 */
export const validateImportJSON = (json: string): ImportValidationResult => {
  if (new Blob([json]).size > MAX_IMPORT_BYTES) {
    return invalid('Import data is too large (max 1 MB)');
  }

  let data: unknown;
  try {
    data = JSON.parse(json);
  } catch {
    return invalid('Invalid JSON format');
  }

  if (!isRecord(data)) return invalid('Import data must be a JSON object');

  const { version = 1 } = data;
  if (typeof version !== 'number') return invalid('Version must be a number');
  if (!SUPPORTED_VERSIONS.includes(version)) return invalid(`Unsupported version: ${version}`);

  if (!isRecord(data.answers)) return invalid('Answers must be an object');

  return { isValid: true, data: { version, answers: data.answers } };
};
