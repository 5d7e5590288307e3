// Narrowing helpers for JSON read from files, storage and imports.

export const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === 'object' && value !== null && !Array.isArray(value);

export const optionalString = (value: unknown): string | undefined =>
  typeof value === 'string' ? value : undefined;

export const isIndexKey = (value: string): boolean => /^\d+$/.test(value);
