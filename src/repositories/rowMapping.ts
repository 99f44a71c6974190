/**
 * Helpers for turning SQLite rows back into domain values.
 */

export function parseEnum<T extends string>(allowed: readonly T[], value: string, column: string): T {
  const match = allowed.find((candidate) => candidate === value);
  if (match === undefined) {
    throw new Error(`Unexpected value "${value}" in column ${column}`);
  }
  return match;
}

export const OWNERSHIP_SCOPES = ['shared', 'personal'] as const;
export const MATCH_STATUSES = ['suggested', 'auto_matched', 'accepted', 'rejected'] as const;
export const MATCH_SOURCES = ['auto', 'manual'] as const;
export const EXCEPTION_TYPES = ['skip', 'modify'] as const;
export const AUDIT_ACTIONS = [
  'suggested',
  'auto_matched',
  'manual_matched',
  'accepted',
  'rejected',
] as const;

export const placeholders = (count: number): string => new Array(count).fill('?').join(', ');
