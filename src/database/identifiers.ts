/**
 * SQL identifier helpers.
 *
 * Table names read from the catalog are interpolated into DDL, so every one of
 * them goes through quoteIdentifier() first.
 */

import { escapeIdentifier } from 'pg';

// NAMEDATALEN - 1; longer identifiers are silently truncated by PostgreSQL
export const MAX_IDENTIFIER_BYTES = 63;

export function quoteIdentifier(name: string): string {
  if (name.length === 0) {
    throw new Error('Identifier cannot be empty');
  }
  if (name.includes('\0')) {
    throw new Error('Identifier cannot contain NUL characters');
  }
  return escapeIdentifier(name);
}

export function qualifiedName(schema: string, table: string): string {
  return `${quoteIdentifier(schema)}.${quoteIdentifier(table)}`;
}

export function exceedsIdentifierLimit(name: string): boolean {
  return Buffer.byteLength(name, 'utf8') > MAX_IDENTIFIER_BYTES;
}

/**
 * Escape LIKE wildcards so the pattern matches `prefix` literally.
 * Uses the default LIKE escape character (backslash).
 */
export function escapeLikePattern(value: string): string {
  return value.replace(/[\\%_]/g, (char) => `\\${char}`);
}

export function prefixPattern(prefix: string): string {
  return `${escapeLikePattern(prefix)}%`;
}
