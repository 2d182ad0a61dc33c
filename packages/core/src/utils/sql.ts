import { VerificationError } from '../errors/index.js';

/** Valid SQL identifier pattern (alphanumeric + underscore, must start with letter/underscore) */
export const VALID_IDENTIFIER = /^[a-zA-Z_][a-zA-Z0-9_]*$/;

/**
 * Validate that a string is a safe SQL identifier
 */
export function validateIdentifier(name: string, type: string): void {
  if (!VALID_IDENTIFIER.test(name)) {
    throw new VerificationError({
      code: 'INVALID_IDENTIFIER',
      message: `Invalid ${type} name: "${name}". Must be alphanumeric with underscores, starting with a letter or underscore.`,
      suggestion: `Use only valid SQL identifiers for ${type} names.`,
      context: { [type]: name },
    });
  }
}

/** Double-quote an identifier, doubling embedded quotes */
export function quoteIdent(name: string): string {
  return `"${name.replace(/"/g, '""')}"`;
}

/** Schema-qualified table reference; both parts must be plain identifiers */
export function qualifiedTable(database: string, table: string): string {
  validateIdentifier(database, 'database');
  validateIdentifier(table, 'table');
  return `${quoteIdent(database)}.${quoteIdent(table)}`;
}

/** Single-quoted string literal */
export function quoteLiteral(value: string): string {
  return `'${value.replace(/'/g, "''")}'`;
}
