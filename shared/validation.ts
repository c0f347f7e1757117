import { REQUIRED_COLUMNS } from './constants.js';
import { MissingColumnsError } from './errors.js';
import type {
  ContactRecord, ContactTable, MatchMode, RecordIssue, ValidationResult,
} from './types.js';

// North-American 10-digit numbers: optional +1/1 prefix, optional (area code), '-' or ' ' separators
const PHONE_SOURCE = String.raw`(?:\+?1[- ]?)?\(?([0-9]{3})\)?[- ]?([0-9]{3})[- ]?([0-9]{4})`;
const EMAIL_SOURCE = String.raw`[a-zA-Z0-9._%+-]+@[a-zA-Z0-9.-]+\.[a-zA-Z]{2,}`;

function compile(source: string): Record<MatchMode, RegExp> {
  return {
    search: new RegExp(source),
    exact: new RegExp(`^(?:${source})$`),
  };
}

export const PHONE_PATTERNS = compile(PHONE_SOURCE);
export const EMAIL_PATTERNS = compile(EMAIL_SOURCE);

// --- Schema ---

export function findMissingColumns(columns: string[]): string[] {
  return REQUIRED_COLUMNS.filter(col => !columns.includes(col));
}

export function assertRequiredColumns(columns: string[]): void {
  const missing = findMissingColumns(columns);
  if (missing.length > 0) {
    throw new MissingColumnsError(missing);
  }
}

/**
 * Check the table's columns and project each row onto a ContactRecord,
 * keeping input order.
 */
export function toContactRecords(table: ContactTable): ContactRecord[] {
  assertRequiredColumns(table.columns);
  return table.rows.map((row, idx) => ({
    row: idx + 1,
    firstName: row['first name'] ?? '',
    lastName: row['last name'] ?? '',
    email: row['email'] ?? '',
    phone: row['phone'] ?? '',
  }));
}

// --- Per-record checks ---

export function isValidPhone(value: string, matchMode: MatchMode = 'search'): boolean {
  return PHONE_PATTERNS[matchMode].test(value);
}

export function isValidEmail(value: string, matchMode: MatchMode = 'search'): boolean {
  return EMAIL_PATTERNS[matchMode].test(value);
}

export function displayName(record: ContactRecord): string {
  return `${record.firstName} ${record.lastName}`;
}

export function verifyRecord(record: ContactRecord, matchMode: MatchMode = 'search'): ValidationResult {
  const issues: RecordIssue[] = [];

  if (!isValidPhone(record.phone, matchMode)) {
    issues.push({ field: 'phone', message: `Bad Phone Number for ${displayName(record)}` });
  }
  if (!isValidEmail(record.email, matchMode)) {
    issues.push({ field: 'email', message: `Bad Email for ${displayName(record)}` });
  }

  return { valid: issues.length === 0, issues };
}
