export type InvalidRecordPolicy = 'skip' | 'includeWithWarning' | 'fail';

export type MatchMode = 'search' | 'exact';

export interface ContactRecord {
  row: number;          // 1-based, data rows only
  firstName: string;
  lastName: string;
  email: string;
  phone: string;
}

export type TableRow = Record<string, string>;

export interface ContactTable {
  columns: string[];    // lower-cased header names, in file order
  rows: TableRow[];
}

export interface RecordIssue {
  field: 'phone' | 'email';
  message: string;
}

export interface ValidationResult {
  valid: boolean;
  issues: RecordIssue[];
}

export interface ConverterOptions {
  input: string;
  output: string;
  onInvalid: InvalidRecordPolicy;
  matchMode: MatchMode;
  forceOverwrite: boolean;
}

export interface ConversionReport {
  outputPath: string;
  processed: number;
  added: number;
  skipped: number;
  invalid: number;
  written: boolean;
}
