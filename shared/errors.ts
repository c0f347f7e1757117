import { REQUIRED_COLUMNS } from './constants.js';

export type ConverterErrorCode =
  | 'INVALID_INPUT'
  | 'MISSING_COLUMNS'
  | 'INVALID_OUTPUT'
  | 'INVALID_RECORDS'
  | 'CONFIG';

/**
 * Base class for every fatal condition the converter detects itself.
 * File-system errors are not wrapped and surface as thrown by node:fs.
 */
export class ContactConverterError extends Error {
  readonly code: ConverterErrorCode;

  constructor(message: string, code: ConverterErrorCode) {
    super(message);
    Object.setPrototypeOf(this, ContactConverterError.prototype);
    this.name = 'ContactConverterError';
    this.code = code;
  }
}

/**
 * Input path missing, not a CSV file, or holding a row the parser rejects.
 */
export class InvalidInputError extends ContactConverterError {
  constructor(message: string) {
    super(message, 'INVALID_INPUT');
    Object.setPrototypeOf(this, InvalidInputError.prototype);
    this.name = 'InvalidInputError';
  }
}

export class MissingColumnsError extends ContactConverterError {
  readonly missing: string[];

  constructor(missing: string[]) {
    super(
      `Input CSV file must include the following columns: ${REQUIRED_COLUMNS.join(', ')} (missing: ${missing.join(', ')})`,
      'MISSING_COLUMNS',
    );
    Object.setPrototypeOf(this, MissingColumnsError.prototype);
    this.name = 'MissingColumnsError';
    this.missing = missing;
  }
}

export class InvalidOutputPathError extends ContactConverterError {
  constructor(message: string) {
    super(message, 'INVALID_OUTPUT');
    Object.setPrototypeOf(this, InvalidOutputPathError.prototype);
    this.name = 'InvalidOutputPathError';
  }
}

/**
 * Raised under the `fail` policy once every record has been checked.
 */
export class InvalidRecordsError extends ContactConverterError {
  readonly rows: number[];

  constructor(rows: number[]) {
    super(
      `${rows.length} record(s) failed validation (rows ${rows.join(', ')}); nothing was written`,
      'INVALID_RECORDS',
    );
    Object.setPrototypeOf(this, InvalidRecordsError.prototype);
    this.name = 'InvalidRecordsError';
    this.rows = rows;
  }
}

export class ConfigError extends ContactConverterError {
  constructor(message: string) {
    super(message, 'CONFIG');
    Object.setPrototypeOf(this, ConfigError.prototype);
    this.name = 'ConfigError';
  }
}
