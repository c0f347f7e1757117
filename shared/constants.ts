import type { ConverterOptions } from './types.js';

export const INPUT_EXTENSION = '.csv';
export const OUTPUT_EXTENSION = '.vcf';

// Canonical (lower-cased) header names every input table must carry
export const REQUIRED_COLUMNS = ['first name', 'last name', 'email', 'phone'] as const;

export const DEFAULT_OPTIONS: Omit<ConverterOptions, 'input'> = {
  output: 'contact_file.vcf',
  onInvalid: 'includeWithWarning',
  matchMode: 'search',
  forceOverwrite: false,
};
