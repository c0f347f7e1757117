import { InvalidRecordsError } from '../shared/errors.js';
import { displayName, toContactRecords, verifyRecord } from '../shared/validation.js';
import { renderDocument } from '../shared/vcard.js';
import type { ContactRecord, ConversionReport, ConverterOptions } from '../shared/types.js';
import {
  assertInputPath, assertOutputPath, loadContactTable, outputExists, promptLine, writeCardFile,
} from './utils.js';

export interface Reporter {
  info(message: string): void;
  warn(message: string): void;
  error(message: string): void;
}

export const consoleReporter: Reporter = {
  info: message => console.log(message),
  warn: message => console.warn(message),
  error: message => console.error(message),
};

export interface ConvertIO {
  reporter: Reporter;
  confirm: (question: string) => Promise<string>;
}

export const defaultIO: ConvertIO = { reporter: consoleReporter, confirm: promptLine };

export function isAffirmative(answer: string): boolean {
  return answer.trim().toLowerCase() === 'y';
}

/**
 * Run the whole CSV → vCard conversion. Every fatal check (paths, columns,
 * the `fail` policy) happens before the output file is touched.
 */
export async function convertContacts(
  options: ConverterOptions,
  io: ConvertIO = defaultIO,
): Promise<ConversionReport> {
  const { reporter } = io;

  assertInputPath(options.input);
  assertOutputPath(options.output);

  const records = toContactRecords(loadContactTable(options.input));

  const emitted: ContactRecord[] = [];
  const invalidRows: number[] = [];

  for (const record of records) {
    const result = verifyRecord(record, options.matchMode);
    if (!result.valid) {
      invalidRows.push(record.row);
      for (const issue of result.issues) reporter.warn(`⚠  ${issue.message}`);

      if (options.onInvalid === 'skip') {
        reporter.warn(`   ↳ Skipping ${displayName(record)}`);
        continue;
      }
    }
    emitted.push(record);
  }

  if (options.onInvalid === 'fail' && invalidRows.length > 0) {
    throw new InvalidRecordsError(invalidRows);
  }

  const document = renderDocument(emitted);
  reporter.info(`Successfully generated contact file for ${emitted.length} people`);

  const report: ConversionReport = {
    outputPath: options.output,
    processed: records.length,
    added: emitted.length,
    skipped: records.length - emitted.length,
    invalid: invalidRows.length,
    written: false,
  };

  if (outputExists(options.output) && !options.forceOverwrite) {
    const answer = await io.confirm(`Overwrite file ${options.output}? (Y or N): `);
    if (!isAffirmative(answer)) {
      reporter.info('Results not written to file');
      return report;
    }
  }

  writeCardFile(options.output, document);
  reporter.info(`✅ ${emitted.length} contacts successfully published to file ${options.output}`);
  return { ...report, written: true };
}
