import { parseArgs } from './utils.js';
import { resolveOptions } from './config.js';
import { convertContacts, defaultIO, type ConvertIO } from './convert.js';
import { ContactConverterError } from '../shared/errors.js';

export const USAGE = `Usage: npx tsx src/convertContacts.ts --input contacts.csv [options]

Convert a CSV of contacts (first name, last name, email, phone) into a vCard
file that address-book apps can import in one go.

Options:
  -i, --input <file.csv>     CSV file with a header row (required)
  -o, --output <file.vcf>    Output file (default: contact_file.vcf)
  --on-invalid <policy>      includeWithWarning (default) | skip | fail
  --match <mode>             search (default) | exact
  -f, --force                Overwrite an existing output file without asking
  --config <file.json>       Read any of the options above from a JSON file
  -h, --help                 Show this message`;

/**
 * Run the converter for one command line and return the process exit code.
 */
export async function main(argv: string[], io: ConvertIO = defaultIO): Promise<number> {
  const { reporter } = io;
  const args = parseArgs(argv);

  if (args['help']) {
    reporter.info(USAGE);
    return 0;
  }

  try {
    const options = resolveOptions(args);
    const report = await convertContacts(options, io);
    if (report.invalid > 0) {
      reporter.info(`   ${report.invalid} record(s) failed validation, ${report.skipped} skipped`);
    }
    return 0;
  } catch (err) {
    if (err instanceof ContactConverterError) {
      reporter.error(`❌ ${err.message}`);
      if (err.code === 'CONFIG') reporter.error(`\n${USAGE}`);
    } else {
      reporter.error(err instanceof Error ? err.stack ?? err.message : String(err));
    }
    return 1;
  }
}
