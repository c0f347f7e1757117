/**
 * End-to-end tests for the CSV → vCard pipeline (src/convert.ts).
 *
 * Each test gets its own temp directory so input and output files never
 * collide. The overwrite prompt and console output are replaced by stubs.
 *
 * Run:  npx tsx --test tests/convert.test.ts
 */

import { describe, it, beforeEach, afterEach } from 'node:test';
import assert from 'node:assert/strict';
import { mkdirSync, writeFileSync, readFileSync, rmSync, existsSync } from 'node:fs';
import { join } from 'node:path';
import { randomBytes } from 'node:crypto';
import { convertContacts, isAffirmative, type ConvertIO } from '../src/convert.js';
import {
  InvalidInputError, InvalidOutputPathError, InvalidRecordsError, MissingColumnsError,
} from '../shared/errors.js';
import { DEFAULT_OPTIONS } from '../shared/constants.js';
import type { ConverterOptions } from '../shared/types.js';

// ── Test helpers ─────────────────────────────────────────────────────

let DIR: string;

function tempDir(): string {
  const dir = join(process.env.TMPDIR ?? '/tmp', `vcf-test-${randomBytes(4).toString('hex')}`);
  mkdirSync(dir, { recursive: true });
  return dir;
}

function writeInput(name: string, content: string): string {
  const path = join(DIR, name);
  writeFileSync(path, content, 'utf-8');
  return path;
}

function options(overrides: Partial<ConverterOptions> = {}): ConverterOptions {
  return {
    ...DEFAULT_OPTIONS,
    input: join(DIR, 'contacts.csv'),
    output: join(DIR, 'contacts.vcf'),
    ...overrides,
  };
}

interface Captured {
  io: ConvertIO;
  info: string[];
  warn: string[];
  questions: string[];
}

function capture(answer = 'n'): Captured {
  const captured: Captured = {
    info: [],
    warn: [],
    questions: [],
    io: {
      reporter: {
        info: m => { captured.info.push(m); },
        warn: m => { captured.warn.push(m); },
        error: () => {},
      },
      confirm: async question => {
        captured.questions.push(question);
        return answer;
      },
    },
  };
  return captured;
}

const SAMPLE_CSV =
  'First Name,Last Name,Email,Phone\n' +
  'Jane,Doe,jane@x.com,555-111-2222\n' +
  'Bob,Roe,bad-email,5551112222\n';

const JANE_CARD =
  'BEGIN:VCARD\nVERSION:3.0\nEMAIL:jane@x.com\nTEL;TYPE=cell,voice:555-111-2222\nFN:Jane Doe\nEND:VCARD\n';
const BOB_CARD =
  'BEGIN:VCARD\nVERSION:3.0\nEMAIL:bad-email\nTEL;TYPE=cell,voice:5551112222\nFN:Bob Roe\nEND:VCARD\n';

beforeEach(() => {
  DIR = tempDir();
});

afterEach(() => {
  rmSync(DIR, { recursive: true, force: true });
});

// ── Default policy ───────────────────────────────────────────────────

describe('convertContacts — default policy', () => {
  it('emits every row in order and warns about the invalid one', async () => {
    writeInput('contacts.csv', SAMPLE_CSV);
    const opts = options();
    const c = capture();

    const report = await convertContacts(opts, c.io);

    assert.equal(readFileSync(opts.output, 'utf-8'), JANE_CARD + BOB_CARD + '\n');
    assert.deepEqual(c.warn, ['⚠  Bad Email for Bob Roe']);
    assert.deepEqual(c.info, [
      'Successfully generated contact file for 2 people',
      `✅ 2 contacts successfully published to file ${opts.output}`,
    ]);
    assert.deepEqual(c.questions, []);
    assert.deepEqual(report, {
      outputPath: opts.output, processed: 2, added: 2, skipped: 0, invalid: 1, written: true,
    });
  });

  it('matches headers case-insensitively and ignores extra columns', async () => {
    writeInput('contacts.csv', 'FIRST NAME,last name,eMail,PHONE,Company\nJane,Doe,jane@x.com,555-111-2222,Acme\n');
    const opts = options();

    await convertContacts(opts, capture().io);

    assert.equal(readFileSync(opts.output, 'utf-8'), JANE_CARD + '\n');
  });

  it('writes only a newline for a header-only table', async () => {
    writeInput('contacts.csv', 'first name,last name,email,phone\n');
    const opts = options();

    const report = await convertContacts(opts, capture().io);

    assert.equal(readFileSync(opts.output, 'utf-8'), '\n');
    assert.equal(report.added, 0);
  });
});

// ── Fatal checks ─────────────────────────────────────────────────────

describe('convertContacts — fatal checks', () => {
  it('rejects a missing input file', async () => {
    const opts = options({ input: join(DIR, 'nope.csv') });
    await assert.rejects(convertContacts(opts, capture().io), InvalidInputError);
    assert.equal(existsSync(opts.output), false);
  });

  it('rejects an input file without the .csv extension', async () => {
    const input = writeInput('contacts.txt', SAMPLE_CSV);
    await assert.rejects(
      convertContacts(options({ input }), capture().io),
      { name: 'InvalidInputError', message: 'Must provide a CSV file as input' },
    );
  });

  it('rejects an output path without the .vcf extension before reading input', async () => {
    writeInput('contacts.csv', SAMPLE_CSV);
    const opts = options({ output: join(DIR, 'contacts.txt') });
    await assert.rejects(convertContacts(opts, capture().io), InvalidOutputPathError);
    assert.equal(existsSync(opts.output), false);
  });

  it('rejects a table missing a required column and writes nothing', async () => {
    writeInput('contacts.csv', 'first name,last name,email\nJane,Doe,jane@x.com\n');
    const opts = options();
    await assert.rejects(
      convertContacts(opts, capture().io),
      (err: unknown) => err instanceof MissingColumnsError && err.missing.join() === 'phone',
    );
    assert.equal(existsSync(opts.output), false);
  });
});

// ── Overwrite handling ───────────────────────────────────────────────

describe('convertContacts — existing output', () => {
  it('leaves the file untouched when the user declines', async () => {
    writeInput('contacts.csv', SAMPLE_CSV);
    const opts = options();
    writeFileSync(opts.output, 'ORIGINAL', 'utf-8');
    const c = capture('n');

    const report = await convertContacts(opts, c.io);

    assert.equal(readFileSync(opts.output, 'utf-8'), 'ORIGINAL');
    assert.deepEqual(c.questions, [`Overwrite file ${opts.output}? (Y or N): `]);
    assert.equal(c.info[c.info.length - 1], 'Results not written to file');
    assert.equal(report.written, false);
  });

  it('overwrites when the user answers Y', async () => {
    writeInput('contacts.csv', SAMPLE_CSV);
    const opts = options();
    writeFileSync(opts.output, 'ORIGINAL', 'utf-8');

    const report = await convertContacts(opts, capture('Y').io);

    assert.equal(readFileSync(opts.output, 'utf-8'), JANE_CARD + BOB_CARD + '\n');
    assert.equal(report.written, true);
  });

  it('skips the prompt when forceOverwrite is set', async () => {
    writeInput('contacts.csv', SAMPLE_CSV);
    const opts = options({ forceOverwrite: true });
    writeFileSync(opts.output, 'ORIGINAL', 'utf-8');
    const c = capture('n');

    await convertContacts(opts, c.io);

    assert.deepEqual(c.questions, []);
    assert.equal(readFileSync(opts.output, 'utf-8'), JANE_CARD + BOB_CARD + '\n');
  });
});

// ── Invalid-record policies ──────────────────────────────────────────

describe('convertContacts — onInvalid', () => {
  it('skip drops invalid rows from the output', async () => {
    writeInput('contacts.csv', SAMPLE_CSV);
    const opts = options({ onInvalid: 'skip' });
    const c = capture();

    const report = await convertContacts(opts, c.io);

    assert.equal(readFileSync(opts.output, 'utf-8'), JANE_CARD + '\n');
    assert.deepEqual(c.warn, ['⚠  Bad Email for Bob Roe', '   ↳ Skipping Bob Roe']);
    assert.equal(c.info[0], 'Successfully generated contact file for 1 people');
    assert.deepEqual(
      { added: report.added, skipped: report.skipped, invalid: report.invalid },
      { added: 1, skipped: 1, invalid: 1 },
    );
  });

  it('fail aborts before writing and lists the offending rows', async () => {
    writeInput('contacts.csv', SAMPLE_CSV);
    const opts = options({ onInvalid: 'fail' });

    await assert.rejects(
      convertContacts(opts, capture().io),
      (err: unknown) => err instanceof InvalidRecordsError && err.rows.join() === '2',
    );
    assert.equal(existsSync(opts.output), false);
  });

  it('exact matching flags values with trailing text', async () => {
    writeInput('contacts.csv', 'first name,last name,email,phone\nJane,Doe,jane@x.com,555-111-2222 ext 9\n');
    const c = capture();

    const report = await convertContacts(options({ matchMode: 'exact' }), c.io);

    assert.deepEqual(c.warn, ['⚠  Bad Phone Number for Jane Doe']);
    assert.equal(report.invalid, 1);
  });
});

describe('isAffirmative', () => {
  it('accepts y in either case', () => {
    assert.equal(isAffirmative('y'), true);
    assert.equal(isAffirmative('Y'), true);
    assert.equal(isAffirmative(' y\n'), true);
  });

  it('treats anything else as no', () => {
    assert.equal(isAffirmative('yes'), false);
    assert.equal(isAffirmative(''), false);
    assert.equal(isAffirmative('n'), false);
  });
});
