import { readFileSync, writeFileSync, existsSync, statSync } from 'node:fs';
import readline from 'node:readline/promises';
import { stdin as input, stdout as output } from 'node:process';
import { parseCsv, toContactTable } from '../shared/csv.js';
import { INPUT_EXTENSION, OUTPUT_EXTENSION } from '../shared/constants.js';
import { InvalidInputError, InvalidOutputPathError } from '../shared/errors.js';
import type { ContactTable } from '../shared/types.js';

// --- Path checks ---

// Plain suffix test, so a bare '.vcf' counts as a vCard file name
export function hasExtension(path: string, ext: string): boolean {
  return path.toLowerCase().endsWith(ext);
}

export function assertInputPath(path: string): void {
  if (!existsSync(path) || !statSync(path).isFile()) {
    throw new InvalidInputError(`Input file ${path} is not a valid file path`);
  }
  if (!hasExtension(path, INPUT_EXTENSION)) {
    throw new InvalidInputError('Must provide a CSV file as input');
  }
}

export function assertOutputPath(path: string): void {
  if (!hasExtension(path, OUTPUT_EXTENSION)) {
    throw new InvalidOutputPathError(`Output file must end with '${OUTPUT_EXTENSION}'`);
  }
}

// --- Read/Write helpers ---

export function loadContactTable(path: string): ContactTable {
  assertInputPath(path);
  const raw = readFileSync(path, 'utf-8');
  return toContactTable(parseCsv(raw));
}

export function outputExists(path: string): boolean {
  return existsSync(path);
}

export function writeCardFile(path: string, document: string): void {
  writeFileSync(path, document + '\n', 'utf-8');
}

// --- Interactive prompt ---

export async function promptLine(question: string): Promise<string> {
  const rl = readline.createInterface({ input, output });
  try {
    return await rl.question(question);
  } finally {
    rl.close();
  }
}

// --- Arg parsing helper ---

const SHORT_FLAGS: Record<string, string> = {
  i: 'input',
  o: 'output',
  f: 'force',
  h: 'help',
};

const BOOLEAN_FLAGS = new Set(['force', 'help']);

export function parseArgs(argv: string[]): Record<string, string> {
  const args: Record<string, string> = {};
  const positional: string[] = [];

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    let key: string | undefined;
    if (arg.startsWith('--')) {
      key = arg.slice(2);
    } else if (arg.length === 2 && arg.startsWith('-')) {
      key = SHORT_FLAGS[arg[1]] ?? arg[1];
    }

    if (key !== undefined) {
      const next = argv[i + 1];
      if (!BOOLEAN_FLAGS.has(key) && next !== undefined && !next.startsWith('-')) {
        args[key] = next;
        i++;
      } else {
        args[key] = 'true';
      }
    } else {
      positional.push(arg);
    }
  }

  if (positional.length > 0) {
    args['_positional'] = positional.join(' ');
  }
  return args;
}
