import { existsSync, readFileSync } from 'node:fs';
import { z } from 'zod';
import { DEFAULT_OPTIONS } from '../shared/constants.js';
import { ConfigError } from '../shared/errors.js';
import type { ConverterOptions } from '../shared/types.js';

const InvalidPolicySchema = z.enum(['skip', 'includeWithWarning', 'fail']);
const MatchModeSchema = z.enum(['search', 'exact']);

/**
 * Shape of an optional JSON config file (`--config`). Every key is optional;
 * CLI flags take precedence over whatever the file sets.
 */
export const ConfigFileSchema = z.object({
  input: z.string().min(1).optional(),
  output: z.string().min(1).optional(),
  onInvalid: InvalidPolicySchema.optional(),
  matchMode: MatchModeSchema.optional(),
  forceOverwrite: z.boolean().optional(),
}).strict();

export type ConfigFile = z.infer<typeof ConfigFileSchema>;

export const ConverterOptionsSchema = z.object({
  input: z.string({ required_error: 'Missing required option --input' }).min(1),
  output: z.string().min(1).default(DEFAULT_OPTIONS.output),
  onInvalid: InvalidPolicySchema.default(DEFAULT_OPTIONS.onInvalid),
  matchMode: MatchModeSchema.default(DEFAULT_OPTIONS.matchMode),
  forceOverwrite: z.boolean().default(DEFAULT_OPTIONS.forceOverwrite),
});

function describeIssues(error: z.ZodError): string {
  return error.issues
    .map(i => (i.path.length > 0 ? `${i.path.join('.')}: ${i.message}` : i.message))
    .join('; ');
}

export function readConfigFile(path: string): ConfigFile {
  if (!existsSync(path)) {
    throw new ConfigError(`Config file ${path} does not exist`);
  }

  let data: unknown;
  try {
    data = JSON.parse(readFileSync(path, 'utf-8'));
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    throw new ConfigError(`Config file ${path} is not valid JSON: ${reason}`);
  }

  const result = ConfigFileSchema.safeParse(data);
  if (!result.success) {
    throw new ConfigError(`Invalid config file ${path}: ${describeIssues(result.error)}`);
  }
  return result.data;
}

/**
 * Map parsed CLI args (see parseArgs) onto option keys, leaving out
 * anything the user did not pass.
 */
export function optionsFromArgs(args: Record<string, string>): ConfigFile {
  const fromArgs: Record<string, string | boolean | undefined> = {
    input: args['input'],
    output: args['output'],
    onInvalid: args['on-invalid'],
    matchMode: args['match'],
    forceOverwrite: args['force'] === 'true' ? true : undefined,
  };

  const defined = Object.fromEntries(
    Object.entries(fromArgs).filter(([, v]) => v !== undefined)
  );

  const result = ConfigFileSchema.safeParse(defined);
  if (!result.success) {
    throw new ConfigError(`Invalid option: ${describeIssues(result.error)}`);
  }
  return result.data;
}

export function resolveOptions(args: Record<string, string>): ConverterOptions {
  const fromFile = args['config'] ? readConfigFile(args['config']) : {};
  const fromArgs = optionsFromArgs(args);

  const result = ConverterOptionsSchema.safeParse({ ...fromFile, ...fromArgs });
  if (!result.success) {
    throw new ConfigError(describeIssues(result.error));
  }
  return result.data;
}
