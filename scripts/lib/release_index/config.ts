import { z } from 'zod';

import { UsageError } from '../errors.js';
import { isHttpUrl } from './sources/index.js';
import { DEFAULT_RENDER_OPTIONS } from './render.js';

export const DEFAULT_SOURCE = 'releases.yaml';
export const DEFAULT_TIMEOUT_MS = 30_000;
// setTimeout cannot hold a longer delay.
export const MAX_TIMEOUT_MS = 2_147_483_647;

const VALUE_OPTIONS = ['source', 'base-url', 'title', 'timeout'] as const;
const FLAG_OPTIONS = ['single-page', 'strict', 'verify-urls', 'check', 'help'] as const;

type ValueOption = (typeof VALUE_OPTIONS)[number];
type FlagOption = (typeof FLAG_OPTIONS)[number];

export interface ParsedArgs {
  command?: string;
  positionals: string[];
  options: Map<ValueOption, string>;
  flags: Set<FlagOption>;
}

function asValueOption(key: string): ValueOption | undefined {
  return VALUE_OPTIONS.find((option) => option === key);
}

function asFlagOption(key: string): FlagOption | undefined {
  return FLAG_OPTIONS.find((option) => option === key);
}

export function parseCliArgs(args: string[]): ParsedArgs {
  const parsed: ParsedArgs = {
    positionals: [],
    options: new Map(),
    flags: new Set()
  };

  for (let index = 0; index < args.length; index += 1) {
    const token = args[index];

    if (!token.startsWith('--')) {
      if (parsed.command === undefined) {
        parsed.command = token.trim().toLowerCase();
      } else {
        parsed.positionals.push(token);
      }
      continue;
    }

    const separator = token.indexOf('=');
    const key = (separator === -1 ? token.slice(2) : token.slice(2, separator)).trim();
    if (!key) {
      throw new UsageError(`Invalid option '${token}'`);
    }

    const flag = asFlagOption(key);
    if (flag) {
      if (separator !== -1) {
        throw new UsageError(`Option '--${key}' does not take a value`);
      }
      parsed.flags.add(flag);
      continue;
    }

    const option = asValueOption(key);
    if (!option) {
      throw new UsageError(`Unknown option '--${key}'`);
    }

    if (separator !== -1) {
      parsed.options.set(option, token.slice(separator + 1));
      continue;
    }

    const value = args[index + 1];
    if (value === undefined || value.startsWith('--')) {
      throw new UsageError(`Missing value for option '--${key}'`);
    }
    parsed.options.set(option, value);
    index += 1;
  }

  return parsed;
}

const envFlag = z
  .enum(['1', 'true', 'yes', '0', 'false', 'no', ''])
  .transform((value) => value === '1' || value === 'true' || value === 'yes');

const configSchema = z.object({
  outputDir: z.string().trim().min(1, 'an output directory is required'),
  source: z.string().trim().min(1, 'the release source must not be empty'),
  baseUrl: z
    .string()
    .trim()
    .refine(isHttpUrl, 'expected an http(s) URL')
    .optional(),
  title: z.string().trim().min(1, 'the title must not be empty'),
  timeoutMs: z.coerce
    .number({ invalid_type_error: 'expected a number of milliseconds' })
    .int('expected a whole number of milliseconds')
    .positive('expected a positive number of milliseconds')
    .max(MAX_TIMEOUT_MS, `expected at most ${MAX_TIMEOUT_MS} milliseconds`),
  perReleasePages: z.boolean(),
  strict: z.boolean(),
  verifyUrls: z.boolean(),
  check: z.boolean()
});

export type IndexConfig = Readonly<z.infer<typeof configSchema>>;

function parseEnvFlag(env: NodeJS.ProcessEnv, name: string): boolean {
  const raw = env[name];
  if (raw === undefined) {
    return false;
  }
  const result = envFlag.safeParse(raw.trim().toLowerCase());
  if (!result.success) {
    throw new UsageError(`${name} must be one of 1, true, yes, 0, false, no (got '${raw}')`);
  }
  return result.data;
}

// Options win over RELEASE_INDEX_* variables, which win over defaults.
export function resolveConfig(args: ParsedArgs, env: NodeJS.ProcessEnv = process.env): IndexConfig {
  if (args.positionals.length === 0) {
    throw new UsageError('Missing output directory');
  }
  if (args.positionals.length > 1) {
    throw new UsageError(`Unexpected argument '${args.positionals[1]}'`);
  }

  const candidate = {
    outputDir: args.positionals[0],
    source: args.options.get('source') ?? env.RELEASE_INDEX_SOURCE ?? DEFAULT_SOURCE,
    baseUrl: args.options.get('base-url') ?? env.RELEASE_INDEX_BASE_URL,
    title: args.options.get('title') ?? env.RELEASE_INDEX_TITLE ?? DEFAULT_RENDER_OPTIONS.title,
    timeoutMs: args.options.get('timeout') ?? env.RELEASE_INDEX_TIMEOUT_MS ?? DEFAULT_TIMEOUT_MS,
    perReleasePages: !(args.flags.has('single-page') || parseEnvFlag(env, 'RELEASE_INDEX_SINGLE_PAGE')),
    strict: args.flags.has('strict') || parseEnvFlag(env, 'RELEASE_INDEX_STRICT'),
    verifyUrls: args.flags.has('verify-urls') || parseEnvFlag(env, 'RELEASE_INDEX_VERIFY_URLS'),
    check: args.flags.has('check')
  };

  const result = configSchema.safeParse(candidate);
  if (!result.success) {
    const issue = result.error.issues[0];
    throw new UsageError(`Invalid ${issue.path.join('.') || 'configuration'}: ${issue.message}`);
  }

  return Object.freeze(result.data);
}
