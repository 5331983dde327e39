import { readFile } from 'node:fs/promises';
import { extname } from 'node:path';
import { parse as parseYaml } from 'yaml';
import type { ZodError } from 'zod';
import { ConfigError } from './errors.js';
import { BenchConfigSchema } from './schemas.js';
import type { BenchConfig } from './schemas.js';

export const DEFAULT_CONFIG_PATH = 'configs/baseline.yaml';

export function getDefaultConfig(): BenchConfig {
  return BenchConfigSchema.parse({});
}

function firstIssue(error: ZodError): ConfigError {
  const issue = error.issues[0];
  if (!issue) {
    return new ConfigError('invalid configuration');
  }
  const field = issue.path.length > 0 ? issue.path.join('.') : undefined;
  if (issue.code === 'unrecognized_keys') {
    const where = field ? `${field}.` : '';
    return new ConfigError(`unknown option(s): ${issue.keys.map((k) => where + k).join(', ')}`, field);
  }
  return new ConfigError(issue.message, field);
}

/** Validates a parsed document; missing options take their defaults. */
export function parseConfig(raw: unknown): BenchConfig {
  const document = raw === null || raw === undefined ? {} : raw;
  if (typeof document !== 'object' || Array.isArray(document)) {
    throw new ConfigError('configuration document must be a mapping');
  }
  const parsed = BenchConfigSchema.safeParse(document);
  if (!parsed.success) {
    throw firstIssue(parsed.error);
  }
  return parsed.data;
}

/** Parses YAML, or JSON for a `.json` path. */
export function parseConfigText(text: string, source = 'config'): BenchConfig {
  let raw: unknown;
  try {
    raw = extname(source) === '.json' ? JSON.parse(text) : parseYaml(text);
  } catch (err: unknown) {
    throw new ConfigError(
      `${source} is not a valid configuration document: ${err instanceof Error ? err.message : String(err)}`,
      undefined,
      { cause: err },
    );
  }
  return parseConfig(raw);
}

export async function loadConfig(path: string): Promise<BenchConfig> {
  let text: string;
  try {
    text = await readFile(path, 'utf-8');
  } catch (err: unknown) {
    throw new ConfigError(
      `cannot read configuration file ${path}: ${err instanceof Error ? err.message : String(err)}`,
      undefined,
      { cause: err },
    );
  }
  return parseConfigText(text, path);
}
