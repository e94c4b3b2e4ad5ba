import { readFile } from 'node:fs/promises';
import { z } from 'zod';
import type { CipherConfiguration } from '../types.js';
import { ConfigurationLoadError } from './errors.js';

export const DEFAULT_CONFIG_PATH = 'config.json';

// Cipher names end up as XML element names in the edit request
const cipherName = z
  .string()
  .regex(/^[a-z][a-z0-9-]*$/, 'must be a cipher name such as aes256-gcm');

const cipherSelection = z
  .union([cipherName, z.array(cipherName).nonempty()])
  .transform((value) => Array.from(new Set(typeof value === 'string' ? [value] : value)));

export const CipherConfigurationSchema = z.object({
  address: z
    .string()
    .regex(/^[A-Za-z0-9.\-:[\]]+$/, 'must be a hostname or IP address, optionally with :port'),
  protocol: z.enum(['https', 'http']).default('https'),
  credentials: z.union([
    z.object({ apiKey: z.string().min(1) }),
    z.object({ username: z.string().min(1), password: z.string().min(1) }),
  ]),
  ciphers: z.object({
    mgmt: cipherSelection,
    ha: cipherSelection,
  }),
  requestTimeoutMs: z.number().int().positive().default(30_000),
  commit: z.object({
    description: z.string().min(1).default('SSH Ciphers Commit'),
    pollIntervalMs: z.number().int().nonnegative().default(2_000),
    timeoutMs: z.number().int().nonnegative().default(600_000),
  }).default({}),
  skipIfApplied: z.boolean().default(false),
});

type Env = Record<string, string | undefined>;

function asRecord(value: unknown): Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
    ? Object.fromEntries(Object.entries(value))
    : {};
}

/**
 * Environment variables win over the file so that secrets can stay out of it.
 * An API key from the environment replaces any credentials from the file.
 */
export function applyEnvironment(raw: unknown, env: Env): Record<string, unknown> {
  const merged = asRecord(raw);

  if (env.PANOS_ADDRESS) merged.address = env.PANOS_ADDRESS;

  if (env.PANOS_API_KEY) {
    merged.credentials = { apiKey: env.PANOS_API_KEY };
  } else if (env.PANOS_USERNAME || env.PANOS_PASSWORD) {
    const credentials = asRecord(merged.credentials);
    delete credentials.apiKey;
    if (env.PANOS_USERNAME) credentials.username = env.PANOS_USERNAME;
    if (env.PANOS_PASSWORD) credentials.password = env.PANOS_PASSWORD;
    merged.credentials = credentials;
  }

  return merged;
}

export function parseConfig(raw: unknown, env: Env = {}): CipherConfiguration {
  const result = CipherConfigurationSchema.safeParse(applyEnvironment(raw, env));
  if (!result.success) {
    const issues = result.error.issues.map((issue) =>
      `${issue.path.length > 0 ? issue.path.join('.') : '(root)'}: ${issue.message}`
    );
    throw new ConfigurationLoadError(`Invalid configuration: ${issues.join('; ')}`);
  }
  return result.data;
}

export function resolveConfigPath(env: Env): string {
  return env.PANOS_CIPHERS_CONFIG || DEFAULT_CONFIG_PATH;
}

export async function loadConfig(path: string, env: Env = {}): Promise<CipherConfiguration> {
  let text: string;
  try {
    text = await readFile(path, 'utf-8');
  } catch (error) {
    const reason = error instanceof Error && 'code' in error && error.code === 'ENOENT'
      ? 'file not found'
      : error instanceof Error ? error.message : String(error);
    throw new ConfigurationLoadError(`Cannot read configuration file ${path}: ${reason}`, { cause: error });
  }

  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new ConfigurationLoadError(`Configuration file ${path} is not valid JSON: ${reason}`, { cause: error });
  }

  return parseConfig(raw, env);
}
