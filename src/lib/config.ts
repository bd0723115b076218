import { z } from 'zod';
import { ConfigError } from './errors.js';

export interface CurlparseConfig {
  /** Fail on unrecognized trailing input (`CURLPARSE_STRICT`). */
  strict: boolean;
  /** Pretty-print JSON output (`CURLPARSE_PRETTY`). */
  pretty: boolean;
}

const TRUE_SPELLINGS = new Set<string>(['1', 'true', 'yes', 'on']);

// An empty value counts as unset.
const EnvBoolean = z
  .string()
  .trim()
  .toLowerCase()
  .pipe(z.enum(['', '1', 'true', 'yes', 'on', '0', 'false', 'no', 'off']))
  .default('')
  .transform((value) => TRUE_SPELLINGS.has(value));

export const CurlparseEnvSchema = z.object({
  CURLPARSE_STRICT: EnvBoolean,
  CURLPARSE_PRETTY: EnvBoolean,
});

/**
 * Reads the CLI defaults from the environment. Command-line flags take
 * precedence over these values.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): CurlparseConfig {
  const parsed = CurlparseEnvSchema.safeParse(env);
  if (!parsed.success) {
    const name = String(parsed.error.issues[0]?.path[0] ?? 'environment');
    throw new ConfigError(`${name} must be a boolean, got "${env[name] ?? ''}"`);
  }

  return {
    strict: parsed.data.CURLPARSE_STRICT,
    pretty: parsed.data.CURLPARSE_PRETTY,
  };
}
