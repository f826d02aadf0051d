import { z } from 'zod';

const envSchema = z.object({
  LEDGERLINE_BTCE_PUBLIC_API_URL: z.string().url().default('https://btc-e.com/api/3'),
  LEDGERLINE_BTCE_TRADE_API_URL: z.string().url().default('https://btc-e.com/tapi'),
  LEDGERLINE_CRYPTSY_API_URL: z.string().url().default('https://api.cryptsy.com/api'),
  LEDGERLINE_HTTP_TIMEOUT_MS: z.coerce.number().int().positive().default(10000),
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
});

type ValidatedEnv = z.infer<typeof envSchema>;

let validatedEnv: ValidatedEnv | undefined;

/**
 * Validates environment variables against the schema.
 * @throws Error if validation fails
 */
export function parseEnv(source: NodeJS.ProcessEnv): ValidatedEnv {
  const result = envSchema.safeParse(source);
  if (!result.success) {
    const errors = result.error.issues.map((e) => `  - ${e.path.join('.')}: ${e.message}`).join('\n');
    throw new Error(`Environment validation failed:\n${errors}`);
  }
  return result.data;
}

/**
 * Validates process.env on first access.
 * Caches the result for subsequent calls.
 */
function validateEnv(): ValidatedEnv {
  if (!validatedEnv) {
    validatedEnv = parseEnv(process.env);
  }
  return validatedEnv;
}

/**
 * Drop the cached environment so the next access re-reads process.env
 */
export function resetEnvCache(): void {
  validatedEnv = undefined;
}

export interface ExchangeEndpoints {
  btcePublicApiUrl: string;
  btceTradeApiUrl: string;
  cryptsyApiUrl: string;
}

/**
 * Base URLs of the exchange APIs, overridable per environment (e.g. to point at a proxy)
 */
export function getExchangeEndpoints(): ExchangeEndpoints {
  const env = validateEnv();
  return {
    btcePublicApiUrl: env.LEDGERLINE_BTCE_PUBLIC_API_URL,
    btceTradeApiUrl: env.LEDGERLINE_BTCE_TRADE_API_URL,
    cryptsyApiUrl: env.LEDGERLINE_CRYPTSY_API_URL,
  };
}

/**
 * Timeout applied to every exchange request, in milliseconds
 */
export function getHttpTimeoutMs(): number {
  return validateEnv().LEDGERLINE_HTTP_TIMEOUT_MS;
}
