/**
 * Router configuration, read once from the environment and checked with zod.
 */
import { z } from 'zod';
import { ok, err, type Result } from './result.js';

const httpsUrl = z
  .string()
  .url()
  .refine((u) => u.startsWith('https://'), 'must be https://');

const LogLevel = z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']);

export const RouterConfigSchema = z
  .object({
    logLevel: LogLevel.default('info'),
    http: z
      .object({
        timeoutMs: z.coerce.number().int().positive().default(30_000),
      })
      .strict(),
    connectors: z
      .object({
        opayo: z.object({ baseUrl: httpsUrl }).strict(),
        authorizedotnet: z.object({ baseUrl: httpsUrl }).strict(),
      })
      .strict(),
  })
  .strict();

export type RouterConfig = z.infer<typeof RouterConfigSchema>;

export type ConnectorsConfig = RouterConfig['connectors'];

export const DEFAULT_OPAYO_BASE_URL = 'https://pi-test.sagepay.com/api/v1/';
export const DEFAULT_AUTHORIZEDOTNET_BASE_URL = 'https://apitest.authorize.net/xml/v1/request.api';

/**
 * Build the configuration from environment variables.
 *
 * Unset variables fall back to sandbox endpoints. Values that are set but
 * invalid fail the whole load; nothing is silently replaced.
 */
export function loadConfig(
  env: Record<string, string | undefined> = process.env
): Result<RouterConfig, z.ZodError> {
  const parsed = RouterConfigSchema.safeParse({
    logLevel: env.LOG_LEVEL,
    http: {
      timeoutMs: env.HTTP_TIMEOUT_MS,
    },
    connectors: {
      opayo: { baseUrl: env.OPAYO_BASE_URL ?? DEFAULT_OPAYO_BASE_URL },
      authorizedotnet: { baseUrl: env.AUTHORIZEDOTNET_BASE_URL ?? DEFAULT_AUTHORIZEDOTNET_BASE_URL },
    },
  });

  return parsed.success ? ok(parsed.data) : err(parsed.error);
}
