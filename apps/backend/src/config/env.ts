import 'dotenv/config';
import { z } from 'zod';

/**
 * Comma-separated list parsed into trimmed, non-empty entries.
 */
const commaList = (fallback: string) =>
  z
    .string()
    .default(fallback)
    .transform(value =>
      value
        .split(',')
        .map(entry => entry.trim())
        .filter(entry => entry.length > 0)
    );

/**
 * Mount prefix for the API router. Must start with a slash and carry no
 * trailing slash, e.g. `/api/v1`.
 */
const apiPrefix = z
  .string()
  .default('/api/v1')
  .transform(value => '/' + value.replace(/^\/+|\/+$/g, ''))
  .refine(value => value !== '/', 'API_PREFIX must name a path below the root');

const envSchema = z.object({
  NODE_ENV: z.enum(['development', 'test', 'production']).default('development'),
  LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace']).optional(),
  PORT: z.coerce.number().int().min(0).max(65535).default(7777),
  // The dashboard is meant for loopback only; see ACCEPTED_HOSTS.
  LISTENER_ADDR: z.string().min(1).default('127.0.0.1'),
  API_PREFIX: apiPrefix,
  ACCEPTED_HOSTS: commaList('localhost,127.0.0.1,::1').transform(hosts => hosts.map(host => host.toLowerCase())),
  DEFAULT_NAMESPACE: z.string().min(1).default('default'),
  NAMESPACES: commaList('default,kube-system,kube-public'),
  CLUSTER_CONTEXT: z.string().default('local'),
  CLUSTER_NAME: z.string().default('local'),
  CLUSTER_SERVER: z.string().default('https://127.0.0.1:6443'),
  CLUSTER_USER: z.string().default('local-admin'),
  NAVIGATION_FAILURE_POLICY: z.enum(['fail-fast', 'degrade']).default('fail-fast'),
  NAVIGATION_CONCURRENCY: z.coerce.number().int().positive().default(1)
});

export type EnvConfig = z.infer<typeof envSchema>;

/**
 * Parse and validate an environment source.
 *
 * @param source - Variables to parse, normally `process.env`
 * @throws {Error} When any variable fails validation
 */
export function parseEnv(source: Record<string, string | undefined>): EnvConfig {
  const parsed = envSchema.safeParse(source);

  if (!parsed.success) {
    console.error('Invalid environment configuration:', parsed.error.flatten().fieldErrors);
    throw new Error('Failed to parse environment variables');
  }

  return parsed.data;
}

export const env: EnvConfig = parseEnv(process.env);
