import { z } from 'zod';

const positiveInt = (fallback: string) =>
  z.string().default(fallback).transform(Number).pipe(z.number().int().positive());

const nonNegativeInt = (fallback: string) =>
  z.string().default(fallback).transform(Number).pipe(z.number().int().min(0));

export const envSchema = z.object({
  LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace']).default('info'),
  MOVIE_SERVER_HOST: z.string().min(1).optional(),
  MOVIE_SERVER_PORT: z.string().default('8080').transform(Number).pipe(z.number().int().min(1).max(65535)),
  MOVIE_SERVER_USERNAME: z.string().optional(),
  MOVIE_SERVER_PASSWORD: z.string().optional(),
  SCAN_CONCURRENCY: positiveInt('200'),
  YEAR_CONCURRENCY: positiveInt('1'),
  MAX_REAUTH_ATTEMPTS: positiveInt('5'),
  MAX_PAGES_PER_YEAR: positiveInt('10000'),
  REQUEST_TIMEOUT_MS: positiveInt('30000'),
  REQUEST_INTERVAL_MS: nonNegativeInt('0'),
  AUTH_RETRIES: positiveInt('3'),
}).refine(data => {
  // Username and password only make sense together
  const hasUsername = data.MOVIE_SERVER_USERNAME !== undefined;
  const hasPassword = data.MOVIE_SERVER_PASSWORD !== undefined;
  return hasUsername === hasPassword;
}, {
  message: 'MOVIE_SERVER_USERNAME and MOVIE_SERVER_PASSWORD must be set together.',
  path: ['MOVIE_SERVER_USERNAME']
});

export type Env = z.infer<typeof envSchema>;

export function parseEnv(source: NodeJS.ProcessEnv) {
  return envSchema.safeParse(source);
}

function validateEnv(): Env {
  const result = parseEnv(process.env);

  if (!result.success) {
    console.error('Environment validation failed:');
    result.error.issues.forEach(error => {
      console.error(`- ${error.path.join('.')}: ${error.message}`);
    });
    process.exit(1);
  }

  return result.data;
}

const env = validateEnv();
export default env;
