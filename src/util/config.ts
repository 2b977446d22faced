import { z } from 'zod';
import yaml from 'js-yaml';
import fs from 'fs';
import path from 'path';
import defaultLogger, { Logger } from './logger';
import defaultEnv, { Env } from './env';
import { ConfigurationError } from './errors';

// --- Zod Schemas ---

const YearSchema = z.number().int().min(1800).max(9999);

const FileConfigSchema = z.object({
  server: z.object({
    host: z.string().min(1).optional(),
    port: z.number().int().min(1).max(65535).optional(),
    timeoutMs: z.number().int().positive().optional(),
    requestIntervalMs: z.number().int().min(0).optional(),
  }).default({}),

  credentials: z.object({
    username: z.string().optional(),
    password: z.string().optional(),
  }).default({}),

  scan: z.object({
    concurrency: z.number().int().positive().optional(),
    yearConcurrency: z.number().int().positive().optional(),
    maxReauthAttempts: z.number().int().positive().optional(),
    maxPagesPerYear: z.number().int().positive().optional(),
    authRetries: z.number().int().positive().optional(),
  }).default({}),

  years: z.array(YearSchema).default([]),
});

const ConfigSchema = z.object({
  server: z.object({
    host: z.string({ required_error: 'server host is required (--server, config file or MOVIE_SERVER_HOST)' }).min(1),
    port: z.number().int().min(1).max(65535),
    timeoutMs: z.number().int().positive(),
    requestIntervalMs: z.number().int().min(0),
  }),
  credentials: z.object({
    username: z.string({ required_error: 'username is required (--username, config file or MOVIE_SERVER_USERNAME)' }),
    password: z.string({ required_error: 'password is required (--password, config file or MOVIE_SERVER_PASSWORD)' }),
  }),
  scan: z.object({
    concurrency: z.number().int().positive(),
    yearConcurrency: z.number().int().positive(),
    maxReauthAttempts: z.number().int().positive(),
    maxPagesPerYear: z.number().int().positive(),
    authRetries: z.number().int().positive(),
  }),
  years: z.array(YearSchema).min(1, 'at least one year is required (--year or config file)'),
  logLevel: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace']),
});

export type FileConfig = z.infer<typeof FileConfigSchema>;
export type Config = z.infer<typeof ConfigSchema>;
export type ServerSettings = Config['server'];
export type Credentials = Config['credentials'];
export type ScanSettings = Config['scan'];

/** Values given on the command line; they win over the file and the environment. */
export interface ConfigOverrides {
  host?: string;
  port?: number;
  username?: string;
  password?: string;
  years?: number[];
  concurrency?: number;
  verbose?: boolean;
}

export interface LoadConfigOptions {
  configPath?: string;
  env?: Env;
  cwd?: string;
  logger?: Logger;
}

function formatIssues(error: z.ZodError): string[] {
  return error.issues.map(issue => issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message);
}

// --- Loader Logic ---

export function readConfigFile(options: LoadConfigOptions = {}): FileConfig {
  const { logger = defaultLogger, cwd = process.cwd() } = options;

  const candidates = options.configPath
    ? [path.resolve(cwd, options.configPath)]
    : [path.resolve(cwd, 'config', 'config.yaml'), path.resolve(cwd, 'config.yaml')];

  const configPath = candidates.find(candidate => fs.existsSync(candidate));

  if (!configPath) {
    if (options.configPath) {
      throw new ConfigurationError([`config file not found: ${candidates[0]}`]);
    }
    logger.debug('No config.yaml found. Using Environment Variables and flags only.');
    return FileConfigSchema.parse({});
  }

  logger.info(`Loading configuration from ${configPath}`);
  let loaded: unknown;
  try {
    loaded = yaml.load(fs.readFileSync(configPath, 'utf8')) ?? {};
  } catch (e) {
    const reason = e instanceof Error ? e.message : String(e);
    throw new ConfigurationError([`failed to parse ${configPath}: ${reason}`]);
  }

  const result = FileConfigSchema.safeParse(loaded);
  if (!result.success) {
    throw new ConfigurationError(formatIssues(result.error));
  }
  return result.data;
}

/**
 * Resolves the run configuration. Precedence per field: command line, then
 * config file, then environment (which carries the defaults).
 */
export function loadConfig(overrides: ConfigOverrides = {}, options: LoadConfigOptions = {}): Config {
  const env = options.env ?? defaultEnv;
  const file = readConfigFile(options);

  const years = overrides.years && overrides.years.length > 0 ? overrides.years : file.years;

  const candidate = {
    server: {
      host: overrides.host ?? file.server.host ?? env.MOVIE_SERVER_HOST,
      port: overrides.port ?? file.server.port ?? env.MOVIE_SERVER_PORT,
      timeoutMs: file.server.timeoutMs ?? env.REQUEST_TIMEOUT_MS,
      requestIntervalMs: file.server.requestIntervalMs ?? env.REQUEST_INTERVAL_MS,
    },
    credentials: {
      username: overrides.username ?? file.credentials.username ?? env.MOVIE_SERVER_USERNAME,
      password: overrides.password ?? file.credentials.password ?? env.MOVIE_SERVER_PASSWORD,
    },
    scan: {
      concurrency: overrides.concurrency ?? file.scan.concurrency ?? env.SCAN_CONCURRENCY,
      yearConcurrency: file.scan.yearConcurrency ?? env.YEAR_CONCURRENCY,
      maxReauthAttempts: file.scan.maxReauthAttempts ?? env.MAX_REAUTH_ATTEMPTS,
      maxPagesPerYear: file.scan.maxPagesPerYear ?? env.MAX_PAGES_PER_YEAR,
      authRetries: file.scan.authRetries ?? env.AUTH_RETRIES,
    },
    years,
    logLevel: overrides.verbose ? 'debug' : env.LOG_LEVEL,
  };

  const result = ConfigSchema.safeParse(candidate);
  if (!result.success) {
    throw new ConfigurationError(formatIssues(result.error));
  }

  return result.data;
}
