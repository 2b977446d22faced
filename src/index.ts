#!/usr/bin/env node
import 'dotenv/config';

import { AxiosAdapter } from 'axios';
import { Command, InvalidArgumentError } from 'commander';
import defaultLogger, { Logger, LogLevel } from './util/logger';
import { Config, ConfigOverrides, loadConfig } from './util/config';
import { AuthRejectedError, ConfigurationError, MovieTallyError } from './util/errors';
import { formatYearTotal } from './util/format';
import { createMovieServerHttp, MovieServerClient, serverUrl } from './api/movies';
import { createAuthenticator } from './api/auth';
import { SessionManager } from './api/session';
import { Orchestrator } from './scanner/orchestrator';
import { YearTotal } from './scanner';

export type CliOptions = {
    server?: string;
    port?: number;
    username?: string;
    password?: string;
    year: number[];
    concurrency?: number;
    config?: string;
    verbose?: boolean;
};

function parseInteger(name: string, min: number, max: number) {
    return (value: string): number => {
        const parsed = Number(value);
        if (!Number.isInteger(parsed) || parsed < min || parsed > max) {
            throw new InvalidArgumentError(`${name} must be an integer between ${min} and ${max}.`);
        }
        return parsed;
    };
}

const parsePort = parseInteger('Port', 1, 65535);
const parseYear = parseInteger('Year', 1800, 9999);
const parseConcurrency = parseInteger('Concurrency', 1, 10000);

export function buildProgram(): Command {
    return new Command()
        .name('movie-tally')
        .description('Count the movies a movie server lists for each requested year')
        .option('-s, --server <host>', 'server host for authentication')
        .option('-P, --port <port>', 'server port (default: 8080)', parsePort)
        .option('-u, --username <username>', 'username for authentication')
        .option('-p, --password <password>', 'password for authentication')
        .option('-y, --year <year>', 'year to count movies for, repeatable', (value: string, previous: number[]) => [...previous, parseYear(value)], [])
        .option('-c, --concurrency <n>', 'concurrent page requests per year', parseConcurrency)
        .option('--config <path>', 'YAML configuration file')
        .option('-v, --verbose', 'enable verbose output');
}

/** `-Y` is accepted as an alias of `-y`, in flag position only. */
export function normalizeArgs(args: string[]): string[] {
    const takesValue = new Set(
        buildProgram()
            .options.filter(option => option.required || option.optional)
            .flatMap(option => [option.short, option.long])
            .filter((flag): flag is string => flag !== undefined)
    );

    return args.map((arg, i) => {
        if (i > 0 && takesValue.has(args[i - 1])) return arg;
        if (arg === '-Y') return '-y';
        return /^-Y\d+$/.test(arg) ? `-y${arg.slice(2)}` : arg;
    });
}

export function toOverrides(options: CliOptions): ConfigOverrides {
    return {
        host: options.server,
        port: options.port,
        username: options.username,
        password: options.password,
        years: options.year,
        concurrency: options.concurrency,
        verbose: options.verbose,
    };
}

export interface CountMoviesOptions {
    logger?: Logger;
    onYearTotal?: (total: YearTotal) => void;
    /** Replaces the network transport of the HTTP client. */
    adapter?: AxiosAdapter;
}

/** Wires the components for one run and scans every configured year. */
export async function countMovies(config: Config, options: CountMoviesOptions = {}): Promise<YearTotal[]> {
    const { logger = defaultLogger, onYearTotal, adapter } = options;
    const http = createMovieServerHttp(config.server, { adapter, logger });
    const sessions = new SessionManager(
        createAuthenticator(http, config.credentials, {
            target: serverUrl(config.server),
            retries: config.scan.authRetries,
            logger,
        }),
        { logger }
    );
    const orchestrator = new Orchestrator({
        source: new MovieServerClient(http, { logger }),
        sessions,
        settings: config.scan,
        logger,
    });

    return orchestrator.run(config.years, onYearTotal);
}

/** Applies the resolved level to the shared logger rather than starting a second transport. */
export function configureLogging(level: LogLevel): Logger {
    defaultLogger.level = level;
    return defaultLogger;
}

export async function main(argv: string[] = process.argv): Promise<number> {
    const program = buildProgram();
    program.parse(normalizeArgs(argv));
    const options = program.opts<CliOptions>();

    let config: Config;
    try {
        config = loadConfig(toOverrides(options), { configPath: options.config });
    } catch (e) {
        if (e instanceof ConfigurationError) {
            defaultLogger.error(e.message);
            return 1;
        }
        throw e;
    }

    const logger = configureLogging(config.logLevel);

    try {
        await countMovies(config, {
            logger,
            onYearTotal: total => process.stdout.write(`${formatYearTotal(total)}\n`),
        });
        return 0;
    } catch (e) {
        if (e instanceof AuthRejectedError) {
            logger.error('Authentication failed. Username or password incorrect.');
        } else if (e instanceof MovieTallyError) {
            logger.error(e.message);
        } else {
            logger.error({ err: e }, 'Unexpected failure');
        }
        return 1;
    }
}

if (require.main === module) {
  main().then(code => {
    process.exitCode = code;
  }).catch((e) => {
    defaultLogger.fatal({ err: e }, 'Unexpected failure');
    process.exitCode = 1;
  });
}
