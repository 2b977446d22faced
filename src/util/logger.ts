import pino from 'pino';
import env from './env';

import { getScanLabel } from './context';

export type Logger = pino.Logger;
export type LogLevel = 'fatal' | 'error' | 'warn' | 'info' | 'debug' | 'trace';

type LogFn = (msg: string | object, ...args: unknown[]) => void;

const WRAPPED_METHODS = new Set(['info', 'warn', 'error', 'debug', 'trace', 'fatal']);

function wrapLogMethod(method: LogFn): LogFn {
    return (msg: string | object, ...args: unknown[]) => {
        const label = getScanLabel();
        if (label) {
            if (typeof msg === 'string') {
                method(`[${label}] ${msg}`, ...args);
            } else if (typeof msg === 'object' && msg !== null) {
                method({ ...msg, scan: label }, ...args);
            } else {
                method(msg, ...args);
            }
        } else {
            method(msg, ...args);
        }
    };
}

/**
 * Builds a pretty-printing pino logger on stderr whose messages carry the
 * active scan label (see `runWithScanLabel`). Stdout is left to the report.
 */
function createLogger(level: LogLevel): Logger {
    const pinoLogger = pino({
        level,
        transport: {
            target: 'pino-pretty',
            options: {
                colorize: true,
                translateTime: 'SYS:standard',
                ignore: 'pid,hostname',
                destination: 2
            }
        }
    });

    return new Proxy(pinoLogger, {
        get(target, prop, receiver) {
            const value = Reflect.get(target, prop, receiver);
            if (typeof value === 'function' && typeof prop === 'string' && WRAPPED_METHODS.has(prop)) {
                // pino's overloads don't collapse into a single callable type
                return wrapLogMethod(value.bind(target) as LogFn);
            }
            return value;
        }
    });
}

const logger = createLogger(env.LOG_LEVEL);

export default logger;
