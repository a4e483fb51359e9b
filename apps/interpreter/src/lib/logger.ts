import pino from 'pino';
import type { ILogger, LogContext } from '@threadlog/types';
import type { EnvConfig } from '../config/env.js';

/**
 * Logger utilities for the threadlog interpreter.
 *
 * Standard output is reserved for rendered blog views, so every diagnostic
 * (rejected commands, storage fallback, startup status) goes through pino to
 * standard error. Services receive an {@link ILogger}; only the entry point
 * touches pino.
 *
 * **Usage:**
 *
 * ```typescript
 * const logger = new PinoLogger(createLogger(env));
 * logger.warn({ line: 3 }, 'Unknown command: publish');
 * ```
 */

type LoggerSettings = Pick<EnvConfig, 'LOG_LEVEL' | 'LOG_FORMAT'>;

/**
 * Creates a pino instance that writes to standard error.
 *
 * **Formats:**
 *
 * 1. `pretty` - `pino-pretty` transport, uncolored, single line per entry
 * 2. `json` - raw pino JSON lines through a synchronous fd 2 destination
 *
 * @param settings - Level and output format from the environment
 * @returns Configured pino logger
 */
export function createLogger(settings: LoggerSettings): pino.Logger {
    const options: pino.LoggerOptions = {
        level: settings.LOG_LEVEL,
        base: {
            service: 'threadlog'
        }
    };

    if (settings.LOG_FORMAT === 'json') {
        return pino(options, pino.destination({ dest: 2, sync: true }));
    }

    const transport = pino.transport({
        target: 'pino-pretty',
        options: {
            destination: 2,
            colorize: false,
            singleLine: true,
            translateTime: 'SYS:standard',
            ignore: 'pid,hostname,service'
        }
    });

    return pino(options, transport);
}

/**
 * {@link ILogger} implementation backed by pino.
 *
 * Accepts both call styles, `warn(message)` and `warn(context, message)`,
 * and forwards them to the matching pino overload.
 */
export class PinoLogger implements ILogger {
    constructor(private readonly pino: pino.Logger) {}

    fatal(contextOrMessage: LogContext | string, message?: string): void {
        this.write('fatal', contextOrMessage, message);
    }

    error(contextOrMessage: LogContext | string, message?: string): void {
        this.write('error', contextOrMessage, message);
    }

    warn(contextOrMessage: LogContext | string, message?: string): void {
        this.write('warn', contextOrMessage, message);
    }

    info(contextOrMessage: LogContext | string, message?: string): void {
        this.write('info', contextOrMessage, message);
    }

    debug(contextOrMessage: LogContext | string, message?: string): void {
        this.write('debug', contextOrMessage, message);
    }

    trace(contextOrMessage: LogContext | string, message?: string): void {
        this.write('trace', contextOrMessage, message);
    }

    child(bindings: LogContext): ILogger {
        return new PinoLogger(this.pino.child(bindings));
    }

    /**
     * Flush buffered entries, used before the process exits.
     */
    flush(): Promise<void> {
        return new Promise((resolve, reject) => {
            this.pino.flush(error => (error ? reject(error) : resolve()));
        });
    }

    private write(level: pino.Level, contextOrMessage: LogContext | string, message?: string): void {
        if (typeof contextOrMessage === 'string') {
            this.pino[level](contextOrMessage);
            return;
        }

        this.pino[level](contextOrMessage, message);
    }
}
