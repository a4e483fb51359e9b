/**
 * Structured key-value context attached to a log entry.
 */
export type LogContext = Record<string, unknown>;

/**
 * Structured logging contract shared across interpreter services.
 *
 * Services depend on this interface rather than on pino directly, so tests can
 * hand in a recording mock and the entry point can decide where diagnostics
 * go. Every method accepts either a bare message or a context object followed
 * by a message, mirroring the pino call style.
 */
export interface ILogger {
    /**
     * Emit a fatal-level log entry.
     *
     * Reserved for failures that stop the interpreter before it reads input,
     * such as invalid configuration.
     */
    fatal(contextOrMessage: LogContext | string, message?: string): void;

    /**
     * Emit an error-level log entry.
     *
     * Used for unexpected failures while processing a single line. The
     * interpreter keeps reading input afterwards.
     */
    error(contextOrMessage: LogContext | string, message?: string): void;

    /**
     * Emit a warning-level log entry.
     *
     * Rejected commands (malformed, unknown, unresolved permalink) and the
     * storage fallback are reported here.
     */
    warn(contextOrMessage: LogContext | string, message?: string): void;

    /**
     * Emit an info-level log entry.
     */
    info(contextOrMessage: LogContext | string, message?: string): void;

    /**
     * Emit a debug-level log entry.
     *
     * Successful mutations (post created, comment added, document deleted)
     * are logged at this level so they stay out of the default output.
     */
    debug(contextOrMessage: LogContext | string, message?: string): void;

    trace(contextOrMessage: LogContext | string, message?: string): void;

    /**
     * Create a scoped child logger with predefined bindings.
     *
     * @param bindings - Key-value pairs merged into every entry of the child
     * @returns A logger that applies the bindings on top of this one
     */
    child(bindings: LogContext): ILogger;
}
