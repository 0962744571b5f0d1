/**
 * Structured logging contract shared by the backend and dashboard modules.
 *
 * Modules receive a logger through their request context and must not import
 * the backend's logging library directly. Any Pino-compatible logger satisfies
 * this interface, including child loggers.
 */
export interface ILogger {
    /**
     * Emit a fatal-level entry. Reserved for failures that stop the process.
     */
    fatal(...args: readonly unknown[]): void;

    /**
     * Emit an error-level entry.
     *
     * Pass a bindings object first and the message second so structured fields
     * such as `error` or `contentPath` are preserved:
     *
     * ```typescript
     * logger.error({ error, contentPath }, 'navigation failed');
     * ```
     */
    error(...args: readonly unknown[]): void;

    warn(...args: readonly unknown[]): void;

    info(...args: readonly unknown[]): void;

    debug(...args: readonly unknown[]): void;

    trace(...args: readonly unknown[]): void;

    /**
     * Create a scoped logger whose entries always carry `bindings`.
     *
     * @param bindings - Key-value pairs merged into every entry of the child
     * @param options - Implementation-specific options such as a level override
     */
    child(bindings: Record<string, unknown>, options?: Record<string, unknown>): ILogger;
}
