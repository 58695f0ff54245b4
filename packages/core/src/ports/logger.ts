/**
 * Structured logger port.
 *
 * Every method takes a context object followed by a message, or just the
 * message, matching pino's call signature so adapters can pass both through.
 */
export interface Logger {
    debug(obj: Record<string, unknown>, msg?: string): void;
    debug(msg: string): void;
    info(obj: Record<string, unknown>, msg?: string): void;
    info(msg: string): void;
    warn(obj: Record<string, unknown>, msg?: string): void;
    warn(msg: string): void;
    error(obj: Record<string, unknown>, msg?: string): void;
    error(msg: string): void;

    /** Create a child logger with additional bound context fields. */
    child(bindings: Record<string, unknown>): Logger;
}
