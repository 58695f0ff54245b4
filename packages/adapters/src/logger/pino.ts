import { LOGGING_DEFAULTS, type LogLevel, type Logger } from '@rendezvous/core';
import pino, { type Logger as PinoInstance } from 'pino';

export interface PinoLoggerOptions {
    level?: LogLevel;
    prettyPrint?: boolean;
    name?: string;
}

export class PinoLogger implements Logger {
    private readonly pino: PinoInstance;

    constructor(options: PinoLoggerOptions = {}, instance?: PinoInstance) {
        if (instance) {
            this.pino = instance;
            return;
        }

        const { level = LOGGING_DEFAULTS.LEVEL, prettyPrint = false, name } = options;

        const pinoOptions: pino.LoggerOptions = {
            level
        };

        if (name) {
            pinoOptions.name = name;
        }

        if (prettyPrint) {
            pinoOptions.transport = {
                target: 'pino-pretty',
                options: { ...LOGGING_DEFAULTS.PRETTY_OPTIONS }
            };
        }

        this.pino = pino(pinoOptions);
    }

    public debug(obj: Record<string, unknown>, msg?: string): void;
    public debug(msg: string): void;
    public debug(arg1: Record<string, unknown> | string, arg2?: string): void {
        if (typeof arg1 === 'string') {
            this.pino.debug(arg1);
        } else {
            this.pino.debug(arg1, arg2);
        }
    }

    public info(obj: Record<string, unknown>, msg?: string): void;
    public info(msg: string): void;
    public info(arg1: Record<string, unknown> | string, arg2?: string): void {
        if (typeof arg1 === 'string') {
            this.pino.info(arg1);
        } else {
            this.pino.info(arg1, arg2);
        }
    }

    public warn(obj: Record<string, unknown>, msg?: string): void;
    public warn(msg: string): void;
    public warn(arg1: Record<string, unknown> | string, arg2?: string): void {
        if (typeof arg1 === 'string') {
            this.pino.warn(arg1);
        } else {
            this.pino.warn(arg1, arg2);
        }
    }

    public error(obj: Record<string, unknown>, msg?: string): void;
    public error(msg: string): void;
    public error(arg1: Record<string, unknown> | string, arg2?: string): void {
        if (typeof arg1 === 'string') {
            this.pino.error(arg1);
        } else {
            this.pino.error(arg1, arg2);
        }
    }

    public child(bindings: Record<string, unknown>): Logger {
        return new PinoLogger({}, this.pino.child(bindings));
    }
}
