import { type Logger } from '@rendezvous/core';

export interface FakeLogEntry {
    level: string;
    obj?: Record<string, unknown>;
    msg?: string;
}

export class FakeLogger implements Logger {
    public logs: FakeLogEntry[] = [];

    constructor(private readonly bindings: Record<string, unknown> = {}, shared?: FakeLogEntry[]) {
        if (shared) {
            this.logs = shared;
        }
    }

    private log(level: string, arg1: Record<string, unknown> | string, arg2?: string): void {
        const msgProp = arg2 !== undefined ? { msg: arg2 } : {};
        if (typeof arg1 === 'string') {
            this.logs.push({ level, ...this.boundObj(), msg: arg1 });
        } else {
            this.logs.push({ level, obj: { ...this.bindings, ...arg1 }, ...msgProp });
        }
    }

    private boundObj(): { obj?: Record<string, unknown> } {
        return Object.keys(this.bindings).length > 0 ? { obj: { ...this.bindings } } : {};
    }

    public debug(obj: Record<string, unknown>, msg?: string): void;
    public debug(msg: string): void;
    public debug(arg1: Record<string, unknown> | string, arg2?: string): void {
        this.log('debug', arg1, arg2);
    }

    public info(obj: Record<string, unknown>, msg?: string): void;
    public info(msg: string): void;
    public info(arg1: Record<string, unknown> | string, arg2?: string): void {
        this.log('info', arg1, arg2);
    }

    public warn(obj: Record<string, unknown>, msg?: string): void;
    public warn(msg: string): void;
    public warn(arg1: Record<string, unknown> | string, arg2?: string): void {
        this.log('warn', arg1, arg2);
    }

    public error(obj: Record<string, unknown>, msg?: string): void;
    public error(msg: string): void;
    public error(arg1: Record<string, unknown> | string, arg2?: string): void {
        this.log('error', arg1, arg2);
    }

    /** Children share the parent's log array so tests can assert on one list. */
    public child(bindings: Record<string, unknown>): Logger {
        return new FakeLogger({ ...this.bindings, ...bindings }, this.logs);
    }

    public messages(level?: string): string[] {
        return this.logs
            .filter((entry) => level === undefined || entry.level === level)
            .map((entry) => entry.msg ?? '');
    }
}
