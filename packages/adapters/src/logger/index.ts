import { resolveLoggingConfig, type Logger, type LoggingConfig } from '@rendezvous/core';

import { PinoLogger } from './pino';

export * from './pino';
export * from './fake';

export function createLogger(config: LoggingConfig = resolveLoggingConfig(), name?: string): Logger {
    return new PinoLogger({ level: config.level, prettyPrint: config.prettyPrint, name });
}
