/**
 * Default constants for Rendezvous configuration
 */

/**
 * Logging Configuration
 */
export const LOGGING_DEFAULTS = {
  /** Default log level */
  LEVEL: "info" as const,

  /** Pino-pretty options used when pretty printing is enabled */
  PRETTY_OPTIONS: {
    colorize: true,
    translateTime: "SYS:standard",
    ignore: "pid,hostname",
  },
} as const;

/**
 * Event manager defaults
 */
export const EVENT_MANAGER_DEFAULTS = {
  /** Bound into the manager's child logger */
  NAME: "event-manager" as const,
} as const;
