import { z } from 'zod';

import type { Predicate } from '../contracts/subscription';
import { InvalidWaitOptionsError } from '../errors';
import { LOGGING_DEFAULTS } from './defaults';

/**
 * A wait bound in milliseconds. `null`/`undefined` mean "no bound";
 * zero is a valid bound that expires immediately.
 */
const boundSchema = z.number().finite().nonnegative().nullable().optional();

const predicateSchema = z
  .custom<Predicate>((value) => typeof value === 'function', { message: 'Expected a predicate function' })
  .optional();

const signalSchema = z
  .custom<AbortSignal>((value) => value instanceof AbortSignal, { message: 'Expected an AbortSignal' })
  .optional();

export const waitOptionsSchema = z
  .object({
    predicate: predicateSchema,
    timeoutMs: boundSchema,
    signal   : signalSchema,
  })
  .strict();

export const loopOptionsSchema = z
  .object({
    predicate         : predicateSchema,
    iterationTimeoutMs: boundSchema,
    loopTimeoutMs     : boundSchema,
    signal            : signalSchema,
  })
  .strict();

export interface WaitOptions {
  predicate?: Predicate;
  /** Give up after this many milliseconds. Omit to wait indefinitely. */
  timeoutMs?: number | null;
  signal?   : AbortSignal;
}

export interface LoopOptions {
  predicate?         : Predicate;
  /** Bound on each individual wait for the next event. */
  iterationTimeoutMs?: number | null;
  /** Overall budget for the loop, decremented after every yielded event. */
  loopTimeoutMs?     : number | null;
  signal?            : AbortSignal;
}

export function parseWaitOptions(options: WaitOptions = {}): WaitOptions {
  const parsed = waitOptionsSchema.safeParse(options);
  if (!parsed.success) {
    throw new InvalidWaitOptionsError(parsed.error.issues);
  }

  return parsed.data;
}

export function parseLoopOptions(options: LoopOptions = {}): LoopOptions {
  const parsed = loopOptionsSchema.safeParse(options);
  if (!parsed.success) {
    throw new InvalidWaitOptionsError(parsed.error.issues);
  }

  return parsed.data;
}

export const LOG_LEVELS = ['debug', 'info', 'warn', 'error'] as const;
export type LogLevel = (typeof LOG_LEVELS)[number];

export interface LoggingConfig {
  level      : LogLevel;
  prettyPrint: boolean;
}

const loggingEnvSchema = z.object({
  RENDEZVOUS_LOG_LEVEL: z.enum(LOG_LEVELS).optional(),
  NODE_ENV            : z.string().optional(),
});

/**
 * Resolves logging settings from the environment. Unknown levels fall back
 * to the default level.
 */
export function resolveLoggingConfig(env: Record<string, string | undefined> = process.env): LoggingConfig {
  const parsed = loggingEnvSchema.safeParse(env);
  const level = parsed.success ? parsed.data.RENDEZVOUS_LOG_LEVEL : undefined;
  const nodeEnv = parsed.success ? parsed.data.NODE_ENV : env.NODE_ENV;

  return {
    level      : level ?? LOGGING_DEFAULTS.LEVEL,
    prettyPrint: nodeEnv !== 'production',
  };
}
