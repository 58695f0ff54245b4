import type { z } from 'zod';

export class TimeoutError extends Error {
  public readonly timeoutMs: number;

  public constructor(label: string, timeoutMs: number) {
    super(`${label} timed out after ${timeoutMs}ms`);
    this.name = 'TimeoutError';
    this.timeoutMs = timeoutMs;
  }
}

/** A single-shot wait elapsed with no matching event. */
export class WaitTimeoutError extends TimeoutError {
  public readonly eventName: string;

  public constructor(eventName: string, timeoutMs: number) {
    super(`waitFor("${eventName}")`, timeoutMs);
    this.name = 'WaitTimeoutError';
    this.eventName = eventName;
  }
}

/**
 * The overall loop budget elapsed and every buffered event was delivered.
 * `timeoutMs` is the bound of the wait that expired.
 */
export class LoopTimeoutError extends TimeoutError {
  public readonly eventName: string;

  public constructor(eventName: string, timeoutMs: number) {
    super(`loopFor("${eventName}")`, timeoutMs);
    this.name = 'LoopTimeoutError';
    this.eventName = eventName;
  }
}

/** Internal: a closed streaming waiter has nothing left to drain. */
export class LoopExhaustedError extends Error {
  public constructor() {
    super('streaming waiter is closed and drained');
    this.name = 'LoopExhaustedError';
  }
}

export class WaitAbortedError extends Error {
  public readonly eventName: string;
  public readonly reason: unknown;

  public constructor(eventName: string, reason?: unknown) {
    const detail = reason instanceof Error ? reason.message : reason !== undefined ? String(reason) : 'aborted';
    super(`wait for "${eventName}" aborted: ${detail}`);
    this.name = 'WaitAbortedError';
    this.eventName = eventName;
    this.reason = reason;
  }
}

export class PredicateError extends Error {
  public readonly eventName: string;

  public constructor(eventName: string, cause: unknown) {
    const detail = cause instanceof Error ? cause.message : String(cause);
    super(`predicate for "${eventName}" threw: ${detail}`, { cause });
    this.name = 'PredicateError';
    this.eventName = eventName;
  }
}

export class InvalidWaitOptionsError extends Error {
  public readonly issues: z.ZodIssue[];

  public constructor(issues: z.ZodIssue[]) {
    const detail = issues
      .map((issue) => `${issue.path.length > 0 ? issue.path.join('.') : '(root)'}: ${issue.message}`)
      .join('; ');

    super(`Invalid wait options: ${detail}`);
    this.name = 'InvalidWaitOptionsError';
    this.issues = issues;
  }
}
