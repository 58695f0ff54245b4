/**
 * Ordered tuple of opaque values attached to one dispatched event.
 */
export type EventArgs = readonly unknown[];

/**
 * Caller-supplied check applied to the spread arguments of a name-matching event.
 */
export type Predicate = (...args: EventArgs) => boolean;

export type SubscriptionKind = 'one-shot' | 'streaming';

/**
 * The "matches and records" capability shared by every waiter kind.
 *
 * `lastMatchArgs` is written as a side effect of matching and is only
 * meaningful right after a match succeeded.
 */
export interface Subscription {
  readonly kind: SubscriptionKind;
  readonly eventName: string;
  readonly predicate: Predicate | undefined;
  lastMatchArgs: EventArgs | undefined;

  /** Offer a dispatched event. Must not suspend and must not throw. */
  process(eventName: string, args: EventArgs): void;

  /** Settle the subscription with an error surfaced to its caller. */
  fail(error: Error): void;
}
