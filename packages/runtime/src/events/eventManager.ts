import {
    EVENT_MANAGER_DEFAULTS,
    LoopExhaustedError,
    LoopTimeoutError,
    WaitAbortedError,
    WaitTimeoutError,
    lowestBound,
    parseLoopOptions,
    parseWaitOptions,
    withTimeout,
    type EventArgs,
    type Logger,
    type LoopOptions,
    type Predicate,
    type RuntimeResource,
    type Subscription,
    type SubscriptionKind,
    type WaitOptions,
} from "@rendezvous/core";
import { createLogger } from "@rendezvous/adapters";

import { OneShotWaiter } from "./oneShotWaiter";
import { StreamingWaiter } from "./streamingWaiter";

export interface EventManagerConfig {
    /** Defaults to a pino logger configured from the environment. */
    logger?: Logger;
    /** Bound as `component` on every log line. */
    name?: string;
}

/**
 * Correlates dispatched events with callers waiting for them.
 *
 * One instance serves one client session. The event source calls
 * `dispatch` for every notification; business logic suspends on
 * `waitFor` (once) or `loopFor` (stream).
 */
export class EventManager implements RuntimeResource {
    private subscriptions: Subscription[] = [];
    private closed = false;
    private readonly logger: Logger;

    constructor(config: EventManagerConfig = {}) {
        const base = config.logger ?? createLogger();
        this.logger = base.child({ component: config.name ?? EVENT_MANAGER_DEFAULTS.NAME });
    }

    /** Number of live subscriptions. */
    get size(): number {
        return this.subscriptions.length;
    }

    get isClosed(): boolean {
        return this.closed;
    }

    /** Snapshot of the live registry in registration order. */
    listSubscriptions(): readonly Subscription[] {
        return [...this.subscriptions];
    }

    register(kind: "one-shot", eventName: string, predicate?: Predicate): OneShotWaiter;
    register(kind: "streaming", eventName: string, predicate?: Predicate): StreamingWaiter;
    register(kind: SubscriptionKind, eventName: string, predicate?: Predicate): Subscription {
        if (this.closed) {
            throw new WaitAbortedError(eventName, "event manager closed");
        }

        const subscription = kind === "one-shot"
            ? new OneShotWaiter(eventName, predicate)
            : new StreamingWaiter(eventName, predicate);

        this.subscriptions.push(subscription);
        this.logger.debug({ eventName, kind, live: this.subscriptions.length }, "subscription registered");
        return subscription;
    }

    /**
     * Removes a subscription. Returns false when it was already gone, which
     * happens whenever the match path and the timeout path both clean up.
     */
    deregister(subscription: Subscription): boolean {
        const index = this.subscriptions.indexOf(subscription);
        if (index === -1) {
            return false;
        }

        this.subscriptions.splice(index, 1);
        this.logger.debug(
            { eventName: subscription.eventName, kind: subscription.kind, live: this.subscriptions.length },
            "subscription removed",
        );
        return true;
    }

    /**
     * Offers one event to every live subscription in registration order.
     * Never suspends and never throws; suspended callers resume after it
     * returns.
     */
    dispatch(eventName: string, args: EventArgs = []): void {
        if (this.closed) return;

        // registrations and removals made while processing apply to the next dispatch
        const live = [...this.subscriptions];
        for (const subscription of live) {
            try {
                subscription.process(eventName, args);
            } catch (error) {
                this.logger.error({ eventName, err: error }, "subscription failed to process event");
            }
        }

        this.logger.debug({ eventName, live: live.length }, "event dispatched");
    }

    /**
     * Resolves with the arguments of the first event named `eventName` that
     * passes `predicate`. Rejects with {@link WaitTimeoutError} once
     * `timeoutMs` elapses, or {@link WaitAbortedError} when `signal` aborts
     * or the manager closes.
     */
    async waitFor(eventName: string, options: WaitOptions = {}): Promise<EventArgs> {
        const { predicate, timeoutMs, signal } = parseWaitOptions(options);
        const waiter = this.register("one-shot", eventName, predicate);

        try {
            return await withTimeout({
                label    : `waitFor("${eventName}")`,
                timeoutMs,
                signal,
                run      : () => waiter.wait(),
                onTimeout: (ms) => new WaitTimeoutError(eventName, ms),
                onAbort  : (reason) => new WaitAbortedError(eventName, reason),
            });
        } catch (error) {
            if (error instanceof WaitTimeoutError) {
                this.logger.debug({ eventName, timeoutMs: error.timeoutMs }, "wait timed out");
            } else if (!(error instanceof WaitAbortedError)) {
                this.logger.warn({ eventName, err: error }, "wait failed");
            }
            throw error;
        } finally {
            this.deregister(waiter);
        }
    }

    /**
     * Streams the arguments of every matching event.
     *
     * Each wait is bounded by the smaller of `iterationTimeoutMs` and what
     * is left of `loopTimeoutMs`. Time spent by the consumer between items
     * counts against the loop budget. When the budget runs out right after
     * an item the stream ends normally; when a wait expires the subscription
     * stops accepting events, the backlog is delivered, and the stream
     * throws {@link LoopTimeoutError}.
     *
     * Options are validated eagerly; the subscription is registered on the
     * first pull and removed however the stream ends.
     */
    loopFor(eventName: string, options: LoopOptions = {}): AsyncGenerator<EventArgs, void, undefined> {
        return this.runLoop(eventName, parseLoopOptions(options));
    }

    async close(): Promise<void> {
        if (this.closed) return;
        this.closed = true;

        const live = this.subscriptions;
        this.subscriptions = [];
        for (const subscription of live) {
            subscription.fail(new WaitAbortedError(subscription.eventName, "event manager closed"));
        }

        this.logger.info({ aborted: live.length }, "event manager closed");
    }

    private async *runLoop(eventName: string, options: LoopOptions): AsyncGenerator<EventArgs, void, undefined> {
        const { predicate, iterationTimeoutMs, signal } = options;
        const waiter = this.register("streaming", eventName, predicate);
        let remainingMs = options.loopTimeoutMs ?? null;

        try {
            for (;;) {
                const startedAt = Date.now();
                let next: EventArgs;

                try {
                    next = await withTimeout({
                        label    : `loopFor("${eventName}")`,
                        timeoutMs: lowestBound(remainingMs, iterationTimeoutMs),
                        signal,
                        run      : (abandoned) => waiter.takeNext(abandoned),
                        onTimeout: (ms) => new LoopTimeoutError(eventName, ms),
                        onAbort  : (reason) => new WaitAbortedError(eventName, reason),
                    });
                } catch (error) {
                    if (!(error instanceof LoopTimeoutError)) {
                        if (!(error instanceof WaitAbortedError)) {
                            this.logger.warn({ eventName, err: error }, "loop failed");
                        }
                        throw error;
                    }

                    waiter.close();
                    this.logger.debug({ eventName, backlog: waiter.size, timeoutMs: error.timeoutMs }, "loop timed out, draining");
                    yield* this.drain(waiter);
                    throw error;
                }

                yield next;

                if (remainingMs !== null) {
                    remainingMs -= Date.now() - startedAt;
                    if (remainingMs <= 0) {
                        this.logger.debug({ eventName }, "loop budget exhausted");
                        return;
                    }
                }
            }
        } finally {
            this.deregister(waiter);
        }
    }

    private async *drain(waiter: StreamingWaiter): AsyncGenerator<EventArgs, void, undefined> {
        for (;;) {
            let next: EventArgs;
            try {
                next = await waiter.takeNext();
            } catch (error) {
                if (error instanceof LoopExhaustedError) {
                    return;
                }
                throw error;
            }

            yield next;
        }
    }
}
