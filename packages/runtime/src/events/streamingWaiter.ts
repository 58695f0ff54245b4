import {
    LoopExhaustedError,
    PredicateError,
    type EventArgs,
    type Predicate,
    type Subscription,
} from "@rendezvous/core";

import { matchesEvent } from "./matching";
import { Signal } from "./signal";

/**
 * Subscription that buffers every matched event in arrival order.
 *
 * Once closed it stops accepting events but keeps handing out what is
 * already queued; `takeNext` reports exhaustion only after the queue is
 * drained. A failure preempts the queue.
 */
export class StreamingWaiter implements Subscription {
    public readonly kind = "streaming" as const;
    public lastMatchArgs: EventArgs | undefined;

    private readonly queue: EventArgs[] = [];
    private readonly wake = new Signal();
    private open = true;
    private failure: Error | undefined;

    constructor(
        public readonly eventName: string,
        public readonly predicate: Predicate | undefined = undefined,
    ) { }

    get size(): number {
        return this.queue.length;
    }

    get isClosed(): boolean {
        return !this.open;
    }

    process(eventName: string, args: EventArgs): void {
        if (!this.open) return;

        let matched: boolean;
        try {
            matched = matchesEvent(this, eventName, args);
        } catch (error) {
            this.fail(new PredicateError(this.eventName, error));
            return;
        }

        if (matched) {
            this.queue.push(args);
            this.wake.raise();
        }
    }

    /**
     * Once `abandoned` aborts, the call rejects with its reason and leaves
     * the queue untouched for the next taker.
     */
    async takeNext(abandoned?: AbortSignal): Promise<EventArgs> {
        const wakeUp = () => this.wake.raise();
        abandoned?.addEventListener("abort", wakeUp, { once: true });

        try {
            for (;;) {
                if (abandoned?.aborted) {
                    throw abandoned.reason;
                }
                if (this.failure) {
                    throw this.failure;
                }

                if (this.queue.length > 0) {
                    const next = this.queue.shift();
                    if (this.queue.length === 0) {
                        this.wake.clear();
                    }
                    if (next !== undefined) {
                        return next;
                    }
                }

                if (!this.open) {
                    throw new LoopExhaustedError();
                }

                this.wake.clear();
                await this.wake.wait();
            }
        } finally {
            abandoned?.removeEventListener("abort", wakeUp);
        }
    }

    /** Stop accepting events. Queued items stay available. */
    close(): void {
        this.open = false;
        // a take suspended on an empty queue would otherwise never wake
        this.wake.raise();
    }

    fail(error: Error): void {
        if (this.failure) return;
        this.failure = error;
        this.close();
    }
}
