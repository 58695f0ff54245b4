import { PredicateError, type EventArgs, type Predicate, type Subscription } from "@rendezvous/core";

import { matchesEvent } from "./matching";
import { Signal } from "./signal";

type WaiterOutcome =
    | { status: "matched"; args: EventArgs }
    | { status: "failed"; error: Error };

/**
 * Subscription that resumes exactly one suspended caller.
 */
export class OneShotWaiter implements Subscription {
    public readonly kind = "one-shot" as const;
    public lastMatchArgs: EventArgs | undefined;

    private readonly signal = new Signal();
    private outcome: WaiterOutcome | undefined;

    constructor(
        public readonly eventName: string,
        public readonly predicate: Predicate | undefined = undefined,
    ) { }

    get isSettled(): boolean {
        return this.signal.isRaised;
    }

    process(eventName: string, args: EventArgs): void {
        if (this.isSettled) return;

        let matched: boolean;
        try {
            matched = matchesEvent(this, eventName, args);
        } catch (error) {
            this.fail(new PredicateError(this.eventName, error));
            return;
        }

        if (matched) {
            this.settle({ status: "matched", args });
        }
    }

    fail(error: Error): void {
        if (this.isSettled) return;
        this.settle({ status: "failed", error });
    }

    /** Suspends until the first match (or failure). */
    async wait(): Promise<EventArgs> {
        await this.signal.wait();

        const outcome = this.outcome;
        if (outcome === undefined) {
            throw new Error(`waiter for "${this.eventName}" woke without an outcome`);
        }
        if (outcome.status === "failed") {
            throw outcome.error;
        }
        return outcome.args;
    }

    private settle(outcome: WaiterOutcome): void {
        this.outcome = outcome;
        this.signal.raise();
    }
}
