import { type EventArgs, type Subscription } from "@rendezvous/core";

/**
 * The single matching rule shared by every subscription kind.
 *
 * A name match records `args` on the subscription before the predicate
 * runs, so an event the predicate rejects still overwrites
 * `lastMatchArgs`. Read it only right after this returns true.
 */
export function matchesEvent(subscription: Subscription, eventName: string, args: EventArgs): boolean {
    if (subscription.eventName !== eventName) {
        return false;
    }

    subscription.lastMatchArgs = args;

    if (subscription.predicate) {
        return subscription.predicate(...args);
    }

    return true;
}
