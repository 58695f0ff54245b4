import { type RuntimeResource } from "../lifecycle";
import { type EventArgs } from "../contracts/subscription";

export type EventHandler = (eventName: string, args: EventArgs) => void;

/**
 * Anything that delivers named notifications, e.g. a gateway connection.
 * Handlers are invoked synchronously on the delivery path.
 */
export interface EventSource extends RuntimeResource {
    onEvent(handler: EventHandler): () => void;
}
