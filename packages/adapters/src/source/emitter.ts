import { EventEmitter } from 'node:events';
import { type EventArgs, type EventHandler, type EventSource } from '@rendezvous/core';

const RELAY_EVENT = 'event';

/**
 * Event source backed by a node:events EventEmitter. Producers call
 * `publish`; every registered handler receives the name and argument tuple.
 */
export class EmitterEventSource implements EventSource {
    private readonly emitter = new EventEmitter();

    public async close(): Promise<void> {
        this.emitter.removeAllListeners(RELAY_EVENT);
    }

    public onEvent(handler: EventHandler): () => void {
        const listener = (eventName: string, args: EventArgs) => handler(eventName, args);
        this.emitter.on(RELAY_EVENT, listener);
        return () => {
            this.emitter.off(RELAY_EVENT, listener);
        };
    }

    public publish(eventName: string, ...args: unknown[]): boolean {
        return this.emitter.emit(RELAY_EVENT, eventName, args);
    }

    public get listenerCount(): number {
        return this.emitter.listenerCount(RELAY_EVENT);
    }
}
