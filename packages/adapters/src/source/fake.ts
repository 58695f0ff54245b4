import { type EventArgs, type EventHandler, type EventSource } from '@rendezvous/core';

export class FakeEventSource implements EventSource {
    public emitted: Array<{ eventName: string; args: EventArgs }> = [];
    public subscriptions = 0;
    public unsubscriptions = 0;
    private handlers = new Set<EventHandler>();

    public onEvent(handler: EventHandler): () => void {
        this.handlers.add(handler);
        this.subscriptions++;
        return () => {
            if (this.handlers.delete(handler)) {
                this.unsubscriptions++;
            }
        };
    }

    public emit(eventName: string, ...args: unknown[]): void {
        this.emitted.push({ eventName, args });
        for (const handler of this.handlers) {
            handler(eventName, args);
        }
    }

    public get handlerCount(): number {
        return this.handlers.size;
    }
}
