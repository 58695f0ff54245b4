/**
 * Resettable binary signal. `wait()` resolves once the signal is raised;
 * raising an already-raised signal is a no-op.
 */
export class Signal {
    private raised = false;
    private resolvers: Array<() => void> = [];

    get isRaised(): boolean {
        return this.raised;
    }

    raise(): void {
        if (this.raised) return;
        this.raised = true;

        const pending = this.resolvers;
        this.resolvers = [];
        for (const resolve of pending) {
            resolve();
        }
    }

    clear(): void {
        this.raised = false;
    }

    wait(): Promise<void> {
        if (this.raised) {
            return Promise.resolve();
        }

        return new Promise<void>((resolve) => {
            this.resolvers.push(resolve);
        });
    }
}
