/**
 * Serial Dispatcher
 *
 * Single entry point for every coordinator input, timer expiry and
 * deferred effect. A task submitted while another task runs is queued and
 * drained afterwards by the outer call, so no two tasks ever interleave and
 * nothing re-enters the coordinator mid-transition.
 */

export type DispatchTask = () => void;

export class SerialDispatcher {
    private readonly queue: DispatchTask[] = [];
    private draining = false;

    constructor(private readonly onTaskError: (error: unknown) => void) { }

    public run(task: DispatchTask): void {
        this.queue.push(task);
        if (this.draining) return;

        this.draining = true;
        try {
            let next = this.queue.shift();
            while (next) {
                try {
                    next();
                } catch (error) {
                    this.onTaskError(error);
                }
                next = this.queue.shift();
            }
        } finally {
            this.draining = false;
        }
    }

    /** Tasks waiting behind the one currently running. */
    public get pending(): number {
        return this.queue.length;
    }

    public get isDraining(): boolean {
        return this.draining;
    }
}
