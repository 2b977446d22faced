/**
 * A fixed-size concurrency queue.
 * Tasks beyond the limit wait in FIFO order. Callers that generate work lazily
 * can `await whenSlotAvailable()` instead of queueing ahead.
 */
export class TaskQueue {
    private running = 0;
    private queue: Array<() => void> = [];
    private slotWaiters: Array<() => void> = [];

    constructor(private readonly concurrency: number) {
        if (!Number.isInteger(concurrency) || concurrency < 1) {
            throw new RangeError(`Concurrency must be a positive integer, got ${concurrency}`);
        }
    }

    /**
     * Add a task to the queue.
     * @param task A function that returns a promise.
     * @returns A promise that resolves with the task's result.
     */
    add<T>(task: () => Promise<T>): Promise<T> {
        return new Promise<T>((resolve, reject) => {
            const runner = async () => {
                this.running++;
                try {
                    resolve(await task());
                } catch (error) {
                    reject(error);
                } finally {
                    this.running--;
                    this.next();
                    this.notify();
                }
            };

            if (this.running < this.concurrency) {
                void runner();
            } else {
                this.queue.push(runner);
            }
        });
    }

    /** Resolves as soon as a new task would start without waiting. */
    whenSlotAvailable(): Promise<void> {
        if (this.hasFreeSlot) return Promise.resolve();
        return new Promise(resolve => this.slotWaiters.push(resolve));
    }

    private next() {
        while (this.running < this.concurrency && this.queue.length > 0) {
            const nextTask = this.queue.shift();
            if (nextTask) nextTask();
        }
    }

    private notify() {
        if (this.hasFreeSlot) {
            const waiter = this.slotWaiters.shift();
            if (waiter) waiter();
        }
    }

    private get hasFreeSlot() {
        return this.running + this.queue.length < this.concurrency;
    }

    get active() {
        return this.running;
    }
}
