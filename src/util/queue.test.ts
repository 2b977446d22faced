import { TaskQueue } from './queue';

function deferred<T>() {
    let resolve: (value: T) => void = () => undefined;
    let reject: (reason: unknown) => void = () => undefined;
    const promise = new Promise<T>((res, rej) => {
        resolve = res;
        reject = rej;
    });
    return { promise, resolve, reject };
}

const flush = () => new Promise(resolve => setImmediate(resolve));

describe('TaskQueue', () => {
    it('should reject a non-positive concurrency', () => {
        expect(() => new TaskQueue(0)).toThrow(RangeError);
        expect(() => new TaskQueue(1.5)).toThrow(RangeError);
    });

    it('should never run more tasks than the limit', async () => {
        const queue = new TaskQueue(2);
        const gates = [deferred<number>(), deferred<number>(), deferred<number>()];

        const results = gates.map(gate => queue.add(() => gate.promise));

        expect(queue.active).toBe(2);

        gates[0].resolve(1);
        await flush();
        expect(queue.active).toBe(2);

        gates[1].resolve(2);
        gates[2].resolve(3);
        await expect(Promise.all(results)).resolves.toEqual([1, 2, 3]);
        expect(queue.active).toBe(0);
    });

    it('should propagate task failures to the caller', async () => {
        const queue = new TaskQueue(1);
        await expect(queue.add(async () => { throw new Error('boom'); })).rejects.toThrow('boom');
        await expect(queue.add(async () => 'next')).resolves.toBe('next');
    });

    it('should resolve whenSlotAvailable immediately while under the limit', async () => {
        const queue = new TaskQueue(2);
        const gate = deferred<void>();
        void queue.add(() => gate.promise);

        let ready = false;
        void queue.whenSlotAvailable().then(() => { ready = true; });
        await flush();
        expect(ready).toBe(true);
        gate.resolve();
    });

    it('should hold whenSlotAvailable until a running task finishes', async () => {
        const queue = new TaskQueue(1);
        const gate = deferred<void>();
        const task = queue.add(() => gate.promise);

        let ready = false;
        void queue.whenSlotAvailable().then(() => { ready = true; });
        await flush();
        expect(ready).toBe(false);

        gate.resolve();
        await task;
        await flush();
        expect(ready).toBe(true);
    });
});
