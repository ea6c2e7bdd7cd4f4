import { describe, expect, it } from 'vitest';
import { UserSerialQueue } from './userSerialQueue';

const deferred = <T>() => {
    let resolve: (value: T) => void = () => undefined;
    const promise = new Promise<T>((res) => {
        resolve = res;
    });
    return { promise, resolve };
};

const flush = () => new Promise<void>((resolve) => setImmediate(resolve));

describe('UserSerialQueue', () => {
    it('runs tasks for the same key one after another', async () => {
        const queue = new UserSerialQueue();
        const gate = deferred<void>();
        const events: string[] = [];

        const first = queue.run('u1', async () => {
            events.push('first:start');
            await gate.promise;
            events.push('first:end');
            return 1;
        });
        const second = queue.run('u1', () => {
            events.push('second');
            return 2;
        });

        await flush();
        expect(events).toEqual(['first:start']);

        gate.resolve();
        expect(await Promise.all([first, second])).toEqual([1, 2]);
        expect(events).toEqual(['first:start', 'first:end', 'second']);
    });

    it('does not hold other keys behind a slow task', async () => {
        const queue = new UserSerialQueue();
        const gate = deferred<void>();

        const slow = queue.run('u1', () => gate.promise);
        const other = await queue.run('u2', () => 'done');

        expect(other).toBe('done');
        gate.resolve();
        await slow;
    });

    it('keeps running later tasks after a failure', async () => {
        const queue = new UserSerialQueue();

        const failing = queue.run('u1', () => {
            throw new Error('boom');
        });
        const next = queue.run('u1', () => 'still runs');

        await expect(failing).rejects.toThrow('boom');
        await expect(next).resolves.toBe('still runs');
    });

    it('forgets keys once their work has settled', async () => {
        const queue = new UserSerialQueue();
        await queue.run('u1', () => undefined);
        await flush();

        expect(queue.pendingKeys).toBe(0);
    });
});
