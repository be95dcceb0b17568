/**
 * Runs async writes one at a time, in submission order.
 * A failed write rejects its own promise and does not stall the queue.
 */
export class WriteQueue {
    private tail: Promise<void> = Promise.resolve();

    run<T>(task: () => Promise<T>): Promise<T> {
        const result = this.tail.then(task);
        this.tail = result.then(
            () => undefined,
            () => undefined
        );
        return result;
    }

    /**
     * Resolves once every write submitted so far has settled
     */
    drain(): Promise<void> {
        return this.tail;
    }
}
