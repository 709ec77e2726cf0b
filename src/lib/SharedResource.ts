/**
 * Grants exclusive access to a shared value, one holder at a time in the order access was requested.
 *
 * Access is scoped: it starts when the callback passed to {@link exclusive} is invoked and ends as soon
 * as the promise it returned settles, regardless of whether it was fulfilled or rejected.
 */
export class SharedResource<T> {

    private readonly value: T;
    private queue: Promise<void> = Promise.resolve();
    private holders = 0;

    constructor(value: T) {
        this.value = value;
    }

    /**
     * Whether someone currently holds or waits for access.
     */
    get locked(): boolean {
        return this.holders > 0;
    }

    exclusive<R>(scope: (value: T) => Promise<R>): Promise<R> {
        this.holders++;

        const result = this.queue
            .then(() => scope(this.value))
            .finally(() => {
                this.holders--;
            });
        // the next holder waits for this scope to settle, but doesn't inherit its outcome
        this.queue = result.then(() => undefined, () => undefined);

        return result;
    }

}
