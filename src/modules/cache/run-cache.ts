/**
 * Per-run memo with single-flight get-or-compute.
 *
 * Concurrent callers asking for the same key share one in-flight computation,
 * and the first settled value is kept for the rest of the run. A computation
 * that rejects is forgotten, so a later caller computes again.
 */
export class RunCache<V> {
    private settled = new Map<string, { value: V }>();
    private inflight = new Map<string, Promise<V>>();
    private computations = 0;

    getOrCompute(key: string, compute: () => Promise<V>): Promise<V> {
        const hit = this.settled.get(key);
        if (hit) return Promise.resolve(hit.value);

        const pending = this.inflight.get(key);
        if (pending) return pending;

        this.computations++;
        const promise = compute().then(
            (value) => {
                this.inflight.delete(key);
                const first = this.settled.get(key);
                if (first) return first.value;
                this.settled.set(key, { value });
                return value;
            },
            (error: unknown) => {
                this.inflight.delete(key);
                throw error;
            }
        );
        this.inflight.set(key, promise);
        return promise;
    }

    get size(): number {
        return this.settled.size;
    }

    /** Number of computations started; lets callers check that work was not duplicated. */
    get computeCount(): number {
        return this.computations;
    }
}
