/**
 * Maps items through an async worker with at most `maxWorkers` in flight.
 * Results keep the order of the input.
 */
export async function mapWithConcurrency<T, R>(items: readonly T[], maxWorkers: number, worker: (item: T, index: number) => Promise<R>): Promise<R[]> {
    const results = new Array<R>(items.length);
    let next = 0;

    const run = async (): Promise<void> => {
        while (next < items.length) {
            const index = next++;
            results[index] = await worker(items[index], index);
        }
    };

    const workers = Array.from({ length: Math.max(1, Math.min(maxWorkers, items.length)) }, () => run());
    await Promise.all(workers);
    return results;
}

/**
 * Every unordered pair of distinct items, in input order
 */
export function unorderedPairs<T>(items: readonly T[]): Array<[T, T]> {
    const pairs: Array<[T, T]> = [];
    for (let i = 0; i < items.length; i++) {
        for (let j = i + 1; j < items.length; j++) {
            pairs.push([items[i], items[j]]);
        }
    }
    return pairs;
}
