/**
 * Round-robin interleave so tracks by the same artist are not played back to
 * back.
 *
 * Tracks are bucketed by artist key (order kept inside each bucket), buckets
 * are ordered by size (largest first, ties by first appearance) and then read
 * one track per bucket per round. No two neighbours share an artist whenever
 * the largest bucket holds at most ⌈n/2⌉ tracks.
 */
export function separateArtists<T>(
    items: readonly T[],
    getArtistKey: (item: T) => string
): T[] {
    if (items.length <= 1) return [...items];

    const buckets = new Map<string, T[]>();
    for (const item of items) {
        const key = getArtistKey(item).trim().toLowerCase();
        const bucket = buckets.get(key);
        if (bucket) {
            bucket.push(item);
        } else {
            buckets.set(key, [item]);
        }
    }

    // Array.prototype.sort is stable, so equal sizes keep insertion order
    const ordered = Array.from(buckets.values()).sort(
        (a, b) => b.length - a.length
    );

    const result: T[] = [];
    const rounds = ordered[0]?.length ?? 0;
    for (let round = 0; round < rounds; round++) {
        for (const bucket of ordered) {
            const item = bucket[round];
            if (item !== undefined) {
                result.push(item);
            }
        }
    }

    return result;
}
