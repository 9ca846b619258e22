/**
 * Entries sorted by count descending, ties by key, optionally cut to `limit`
 */
export function mostCommon(counts: ReadonlyMap<string, number>, limit?: number): [string, number][] {
    const sorted = Array.from(counts.entries()).sort(
        ([keyA, countA], [keyB, countB]) => countB - countA || (keyA < keyB ? -1 : keyA > keyB ? 1 : 0)
    );
    return limit === undefined ? sorted : sorted.slice(0, limit);
}

export function increment(counts: Map<string, number>, key: string, by: number = 1): void {
    counts.set(key, (counts.get(key) ?? 0) + by);
}
