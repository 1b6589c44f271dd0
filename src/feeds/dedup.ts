/**
 * Guid-based deduplication.
 *
 * Items are duplicates when they share a guid within the same sport; the first
 * occurrence wins and encounter order is preserved. An optional SeenCache
 * extends the check across runs. The cache is only read here; keys are written
 * by markPublished once an item has actually been emitted.
 */

import { errorMessage } from './errors.js';
import { log } from '../server/logging.js';
import { Item, SeenCache } from '../types/index.js';

export interface DedupResult<T extends Item> {
    items: T[];
    duplicateCount: number;
    previouslySeenCount: number;
    totalProcessed: number;
}

export function dedupKey(item: Item): string {
    return `${item.sport}:${item.guid}`;
}

export function deduplicateInMemory<T extends Item>(items: readonly T[]): T[] {
    const seen = new Set<string>();
    const unique: T[] = [];
    for (const item of items) {
        const key = dedupKey(item);
        if (seen.has(key)) continue;
        seen.add(key);
        unique.push(item);
    }
    return unique;
}

// A failing cache lookup treats the item as new rather than losing it
async function wasSeen(cache: SeenCache, key: string): Promise<boolean> {
    try {
        return await cache.hasSeen(key);
    } catch (err) {
        log('warn', 'Seen cache lookup failed, assuming item is new', { key, error: errorMessage(err) });
        return false;
    }
}

async function remember(cache: SeenCache, key: string): Promise<void> {
    try {
        await cache.markSeen(key);
    } catch (err) {
        log('warn', 'Seen cache update failed', { key, error: errorMessage(err) });
    }
}

/**
 * Full deduplication: first within this run, then against the cache when one
 * is supplied.
 */
export async function deduplicate<T extends Item>(items: readonly T[], cache?: SeenCache): Promise<DedupResult<T>> {
    const unique = deduplicateInMemory(items);
    const duplicateCount = items.length - unique.length;

    if (!cache) {
        return { items: unique, duplicateCount, previouslySeenCount: 0, totalProcessed: items.length };
    }

    const fresh: T[] = [];
    for (const item of unique) {
        const key = dedupKey(item);
        if (await wasSeen(cache, key)) continue;
        fresh.push(item);
    }

    const previouslySeenCount = unique.length - fresh.length;
    log('info', 'Deduplicated against seen cache', {
        total: items.length,
        duplicates: duplicateCount,
        previouslySeen: previouslySeenCount,
        remaining: fresh.length
    });

    return { items: fresh, duplicateCount, previouslySeenCount, totalProcessed: items.length };
}

// Record items that made it into a written feed so later runs skip them
export async function markPublished(items: readonly Item[], cache: SeenCache): Promise<void> {
    for (const item of items) {
        await remember(cache, dedupKey(item));
    }
    log('info', 'Recorded published items in seen cache', { items: items.length });
}
