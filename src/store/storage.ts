import * as fs from 'fs';
import * as path from 'path';
import { z } from 'zod';
import { errorMessage } from '../feeds/errors.js';
import { log } from '../server/logging.js';
import { Clock, SeenCache } from '../types/index.js';

export const SEEN_RETENTION_MS = 30 * 24 * 60 * 60 * 1000; // 30 days

// key -> time it was first recorded, in ms
export class MemorySeenCache implements SeenCache {
    protected readonly seen: Map<string, number>;

    constructor(initial: Iterable<string> = [], protected readonly clock: Clock = () => new Date()) {
        const now = clock().getTime();
        this.seen = new Map(Array.from(initial, key => [key, now]));
    }

    async hasSeen(key: string): Promise<boolean> {
        return this.seen.has(key);
    }

    async markSeen(key: string): Promise<void> {
        if (!this.seen.has(key)) {
            this.seen.set(key, this.clock().getTime());
        }
    }

    keys(): string[] {
        return Array.from(this.seen.keys());
    }

    get size(): number {
        return this.seen.size;
    }
}

const seenFileSchema = z.object({
    updatedAt: z.string().optional(),
    entries: z.array(z.object({
        key: z.string(),
        seenAt: z.string().datetime()
    }))
});

export interface FileSeenCacheOptions {
    clock?: Clock;
    retentionMs?: number;
}

// File-based persistent seen-set: { updatedAt, entries: [{ key, seenAt }] } as JSON
export class FileSeenCache extends MemorySeenCache {
    private constructor(
        private readonly filePath: string,
        private readonly retentionMs: number,
        clock: Clock
    ) {
        super([], clock);
    }

    /**
     * A missing or unreadable file gives an empty cache; the worst outcome is
     * republishing items, never losing a run.
     */
    static load(filePath: string, options: FileSeenCacheOptions = {}): FileSeenCache {
        const cache = new FileSeenCache(filePath, options.retentionMs ?? SEEN_RETENTION_MS, options.clock ?? (() => new Date()));
        if (!fs.existsSync(filePath)) {
            log('info', 'Seen cache not found, starting empty', { filePath });
            return cache;
        }

        try {
            const parsed = seenFileSchema.safeParse(JSON.parse(fs.readFileSync(filePath, 'utf8')));
            if (!parsed.success) {
                throw new Error('unexpected shape');
            }
            for (const entry of parsed.data.entries) {
                cache.seen.set(entry.key, new Date(entry.seenAt).getTime());
            }
        } catch (err) {
            log('warn', 'Seen cache unreadable, starting empty', { filePath, error: errorMessage(err) });
            return cache;
        }

        log('info', 'Loaded seen cache', { filePath, keys: cache.size });
        return cache;
    }

    // Drops keys older than the retention window, then writes the file
    save(now: Date = this.clock()): void {
        const cutoff = now.getTime() - this.retentionMs;
        let pruned = 0;
        for (const [key, seenAt] of this.seen) {
            if (seenAt < cutoff) {
                this.seen.delete(key);
                pruned++;
            }
        }

        fs.mkdirSync(path.dirname(path.resolve(this.filePath)), { recursive: true });
        const payload = {
            updatedAt: now.toISOString(),
            entries: Array.from(this.seen, ([key, seenAt]) => ({ key, seenAt: new Date(seenAt).toISOString() }))
        };
        fs.writeFileSync(this.filePath, JSON.stringify(payload, null, 2), 'utf8');
        log('info', 'Saved seen cache', { filePath: this.filePath, keys: payload.entries.length, pruned });
    }
}
