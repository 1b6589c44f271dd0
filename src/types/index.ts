export const SPORTS = ['npb', 'jleague', 'keiba', 'mlb'] as const;

export type Sport = typeof SPORTS[number];

export type Clock = () => Date;

export type FeedSource = {
    readonly name: string;
    readonly sport: Sport;
    readonly url: string | null;
    readonly demo: boolean;
    readonly link: string;
    readonly titlePrefix: string | null;
    readonly maxItems: number | null;
};

export type RunConfig = {
    readonly feedTitle: string;
    readonly feedLink: string;
    readonly feedDescription: string;
    readonly language: string;
    readonly emojiBySport: Readonly<Record<Sport, string>>;
    readonly maxItemsPerSport: number | null;
    readonly timeoutMs: number;
    readonly feeds: readonly FeedSource[];
};

// Format-neutral record handed from the format parsers / demo generator to the normalizer
export interface RawEntry {
    title?: string;
    link?: string;
    description?: string;
    published?: string;
    guid?: string;
}

export type Item = {
    title: string;
    link: string;
    description: string;
    published: Date;
    sport: Sport;
    guid: string;
};

export type EnrichedItem = Item & { readonly enriched: true };

export type OutputFeed = {
    title: string;
    link: string;
    description: string;
    language: string;
    items: readonly EnrichedItem[];
};

export type FeedFormat = 'rss2' | 'atom';

export type RawDocument =
    | { kind: 'xml'; body: string; contentType?: string }
    | { kind: 'demo'; entries: RawEntry[] };

export type FetchMeta = { feed: string; sport: Sport; durationMs: number };

export type FetchResult =
    | { status: 'ok'; document: RawDocument; meta: FetchMeta }
    | { status: 'error'; error: { type: string; message: string; httpStatus?: number }; meta: FetchMeta };

export type SourceReport = {
    feed: string;
    sport: Sport;
    url: string | null;
    status: 'ok' | 'error';
    format: FeedFormat | 'demo' | null;
    fetchedRaw: number;
    kept: number;
    skipped: number;
    error: string | null;
    durationMs: number;
};

// Pluggable cross-run memory for the deduplicator
export interface SeenCache {
    hasSeen(key: string): Promise<boolean>;
    markSeen(key: string): Promise<void>;
}
