import { SPORT_PROFILES } from './config.js';
import { siblingUrl } from '../shared/url-utils.js';
import { EnrichedItem, Item, OutputFeed, Sport } from '../types/index.js';

export interface FeedSettings {
    feedTitle: string;
    feedLink: string;
    feedDescription: string;
    language: string;
    maxItemsPerSport: number | null;
}

export interface AggregatedFeeds {
    combined: OutputFeed;
    bySport: Map<Sport, OutputFeed>;
}

/**
 * Newest first. Equal timestamps keep their encounter order, which is made
 * explicit rather than left to the sort implementation.
 */
export function sortNewestFirst<T extends Item>(items: readonly T[]): T[] {
    return items
        .map((item, index) => ({ item, index }))
        .sort((a, b) => (b.item.published.getTime() - a.item.published.getTime()) || (a.index - b.index))
        .map(entry => entry.item);
}

// Keeps the first `max` items of the newest-first order; among ties the later-encountered ones are dropped
export function takeNewest<T extends Item>(items: readonly T[], max: number): T[] {
    return sortNewestFirst(items).slice(0, Math.max(0, max));
}

export function sportFeedMeta(sport: Sport, settings: FeedSettings): Omit<OutputFeed, 'items'> {
    const profile = SPORT_PROFILES[sport];
    return {
        title: `${settings.feedTitle} - ${profile.label}`,
        link: siblingUrl(settings.feedLink, profile.fileName),
        description: `${settings.feedDescription}（${profile.label}のみ）`,
        language: settings.language
    };
}

/**
 * Build one feed per configured sport (possibly empty) and the combined feed.
 * The per-sport cap is applied first, so the combined feed holds exactly the
 * union of the per-sport feeds. Items are taken in encounter order; ties in
 * every feed keep that order.
 */
export function aggregateFeeds(
    items: readonly EnrichedItem[],
    sports: readonly Sport[],
    settings: FeedSettings
): AggregatedFeeds {
    const bySport = new Map<Sport, OutputFeed>();
    const kept = new Set<EnrichedItem>();

    for (const sport of sports) {
        if (bySport.has(sport)) continue;
        const sportItems = items.filter(item => item.sport === sport);
        const ordered = settings.maxItemsPerSport
            ? takeNewest(sportItems, settings.maxItemsPerSport)
            : sortNewestFirst(sportItems);

        bySport.set(sport, { ...sportFeedMeta(sport, settings), items: ordered });
        ordered.forEach(item => kept.add(item));
    }

    return {
        combined: {
            title: settings.feedTitle,
            link: settings.feedLink,
            description: settings.feedDescription,
            language: settings.language,
            items: sortNewestFirst(items.filter(item => kept.has(item)))
        },
        bySport
    };
}
