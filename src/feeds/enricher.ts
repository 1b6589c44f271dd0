import { EnrichedItem, FeedSource, Item, Sport } from '../types/index.js';

// Call-to-action label; its presence marks a description as already enriched
export const PROMO_MARKER = 'ベットはこちら:';
export const PROMO_SEPARATOR = '\n\n';

export function buildPromoBlock(sport: Sport, link: string, emojiBySport: Readonly<Record<Sport, string>>): string {
    return `${emojiBySport[sport]} ${PROMO_MARKER} ${link}`;
}

export function isEnriched(description: string): boolean {
    return description.includes(PROMO_MARKER);
}

export function enrichDescription(description: string, block: string): string {
    if (isEnriched(description)) return description;
    return description ? `${description}${PROMO_SEPARATOR}${block}` : block;
}

export function enrichItem(item: Item, source: FeedSource, emojiBySport: Readonly<Record<Sport, string>>): EnrichedItem {
    const block = buildPromoBlock(source.sport, source.link, emojiBySport);
    return {
        ...item,
        description: enrichDescription(item.description, block),
        enriched: true
    };
}
