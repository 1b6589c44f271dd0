import { MalformedEntryError, errorMessage } from './errors.js';
import { takeNewest } from './aggregator.js';
import { log } from '../server/logging.js';
import { parseFeedDate } from '../shared/date-utils.js';
import { stripInvalidXmlChars } from '../shared/text-utils.js';
import { computeGuid, normalizeUrl } from '../shared/url-utils.js';
import { Clock, FeedSource, Item, RawEntry } from '../types/index.js';

export interface NormalizeResult {
    items: Item[];
    skipped: number;
}

function resolveLink(entry: RawEntry): string {
    const link = normalizeUrl(entry.link || '');
    if (link) return link;
    // RSS permalinks sometimes only live in <guid>
    if (entry.guid && /^https?:\/\//i.test(entry.guid.trim())) {
        return normalizeUrl(entry.guid);
    }
    return '';
}

export function normalizeEntry(entry: RawEntry, source: FeedSource, clock: Clock): Item {
    const title = stripInvalidXmlChars(entry.title || '').trim();
    if (!title) {
        throw new MalformedEntryError('Entry has no title');
    }

    const link = resolveLink(entry);
    if (!link) {
        throw new MalformedEntryError(`Entry "${title}" has no valid http(s) link`);
    }

    const sourceGuid = stripInvalidXmlChars(entry.guid || '').trim();

    return {
        title: source.titlePrefix ? `[${source.titlePrefix}] ${title}` : title,
        link,
        description: stripInvalidXmlChars(entry.description || '').trim(),
        published: parseFeedDate(entry.published) ?? clock(),
        sport: source.sport,
        guid: sourceGuid || computeGuid(link)
    };
}

/**
 * Normalize every entry of one source. Malformed entries are logged and
 * skipped; a source-level maxItems keeps only the newest entries.
 */
export function normalizeEntries(entries: RawEntry[], source: FeedSource, clock: Clock): NormalizeResult {
    const items: Item[] = [];
    let skipped = 0;

    entries.forEach((entry, index) => {
        try {
            items.push(normalizeEntry(entry, source, clock));
        } catch (err) {
            skipped++;
            log('warn', 'Skipping malformed feed entry', { feed: source.name, index, error: errorMessage(err) });
        }
    });

    return {
        items: source.maxItems ? takeNewest(items, source.maxItems) : items,
        skipped
    };
}
