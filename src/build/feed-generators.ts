/**
 * Feed generation utilities — RSS XML and the feed health report.
 */

import * as xml2js from 'xml2js';
import { SerializationError, errorMessage } from '../feeds/errors.js';
import { log } from '../server/logging.js';
import { formatRfc822 } from '../shared/date-utils.js';
import { findInvalidXmlChar, stripInvalidXmlChars } from '../shared/text-utils.js';
import { EnrichedItem, OutputFeed, SourceReport } from '../types/index.js';

export const GENERATOR_NAME = 'JP Sports Enriched RSS';

// =====================================================================
// RSS XML Generation
// =====================================================================

export interface RSSOptions {
    buildDate?: Date;
}

export interface RenderedFeed {
    xml: string;
    itemCount: number;
    dropped: number;
    // items that made it into the document, in output order
    published: EnrichedItem[];
}

type XmlItem = {
    title: string;
    link: string;
    description: string;
    pubDate: string;
    guid: { _: string; $: { isPermaLink: 'true' | 'false' } };
};

function assertSerializable(field: string, value: string): string {
    const at = findInvalidXmlChar(value);
    if (at >= 0) {
        throw new SerializationError(`Field "${field}" contains a character XML cannot represent at index ${at}`);
    }
    return value;
}

export function toXmlItem(item: EnrichedItem): XmlItem {
    return {
        title: assertSerializable('title', item.title),
        link: assertSerializable('link', item.link),
        description: assertSerializable('description', item.description),
        pubDate: formatRfc822(item.published),
        guid: {
            _: assertSerializable('guid', item.guid),
            $: { isPermaLink: item.guid === item.link ? 'true' : 'false' }
        }
    };
}

/**
 * Render an OutputFeed as an RSS 2.0 document. Text content is escaped by the
 * xml2js builder; items that cannot be represented are dropped so the rest of
 * the document stays well-formed.
 */
export function renderRSSFeed(feed: OutputFeed, options: RSSOptions = {}): RenderedFeed {
    const xmlItems: XmlItem[] = [];
    const published: EnrichedItem[] = [];
    let dropped = 0;

    for (const item of feed.items) {
        try {
            xmlItems.push(toXmlItem(item));
            published.push(item);
        } catch (err) {
            dropped++;
            log('warn', 'Dropping item that cannot be serialized', { feed: feed.title, guid: item.guid, error: errorMessage(err) });
        }
    }

    const channel = {
        title: stripInvalidXmlChars(feed.title),
        link: stripInvalidXmlChars(feed.link),
        description: stripInvalidXmlChars(feed.description),
        language: stripInvalidXmlChars(feed.language),
        lastBuildDate: formatRfc822(options.buildDate ?? new Date()),
        generator: GENERATOR_NAME,
        'atom:link': { $: { href: stripInvalidXmlChars(feed.link), rel: 'self', type: 'application/rss+xml' } },
        ...(xmlItems.length > 0 ? { item: xmlItems } : {})
    };

    const builder = new xml2js.Builder({
        xmldec: { version: '1.0', encoding: 'UTF-8' },
        renderOpts: { pretty: true, indent: '  ', newline: '\n' }
    });

    const xml = builder.buildObject({
        rss: {
            $: { version: '2.0', 'xmlns:atom': 'http://www.w3.org/2005/Atom' },
            channel
        }
    });

    return { xml, itemCount: xmlItems.length, dropped, published };
}

export function generateRSSXML(feed: OutputFeed, options: RSSOptions = {}): string {
    return renderRSSFeed(feed, options).xml;
}

// =====================================================================
// Feed Health Report
// =====================================================================

export interface FeedHealthReport {
    generatedAt: string;
    totalFeeds: number;
    successfulFeeds: number;
    failedFeeds: number;
    totalEntriesFetched: number;
    totalItemsKept: number;
    totalEntriesSkipped: number;
    feeds: SourceReport[];
}

export function generateFeedHealthReport(reports: readonly SourceReport[], generatedAt: Date = new Date()): FeedHealthReport {
    const feeds = [...reports].sort((a, b) => {
        if (a.status !== b.status) return a.status === 'error' ? -1 : 1;
        return a.feed.localeCompare(b.feed);
    });

    return {
        generatedAt: generatedAt.toISOString(),
        totalFeeds: feeds.length,
        successfulFeeds: feeds.filter(f => f.status === 'ok').length,
        failedFeeds: feeds.filter(f => f.status === 'error').length,
        totalEntriesFetched: feeds.reduce((sum, f) => sum + f.fetchedRaw, 0),
        totalItemsKept: feeds.reduce((sum, f) => sum + f.kept, 0),
        totalEntriesSkipped: feeds.reduce((sum, f) => sum + f.skipped, 0),
        feeds
    };
}
