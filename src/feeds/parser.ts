import Parser from 'rss-parser';
import * as xml2js from 'xml2js';
import { z } from 'zod';
import { MalformedDocumentError, MalformedEntryError, errorMessage } from './errors.js';
import { log } from '../server/logging.js';
import { FeedFormat, RawEntry } from '../types/index.js';

export interface ParsedEntries {
    format: FeedFormat;
    entries: RawEntry[];
    skipped: number;
}

/**
 * One implementation per wire format. Both produce the same RawEntry shape so
 * the normalizer never needs to know where an entry came from.
 */
export interface FeedFormatParser {
    readonly format: FeedFormat;
    parse(body: string, feedName?: string): Promise<ParsedEntries>;
}

function asText(value: unknown): string | undefined {
    if (typeof value === 'string') return value;
    if (value && typeof value === 'object' && '_' in value && typeof value._ === 'string') return value._;
    return undefined;
}

function skipEntry(feedName: string | undefined, index: number, error: unknown): void {
    log('warn', 'Skipping malformed feed entry', { feed: feedName, index, error: errorMessage(error) });
}

// =====================================================================
// RSS 2.0 (and RSS 1.0 / RDF) via rss-parser
// =====================================================================

type RssCustomItem = {
    description?: unknown;
    'content:encoded'?: unknown;
    published?: unknown;
};

export class Rss2Parser implements FeedFormatParser {
    readonly format = 'rss2';

    private readonly parser = new Parser<Record<string, unknown>, RssCustomItem>({
        customFields: {
            item: ['description', 'content:encoded', 'published']
        }
    });

    async parse(body: string): Promise<ParsedEntries> {
        const parsed = await this.parser.parseString(body).catch((err: unknown) => {
            throw new MalformedDocumentError(`Unparsable RSS document: ${errorMessage(err)}`, { cause: err });
        });
        const entries: RawEntry[] = parsed.items.map(item => ({
            title: asText(item.title),
            link: asText(item.link),
            description: asText(item.description) ?? asText(item.content) ?? asText(item['content:encoded']),
            published: asText(item.pubDate) ?? asText(item.published) ?? asText(item.isoDate),
            guid: asText(item.guid)
        }));

        // rss-parser never rejects single items; incomplete ones are dropped by the normalizer
        const skipped = 0;
        return { format: this.format, entries, skipped };
    }
}

// =====================================================================
// Atom via xml2js, entries validated with zod
// =====================================================================

const textNode = z.union([
    z.string(),
    z.object({ _: z.string().optional() }).passthrough()
]);

const linkNode = z.union([
    z.string(),
    z.object({
        $: z.object({ href: z.string(), rel: z.string().optional() }).passthrough()
    }).passthrough()
]);

const atomEntrySchema = z.object({
    title: z.array(textNode).optional(),
    link: z.array(linkNode).optional(),
    id: z.array(textNode).optional(),
    published: z.array(textNode).optional(),
    updated: z.array(textNode).optional(),
    summary: z.array(textNode).optional(),
    content: z.array(textNode).optional()
}).passthrough();

const atomDocumentSchema = z.object({
    feed: z.union([
        z.string(),
        z.object({ entry: z.array(z.unknown()).optional() }).passthrough()
    ])
});

type AtomLink = z.infer<typeof linkNode>;

function pickAtomLink(links: AtomLink[] | undefined): string | undefined {
    if (!links) return undefined;
    let fallback: string | undefined;
    for (const l of links) {
        if (typeof l === 'string') return l.trim();
        const { href, rel } = l.$;
        if (!rel || rel === 'alternate') return href.trim();
        fallback ??= href.trim();
    }
    return fallback;
}

function first(nodes: z.infer<typeof textNode>[] | undefined): string | undefined {
    return nodes && nodes.length > 0 ? asText(nodes[0]) : undefined;
}

export class AtomParser implements FeedFormatParser {
    readonly format = 'atom';

    async parse(body: string, feedName?: string): Promise<ParsedEntries> {
        let doc: unknown;
        try {
            doc = await xml2js.parseStringPromise(body);
        } catch (err) {
            throw new MalformedDocumentError(`Unparsable Atom document: ${errorMessage(err)}`, { cause: err });
        }

        const shape = atomDocumentSchema.safeParse(doc);
        if (!shape.success) {
            throw new MalformedDocumentError('Document root is not an Atom <feed>');
        }
        const rawEntries = typeof shape.data.feed === 'string' ? [] : shape.data.feed.entry ?? [];

        const entries: RawEntry[] = [];
        let skipped = 0;
        rawEntries.forEach((raw, index) => {
            const parsed = atomEntrySchema.safeParse(raw);
            if (!parsed.success) {
                skipped++;
                skipEntry(feedName, index, new MalformedEntryError(parsed.error.issues[0]?.message ?? 'invalid entry'));
                return;
            }
            const entry = parsed.data;
            entries.push({
                title: first(entry.title),
                link: pickAtomLink(entry.link),
                description: first(entry.summary) ?? first(entry.content),
                published: first(entry.published) ?? first(entry.updated),
                guid: first(entry.id)
            });
        });

        return { format: this.format, entries, skipped };
    }
}

// =====================================================================
// Format selection
// =====================================================================

export const FEED_PARSERS: Record<FeedFormat, FeedFormatParser> = {
    rss2: new Rss2Parser(),
    atom: new AtomParser()
};

function rootElementName(body: string): string | null {
    const stripped = body
        .replace(/^\uFEFF/, '')
        .replace(/<\?[\s\S]*?\?>/g, '')
        .replace(/<!--[\s\S]*?-->/g, '')
        .replace(/<!DOCTYPE[^>]*>/gi, '');
    const match = stripped.match(/<([A-Za-z_][\w.:-]*)/);
    return match ? match[1] : null;
}

/**
 * The declared content type wins when it names a format; otherwise the root
 * element decides.
 */
export function detectFeedFormat(body: string, contentType?: string): FeedFormat {
    const declared = (contentType || '').toLowerCase();
    if (declared.includes('atom')) return 'atom';
    if (declared.includes('rss') || declared.includes('rdf')) return 'rss2';

    const root = rootElementName(body);
    if (root === 'rss' || root === 'rdf:RDF') return 'rss2';
    if (root === 'feed') return 'atom';
    throw new MalformedDocumentError(root ? `Unsupported feed root element <${root}>` : 'Response is not an XML document');
}

export async function parseFeedDocument(body: string, contentType?: string, feedName?: string): Promise<ParsedEntries> {
    const format = detectFeedFormat(body, contentType);
    return FEED_PARSERS[format].parse(body, feedName);
}
