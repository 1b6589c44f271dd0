/**
 * Feed enrichment pipeline
 *
 * 1. fetchAllSources()    - HTTP fetch or demo generation per source
 * 2. parseFeedDocument()  - RSS 2.0 / Atom into raw entries
 * 3. normalizeEntries()   - canonical items, malformed entries skipped
 * 4. enrichItem()         - sport promo block appended
 * 5. deduplicate()        - first occurrence per guid, optional seen cache
 * 6. aggregateFeeds()     - combined feed + one feed per configured sport
 *
 * The seen cache is only consulted here. Callers that publish the result
 * record what they wrote with markPublished().
 *
 * Source-level failures never abort the run; the failing source contributes
 * zero items and is reported.
 */

import { aggregateFeeds, AggregatedFeeds } from './aggregator.js';
import { deduplicate } from './dedup.js';
import { enrichItem } from './enricher.js';
import { FeedError, errorMessage } from './errors.js';
import { fetchAllSources, FetchText } from './fetcher.js';
import { normalizeEntries } from './normalizer.js';
import { ParsedEntries, parseFeedDocument } from './parser.js';
import { log } from '../server/logging.js';
import { Clock, EnrichedItem, FeedFormat, FeedSource, FetchResult, RunConfig, SeenCache, SourceReport, Sport } from '../types/index.js';

export interface PipelineOptions {
    clock?: Clock;
    perSport?: number;
    fetchText?: FetchText;
    cache?: SeenCache;
}

export interface PipelineResult extends AggregatedFeeds {
    reports: SourceReport[];
    duplicateCount: number;
    previouslySeenCount: number;
}

function errorReport(source: FeedSource, result: FetchResult, message: string): SourceReport {
    return {
        feed: source.name,
        sport: source.sport,
        url: source.url,
        status: 'error',
        format: null,
        fetchedRaw: 0,
        kept: 0,
        skipped: 0,
        error: message,
        durationMs: result.meta.durationMs
    };
}

type SourceEntries = Omit<ParsedEntries, 'format'> & { format: FeedFormat | 'demo' };

async function extractEntries(source: FeedSource, result: Extract<FetchResult, { status: 'ok' }>): Promise<SourceEntries> {
    const { document } = result;
    if (document.kind === 'demo') {
        return { format: 'demo', entries: document.entries, skipped: 0 };
    }
    return parseFeedDocument(document.body, document.contentType, source.name);
}

export function configuredSports(feeds: readonly FeedSource[]): Sport[] {
    return Array.from(new Set(feeds.map(feed => feed.sport)));
}

export async function runPipeline(config: RunConfig, options: PipelineOptions = {}): Promise<PipelineResult> {
    const clock = options.clock ?? (() => new Date());
    log('info', 'Pipeline: processing feed sources', { sources: config.feeds.length });

    // Stage 1: fetch
    const results = await fetchAllSources(config.feeds, {
        timeoutMs: config.timeoutMs,
        perSport: options.perSport,
        clock,
        fetchText: options.fetchText
    });

    // Stages 2-4: parse, normalize and enrich per source
    const reports: SourceReport[] = [];
    const enriched: EnrichedItem[] = [];

    for (let i = 0; i < config.feeds.length; i++) {
        const source = config.feeds[i];
        const result = results[i];

        if (result.status === 'error') {
            reports.push(errorReport(source, result, result.error.message));
            continue;
        }

        let parsed: SourceEntries;
        try {
            parsed = await extractEntries(source, result);
        } catch (err) {
            // An unparsable document is handled like an unreachable source
            log('warn', 'Feed document unusable, skipping source for this run', {
                feed: source.name,
                type: err instanceof FeedError ? err.type : 'malformed_document',
                error: errorMessage(err)
            });
            reports.push(errorReport(source, result, errorMessage(err)));
            continue;
        }

        const { items, skipped } = normalizeEntries(parsed.entries, source, clock);
        for (const item of items) {
            enriched.push(enrichItem(item, source, config.emojiBySport));
        }

        reports.push({
            feed: source.name,
            sport: source.sport,
            url: source.url,
            status: 'ok',
            format: parsed.format,
            fetchedRaw: parsed.entries.length + parsed.skipped,
            kept: items.length,
            skipped: parsed.skipped + skipped,
            error: null,
            durationMs: result.meta.durationMs
        });
    }

    // Stage 5: dedup in one sequential pass over every source's items
    const deduped = await deduplicate(enriched, options.cache);

    // Stage 6: partition and order
    const feeds = aggregateFeeds(deduped.items, configuredSports(config.feeds), {
        feedTitle: config.feedTitle,
        feedLink: config.feedLink,
        feedDescription: config.feedDescription,
        language: config.language,
        maxItemsPerSport: config.maxItemsPerSport
    });

    log('info', 'Pipeline completed', {
        sources: reports.length,
        failedSources: reports.filter(r => r.status === 'error').length,
        items: feeds.combined.items.length,
        duplicates: deduped.duplicateCount,
        previouslySeen: deduped.previouslySeenCount
    });

    return {
        ...feeds,
        reports,
        duplicateCount: deduped.duplicateCount,
        previouslySeenCount: deduped.previouslySeenCount
    };
}
