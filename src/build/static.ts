/**
 * Static RSS build module
 * Runs the pipeline and writes the combined feed, one feed per sport and the
 * feed health report.
 */

import * as fs from 'fs';
import * as path from 'path';
import { log } from '../server/logging.js';
import { COMBINED_FEED_FILE, DEFAULT_OUTPUT_DIR, HEALTH_REPORT_FILE, SPORT_PROFILES } from '../feeds/config.js';
import { markPublished } from '../feeds/dedup.js';
import { PipelineOptions, runPipeline } from '../feeds/pipeline.js';
import { generateFeedHealthReport, renderRSSFeed } from './feed-generators.js';
import { EnrichedItem, RunConfig, Sport } from '../types/index.js';

export interface FeedWriter {
    write(fileName: string, contents: string): Promise<void>;
}

export class FileFeedWriter implements FeedWriter {
    constructor(private readonly outDir: string = path.join(process.cwd(), DEFAULT_OUTPUT_DIR)) {}

    async write(fileName: string, contents: string): Promise<void> {
        await fs.promises.mkdir(this.outDir, { recursive: true });
        await fs.promises.writeFile(path.join(this.outDir, fileName), contents, 'utf8');
    }
}

export interface WrittenFeed {
    fileName: string;
    sport: Sport | null;
    itemCount: number;
    dropped: number;
}

export interface BuildOptions extends PipelineOptions {
    writer?: FeedWriter;
}

export interface BuildSummary {
    feeds: WrittenFeed[];
    failedSources: number;
    durationMs: number;
}

/**
 * Build every output document. Source failures only shrink the feeds; a
 * writer failure is the one thing that propagates. With a seen cache, the
 * items written to the per-sport feeds are recorded after every file is out.
 */
export async function buildStaticFeeds(config: RunConfig, options: BuildOptions = {}): Promise<BuildSummary> {
    const startTime = Date.now();
    const writer = options.writer ?? new FileFeedWriter();
    const buildDate = (options.clock ?? (() => new Date()))();
    log('info', 'Starting RSS feed generation', { sources: config.feeds.length });

    const result = await runPipeline(config, options);
    const written: WrittenFeed[] = [];
    const published: EnrichedItem[] = [];

    const combined = renderRSSFeed(result.combined, { buildDate });
    await writer.write(COMBINED_FEED_FILE, combined.xml);
    written.push({ fileName: COMBINED_FEED_FILE, sport: null, itemCount: combined.itemCount, dropped: combined.dropped });
    log('info', `Wrote ${COMBINED_FEED_FILE}`, { items: combined.itemCount, dropped: combined.dropped });

    for (const [sport, feed] of result.bySport) {
        const fileName = SPORT_PROFILES[sport].fileName;
        const rendered = renderRSSFeed(feed, { buildDate });
        await writer.write(fileName, rendered.xml);
        published.push(...rendered.published);
        written.push({ fileName, sport, itemCount: rendered.itemCount, dropped: rendered.dropped });
        log('info', `Wrote ${fileName}`, { items: rendered.itemCount, dropped: rendered.dropped });
    }

    const health = generateFeedHealthReport(result.reports, buildDate);
    await writer.write(HEALTH_REPORT_FILE, JSON.stringify(health, null, 2));

    if (options.cache) {
        await markPublished(published, options.cache);
    }

    const summary: BuildSummary = {
        feeds: written,
        failedSources: health.failedFeeds,
        durationMs: Date.now() - startTime
    };
    log('info', 'RSS feed generation completed', {
        files: written.length,
        failedSources: summary.failedSources,
        durationMs: summary.durationMs
    });
    return summary;
}
