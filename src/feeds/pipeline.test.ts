import { afterEach, beforeEach, describe, it, expect, vi } from 'vitest';
import { configuredSports, runPipeline } from './pipeline.js';
import { parseConfig } from './config.js';
import { DEMO_SUMMARY } from './demo.js';
import { buildPromoBlock } from './enricher.js';
import { SourceUnavailableError } from './errors.js';
import { FetchText } from './fetcher.js';
import { MemorySeenCache } from '../store/storage.js';

const clock = () => new Date('2026-10-19T03:00:00Z');

const MLB_RSS = `<?xml version="1.0" encoding="UTF-8"?>
<rss version="2.0"><channel><title>MLB</title>
  <item>
    <title>大谷 第50号</title>
    <link>https://news.example.com/mlb/1</link>
    <description>先頭打者本塁打</description>
    <pubDate>Mon, 19 Oct 2026 10:00:00 +0900</pubDate>
    <guid>mlb-1</guid>
  </item>
  <item>
    <title>ダルビッシュ 7回無失点</title>
    <link>https://news.example.com/mlb/2</link>
    <pubDate>Mon, 19 Oct 2026 11:00:00 +0900</pubDate>
    <guid>mlb-2</guid>
  </item>
</channel></rss>`;

const demoConfig = parseConfig({
    feed_title: 'Digest',
    feed_link: 'https://example.com/jp-sports/feed.xml',
    feeds: ['npb', 'jleague', 'keiba', 'mlb'].map(sport => ({
        sport,
        demo: true,
        target_url: `https://bet.example.com/${sport}`
    }))
});

const liveConfig = parseConfig({
    feeds: [
        { sport: 'npb', url: 'https://feeds.example.com/npb.xml', target_url: 'https://bet.example.com/npb' },
        { sport: 'mlb', url: 'https://feeds.example.com/mlb.xml', target_url: 'https://bet.example.com/mlb' }
    ]
});

beforeEach(() => {
    vi.stubEnv('FEED_TIMEOUT_MS', '');
});

afterEach(() => {
    vi.unstubAllEnvs();
});

describe('configuredSports', () => {
    it('lists each sport once in configuration order', () => {
        const feeds = [...liveConfig.feeds, { ...liveConfig.feeds[0], name: 'NPB 2' }];
        expect(configuredSports(feeds)).toEqual(['npb', 'mlb']);
    });
});

describe('runPipeline', () => {
    it('enriches demo entries for every sport', async () => {
        const result = await runPipeline(demoConfig, { clock, perSport: 3 });
        const items = result.combined.items;

        expect(items).toHaveLength(12);
        expect(items.slice(0, 5).map(item => item.title)).toEqual([
            '[NPB] パ・リーグ投手戦 注目ポイント',
            '[JLEAGUE] 横浜FM 新戦力が躍動',
            '[KEIBA] 今週の追い切り評価',
            '[MLB] カブス 鈴木誠也が決勝打',
            '[NPB] 広島が接戦を制す、終盤で逆転'
        ]);
        for (const item of items) {
            const block = buildPromoBlock(item.sport, `https://bet.example.com/${item.sport}`, demoConfig.emojiBySport);
            expect(item.description).toBe(`${DEMO_SUMMARY}\n\n${block}`);
        }

        expect(Array.from(result.bySport.keys())).toEqual(['npb', 'jleague', 'keiba', 'mlb']);
        expect(result.bySport.get('keiba')?.items.map(item => item.link)).toEqual([
            'https://example.com/demo/keiba/3',
            'https://example.com/demo/keiba/2',
            'https://example.com/demo/keiba/1'
        ]);
        expect(result.reports.map(report => [report.status, report.format, report.kept])).toEqual([
            ['ok', 'demo', 3], ['ok', 'demo', 3], ['ok', 'demo', 3], ['ok', 'demo', 3]
        ]);
    });

    it('keeps going when a source is unavailable', async () => {
        const fetchText: FetchText = async url => {
            if (url.includes('npb')) throw new SourceUnavailableError(`HTTP 503 fetching ${url}`, 503);
            return { body: MLB_RSS, contentType: 'application/rss+xml' };
        };
        const result = await runPipeline(liveConfig, { clock, fetchText });

        expect(result.combined.items.map(item => item.title)).toEqual(['[MLB] ダルビッシュ 7回無失点', '[MLB] 大谷 第50号']);
        expect(result.bySport.get('npb')?.items).toEqual([]);
        expect(result.reports[0]).toMatchObject({
            feed: 'NPB',
            status: 'error',
            error: 'HTTP 503 fetching https://feeds.example.com/npb.xml',
            kept: 0
        });
        expect(result.reports[1]).toMatchObject({ feed: 'MLB', status: 'ok', format: 'rss2', fetchedRaw: 2, kept: 2, skipped: 0, error: null });
    });

    it('reports an unusable document as a failed source', async () => {
        const fetchText: FetchText = async url => (
            url.includes('npb') ? { body: '<html><body>maintenance</body></html>' } : { body: MLB_RSS }
        );
        const result = await runPipeline(liveConfig, { clock, fetchText });

        expect(result.reports[0]).toMatchObject({ status: 'error', error: 'Unsupported feed root element <html>' });
        expect(result.combined.items).toHaveLength(2);
    });

    it('drops duplicates and items seen in earlier runs', async () => {
        const config = parseConfig({
            feeds: [
                { sport: 'mlb', name: 'MLB A', url: 'https://feeds.example.com/mlb-a.xml', target_url: 'https://bet.example.com/mlb' },
                { sport: 'mlb', name: 'MLB B', url: 'https://feeds.example.com/mlb-b.xml', target_url: 'https://bet.example.com/mlb' }
            ]
        });
        const fetchText: FetchText = async () => ({ body: MLB_RSS });
        const cache = new MemorySeenCache(['mlb:mlb-1']);

        const result = await runPipeline(config, { clock, fetchText, cache });

        expect(result.duplicateCount).toBe(2);
        expect(result.previouslySeenCount).toBe(1);
        expect(result.combined.items.map(item => item.title)).toEqual(['[MLB A] ダルビッシュ 7回無失点']);
        // recording is left to whoever publishes the result
        expect(cache.keys()).toEqual(['mlb:mlb-1']);
    });

    it('orders equal timestamps by encounter order across interleaved sources', async () => {
        const config = parseConfig({
            feeds: [
                { sport: 'npb', name: 'A', url: 'https://feeds.example.com/a.xml', target_url: 'https://bet.example.com/npb' },
                { sport: 'mlb', name: 'B', url: 'https://feeds.example.com/b.xml', target_url: 'https://bet.example.com/mlb' },
                { sport: 'npb', name: 'C', url: 'https://feeds.example.com/c.xml', target_url: 'https://bet.example.com/npb' }
            ]
        });
        const fetchText: FetchText = async url => {
            const id = url.slice(url.lastIndexOf('/') + 1, -'.xml'.length);
            return {
                body: `<rss version="2.0"><channel><title>${id}</title><item><title>${id} 0</title>` +
                    `<link>https://news.example.com/${id}/0</link><pubDate>Mon, 19 Oct 2026 09:00:00 +0900</pubDate>` +
                    '</item></channel></rss>'
            };
        };

        const result = await runPipeline(config, { clock, fetchText });

        expect(result.combined.items.map(item => item.title)).toEqual(['[A] a 0', '[B] b 0', '[C] c 0']);
        expect(result.bySport.get('npb')?.items.map(item => item.title)).toEqual(['[A] a 0', '[C] c 0']);
    });
});
