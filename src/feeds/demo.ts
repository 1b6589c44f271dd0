import { SPORT_PROFILES } from './config.js';
import { Clock, FeedSource, RawEntry } from '../types/index.js';

export const DEMO_STEP_MINUTES = 7;
export const DEMO_SUMMARY = '（デモ）これはテスト用のニュース要約です。実運用では実際の記事の概要が入ります。';

export interface DemoOptions {
    perSport: number;
    clock: Clock;
}

/**
 * Synthesize entries for a source without touching the network. Titles and
 * links are distinct per sport; timestamps increase by DEMO_STEP_MINUTES and
 * the last entry is stamped with clock().
 */
export function generateDemoEntries(source: FeedSource, { perSport, clock }: DemoOptions): RawEntry[] {
    const profile = SPORT_PROFILES[source.sport];
    const now = clock().getTime();
    const count = Math.max(0, Math.floor(perSport));
    const entries: RawEntry[] = [];

    for (let i = 0; i < count; i++) {
        const title = profile.demoTitles[i] ?? `${profile.label} デモニュース ${i + 1}`;
        const published = new Date(now - (count - 1 - i) * DEMO_STEP_MINUTES * 60 * 1000);
        entries.push({
            title,
            link: `https://example.com/demo/${source.sport}/${i + 1}`,
            description: DEMO_SUMMARY,
            published: published.toISOString()
        });
    }

    return entries;
}
