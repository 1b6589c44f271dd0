import { describe, it, expect } from 'vitest';
import { DEMO_SUMMARY, generateDemoEntries } from './demo.js';
import { FeedSource } from '../types/index.js';

const clock = () => new Date('2026-10-19T03:00:00Z');

const source: FeedSource = {
    name: 'NPB',
    sport: 'npb',
    url: null,
    demo: true,
    link: 'https://bet.example.com/npb',
    titlePrefix: 'NPB',
    maxItems: null
};

describe('generateDemoEntries', () => {
    it('creates entries with increasing timestamps ending at the clock', () => {
        const entries = generateDemoEntries(source, { perSport: 3, clock });

        expect(entries).toEqual([
            {
                title: '阪神 vs 巨人 きょう18:00 先発発表',
                link: 'https://example.com/demo/npb/1',
                description: DEMO_SUMMARY,
                published: '2026-10-19T02:46:00.000Z'
            },
            {
                title: '広島が接戦を制す、終盤で逆転',
                link: 'https://example.com/demo/npb/2',
                description: DEMO_SUMMARY,
                published: '2026-10-19T02:53:00.000Z'
            },
            {
                title: 'パ・リーグ投手戦 注目ポイント',
                link: 'https://example.com/demo/npb/3',
                description: DEMO_SUMMARY,
                published: '2026-10-19T03:00:00.000Z'
            }
        ]);
    });

    it('numbers entries past the canned titles', () => {
        const entries = generateDemoEntries({ ...source, sport: 'keiba' }, { perSport: 4, clock });
        expect(entries[3].title).toBe('KEIBA デモニュース 4');
        expect(entries[3].link).toBe('https://example.com/demo/keiba/4');
    });

    it('returns nothing for a zero count', () => {
        expect(generateDemoEntries(source, { perSport: 0, clock })).toEqual([]);
    });
});
