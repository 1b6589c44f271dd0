import { describe, it, expect } from 'vitest';
import { computeGuid, normalizeUrl, siblingUrl } from './url-utils.js';

describe('normalizeUrl', () => {
    it('keeps absolute http(s) URLs', () => {
        expect(normalizeUrl(' https://news.example.com/a1?x=1 ')).toBe('https://news.example.com/a1?x=1');
    });

    it('rejects relative and non-http URLs', () => {
        expect(normalizeUrl('/a1')).toBe('');
        expect(normalizeUrl('ftp://news.example.com/a1')).toBe('');
        expect(normalizeUrl('')).toBe('');
    });
});

describe('computeGuid', () => {
    it('is a stable sha1 hex digest of the link', () => {
        const guid = computeGuid('https://news.example.com/a1');
        expect(guid).toMatch(/^[0-9a-f]{40}$/);
        expect(computeGuid('https://news.example.com/a1')).toBe(guid);
        expect(computeGuid('https://news.example.com/a2')).not.toBe(guid);
    });
});

describe('siblingUrl', () => {
    it('replaces the file name of the feed link', () => {
        expect(siblingUrl('https://example.com/jp-sports/feed.xml', 'npb.xml')).toBe('https://example.com/jp-sports/npb.xml');
    });

    it('appends to a bare origin', () => {
        expect(siblingUrl('https://example.com', 'mlb.xml')).toBe('https://example.com/mlb.xml');
        expect(siblingUrl('https://example.com/', 'mlb.xml')).toBe('https://example.com/mlb.xml');
    });
});
