/**
 * URL and guid helpers shared by the normalizer and the aggregator.
 */

import { createHash } from 'crypto';

// Returns the canonical form of an absolute http(s) URL, or '' when the value is not one
export function normalizeUrl(urlStr: string): string {
    if (!urlStr) return '';
    try {
        const u = new URL(urlStr.trim());
        if (u.protocol !== 'http:' && u.protocol !== 'https:') return '';
        return u.toString();
    } catch {
        return '';
    }
}

export function computeGuid(link: string): string {
    return createHash('sha1').update(link).digest('hex');
}

// Sibling URL of a feed document, e.g. (".../feed.xml", "npb.xml") -> ".../npb.xml"
export function siblingUrl(feedLink: string, fileName: string): string {
    const slash = feedLink.lastIndexOf('/');
    const base = slash > feedLink.indexOf('//') + 1 ? feedLink.slice(0, slash) : feedLink.replace(/\/$/, '');
    return `${base}/${fileName}`;
}
