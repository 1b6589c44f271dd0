import axios from 'axios';
import { FEED_HEADERS, DEFAULT_TIMEOUT_MS, DEFAULT_DEMO_PER_SPORT, MAX_FEED_BYTES } from './config.js';
import { generateDemoEntries } from './demo.js';
import { FeedError, MalformedDocumentError, SourceUnavailableError, errorMessage } from './errors.js';
import { log } from '../server/logging.js';
import { Clock, FeedSource, FetchResult } from '../types/index.js';

export interface FetchedText {
    body: string;
    contentType?: string;
}

export type FetchText = (url: string, timeoutMs: number) => Promise<FetchedText>;

export interface FetchOptions {
    timeoutMs?: number;
    perSport?: number;
    clock?: Clock;
    fetchText?: FetchText;
}

/**
 * Single GET bounded in time and size. axios' `timeout` only watches socket
 * inactivity, so the abort signal caps the whole request. Non-2xx, network
 * errors and timeouts surface as SourceUnavailableError; an empty body as
 * MalformedDocumentError.
 */
export async function fetchFeedText(url: string, timeoutMs: number = DEFAULT_TIMEOUT_MS): Promise<FetchedText> {
    let body: unknown;
    let contentType: string | undefined;
    try {
        const response = await axios.get<string>(url, {
            timeout: timeoutMs,
            signal: AbortSignal.timeout(timeoutMs),
            maxContentLength: MAX_FEED_BYTES,
            headers: FEED_HEADERS,
            responseType: 'text',
            // keep the raw body; axios would otherwise try JSON.parse on it
            transformResponse: (data: unknown) => data,
            maxRedirects: 5
        });
        body = response.data;
        const header = response.headers['content-type'];
        contentType = typeof header === 'string' ? header : undefined;
    } catch (err) {
        const status = axios.isAxiosError(err) ? err.response?.status : undefined;
        const code = axios.isAxiosError(err) ? err.code : undefined;
        const reason = status
            ? `HTTP ${status}`
            : code === 'ECONNABORTED' || code === 'ETIMEDOUT' || code === 'ERR_CANCELED'
                ? `Timed out after ${timeoutMs}ms`
                : errorMessage(err);
        throw new SourceUnavailableError(`${reason} fetching ${url}`, status, { cause: err });
    }

    if (typeof body !== 'string' || !body.trim()) {
        throw new MalformedDocumentError(`Empty response body from ${url}`);
    }
    return { body, contentType };
}

export async function fetchFeedSource(source: FeedSource, options: FetchOptions = {}): Promise<FetchResult> {
    const start = Date.now();
    const meta = () => ({ feed: source.name, sport: source.sport, durationMs: Date.now() - start });

    if (source.demo) {
        const entries = generateDemoEntries(source, {
            perSport: options.perSport ?? DEFAULT_DEMO_PER_SPORT,
            clock: options.clock ?? (() => new Date())
        });
        return { status: 'ok', document: { kind: 'demo', entries }, meta: meta() };
    }

    if (!source.url) {
        return {
            status: 'error',
            error: { type: 'source_unavailable', message: 'No feed URL configured' },
            meta: meta()
        };
    }

    const fetchText = options.fetchText ?? fetchFeedText;
    try {
        const { body, contentType } = await fetchText(source.url, options.timeoutMs ?? DEFAULT_TIMEOUT_MS);
        return { status: 'ok', document: { kind: 'xml', body, contentType }, meta: meta() };
    } catch (err) {
        const message = errorMessage(err);
        log('warn', 'Feed source unavailable, skipping for this run', { feed: source.name, sport: source.sport, error: message });
        return {
            status: 'error',
            error: {
                type: err instanceof FeedError ? err.type : 'source_unavailable',
                message,
                httpStatus: err instanceof SourceUnavailableError ? err.httpStatus : undefined
            },
            meta: meta()
        };
    }
}

export async function fetchAllSources(sources: readonly FeedSource[], options: FetchOptions = {}): Promise<FetchResult[]> {
    // Sources share no state, so they are fetched concurrently; results keep configuration order
    return Promise.all(sources.map(source => fetchFeedSource(source, options)));
}
