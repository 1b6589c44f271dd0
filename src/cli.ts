import * as path from 'path';
import { buildStaticFeeds, FeedWriter, FileFeedWriter } from './build/static.js';
import { DEFAULT_DEMO_PER_SPORT, DEFAULT_OUTPUT_DIR, loadConfig, withDemoSources } from './feeds/config.js';
import { ConfigError, errorMessage } from './feeds/errors.js';
import { log } from './server/logging.js';
import { FileSeenCache } from './store/storage.js';
import { Clock } from './types/index.js';

export interface CliOptions {
    demo: boolean;
    perSport: number;
    configPath: string;
    outDir: string;
    seenCachePath: string | null;
    help: boolean;
}

export const USAGE = `Usage: rssfeed [--demo] [--per-sport N] [--config PATH] [--out DIR] [--seen-cache PATH]

  --demo             generate demo items instead of fetching feeds
  --per-sport N      demo items per sport (default ${DEFAULT_DEMO_PER_SPORT})
  --config PATH      feed configuration (default config.json, or CONFIG_PATH)
  --out DIR          output directory (default ${DEFAULT_OUTPUT_DIR}, or OUTPUT_DIR)
  --seen-cache PATH  remember guids across runs in this JSON file`;

export function parseCliArgs(args: string[], env: NodeJS.ProcessEnv = process.env): CliOptions {
    const valueOf = (flag: string): string | undefined => {
        const index = args.indexOf(flag);
        if (index === -1) return undefined;
        const value = args[index + 1];
        if (value === undefined || value.startsWith('--')) {
            throw new ConfigError(`${flag} needs a value`);
        }
        return value;
    };

    const perSportArg = valueOf('--per-sport');
    const perSport = perSportArg === undefined ? DEFAULT_DEMO_PER_SPORT : Number(perSportArg);
    if (!Number.isInteger(perSport) || perSport < 0) {
        throw new ConfigError(`--per-sport must be a non-negative integer, got "${perSportArg}"`);
    }

    return {
        demo: args.includes('--demo') || env.DEMO === 'true',
        perSport,
        configPath: valueOf('--config') ?? env.CONFIG_PATH ?? 'config.json',
        outDir: valueOf('--out') ?? env.OUTPUT_DIR ?? DEFAULT_OUTPUT_DIR,
        seenCachePath: valueOf('--seen-cache') ?? env.SEEN_CACHE_PATH ?? null,
        help: args.includes('--help') || args.includes('-h')
    };
}

export interface MainDeps {
    clock?: Clock;
    writer?: FeedWriter;
}

// Returns the process exit code
export async function main(args: string[], deps: MainDeps = {}): Promise<number> {
    let options: CliOptions;
    try {
        options = parseCliArgs(args);
    } catch (err) {
        console.error(errorMessage(err));
        console.error(USAGE);
        return 1;
    }

    if (options.help) {
        console.log(USAGE);
        return 0;
    }

    try {
        const loaded = loadConfig(path.resolve(options.configPath));
        const config = options.demo ? withDemoSources(loaded) : loaded;
        const cache = options.seenCachePath ? FileSeenCache.load(options.seenCachePath, { clock: deps.clock }) : undefined;

        const summary = await buildStaticFeeds(config, {
            clock: deps.clock,
            perSport: options.perSport,
            cache,
            writer: deps.writer ?? new FileFeedWriter(path.resolve(options.outDir))
        });
        cache?.save();

        for (const feed of summary.feeds) {
            console.log(`Wrote ${path.join(options.outDir, feed.fileName)} (${feed.itemCount} items)`);
        }
        return 0;
    } catch (err) {
        log('error', 'Static build failed', {
            error: errorMessage(err),
            stack: err instanceof Error && !(err instanceof ConfigError) ? err.stack : undefined
        });
        return 1;
    }
}
