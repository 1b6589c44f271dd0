import * as fs from 'fs';
import { z } from 'zod';
import { ConfigError, errorMessage } from './errors.js';
import { FeedSource, RunConfig, Sport, SPORTS } from '../types/index.js';

// Headers sent with every feed request
export const FEED_HEADERS = {
  "User-Agent": "Mozilla/5.0 (compatible; jp-sports-enriched-rss/1.0)",
  "Accept": "application/rss+xml, application/atom+xml, application/xml, text/xml, */*",
  "Accept-Language": "ja,en-US;q=0.8",
  "Cache-Control": "no-cache"
};

export const DEFAULT_TIMEOUT_MS = 10000;
export const MAX_FEED_BYTES = 5 * 1024 * 1024;
export const DEFAULT_DEMO_PER_SPORT = 3;
export const DEFAULT_OUTPUT_DIR = 'docs';
export const COMBINED_FEED_FILE = 'feed.xml';
export const HEALTH_REPORT_FILE = 'feed-health.json';

export interface SportProfile {
  label: string;
  fileName: string;
  emoji: string;
  demoTitles: string[];
}

// One entry per sport; adding a sport to SPORTS without a profile does not compile
export const SPORT_PROFILES: Record<Sport, SportProfile> = {
  npb: {
    label: 'NPB',
    fileName: 'npb.xml',
    emoji: '⚾',
    demoTitles: ['阪神 vs 巨人 きょう18:00 先発発表', '広島が接戦を制す、終盤で逆転', 'パ・リーグ投手戦 注目ポイント']
  },
  jleague: {
    label: 'JLEAGUE',
    fileName: 'jleague.xml',
    emoji: '⚽',
    demoTitles: ['浦和 vs 川崎F プレビュー', '神戸、首位攻防戦を制す', '横浜FM 新戦力が躍動']
  },
  keiba: {
    label: 'KEIBA',
    fileName: 'keiba.xml',
    emoji: '🏇',
    demoTitles: ['セントライト記念 展望', '重賞トリプルトレンド：注目馬3頭', '今週の追い切り評価']
  },
  mlb: {
    label: 'MLB',
    fileName: 'mlb.xml',
    emoji: '🧢',
    demoTitles: ['ドジャース 大谷がマルチ安打', 'パドレス ダルビッシュ復帰登板', 'カブス 鈴木誠也が決勝打']
  }
};

const sportSchema = z.enum(SPORTS);

const feedSchema = z.object({
  sport: sportSchema,
  name: z.string().min(1).optional(),
  url: z.string().url().nullable().optional(),
  demo: z.boolean().optional(),
  target_url: z.string().url(),
  title_prefix: z.string().nullable().optional(),
  max_items: z.number().int().positive().nullable().optional()
}).refine(feed => feed.demo === true || !!feed.url, {
  message: 'url is required unless demo is true',
  path: ['url']
});

const configSchema = z.object({
  feed_title: z.string().min(1).default('JP Sports Betting Digest'),
  feed_link: z.string().url().default('https://example.com/feed.xml'),
  feed_description: z.string().default(''),
  language: z.string().min(1).default('ja'),
  emoji_by_sport: z.record(z.string()).default({}),
  max_items_per_sport: z.number().int().positive().nullable().default(null),
  timeout_ms: z.number().int().positive().optional(),
  feeds: z.array(feedSchema).min(1)
});

export type RawConfig = z.input<typeof configSchema>;

function timeoutFromEnv(): number | undefined {
  const value = process.env.FEED_TIMEOUT_MS;
  if (!value) return undefined;
  const parsed = parseInt(value, 10);
  return Number.isFinite(parsed) && parsed > 0 ? parsed : undefined;
}

export function parseConfig(raw: unknown): RunConfig {
  const result = configSchema.safeParse(raw);
  if (!result.success) {
    throw new ConfigError(
      'Invalid feed configuration',
      result.error.issues.map(issue => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
    );
  }
  const cfg = result.data;

  const emojiFor = (sport: Sport): string => cfg.emoji_by_sport[sport] ?? SPORT_PROFILES[sport].emoji;
  const emojiBySport: Record<Sport, string> = {
    npb: emojiFor('npb'),
    jleague: emojiFor('jleague'),
    keiba: emojiFor('keiba'),
    mlb: emojiFor('mlb')
  };

  const feeds: FeedSource[] = cfg.feeds.map(feed => ({
    name: feed.name ?? SPORT_PROFILES[feed.sport].label,
    sport: feed.sport,
    url: feed.url ?? null,
    demo: feed.demo ?? false,
    link: feed.target_url,
    titlePrefix: feed.title_prefix === undefined ? (feed.name ?? SPORT_PROFILES[feed.sport].label) : feed.title_prefix,
    maxItems: feed.max_items ?? null
  }));

  return {
    feedTitle: cfg.feed_title,
    feedLink: cfg.feed_link,
    feedDescription: cfg.feed_description,
    language: cfg.language,
    emojiBySport,
    maxItemsPerSport: cfg.max_items_per_sport,
    timeoutMs: timeoutFromEnv() ?? cfg.timeout_ms ?? DEFAULT_TIMEOUT_MS,
    feeds
  };
}

export function loadConfig(configPath: string): RunConfig {
  let text: string;
  try {
    text = fs.readFileSync(configPath, 'utf8');
  } catch (err) {
    throw new ConfigError(`Cannot read config file ${configPath}`, [errorMessage(err)]);
  }

  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (err) {
    throw new ConfigError(`Config file ${configPath} is not valid JSON`, [errorMessage(err)]);
  }
  return parseConfig(raw);
}

// Demo runs substitute the generator for every configured source
export function withDemoSources(config: RunConfig): RunConfig {
  return {
    ...config,
    feeds: config.feeds.map(feed => ({ ...feed, demo: true }))
  };
}
