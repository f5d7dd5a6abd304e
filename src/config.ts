import { z } from 'zod';
import dotenv from 'dotenv';
import fs from 'fs';
import path from 'path';
import { fileURLToPath } from 'url';

dotenv.config();

const __dirname = path.dirname(fileURLToPath(import.meta.url));
const rootPath = path.join(__dirname, '..');

// Helper for Boolean
const bool = (defaultValue: 'true' | 'false') =>
  z.enum(['true', 'false'])
   .default(defaultValue)
   .transform(val => val === 'true');

// Helper for numeric env values
const int = (defaultValue: number) =>
  z.coerce.number().int().nonnegative().default(defaultValue);

const ratio = (defaultValue: number) =>
  z.coerce.number().min(0).max(1).default(defaultValue);

const resolvePath = (defaultValue: string) =>
  z.string()
   .default(defaultValue)
   .transform(val => path.isAbsolute(val) ? val : path.join(rootPath, val));

// Configuration Schema
const configSchema = z.object({
  youtube: z.object({
    apiKey: z.string().optional(),
    baseUrl: z.string().url().default('https://www.googleapis.com/youtube/v3'),
    timeoutMs: int(30000),
    pageSize: int(50),
    commentPageSize: int(100),
    maxPagesPerRun: int(20),
    requestsPerMinute: int(60),
  }),

  retry: z.object({
    maxAttempts: int(4),
    baseDelayMs: int(1000),
    maxDelayMs: int(30000),
  }),

  // Run ledger
  staleRunMinutes: int(120),
  concurrency: z.coerce.number().int().min(1).default(1),
  retentionDays: int(30),

  authenticity: z.object({
    suspicionThreshold: z.coerce.number().min(0).max(100).default(70),
    burstWindowSeconds: int(60),
    peerWindowDays: int(30),
    nearDuplicateThreshold: z.coerce.number().min(0.5).max(0.999).default(0.9),
    whitelistAdjustment: z.coerce.number().min(0).max(100).default(15),
  }),

  quality: z.object({
    nullCriticalTolerance: int(0),
    maxOutlierRatio: ratio(0.05),
    outlierZScore: z.coerce.number().positive().default(3),
  }),

  cron: z.string().default('15 0 * * *'),

  // Server
  port: z.coerce.number().int().positive().default(3000),
  logLevel: z.enum(['error', 'warn', 'info', 'debug']).default('info'),
  logToFile: bool('true'),

  // Paths
  paths: z.object({
    root: z.string().default(rootPath),
    data: z.string().default(path.join(rootPath, 'data')),
    logs: z.string().default(path.join(rootPath, 'logs')),
    database: resolvePath('data/engagement.db'),
    channels: resolvePath('config/channels.json'),
  }),
});

export type AppConfig = z.infer<typeof configSchema>;

// Validate Environment
const rawConfig = {
  youtube: {
    apiKey: process.env.YOUTUBE_API_KEY || undefined,
    baseUrl: process.env.YOUTUBE_BASE_URL,
    timeoutMs: process.env.YOUTUBE_TIMEOUT_MS,
    pageSize: process.env.YOUTUBE_PAGE_SIZE,
    commentPageSize: process.env.YOUTUBE_COMMENT_PAGE_SIZE,
    maxPagesPerRun: process.env.YOUTUBE_MAX_PAGES,
    requestsPerMinute: process.env.YOUTUBE_RPM,
  },

  retry: {
    maxAttempts: process.env.RETRY_MAX_ATTEMPTS,
    baseDelayMs: process.env.RETRY_BASE_DELAY_MS,
    maxDelayMs: process.env.RETRY_MAX_DELAY_MS,
  },

  staleRunMinutes: process.env.STALE_RUN_MINUTES,
  concurrency: process.env.ETL_CONCURRENCY,
  retentionDays: process.env.RETENTION_DAYS,

  authenticity: {
    suspicionThreshold: process.env.AUTHENTICITY_THRESHOLD,
    burstWindowSeconds: process.env.AUTHENTICITY_BURST_WINDOW_SECONDS,
    peerWindowDays: process.env.AUTHENTICITY_PEER_WINDOW_DAYS,
    nearDuplicateThreshold: process.env.AUTHENTICITY_DUPLICATE_THRESHOLD,
    whitelistAdjustment: process.env.AUTHENTICITY_WHITELIST_ADJUSTMENT,
  },

  quality: {
    nullCriticalTolerance: process.env.QUALITY_NULL_TOLERANCE,
    maxOutlierRatio: process.env.QUALITY_MAX_OUTLIER_RATIO,
    outlierZScore: process.env.QUALITY_OUTLIER_Z,
  },

  cron: process.env.ETL_CRON,

  port: process.env.PORT,
  logLevel: process.env.LOG_LEVEL,
  logToFile: process.env.LOG_TO_FILE,

  paths: {
    database: process.env.DATABASE_PATH,
    channels: process.env.CHANNELS_FILE,
  },
};

const parsed = configSchema.safeParse(rawConfig);

if (!parsed.success) {
  console.error('❌ Invalid Configuration:', JSON.stringify(parsed.error.format(), null, 2));
  process.exit(1);
}

export const config: Readonly<AppConfig> = Object.freeze(parsed.data);

// ============================================================================
// CHANNEL LIST
// ============================================================================

const channelSchema = z.object({
  id: z.string().min(1),
  name: z.string().min(1),
  contentType: z.string().min(1).default('general'),
});

export type Channel = Readonly<z.infer<typeof channelSchema>>;

const channelListSchema = z.array(channelSchema).superRefine((channels, ctx) => {
  const seen = new Set<string>();
  channels.forEach((channel, index) => {
    if (seen.has(channel.id)) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, path: [index, 'id'], message: `Duplicate channel id ${channel.id}` });
    }
    seen.add(channel.id);
  });
});

export function parseChannels(input: unknown): readonly Channel[] {
  const channels = channelListSchema.parse(input);
  return Object.freeze(channels.map(channel => Object.freeze({ ...channel })));
}

export function loadChannels(filePath: string = config.paths.channels): readonly Channel[] {
  const raw: unknown = JSON.parse(fs.readFileSync(filePath, 'utf8'));
  return parseChannels(raw);
}
