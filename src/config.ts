import { z } from 'zod';
import { config as dotenvConfig } from 'dotenv';

dotenvConfig();

const flag = z.enum(['true', 'false']).default('false').transform((v) => v === 'true');
// blank counts as unset so an empty KEY= line in .env is not a credential
const optionalSecret = z.string().optional().transform((v) => v?.trim() || undefined);

export const EnvSchema = z.object({
  TTS_PROVIDER_ACTIVE:     z.string().default('edge'),
  CHANNELS_FILE:           z.string().default('config/channels.json'),
  ANTHROPIC_API_KEY:       optionalSecret,
  OPENAI_API_KEY:          optionalSecret,
  ELEVENLABS_API_KEY:      optionalSecret,
  PEXELS_API_KEY:          optionalSecret,
  TELEGRAM_BOT_TOKEN:      optionalSecret,
  TELEGRAM_CHAT_ID:        optionalSecret,
  ANTHROPIC_MODEL:         z.string().default('claude-sonnet-4-6'),
  OPENAI_MODEL:            z.string().default('gpt-4o-mini'),
  LLM_MAX_OUTPUT_TOKENS:   z.coerce.number().int().positive().default(256),
  LLM_TEMPERATURE:         z.coerce.number().min(0).max(2).default(0.7),
  LLM_MAX_PROMPT_CHARS:    z.coerce.number().int().positive().default(2000),
  LLM_CACHE_TTL_SECONDS:   z.coerce.number().int().nonnegative().default(3600),
  LLM_CACHE_PATH:          z.string().optional(),
  LLM_RPM_LIMIT:           z.coerce.number().int().min(1).default(3),
  LLM_TPM_LIMIT:           z.coerce.number().int().min(1).default(1000),
  LLM_RPD_LIMIT:           z.coerce.number().int().nonnegative().default(0), // 0 = no daily cap
  LLM_CONCURRENCY_LIMIT:   z.coerce.number().int().min(1).default(1),
  ELEVENLABS_MODEL_ID:     z.string().default('eleven_multilingual_v2'),
  ELEVENLABS_BASE_URL:     z.string().url().default('https://api.elevenlabs.io/v1'),
  ELEVENLABS_TIMEOUT_MS:   z.coerce.number().int().positive().default(60_000),
  EDGE_TTS_TIMEOUT_MS:     z.coerce.number().int().positive().default(60_000),
  TTS_WORKER_POOL_SIZE:    z.coerce.number().int().min(1).default(4),
  STAGE_MAX_ATTEMPTS:      z.coerce.number().int().min(1).default(3),
  STAGE_BACKOFF_BASE_MS:   z.coerce.number().int().nonnegative().default(500),
  STAGE_BACKOFF_FACTOR:    z.coerce.number().min(1).default(2),
  ASSETS_DIR:              z.string().default('./assets'),
  OUTPUT_DIR:              z.string().default('./output'),
  TEMP_DIR:                z.string().default('./temp'),
  ASSETS_AUTO_FETCH:       flag,
  ASSETS_THEME:            z.string().optional(),
  PEXELS_PER_PAGE:         z.coerce.number().int().min(1).max(80).default(6),
  FFMPEG_PATH:             z.string().default('ffmpeg'),
  VIDEO_RESOLUTION:        z.enum(['720p', '1080p', 'vertical']).default('1080p'),
  VIDEO_FPS:               z.coerce.number().int().positive().default(30),
  KEEP_FAILED_RUNS:        flag,
  LOG_LEVEL:  z.enum(['debug', 'info', 'warn', 'error']).default('info'),
  LOG_FORMAT: z.enum(['text', 'json']).default('text'),
});

export type Env = z.infer<typeof EnvSchema>;

export function parseEnv(source: Record<string, string | undefined>): Env {
  const parsed = EnvSchema.safeParse(source);
  if (!parsed.success) {
    const invalid = parsed.error.issues.map(i => i.path.join('.')).join(', ');
    throw new Error(`Invalid environment variables: ${invalid}`);
  }
  return parsed.data;
}

export const env = parseEnv(process.env);

export interface RetryPolicy {
  maxAttempts: number;
  baseDelayMs: number;
  backoffFactor: number;
}

export function retryPolicyFrom(e: Env): RetryPolicy {
  return {
    maxAttempts:   e.STAGE_MAX_ATTEMPTS,
    baseDelayMs:   e.STAGE_BACKOFF_BASE_MS,
    backoffFactor: e.STAGE_BACKOFF_FACTOR,
  };
}

export interface LlmRateLimits {
  requestsPerMinute: number;
  tokensPerMinute: number;
  requestsPerDay: number;
  maxConcurrent: number;
}

export function llmRateLimitsFrom(e: Env): LlmRateLimits {
  return {
    requestsPerMinute: e.LLM_RPM_LIMIT,
    tokensPerMinute:   e.LLM_TPM_LIMIT,
    requestsPerDay:    e.LLM_RPD_LIMIT,
    maxConcurrent:     e.LLM_CONCURRENCY_LIMIT,
  };
}

export const VIDEO_RESOLUTIONS = {
  '720p':     { width: 1280, height: 720 },
  '1080p':    { width: 1920, height: 1080 },
  'vertical': { width: 1080, height: 1920 },
} as const;

export type VideoResolution = keyof typeof VIDEO_RESOLUTIONS;
