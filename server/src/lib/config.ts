import { z } from 'zod';

function positiveInt(fallback: number, max?: number) {
  return z
    .string()
    .optional()
    .transform((raw) => {
      const parsed = Number.parseInt(raw ?? '', 10);
      const value = Number.isFinite(parsed) && parsed > 0 ? parsed : fallback;
      return max === undefined ? value : Math.min(value, max);
    });
}

function envBool(fallback: boolean) {
  return z
    .string()
    .optional()
    .transform((raw) => {
      if (raw === undefined || raw.trim() === '') return fallback;
      return ['1', 'true', 'yes', 'on'].includes(raw.trim().toLowerCase());
    });
}

function csvList(fallback: string[]) {
  return z
    .string()
    .optional()
    .transform((raw) => {
      if (raw === undefined) return fallback;
      return raw.split(',').map((item) => item.trim()).filter(Boolean);
    });
}

const optionalSecret = z
  .string()
  .optional()
  .transform((raw) => (raw && raw.trim() ? raw.trim() : undefined));

const envSchema = z.object({
  NODE_ENV: z.string().default('development'),
  PORT: positiveInt(3001),
  STORE_BACKEND: z.enum(['supabase', 'memory']).default('supabase'),

  SUPABASE_URL: optionalSecret,
  SUPABASE_SERVICE_ROLE_KEY: optionalSecret,
  SUPABASE_CLIENTS_TABLE: z.string().default('clients'),
  SUPABASE_AUDIENCE_TABLE: z.string().default('audience_records'),

  APIFY_API_TOKEN: optionalSecret,
  APIFY_BASE_URL: z.string().url().default('https://api.apify.com/v2'),
  APIFY_ACTOR_INSTAGRAM: z.string().default('apify~instagram-hashtag-scraper'),
  APIFY_ACTOR_LINKEDIN: z.string().default('curious_coder~linkedin-profile-scraper'),
  APIFY_ACTOR_FACEBOOK: z.string().default('apify~facebook-pages-scraper'),
  PROFILE_SOURCE_SEED_TERMS_INSTAGRAM: csvList(['makeup', 'beauty', 'cosmetics', 'skincare', 'makeupartist']),
  PROFILE_SOURCE_SEED_TERMS_LINKEDIN: csvList(['cosmetics industry', 'beauty marketing', 'skincare specialist']),
  PROFILE_SOURCE_SEED_TERMS_FACEBOOK: csvList(['beauty blogger', 'makeup artist', 'skincare enthusiast']),
  PROFILE_SOURCE_TIMEOUT_MS: positiveInt(180_000),

  LLM_PROVIDER: z
    .string()
    .optional()
    .transform((raw) => raw?.trim().toLowerCase()),
  OPENAI_API_KEY: optionalSecret,
  OPENAI_BASE_URL: z.string().url().default('https://api.openai.com/v1'),
  OPENAI_MODEL: z.string().default('gpt-4o-mini'),
  ANTHROPIC_API_KEY: optionalSecret,
  ANTHROPIC_MODEL: z.string().default('claude-3-5-haiku-latest'),
  GENERATION_MAX_TOKENS: positiveInt(800),
  GENERATION_TEMPERATURE: z.coerce.number().min(0).max(2).default(0.7),
  GENERATION_TIMEOUT_MS: positiveInt(60_000),
  CHAIN_MAX_ITERATIONS: positiveInt(3, 3),

  JOB_CONCURRENCY: positiveInt(3),
  TASK_GRACE_PERIOD_MS: positiveInt(300_000),
  INGESTION_SCHEDULER_ENABLED: envBool(true),
  INGESTION_INTERVAL_MINUTES: positiveInt(360),
});

export type LlmProviderName = 'openai' | 'anthropic';

export interface AppConfig {
  nodeEnv: string;
  isProduction: boolean;
  port: number;
  store: {
    backend: 'supabase' | 'memory';
    supabaseUrl?: string;
    supabaseServiceKey?: string;
    clientsTable: string;
    audienceTable: string;
  };
  profileSource: {
    apiToken?: string;
    baseUrl: string;
    timeoutMs: number;
    actors: Record<'instagram' | 'linkedin' | 'facebook', string>;
    seedTerms: Record<'instagram' | 'linkedin' | 'facebook', string[]>;
  };
  llm: {
    provider: LlmProviderName;
    openaiApiKey?: string;
    openaiBaseUrl: string;
    openaiModel: string;
    anthropicApiKey?: string;
    anthropicModel: string;
    maxTokens: number;
    temperature: number;
    timeoutMs: number;
  };
  chain: {
    maxIterations: number;
  };
  jobs: {
    concurrency: number;
    taskGracePeriodMs: number;
    schedulerEnabled: boolean;
    ingestionIntervalMs: number;
  };
}

function resolveProvider(configured: string | undefined, env: z.infer<typeof envSchema>): LlmProviderName {
  if (configured === 'openai' || configured === 'anthropic') return configured;
  // Anthropic only when it is the sole key configured.
  return env.ANTHROPIC_API_KEY && !env.OPENAI_API_KEY ? 'anthropic' : 'openai';
}

export function loadConfig(source: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = envSchema.safeParse(source);
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ');
    throw new Error(`Invalid environment configuration: ${issues}`);
  }
  const env = parsed.data;

  return {
    nodeEnv: env.NODE_ENV,
    isProduction: env.NODE_ENV === 'production',
    port: env.PORT,
    store: {
      backend: env.STORE_BACKEND,
      supabaseUrl: env.SUPABASE_URL,
      supabaseServiceKey: env.SUPABASE_SERVICE_ROLE_KEY,
      clientsTable: env.SUPABASE_CLIENTS_TABLE,
      audienceTable: env.SUPABASE_AUDIENCE_TABLE,
    },
    profileSource: {
      apiToken: env.APIFY_API_TOKEN,
      baseUrl: env.APIFY_BASE_URL.replace(/\/$/, ''),
      timeoutMs: env.PROFILE_SOURCE_TIMEOUT_MS,
      actors: {
        instagram: env.APIFY_ACTOR_INSTAGRAM,
        linkedin: env.APIFY_ACTOR_LINKEDIN,
        facebook: env.APIFY_ACTOR_FACEBOOK,
      },
      seedTerms: {
        instagram: env.PROFILE_SOURCE_SEED_TERMS_INSTAGRAM,
        linkedin: env.PROFILE_SOURCE_SEED_TERMS_LINKEDIN,
        facebook: env.PROFILE_SOURCE_SEED_TERMS_FACEBOOK,
      },
    },
    llm: {
      provider: resolveProvider(env.LLM_PROVIDER, env),
      openaiApiKey: env.OPENAI_API_KEY,
      openaiBaseUrl: env.OPENAI_BASE_URL.replace(/\/$/, ''),
      openaiModel: env.OPENAI_MODEL,
      anthropicApiKey: env.ANTHROPIC_API_KEY,
      anthropicModel: env.ANTHROPIC_MODEL,
      maxTokens: env.GENERATION_MAX_TOKENS,
      temperature: env.GENERATION_TEMPERATURE,
      timeoutMs: env.GENERATION_TIMEOUT_MS,
    },
    chain: {
      maxIterations: env.CHAIN_MAX_ITERATIONS,
    },
    jobs: {
      concurrency: env.JOB_CONCURRENCY,
      taskGracePeriodMs: env.TASK_GRACE_PERIOD_MS,
      schedulerEnabled: env.INGESTION_SCHEDULER_ENABLED,
      ingestionIntervalMs: env.INGESTION_INTERVAL_MINUTES * 60_000,
    },
  };
}

let cachedConfig: AppConfig | null = null;

export function getConfig(): AppConfig {
  if (!cachedConfig) {
    cachedConfig = loadConfig();
  }
  return cachedConfig;
}
