import os from 'node:os';
import path from 'node:path';
import { z } from 'zod';
import { ConfigError } from './errors.js';

const unquote = (val: unknown) =>
  typeof val === 'string' ? val.trim().replace(/^(['"])(.*)\1$/, '$2') : val;

const envBoolean = (fallback: boolean) =>
  z.preprocess((val) => {
    if (typeof val !== 'string' || val.trim() === '') return undefined;
    const normalized = val.trim().toLowerCase();
    if (['true', '1', 'yes'].includes(normalized)) return true;
    if (['false', '0', 'no'].includes(normalized)) return false;
    return val;
  }, z.boolean().default(fallback));

const SUMMARY_MODEL_DEFAULTS = {
  openrouter: 'openai/gpt-4o-mini',
  openai: 'gpt-4o-mini',
  anthropic: 'claude-3-5-haiku-latest',
  ollama: 'llama3.2',
} as const;

const configSchema = z.object({
  dataDir: z.string().default(path.join(os.homedir(), '.strata')),
  tinyContentThreshold: z.coerce.number().int().min(1).default(500),
  smallContentThreshold: z.coerce.number().int().min(2).default(2000),
  defaultMaxResults: z.coerce.number().int().min(1).max(100).default(5),

  embeddingProvider: z.enum(['openai', 'ollama', 'local']).default('openai'),
  openaiApiKey: z.preprocess(unquote, z.string().default('')),
  openaiBaseUrl: z.string().optional(),
  ollamaBaseUrl: z.string().default('http://localhost:11434/v1'),
  embeddingModel: z.string().optional(),
  embeddingBatchSize: z.coerce.number().int().min(1).max(2048).default(100),

  qdrantUrl: z.string().default('http://localhost:6333'),
  qdrantApiKey: z.string().optional(),
  collectionPrefix: z.string().regex(/^[a-z0-9_]+$/, 'lowercase letters, digits and underscores only').default('strata'),

  summaryLlmProvider: z.enum(['openrouter', 'openai', 'anthropic', 'ollama']).default('openrouter'),
  summaryLlmModel: z.string().optional(),
  summaryLlmApiKey: z.preprocess(unquote, z.string().optional()),
  summaryLlmBaseUrl: z.string().optional(),
  openrouterApiKey: z.preprocess(unquote, z.string().optional()),
  openrouterEndpoint: z.string().default('https://openrouter.ai/api/v1'),
  anthropicApiKey: z.preprocess(unquote, z.string().optional()),
  summaryTimeoutMs: z.coerce.number().int().min(1000).default(30_000),

  enableAutoBackup: envBoolean(true),
  backupIntervalHours: z.coerce.number().min(0).default(24),
  backupRetentionCount: z.coerce.number().int().min(1).default(10),
  backupPath: z.string().default(path.join(os.homedir(), '.strata-backups')),
}).refine((cfg) => cfg.tinyContentThreshold < cfg.smallContentThreshold, {
  message: 'TINY_CONTENT_THRESHOLD must be lower than SMALL_CONTENT_THRESHOLD',
  path: ['tinyContentThreshold'],
}).transform((cfg) => ({
  ...cfg,
  // Default embedding model depends on provider
  embeddingModel: cfg.embeddingModel
    ?? (cfg.embeddingProvider === 'ollama' ? 'nomic-embed-text' : 'text-embedding-3-small'),
  summaryLlmModel: cfg.summaryLlmModel ?? SUMMARY_MODEL_DEFAULTS[cfg.summaryLlmProvider],
}));

export type Config = z.infer<typeof configSchema>;

let cachedConfig: Config | null = null;

export function loadConfig(): Config {
  const raw = {
    dataDir: process.env.STRATA_DATA_DIR || undefined,
    tinyContentThreshold: process.env.TINY_CONTENT_THRESHOLD || undefined,
    smallContentThreshold: process.env.SMALL_CONTENT_THRESHOLD || undefined,
    defaultMaxResults: process.env.DEFAULT_MAX_RESULTS || undefined,
    embeddingProvider: process.env.EMBEDDING_PROVIDER || undefined,
    openaiApiKey: process.env.OPENAI_API_KEY ?? '',
    openaiBaseUrl: process.env.OPENAI_BASE_URL || undefined,
    ollamaBaseUrl: process.env.OLLAMA_BASE_URL || undefined,
    embeddingModel: process.env.EMBEDDING_MODEL || undefined,
    embeddingBatchSize: process.env.EMBEDDING_BATCH_SIZE || undefined,
    qdrantUrl: process.env.QDRANT_URL || undefined,
    qdrantApiKey: process.env.QDRANT_API_KEY || undefined,
    collectionPrefix: process.env.COLLECTION_PREFIX || undefined,
    summaryLlmProvider: process.env.SUMMARY_LLM_PROVIDER || undefined,
    summaryLlmModel: process.env.SUMMARY_LLM_MODEL || undefined,
    summaryLlmApiKey: process.env.SUMMARY_LLM_API_KEY || undefined,
    summaryLlmBaseUrl: process.env.SUMMARY_LLM_BASE_URL || undefined,
    openrouterApiKey: process.env.OPENROUTER_API_KEY || undefined,
    openrouterEndpoint: process.env.OPENROUTER_ENDPOINT || undefined,
    anthropicApiKey: process.env.ANTHROPIC_API_KEY || undefined,
    summaryTimeoutMs: process.env.SUMMARY_TIMEOUT_MS || undefined,
    enableAutoBackup: process.env.ENABLE_AUTO_BACKUP,
    backupIntervalHours: process.env.BACKUP_INTERVAL_HOURS || undefined,
    backupRetentionCount: process.env.BACKUP_RETENTION_COUNT || undefined,
    backupPath: process.env.BACKUP_PATH || undefined,
  };

  const result = configSchema.safeParse(raw);
  if (!result.success) {
    const issues = result.error.issues.map(i => `  ${i.path.join('.')}: ${i.message}`).join('\n');
    throw new ConfigError(`Invalid configuration:\n${issues}`);
  }

  cachedConfig = result.data;
  return cachedConfig;
}

export function getConfig(): Config {
  if (!cachedConfig) {
    return loadConfig();
  }
  return cachedConfig;
}
