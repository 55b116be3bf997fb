import type { Config } from '../config.js';

export function makeConfig(overrides: Partial<Config> = {}): Config {
  return {
    dataDir: '/tmp/strata-test',
    tinyContentThreshold: 500,
    smallContentThreshold: 2000,
    defaultMaxResults: 5,
    embeddingProvider: 'openai',
    openaiApiKey: 'test-key',
    openaiBaseUrl: undefined,
    ollamaBaseUrl: 'http://localhost:11434/v1',
    embeddingModel: 'text-embedding-3-small',
    embeddingBatchSize: 100,
    qdrantUrl: 'http://localhost:6333',
    qdrantApiKey: undefined,
    collectionPrefix: 'strata',
    summaryLlmProvider: 'openrouter',
    summaryLlmModel: 'openai/gpt-4o-mini',
    summaryLlmApiKey: undefined,
    summaryLlmBaseUrl: undefined,
    openrouterApiKey: 'test-openrouter-key',
    openrouterEndpoint: 'https://openrouter.ai/api/v1',
    anthropicApiKey: undefined,
    summaryTimeoutMs: 30_000,
    enableAutoBackup: false,
    backupIntervalHours: 24,
    backupRetentionCount: 10,
    backupPath: '/tmp/strata-test-backups',
    ...overrides,
  };
}
