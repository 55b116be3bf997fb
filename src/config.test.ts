import os from 'node:os';
import path from 'node:path';
import { describe, it, expect, vi, beforeEach } from 'vitest';

const CONFIG_ENV = [
  'STRATA_DATA_DIR',
  'TINY_CONTENT_THRESHOLD',
  'SMALL_CONTENT_THRESHOLD',
  'EMBEDDING_PROVIDER',
  'EMBEDDING_MODEL',
  'QDRANT_URL',
  'COLLECTION_PREFIX',
  'SUMMARY_LLM_PROVIDER',
  'SUMMARY_LLM_MODEL',
  'OPENROUTER_API_KEY',
  'ENABLE_AUTO_BACKUP',
  'BACKUP_INTERVAL_HOURS',
  'BACKUP_RETENTION_COUNT',
  'BACKUP_PATH',
];

// Must re-import loadConfig each test to avoid cached config
describe('loadConfig', () => {
  beforeEach(() => {
    vi.unstubAllEnvs();
    for (const name of CONFIG_ENV) vi.stubEnv(name, '');
    vi.stubEnv('OPENAI_API_KEY', 'test-key');
    // Reset module cache so cachedConfig is cleared
    vi.resetModules();
  });

  async function freshLoadConfig() {
    const mod = await import('./config.js');
    return mod.loadConfig;
  }

  it('uses default values', async () => {
    const config = (await freshLoadConfig())();
    expect(config.dataDir).toBe(path.join(os.homedir(), '.strata'));
    expect(config.tinyContentThreshold).toBe(500);
    expect(config.smallContentThreshold).toBe(2000);
    expect(config.embeddingModel).toBe('text-embedding-3-small');
    expect(config.qdrantUrl).toBe('http://localhost:6333');
    expect(config.collectionPrefix).toBe('strata');
    expect(config.summaryLlmProvider).toBe('openrouter');
    expect(config.summaryLlmModel).toBe('openai/gpt-4o-mini');
    expect(config.enableAutoBackup).toBe(true);
    expect(config.backupIntervalHours).toBe(24);
    expect(config.backupRetentionCount).toBe(10);
    expect(config.backupPath).toBe(path.join(os.homedir(), '.strata-backups'));
  });

  it('allows a missing API key (guard lives at server startup)', async () => {
    vi.stubEnv('OPENAI_API_KEY', '');
    const config = (await freshLoadConfig())();
    expect(config.openaiApiKey).toBe('');
  });

  it('defaults the embedding model for ollama', async () => {
    vi.stubEnv('EMBEDDING_PROVIDER', 'ollama');
    const config = (await freshLoadConfig())();
    expect(config.embeddingModel).toBe('nomic-embed-text');
  });

  it('strips surrounding quotes from API keys', async () => {
    vi.stubEnv('OPENAI_API_KEY', '"test-key"');
    vi.stubEnv('OPENROUTER_API_KEY', "'test-router-key'");
    const config = (await freshLoadConfig())();
    expect(config.openaiApiKey).toBe('test-key');
    expect(config.openrouterApiKey).toBe('test-router-key');
  });

  it('parses thresholds from env', async () => {
    vi.stubEnv('TINY_CONTENT_THRESHOLD', '100');
    vi.stubEnv('SMALL_CONTENT_THRESHOLD', '400');
    const config = (await freshLoadConfig())();
    expect(config.tinyContentThreshold).toBe(100);
    expect(config.smallContentThreshold).toBe(400);
  });

  it('rejects a tiny threshold that is not below the small one', async () => {
    vi.stubEnv('TINY_CONTENT_THRESHOLD', '2000');
    vi.stubEnv('SMALL_CONTENT_THRESHOLD', '2000');
    const loadConfig = await freshLoadConfig();
    expect(() => loadConfig()).toThrow('TINY_CONTENT_THRESHOLD must be lower than SMALL_CONTENT_THRESHOLD');
  });

  it('picks the summary model per provider', async () => {
    vi.stubEnv('SUMMARY_LLM_PROVIDER', 'anthropic');
    const config = (await freshLoadConfig())();
    expect(config.summaryLlmModel).toBe('claude-3-5-haiku-latest');
  });

  it('keeps an explicit summary model', async () => {
    vi.stubEnv('SUMMARY_LLM_PROVIDER', 'ollama');
    vi.stubEnv('SUMMARY_LLM_MODEL', 'mistral');
    const config = (await freshLoadConfig())();
    expect(config.summaryLlmModel).toBe('mistral');
  });

  it('parses boolean flags', async () => {
    vi.stubEnv('ENABLE_AUTO_BACKUP', 'false');
    expect((await freshLoadConfig())().enableAutoBackup).toBe(false);

    vi.resetModules();
    vi.stubEnv('ENABLE_AUTO_BACKUP', 'YES');
    expect((await freshLoadConfig())().enableAutoBackup).toBe(true);
  });

  it('rejects an unparsable boolean', async () => {
    vi.stubEnv('ENABLE_AUTO_BACKUP', 'sometimes');
    const loadConfig = await freshLoadConfig();
    expect(() => loadConfig()).toThrow('Invalid configuration');
  });

  it('rejects an invalid collection prefix', async () => {
    vi.stubEnv('COLLECTION_PREFIX', 'My-Memories');
    const loadConfig = await freshLoadConfig();
    expect(() => loadConfig()).toThrow('collectionPrefix: lowercase letters, digits and underscores only');
  });

  it('rejects an unknown summary provider', async () => {
    vi.stubEnv('SUMMARY_LLM_PROVIDER', 'cohere');
    const loadConfig = await freshLoadConfig();
    expect(() => loadConfig()).toThrow('summaryLlmProvider');
  });

  it('getConfig returns the cached config', async () => {
    const mod = await import('./config.js');
    const loaded = mod.loadConfig();
    expect(mod.getConfig()).toBe(loaded);
  });
});
