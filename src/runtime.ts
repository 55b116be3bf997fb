import type { Config } from './config.js';
import { createEmbedding } from './embedding/factory.js';
import { QdrantVectorIndex } from './vectordb/qdrant.js';
import { bootstrapQdrant } from './infra/qdrant-bootstrap.js';
import { RecordStore } from './records/store.js';
import { BackupScheduler } from './backup/scheduler.js';
import { MemoryService } from './memory/service.js';
import { DisabledSummaryGenerator, LlmSummaryGenerator } from './memory/summarizer.js';
import type { SummaryGenerator } from './memory/summarizer.js';
import { resolveSummaryApiKey } from './memory/llm.js';
import { getBackupDir, getDataDir, getRecordDbPath } from './paths.js';

export interface Runtime {
  records: RecordStore;
  vectors: QdrantVectorIndex;
  backups: BackupScheduler;
  service: MemoryService;
}

function createSummarizer(config: Config): SummaryGenerator {
  if (!resolveSummaryApiKey(config)) {
    console.warn(
      `No API key for summary provider "${config.summaryLlmProvider}". Memories are stored without summaries.`,
    );
    return new DisabledSummaryGenerator();
  }
  return new LlmSummaryGenerator();
}

/**
 * Wire the stores, the summary generator and the backup scheduler from config.
 * Starts a local Qdrant container when the configured one is unreachable.
 */
export async function createRuntime(config: Config): Promise<Runtime> {
  const embedding = createEmbedding(config);
  await embedding.initialize();

  const qdrantUrl = await bootstrapQdrant();
  const vectors = new QdrantVectorIndex(embedding, {
    url: qdrantUrl,
    apiKey: config.qdrantApiKey,
    prefix: config.collectionPrefix,
  });
  console.log(`Using Qdrant at ${qdrantUrl}`);

  const dataDir = getDataDir();
  const records = new RecordStore(getRecordDbPath());
  const backups = new BackupScheduler({
    dataDir,
    backupDir: getBackupDir(),
    intervalHours: config.backupIntervalHours,
    retentionCount: config.backupRetentionCount,
    enabled: config.enableAutoBackup,
    prepare: () => records.checkpoint(),
  });

  const service = new MemoryService(records, vectors, createSummarizer(config), {
    thresholds: { tiny: config.tinyContentThreshold, small: config.smallContentThreshold },
    dataDir,
    defaultMaxResults: config.defaultMaxResults,
    backup: backups,
  });

  return { records, vectors, backups, service };
}
