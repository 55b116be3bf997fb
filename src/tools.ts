import { z } from 'zod';
import type { MemoryService } from './memory/service.js';
import type { BackupScheduler } from './backup/scheduler.js';
import { RETRIEVAL_MODES, SUMMARY_LENGTHS, SUMMARY_STYLES } from './memory/types.js';
import { UsageError } from './errors.js';
import { errorResult, formatBackupList, jsonResult } from './format.js';
import type { ToolResult } from './format.js';

const tags = z.array(z.string()).optional();

const initializeArgs = z.object({ reset: z.boolean().default(false) });
const storeArgs = z.object({ content: z.string(), topic: z.string(), tags: tags.default([]) });
const retrieveArgs = z.object({
  query: z.string(),
  max_results: z.number().optional(),
  topic: z.string().optional(),
  return_type: z.enum(RETRIEVAL_MODES).default('full_text'),
});
const updateArgs = z.object({
  memory_id: z.string().min(1),
  content: z.string().optional(),
  topic: z.string().optional(),
  tags,
});
const deleteArgs = z.object({ memory_id: z.string().min(1) });
const deleteTopicArgs = z.object({ topic_name: z.string().min(1) });
const summarizeArgs = z.object({
  memory_id: z.string().optional(),
  query: z.string().optional(),
  topic: z.string().optional(),
  summary_type: z.enum(SUMMARY_STYLES).default('abstractive'),
  length: z.enum(SUMMARY_LENGTHS).default('medium'),
});
const reindexArgs = z.object({ reset: z.boolean().default(false) });

type Parsed<T> = { ok: true; value: T } | { ok: false; result: ToolResult };

function parseArgs<T extends z.ZodTypeAny>(schema: T, args: Record<string, unknown>): Parsed<z.output<T>> {
  const parsed = schema.safeParse(args);
  if (parsed.success) return { ok: true, value: parsed.data };
  const issues = parsed.error.issues.map(i => `"${i.path.join('.')}": ${i.message}`).join('; ');
  return { ok: false, result: errorResult(`Error: invalid arguments. ${issues}`) };
}

/**
 * Runs one operation at the tool boundary. Usage errors and anything else
 * thrown become isError results instead of protocol errors.
 */
async function guarded(label: string, fn: () => ToolResult | Promise<ToolResult>): Promise<ToolResult> {
  try {
    return await fn();
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    if (err instanceof UsageError) return errorResult(`Error: ${message}`);
    console.error(`${label} failed: ${message}`);
    return errorResult(`Error ${label}: ${message}`);
  }
}

export class ToolHandlers {
  constructor(
    private service: MemoryService,
    private backups: BackupScheduler,
  ) {}

  handleInitialize(args: Record<string, unknown>): Promise<ToolResult> {
    const parsed = parseArgs(initializeArgs, args);
    if (!parsed.ok) return Promise.resolve(parsed.result);
    return guarded('initializing', async () => jsonResult(await this.service.initialize(parsed.value.reset)));
  }

  handleStore(args: Record<string, unknown>): Promise<ToolResult> {
    const parsed = parseArgs(storeArgs, args);
    if (!parsed.ok) return Promise.resolve(parsed.result);
    const { content, topic, tags } = parsed.value;
    return guarded('storing memory', async () => jsonResult(await this.service.store(content, topic, tags)));
  }

  handleRetrieve(args: Record<string, unknown>): Promise<ToolResult> {
    const parsed = parseArgs(retrieveArgs, args);
    if (!parsed.ok) return Promise.resolve(parsed.result);
    const { query, max_results, topic, return_type } = parsed.value;
    return guarded('retrieving memories', async () => {
      const results = await this.service.retrieve(query, {
        maxResults: max_results,
        topic,
        returnType: return_type,
      });
      return jsonResult(results);
    });
  }

  handleUpdate(args: Record<string, unknown>): Promise<ToolResult> {
    const parsed = parseArgs(updateArgs, args);
    if (!parsed.ok) return Promise.resolve(parsed.result);
    const { memory_id, content, topic, tags } = parsed.value;
    return guarded('updating memory', async () =>
      jsonResult(await this.service.update(memory_id, { content, topic, tags })),
    );
  }

  handleDelete(args: Record<string, unknown>): Promise<ToolResult> {
    const parsed = parseArgs(deleteArgs, args);
    if (!parsed.ok) return Promise.resolve(parsed.result);
    return guarded('deleting memory', async () => jsonResult(await this.service.delete(parsed.value.memory_id)));
  }

  handleListTopics(): Promise<ToolResult> {
    return guarded('listing topics', () => jsonResult(this.service.listTopics()));
  }

  handleStatus(): Promise<ToolResult> {
    return guarded('reading status', async () => jsonResult(await this.service.getStatus()));
  }

  handleDeleteEmptyTopic(args: Record<string, unknown>): Promise<ToolResult> {
    const parsed = parseArgs(deleteTopicArgs, args);
    if (!parsed.ok) return Promise.resolve(parsed.result);
    return guarded('deleting topic', async () =>
      jsonResult(await this.service.deleteEmptyTopic(parsed.value.topic_name)),
    );
  }

  handleSummarize(args: Record<string, unknown>): Promise<ToolResult> {
    const parsed = parseArgs(summarizeArgs, args);
    if (!parsed.ok) return Promise.resolve(parsed.result);
    const { memory_id, query, topic, summary_type, length } = parsed.value;
    return guarded('summarizing', async () =>
      jsonResult(
        await this.service.summarize({ memoryId: memory_id, query, topic, style: summary_type, length }),
      ),
    );
  }

  handleReindex(args: Record<string, unknown>): Promise<ToolResult> {
    const parsed = parseArgs(reindexArgs, args);
    if (!parsed.ok) return Promise.resolve(parsed.result);
    return guarded('reindexing', async () => jsonResult(await this.service.reindex(parsed.value.reset)));
  }

  handleListBackups(): Promise<ToolResult> {
    return guarded('listing backups', async () => {
      const backups = await this.backups.listBackups();
      return jsonResult({
        status: 'success',
        message: formatBackupList(backups, this.backups.backupDir),
        backups,
      });
    });
  }
}
