#!/usr/bin/env node

// CRITICAL: Redirect console outputs to stderr BEFORE any imports
// Only MCP protocol messages should go to stdout
console.log = (...args: unknown[]) => {
  process.stderr.write('[LOG] ' + args.join(' ') + '\n');
};
console.warn = (...args: unknown[]) => {
  process.stderr.write('[WARN] ' + args.join(' ') + '\n');
};

import { Server } from '@modelcontextprotocol/sdk/server/index.js';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import {
  ListToolsRequestSchema,
  CallToolRequestSchema,
} from '@modelcontextprotocol/sdk/types.js';

import { loadConfig } from './config.js';
import { createRuntime } from './runtime.js';
import type { Runtime } from './runtime.js';
import { ToolHandlers } from './tools.js';
import { TOOL_DEFINITIONS } from './tool-schemas.js';
import { getSetupErrorMessage } from './setup-message.js';

const WORKFLOW_GUIDANCE = `# Strata Memory Workflow

**Storing:**
- \`memory_store(content="...", topic="...", tags=[...])\` → saves the text, indexes it and derives a summary
- Pick stable topic names; \`memory_list_topics()\` shows what exists
- Short text is indexed as is; longer text gets an extractive or abstractive summary

**Recalling:**
- \`memory_retrieve(query="...")\` → semantic search over summaries, returns full records
- Add \`topic\` to stay inside one topic
- \`return_type="summary"\` returns only the summaries (cheaper); \`"both"\` returns both

**Maintaining:**
- \`memory_update(memory_id="...", content|topic|tags)\` → edits in place, summary follows the content
- \`memory_delete(memory_id="...")\` → removes the record, its summaries and their vectors
- \`memory_delete_empty_topic(topic_name="...")\` → cleans up topics left without members

**Summaries on demand:**
- \`memory_summarize(memory_id|query|topic, summary_type, length)\` → exactly one source
- \`summary_type="query_focused"\` needs \`query\`

**When something looks off:**
- \`memory_status()\` → record counts vs. vector counts
- Results with \`indexed: false\` or \`summary_stored: false\` are stored but not fully searchable
- \`memory_reindex()\` → rebuild the vector index from the records
- \`memory_list_backups()\` → automatic snapshots of the storage directory`;

async function main() {
  const config = loadConfig();
  console.log(`Config loaded. Embedding: ${config.embeddingModel}, Summaries: ${config.summaryLlmProvider}/${config.summaryLlmModel}`);

  let runtime: Runtime | null = null;
  let handlers: ToolHandlers | null = null;
  let setupError: string | null = null;

  try {
    runtime = await createRuntime(config);
    const init = await runtime.service.initialize(false);
    if (init.status === 'error') {
      console.warn(`Initialization incomplete: ${init.message}`);
    }
    handlers = new ToolHandlers(runtime.service, runtime.backups);
    console.log('Memory system ready.');
  } catch (err) {
    setupError = err instanceof Error ? err.message : String(err);
    console.warn(`Strata initialization failed: ${setupError}`);
    console.warn('Server will start in setup-required mode. All tool calls will return setup instructions.');
  }

  const server = new Server(
    { name: 'strata-memory', version: '0.1.0' },
    { capabilities: { tools: {} } },
  );

  server.setRequestHandler(ListToolsRequestSchema, async () => ({
    tools: [
      {
        name: '__IMPORTANT',
        description: 'Read first: how to store, recall and maintain memories with this server.',
        inputSchema: { type: 'object' as const, properties: {}, required: [] },
      },
      ...TOOL_DEFINITIONS,
    ],
  }));

  server.setRequestHandler(CallToolRequestSchema, async (request) => {
    const { name, arguments: args } = request.params;

    if (name === '__IMPORTANT') return { content: [{ type: 'text' as const, text: WORKFLOW_GUIDANCE }] };

    if (!handlers) {
      return {
        content: [{
          type: 'text' as const,
          text: getSetupErrorMessage(setupError ?? 'Unknown error'),
        }],
        isError: true,
      };
    }

    switch (name) {
      case 'memory_initialize':
        return handlers.handleInitialize(args ?? {});
      case 'memory_store':
        return handlers.handleStore(args ?? {});
      case 'memory_retrieve':
        return handlers.handleRetrieve(args ?? {});
      case 'memory_update':
        return handlers.handleUpdate(args ?? {});
      case 'memory_delete':
        return handlers.handleDelete(args ?? {});
      case 'memory_list_topics':
        return handlers.handleListTopics();
      case 'memory_status':
        return handlers.handleStatus();
      case 'memory_delete_empty_topic':
        return handlers.handleDeleteEmptyTopic(args ?? {});
      case 'memory_summarize':
        return handlers.handleSummarize(args ?? {});
      case 'memory_reindex':
        return handlers.handleReindex(args ?? {});
      case 'memory_list_backups':
        return handlers.handleListBackups();
      default:
        return {
          content: [{ type: 'text' as const, text: `Unknown tool: ${name}` }],
          isError: true,
        };
    }
  });

  const shutdown = (signal: string) => {
    console.error(`Received ${signal}, shutting down...`);
    runtime?.records.close();
    process.exit(0);
  };
  process.on('SIGINT', () => shutdown('SIGINT'));
  process.on('SIGTERM', () => shutdown('SIGTERM'));

  const transport = new StdioServerTransport();
  await server.connect(transport);
  console.log('Strata memory MCP server started on stdio.');
}

main().catch((err) => {
  console.error('Fatal error:', err);
  process.exit(1);
});
