const STORE_DESCRIPTION = `\
Store a piece of text as a long-term memory under a topic.

The record is written to the local database first; the semantic index and an automatic summary \
are added afterwards on a best-effort basis. Check \`indexed\` and \`summary.summary_stored\` in the \
result: a failed side effect does not undo the stored memory, and \`memory_reindex\` repairs the index.

Summaries are picked by size: short content is indexed as is, medium content gets an extractive \
summary, long content an abstractive one.`;

const RETRIEVE_DESCRIPTION = `\
Find stored memories by meaning.

The query is matched against memory summaries, then resolved to the full records. \
Use \`topic\` to stay inside one topic and \`return_type\` to choose between the full text, \
the summary, or both. Returns an empty list when nothing matches.`;

const UPDATE_DESCRIPTION = `\
Change the content, topic or tags of an existing memory. Provide at least one field.

Changing the content regenerates the summary. Moving a memory to another topic creates the \
topic if needed and removes the old one once it has no members left.`;

const DELETE_DESCRIPTION = `\
Delete a memory together with its summaries, from both the database and the semantic index.`;

const SUMMARIZE_DESCRIPTION = `\
Generate an ad hoc summary, separate from the automatic one stored with each memory.

Provide exactly one source: \`memory_id\` for one memory, \`query\` for the memories that best \
match a question, or \`topic\` for the memories in a topic. \`summary_type=query_focused\` \
requires \`query\`.`;

const DELETE_EMPTY_TOPIC_DESCRIPTION = `\
Remove a topic that no longer holds any memories. Topics with members are left untouched.`;

const REINDEX_DESCRIPTION = `\
Rebuild the semantic index from the database. Use after an index outage or when \`memory_status\` \
shows vector counts that disagree with the record counts. No summaries are regenerated.`;

export const TOOL_DEFINITIONS = [
  {
    name: 'memory_initialize',
    description: 'Create the storage schema and vector collections. With reset=true, wipe all memories first.',
    inputSchema: {
      type: 'object' as const,
      properties: {
        reset: {
          type: 'boolean',
          description: 'Delete every stored memory, summary and topic before initializing.',
          default: false,
        },
      },
      required: [],
    },
  },
  {
    name: 'memory_store',
    description: STORE_DESCRIPTION,
    inputSchema: {
      type: 'object' as const,
      properties: {
        content: {
          type: 'string',
          description: 'The text to remember.',
        },
        topic: {
          type: 'string',
          description: 'Topic to file the memory under. Created on first use.',
        },
        tags: {
          type: 'array',
          items: { type: 'string' },
          description: 'Optional free-form tags.',
        },
      },
      required: ['content', 'topic'],
    },
  },
  {
    name: 'memory_retrieve',
    description: RETRIEVE_DESCRIPTION,
    inputSchema: {
      type: 'object' as const,
      properties: {
        query: {
          type: 'string',
          description: 'Natural language description of what to recall.',
        },
        max_results: {
          type: 'number',
          description: 'Maximum number of memories to return.',
          default: 5,
          maximum: 100,
        },
        topic: {
          type: 'string',
          description: 'Only return memories from this topic.',
        },
        return_type: {
          type: 'string',
          enum: ['full_text', 'summary', 'both'],
          description: 'Which representation to return.',
          default: 'full_text',
        },
      },
      required: ['query'],
    },
  },
  {
    name: 'memory_update',
    description: UPDATE_DESCRIPTION,
    inputSchema: {
      type: 'object' as const,
      properties: {
        memory_id: {
          type: 'string',
          description: 'ID of the memory to update.',
        },
        content: {
          type: 'string',
          description: 'Replacement text.',
        },
        topic: {
          type: 'string',
          description: 'Topic to move the memory to.',
        },
        tags: {
          type: 'array',
          items: { type: 'string' },
          description: 'Replacement tag list.',
        },
      },
      required: ['memory_id'],
    },
  },
  {
    name: 'memory_delete',
    description: DELETE_DESCRIPTION,
    inputSchema: {
      type: 'object' as const,
      properties: {
        memory_id: {
          type: 'string',
          description: 'ID of the memory to delete.',
        },
      },
      required: ['memory_id'],
    },
  },
  {
    name: 'memory_list_topics',
    description: 'List all topics with their descriptions and member counts.',
    inputSchema: {
      type: 'object' as const,
      properties: {},
      required: [],
    },
  },
  {
    name: 'memory_status',
    description:
      'Show record counts, vector counts per collection, summary tier thresholds and the storage location.',
    inputSchema: {
      type: 'object' as const,
      properties: {},
      required: [],
    },
  },
  {
    name: 'memory_delete_empty_topic',
    description: DELETE_EMPTY_TOPIC_DESCRIPTION,
    inputSchema: {
      type: 'object' as const,
      properties: {
        topic_name: {
          type: 'string',
          description: 'Name of the topic to remove.',
        },
      },
      required: ['topic_name'],
    },
  },
  {
    name: 'memory_summarize',
    description: SUMMARIZE_DESCRIPTION,
    inputSchema: {
      type: 'object' as const,
      properties: {
        memory_id: {
          type: 'string',
          description: 'Summarize this memory.',
        },
        query: {
          type: 'string',
          description: 'Summarize the memories that best match this query.',
        },
        topic: {
          type: 'string',
          description: 'Summarize the memories in this topic.',
        },
        summary_type: {
          type: 'string',
          enum: ['abstractive', 'extractive', 'query_focused'],
          description: 'Summary style.',
          default: 'abstractive',
        },
        length: {
          type: 'string',
          enum: ['short', 'medium', 'detailed'],
          description: 'Target length.',
          default: 'medium',
        },
      },
      required: [],
    },
  },
  {
    name: 'memory_reindex',
    description: REINDEX_DESCRIPTION,
    inputSchema: {
      type: 'object' as const,
      properties: {
        reset: {
          type: 'boolean',
          description: 'Drop and recreate the vector collections before rebuilding.',
          default: false,
        },
      },
      required: [],
    },
  },
  {
    name: 'memory_list_backups',
    description: 'List the storage snapshots taken by the automatic backup, newest first.',
    inputSchema: {
      type: 'object' as const,
      properties: {},
      required: [],
    },
  },
];
