export const SUMMARY_TIERS = ['direct_tiny', 'extractive_short', 'abstractive_medium'] as const;

/** Size tier used for the automatic summary of a memory. */
export type SummaryTier = (typeof SUMMARY_TIERS)[number];

export interface MemoryRecord {
  id: string;
  content: string;
  topic: string;
  tags: string[];
  created_at: string;
  updated_at: string;
  version: number;
  content_size: number;
}

export interface TopicRecord {
  name: string;
  description: string | null;
  item_count: number;
  created_at: string;
}

export interface SummaryRecord {
  id: string;
  memory_id: string;
  summary_type: SummaryTier;
  summary_text: string;
  created_at: string;
  updated_at: string;
}

export interface NewMemory {
  id: string;
  content: string;
  topic: string;
  tags: string[];
  /** Creation time; also the initial updated_at. */
  timestamp: string;
}

export interface MemoryPatch {
  content?: string;
  topic?: string;
  tags?: string[];
}

export interface UpdatedMemory {
  record: MemoryRecord;
  previousTopic: string;
}

export type TopicDeletion = 'deleted' | 'not_empty' | 'not_found';

export interface RecordStoreStatus {
  total_memories: number;
  total_topics: number;
  total_summaries: number;
  top_topics: { name: string; count: number }[];
  latest_item_date: string | null;
}
