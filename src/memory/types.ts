import type { RecordStoreStatus, SummaryTier, TopicRecord } from '../records/types.js';

export const SUMMARY_STYLES = ['abstractive', 'extractive', 'query_focused'] as const;
export const SUMMARY_LENGTHS = ['short', 'medium', 'detailed'] as const;
export const RETRIEVAL_MODES = ['full_text', 'summary', 'both'] as const;

export type SummaryStyle = (typeof SUMMARY_STYLES)[number];
export type SummaryLength = (typeof SUMMARY_LENGTHS)[number];
export type RetrievalMode = (typeof RETRIEVAL_MODES)[number];

export interface SuccessResult {
  status: 'success';
  message: string;
}

export interface FailureResult {
  status: 'error';
  message: string;
  error_details?: Record<string, unknown>;
}

/** Every inbound operation except retrieve answers with this shape. */
export type OperationResult<T extends object = Record<never, never>> = (SuccessResult & T) | FailureResult;

export interface SummaryOutcome {
  summary_generated: boolean;
  summary_type: SummaryTier;
  summary_stored: boolean;
  summary_embedding_stored: boolean;
  summary_id: string | null;
}

export interface StoreData {
  memory_id: string;
  topic: string;
  tags: string[];
  timestamp: string;
  content_size: number;
  indexed: boolean;
  topic_indexed: boolean;
  summary: SummaryOutcome;
}

export interface UpdateData {
  memory_id: string;
  version: number;
  updated_fields: { content: boolean; topic: boolean; tags: boolean };
  timestamp: string;
  indexed: boolean;
  /** False when the memory moved but the topic item counts could not be adjusted. */
  topic_counts_updated: boolean;
  summary_updated: boolean;
  summary_type: SummaryTier | null;
}

export interface DeleteData {
  memory_id: string;
  summaries_deleted: number;
  vector_deleted: boolean;
  summary_vectors_deleted: boolean;
}

export interface RetrievedMemory {
  id: string;
  topic: string;
  tags: string[];
  created_at: string;
  updated_at: string;
  content?: string;
  summary?: string;
}

export interface StatusData {
  stats: RecordStoreStatus & {
    vector_counts: Record<string, number | null>;
    data_dir: string;
    tiny_content_threshold: number;
    small_content_threshold: number;
    system_time: string;
  };
}

export interface TopicList {
  topics: TopicRecord[];
}

export interface ReindexData {
  memories: number;
  summaries: number;
  topics: number;
  failures: number;
}
