import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import type { Mock } from 'vitest';
import { mkdtempSync, rmSync } from 'node:fs';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import { MemoryService, topicDescription } from '../service.js';
import type { OperationResult } from '../types.js';
import { RecordStore } from '../../records/store.js';
import { RecordStoreError, UsageError } from '../../errors.js';
import { MockVectorIndex } from '../../__test__/mock-vector-index.js';
import { MockSummaryGenerator } from '../../__test__/mock-summarizer.js';

function steppingClock(start = Date.parse('2026-01-01T00:00:00.000Z')) {
  let t = start;
  return () => new Date((t += 1000));
}

function sequentialIds() {
  let n = 0;
  return () => `id-${++n}`;
}

function expectSuccess<T extends object>(result: OperationResult<T>): T & { message: string } {
  if (result.status !== 'success') throw new Error(`expected success, got: ${result.message}`);
  return result;
}

describe('MemoryService', () => {
  let tmpDir: string;
  let records: RecordStore;
  let vectors: MockVectorIndex;
  let summarizer: MockSummaryGenerator;
  let backup: { runIfDue: Mock<() => Promise<string | null>> };
  let service: MemoryService;

  beforeEach(() => {
    tmpDir = mkdtempSync(join(tmpdir(), 'strata-service-'));
    const clock = steppingClock();
    records = new RecordStore(join(tmpDir, 'memory.sqlite'), { now: clock });
    vectors = new MockVectorIndex();
    summarizer = new MockSummaryGenerator();
    backup = { runIfDue: vi.fn<() => Promise<string | null>>(async () => null) };
    service = new MemoryService(records, vectors, summarizer, {
      thresholds: { tiny: 500, small: 2000 },
      dataDir: tmpDir,
      backup,
      now: clock,
      newId: sequentialIds(),
    });
    vi.spyOn(console, 'log').mockImplementation(() => {});
    vi.spyOn(console, 'warn').mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
    records.close();
    rmSync(tmpDir, { recursive: true, force: true });
  });

  describe('store', () => {
    it('uses tiny content as its own summary without calling the generator', async () => {
      const data = expectSuccess(await service.store('User prefers snake_case', 'preferences', ['style']));

      expect(data.memory_id).toBe('id-1');
      expect(data.content_size).toBe(23);
      expect(data.indexed).toBe(true);
      expect(data.topic_indexed).toBe(true);
      expect(data.summary).toEqual({
        summary_generated: true,
        summary_type: 'direct_tiny',
        summary_stored: true,
        summary_embedding_stored: true,
        summary_id: 'id-2',
      });
      expect(summarizer.calls).toHaveLength(0);
      expect(records.getSummaryById('id-2')?.summary_text).toBe('User prefers snake_case');
      expect(vectors.ids('memories')).toEqual(['id-1']);
      expect(vectors.ids('summaries')).toEqual(['id-2']);
    });

    it('summarizes a 1200 character article extractively', async () => {
      const data = expectSuccess(await service.store('word '.repeat(240), 'articles'));

      expect(data.summary.summary_type).toBe('extractive_short');
      expect(summarizer.calls).toHaveLength(1);
      expect(summarizer.calls[0]?.style).toBe('extractive');
      expect(summarizer.calls[0]?.length).toBe('short');
    });

    it('summarizes long content abstractively', async () => {
      const data = expectSuccess(await service.store('x'.repeat(2000), 'articles'));

      expect(data.summary.summary_type).toBe('abstractive_medium');
      expect(summarizer.calls[0]?.style).toBe('abstractive');
      expect(summarizer.calls[0]?.length).toBe('medium');
    });

    it('still stores the memory when summary generation fails', async () => {
      summarizer.respondWith(null);
      const data = expectSuccess(await service.store('y'.repeat(800), 'articles'));

      expect(data.summary).toEqual({
        summary_generated: false,
        summary_type: 'extractive_short',
        summary_stored: false,
        summary_embedding_stored: false,
        summary_id: null,
      });
      expect(records.getMemory(data.memory_id)).not.toBeNull();
      expect(records.listSummaries(data.memory_id)).toEqual([]);
    });

    it('treats a blank generated summary as a failure', async () => {
      summarizer.respondWith('   ');
      const data = expectSuccess(await service.store('y'.repeat(800), 'articles'));
      expect(data.summary.summary_generated).toBe(false);
    });

    it('reports an index failure without failing the store', async () => {
      vectors.failOn('upsert', 'memories');
      const data = expectSuccess(await service.store('note', 'misc'));

      expect(data.indexed).toBe(false);
      expect(data.summary.summary_embedding_stored).toBe(true);
      expect(records.getMemory(data.memory_id)?.content).toBe('note');
    });

    it('reports summary and topic index failures separately', async () => {
      vectors.failOn('upsert', 'summaries');
      vectors.failOn('upsert', 'topics');
      const data = expectSuccess(await service.store('note', 'misc'));

      expect(data.indexed).toBe(true);
      expect(data.topic_indexed).toBe(false);
      expect(data.summary.summary_stored).toBe(true);
      expect(data.summary.summary_embedding_stored).toBe(false);
    });

    it('fails without touching the index when the record write fails', async () => {
      vi.spyOn(records, 'createMemory').mockImplementation(() => {
        throw new RecordStoreError('disk I/O error');
      });

      const result = await service.store('note', 'misc');

      expect(result).toEqual({ status: 'error', message: 'Error storing content: disk I/O error' });
      expect(vectors.calls).toEqual([]);
    });

    it('rejects empty content or topic before any storage access', async () => {
      expect(await service.store('  ', 'misc')).toEqual({ status: 'error', message: 'Content must not be empty' });
      expect(await service.store('note', '')).toEqual({ status: 'error', message: 'Topic must not be empty' });
      expect(records.getStatus().total_memories).toBe(0);
      expect(backup.runIfDue).not.toHaveBeenCalled();
    });

    it('checks for a due backup before writing', async () => {
      await service.store('note', 'misc');
      expect(backup.runIfDue).toHaveBeenCalledTimes(1);
    });

    it('keeps storing when the backup check throws', async () => {
      backup.runIfDue.mockRejectedValue(new Error('no space'));
      const result = await service.store('note', 'misc');
      expect(result.status).toBe('success');
    });

    it('describes the topic in the topics collection', async () => {
      await service.store('note', 'misc', ['a', 'b']);
      expect(vectors.collections.get('topics')?.get('misc')?.text).toBe('Topic misc containing information about a, b');
    });
  });

  describe('retrieve', () => {
    it('returns an empty list when nothing matches', async () => {
      expect(await service.retrieve('anything')).toEqual([]);
    });

    it('resolves summary hits to memories', async () => {
      await service.store('apples are red', 'fruit', ['color']);

      const results = await service.retrieve('apples');

      expect(results).toHaveLength(1);
      expect(results[0]).toMatchObject({ id: 'id-1', topic: 'fruit', tags: ['color'], content: 'apples are red' });
      expect(results[0]?.summary).toBeUndefined();
      expect(vectors.calls.filter(c => c.method === 'query').map(c => c.collection)).toEqual(['summaries']);
    });

    it('returns summaries or both on request', async () => {
      await service.store('apples are red', 'fruit');

      const [summaryOnly] = await service.retrieve('apples', { returnType: 'summary' });
      expect(summaryOnly?.content).toBeUndefined();
      expect(summaryOnly?.summary).toBe('apples are red');

      const [both] = await service.retrieve('apples', { returnType: 'both' });
      expect(both?.content).toBe('apples are red');
      expect(both?.summary).toBe('apples are red');
    });

    it('filters by topic and bounds the result count', async () => {
      await service.store('apples are red', 'fruit');
      await service.store('apples pie recipe', 'cooking');
      await service.store('green apples', 'fruit');

      const fruit = await service.retrieve('apples', { topic: 'fruit' });
      expect(fruit.map(r => r.topic)).toEqual(['fruit', 'fruit']);

      const one = await service.retrieve('apples', { maxResults: 1 });
      expect(one).toHaveLength(1);
    });

    it('skips hits whose summary is no longer in the record store', async () => {
      await service.store('apples are red', 'fruit');
      await vectors.upsert('summaries', 'ghost', 'apples everywhere', { topic: 'fruit' });

      const results = await service.retrieve('apples');

      expect(results.map(r => r.id)).toEqual(['id-1']);
      expect(console.warn).toHaveBeenCalledWith('Skipping summary ghost: indexed but not in the record store');
    });

    it('does not return a deleted memory', async () => {
      const stored = expectSuccess(await service.store('apples are red', 'fruit'));
      await service.delete(stored.memory_id);

      const results = await service.retrieve('apples are red');
      expect(results.map(r => r.id)).not.toContain(stored.memory_id);
    });

    it('rejects an empty query', async () => {
      await expect(service.retrieve(' ')).rejects.toThrow(UsageError);
    });
  });

  describe('update', () => {
    it('changes only tags, bumping version and updated_at', async () => {
      const stored = expectSuccess(await service.store('User prefers snake_case', 'preferences', ['style']));
      const before = records.getMemory(stored.memory_id);

      const data = expectSuccess(await service.update(stored.memory_id, { tags: ['naming'] }));
      const after = records.getMemory(stored.memory_id);

      expect(data.version).toBe(2);
      expect(data.updated_fields).toEqual({ content: false, topic: false, tags: true });
      expect(data.topic_counts_updated).toBe(true);
      expect(data.summary_updated).toBe(false);
      expect(data.summary_type).toBeNull();
      expect(after?.content).toBe(before?.content);
      expect(after?.topic).toBe('preferences');
      expect(after?.tags).toEqual(['naming']);
      expect(after?.version).toBe((before?.version ?? 0) + 1);
      expect(after?.updated_at).not.toBe(before?.updated_at);
      expect(summarizer.calls).toHaveLength(0);
    });

    it('keeps the memory when it was the last one in its old topic', async () => {
      const stored = expectSuccess(await service.store('note about testing', 'old-topic'));

      const data = expectSuccess(await service.update(stored.memory_id, { topic: 'new-topic' }));

      expect(data.version).toBe(2);
      expect(records.getMemory(stored.memory_id)?.topic).toBe('new-topic');
      expect(records.getTopic('old-topic')).toBeNull();
      expect(records.getTopic('new-topic')?.item_count).toBe(1);
      expect(vectors.ids('topics')).toEqual(['new-topic']);

      const found = await service.retrieve('testing', { topic: 'new-topic' });
      expect(found.map(r => r.id)).toEqual([stored.memory_id]);
    });

    it('moves counters without deleting a topic that still has members', async () => {
      const a = expectSuccess(await service.store('one', 'shared'));
      await service.store('two', 'shared');

      await service.update(a.memory_id, { topic: 'other' });

      expect(records.getTopic('shared')?.item_count).toBe(1);
      expect(records.getTopic('other')?.item_count).toBe(1);
    });

    it('preserves vector metadata the update does not touch', async () => {
      const stored = expectSuccess(await service.store('note', 'misc'));
      await vectors.upsert('memories', stored.memory_id, 'note', { pinned: true });

      await service.update(stored.memory_id, { tags: ['x'] });

      const entry = await vectors.getById('memories', stored.memory_id);
      expect(entry?.metadata.pinned).toBe(true);
      expect(entry?.metadata.created_at).toBe(stored.timestamp);
      expect(entry?.metadata.tags).toBe('["x"]');
      expect(entry?.metadata.version).toBe(2);
    });

    it('overwrites the existing summary in place when content grows past a tier', async () => {
      const stored = expectSuccess(await service.store('z'.repeat(800), 'articles'));
      const summaryId = stored.summary.summary_id;

      summarizer.respondWith('a fresh abstract');
      const data = expectSuccess(await service.update(stored.memory_id, { content: 'z'.repeat(2500) }));

      expect(data.summary_updated).toBe(true);
      expect(data.summary_type).toBe('abstractive_medium');
      const summaries = records.listSummaries(stored.memory_id);
      expect(summaries).toHaveLength(1);
      expect(summaries[0]?.id).toBe(summaryId);
      expect(summaries[0]?.summary_type).toBe('abstractive_medium');
      expect(summaries[0]?.summary_text).toBe('a fresh abstract');
      expect(records.getMemory(stored.memory_id)?.content_size).toBe(2500);
    });

    it('creates a summary when the memory had none', async () => {
      summarizer.respondWith(null);
      const stored = expectSuccess(await service.store('q'.repeat(600), 'articles'));
      expect(stored.summary.summary_id).toBeNull();

      const data = expectSuccess(await service.update(stored.memory_id, { content: 'short now' }));

      expect(data.summary_updated).toBe(true);
      expect(data.summary_type).toBe('direct_tiny');
      expect(records.getAnySummary(stored.memory_id)?.summary_text).toBe('short now');
    });

    it('keeps the record update when re-indexing fails', async () => {
      const stored = expectSuccess(await service.store('note', 'misc'));
      vectors.failOn('upsert');

      const data = expectSuccess(await service.update(stored.memory_id, { content: 'revised note' }));

      expect(data.indexed).toBe(false);
      expect(data.summary_updated).toBe(true);
      expect(records.getMemory(stored.memory_id)?.content).toBe('revised note');
    });

    it('keeps the newest summary when generations for two edits finish out of order', async () => {
      const stored = expectSuccess(await service.store('x'.repeat(800), 'articles'));
      const pending: { text: string; resolve: (summary: string) => void }[] = [];
      const deferred = {
        generate: (text: string) =>
          new Promise<string | null>(resolve => {
            pending.push({ text, resolve });
          }),
      };
      const racing = new MemoryService(records, vectors, deferred, {
        thresholds: { tiny: 500, small: 2000 },
        dataDir: tmpDir,
        backup,
        newId: sequentialIds(),
      });

      const first = racing.update(stored.memory_id, { content: 'A'.repeat(800) });
      const second = racing.update(stored.memory_id, { content: 'B'.repeat(800) });
      await vi.waitFor(() => expect(pending).toHaveLength(2));
      const forA = pending.find(p => p.text.startsWith('A'));
      const forB = pending.find(p => p.text.startsWith('B'));

      forB?.resolve('summary of B');
      const b = expectSuccess(await second);
      forA?.resolve('summary of A');
      const a = expectSuccess(await first);

      expect(a.summary_updated).toBe(false);
      expect(b.summary_updated).toBe(true);
      expect(records.getMemory(stored.memory_id)?.content).toBe('B'.repeat(800));
      const summaries = records.listSummaries(stored.memory_id);
      expect(summaries).toHaveLength(1);
      expect(summaries[0]?.summary_text).toBe('summary of B');
      const entry = await vectors.getById('summaries', stored.summary.summary_id ?? '');
      expect(entry?.text).toBe('summary of B');
    });

    it('reports a failed topic counter move and still re-indexes and summarizes', async () => {
      const stored = expectSuccess(await service.store('note', 'misc'));
      vi.spyOn(records, 'moveTopicMembership').mockImplementation(() => {
        throw new RecordStoreError('database is locked');
      });

      const data = expectSuccess(await service.update(stored.memory_id, { topic: 'new', content: 'changed' }));

      expect(data.topic_counts_updated).toBe(false);
      expect(data.indexed).toBe(true);
      expect(data.summary_updated).toBe(true);
      expect(data.summary_type).toBe('direct_tiny');
      expect(records.getMemory(stored.memory_id)?.topic).toBe('new');
      expect(records.getAnySummary(stored.memory_id)?.summary_text).toBe('changed');
      expect(console.warn).toHaveBeenCalledWith(
        `Failed to move topic counters for memory ${stored.memory_id}: database is locked`,
      );
    });

    it('rejects an update with no fields', async () => {
      const stored = expectSuccess(await service.store('note', 'misc'));
      expect(await service.update(stored.memory_id, {})).toEqual({
        status: 'error',
        message: 'At least one of content, topic, or tags must be provided',
      });
      expect(records.getMemory(stored.memory_id)?.version).toBe(1);
    });

    it('reports unknown ids', async () => {
      expect(await service.update('missing', { tags: [] })).toEqual({
        status: 'error',
        message: 'Memory item with ID missing not found',
      });
    });
  });

  describe('delete', () => {
    it('removes the memory, its summaries and their vectors', async () => {
      const stored = expectSuccess(await service.store('note', 'misc'));

      const data = expectSuccess(await service.delete(stored.memory_id));

      expect(data).toMatchObject({
        memory_id: stored.memory_id,
        summaries_deleted: 1,
        vector_deleted: true,
        summary_vectors_deleted: true,
      });
      expect(records.getMemory(stored.memory_id)).toBeNull();
      expect(records.getSummary(stored.memory_id, 'direct_tiny')).toBeNull();
      expect(vectors.ids('memories')).toEqual([]);
      expect(vectors.ids('summaries')).toEqual([]);
    });

    it('deletes summary vectors before the record and the memory vector after', async () => {
      const stored = expectSuccess(await service.store('note', 'misc'));
      vectors.calls.length = 0;
      const deleteMemory = vi.spyOn(records, 'deleteMemory');

      await service.delete(stored.memory_id);

      const deletes = vectors.calls.filter(c => c.method === 'delete').map(c => c.collection);
      expect(deletes).toEqual(['summaries', 'memories']);
      expect(deleteMemory).toHaveBeenCalledTimes(1);
    });

    it('still deletes the record when vector deletes fail', async () => {
      const stored = expectSuccess(await service.store('note', 'misc'));
      vectors.failOn('delete');

      const data = expectSuccess(await service.delete(stored.memory_id));

      expect(data.vector_deleted).toBe(false);
      expect(data.summary_vectors_deleted).toBe(false);
      expect(records.getMemory(stored.memory_id)).toBeNull();
    });

    it('reports a missing id as a failure', async () => {
      expect(await service.delete('missing')).toEqual({
        status: 'error',
        message: 'Memory item with ID missing not found',
      });
      expect(vectors.calls).toEqual([]);
    });
  });

  describe('topic counter invariant', () => {
    it('matches live memories after mixed operations', async () => {
      const ids: string[] = [];
      for (const topic of ['a', 'a', 'b', 'c', 'a']) {
        ids.push(expectSuccess(await service.store(`note in ${topic}`, topic)).memory_id);
      }
      await service.update(ids[0] ?? '', { topic: 'b' });
      await service.delete(ids[1] ?? '');
      await service.update(ids[3] ?? '', { topic: 'a' });
      await service.delete(ids[2] ?? '');

      for (const topic of records.listTopics()) {
        expect(topic.item_count).toBe(records.countMemoriesInTopic(topic.name));
        expect(topic.item_count).toBeGreaterThanOrEqual(0);
      }
      expect(records.getTopic('c')).toBeNull();
    });
  });

  describe('initialize and status', () => {
    it('is idempotent without reset', async () => {
      await service.store('note', 'misc');
      expect((await service.initialize(false)).status).toBe('success');
      expect((await service.initialize(false)).status).toBe('success');
      expect(records.getStatus().total_memories).toBe(1);
    });

    it('clears both stores on reset', async () => {
      await service.store('note', 'misc');

      expect(await service.initialize(true)).toEqual({
        status: 'success',
        message: 'Memory system initialized successfully',
        reset: true,
      });

      const status = expectSuccess(await service.getStatus());
      expect(status.stats.total_memories).toBe(0);
      expect(status.stats.total_topics).toBe(0);
      expect(status.stats.vector_counts).toEqual({ memories: 0, summaries: 0, topics: 0 });
    });

    it('reports which store failed to initialize', async () => {
      vi.spyOn(vectors, 'initialize').mockRejectedValue(new Error('connection refused'));

      expect(await service.initialize(false)).toEqual({
        status: 'error',
        message: 'Error initializing memory system',
        error_details: { record_store: true, vector_index: false, vector_index_error: 'connection refused' },
      });
    });

    it('merges record stats, vector counts and thresholds', async () => {
      await service.store('note', 'misc');
      vectors.failOn('count', 'topics');

      const { stats } = expectSuccess(await service.getStatus());

      expect(stats.total_memories).toBe(1);
      expect(stats.total_summaries).toBe(1);
      expect(stats.vector_counts).toEqual({ memories: 1, summaries: 1, topics: null });
      expect(stats.data_dir).toBe(tmpDir);
      expect(stats.tiny_content_threshold).toBe(500);
      expect(stats.small_content_threshold).toBe(2000);
      expect(typeof stats.system_time).toBe('string');
    });
  });

  describe('topics', () => {
    it('lists topics with counts', async () => {
      await service.store('one', 'b');
      await service.store('two', 'a');
      await service.store('three', 'a');

      const data = expectSuccess(service.listTopics());
      expect(data.message).toBe('Found 2 topics');
      expect(data.topics.map(t => [t.name, t.item_count])).toEqual([
        ['a', 2],
        ['b', 1],
      ]);
    });

    it('returns an empty list when there are no topics', () => {
      expect(service.listTopics()).toEqual({ status: 'success', message: 'No topics found', topics: [] });
    });

    it('deletes an emptied topic and its vector', async () => {
      const stored = expectSuccess(await service.store('one', 'temp'));
      await service.delete(stored.memory_id);

      expect(await service.deleteEmptyTopic('temp')).toEqual({
        status: 'success',
        message: "Topic 'temp' deleted successfully because it was empty.",
      });
      expect(vectors.ids('topics')).toEqual([]);
    });

    it('refuses to delete a topic with members', async () => {
      await service.store('one', 'busy');
      await service.store('two', 'busy');

      expect(await service.deleteEmptyTopic('busy')).toEqual({
        status: 'error',
        message: "Topic 'busy' could not be deleted because it is not empty. It contains 2 items.",
      });
    });

    it('reports unknown topics', async () => {
      expect(await service.deleteEmptyTopic('nope')).toEqual({ status: 'error', message: "Topic 'nope' not found." });
    });
  });

  describe('summarize', () => {
    it('requires exactly one source', async () => {
      const expected = { status: 'error', message: 'Exactly one of memory_id, query, or topic must be provided.' };
      expect(await service.summarize({})).toEqual(expected);
      expect(await service.summarize({ memoryId: 'x', topic: 'y' })).toEqual(expected);
    });

    it('summarizes a single memory', async () => {
      const stored = expectSuccess(await service.store('apples are red', 'fruit'));
      summarizer.respondWith('red apples');

      expect(await service.summarize({ memoryId: stored.memory_id, length: 'short' })).toEqual({
        status: 'success',
        message: 'Summary generated successfully',
        summary: 'red apples',
        source_count: 1,
      });
      expect(summarizer.calls[0]).toEqual({ text: 'apples are red', style: 'abstractive', length: 'short', query: undefined });
    });

    it('summarizes the memories matching a query', async () => {
      await service.store('apples are red', 'fruit');
      await service.store('bananas are yellow', 'fruit');

      const data = expectSuccess(await service.summarize({ query: 'apples', style: 'query_focused' }));

      expect(data.source_count).toBe(2);
      expect(summarizer.calls[0]).toEqual({
        text: 'apples are red\n\nbananas are yellow',
        style: 'query_focused',
        length: 'medium',
        query: 'apples',
      });
    });

    it('limits topic summaries to that topic', async () => {
      await service.store('apples are red', 'fruit');
      await service.store('carrots are orange', 'vegetables');

      await service.summarize({ topic: 'vegetables' });

      expect(summarizer.calls[0]?.text).toBe('carrots are orange');
    });

    it('succeeds with a message when nothing matches', async () => {
      expect(await service.summarize({ query: 'anything' })).toEqual({
        status: 'success',
        message: 'No relevant memories found to summarize.',
      });
    });

    it('throws a usage error for query_focused without a query', async () => {
      await expect(service.summarize({ topic: 'fruit', style: 'query_focused' })).rejects.toThrow(UsageError);
      expect(vectors.calls).toEqual([]);
    });

    it('fails when the generator returns nothing', async () => {
      const stored = expectSuccess(await service.store('apples are red', 'fruit'));
      summarizer.respondWith(null);

      expect((await service.summarize({ memoryId: stored.memory_id })).status).toBe('error');
    });

    it('reports an unknown memory', async () => {
      expect(await service.summarize({ memoryId: 'missing' })).toEqual({
        status: 'error',
        message: 'Memory item with ID missing not found.',
      });
    });
  });

  describe('reindex', () => {
    it('rebuilds every collection from the record store', async () => {
      await service.store('apples are red', 'fruit', ['color']);
      await service.store('carrots', 'vegetables');
      await vectors.initialize(true);

      const result = await service.reindex();

      expect(result).toEqual({
        status: 'success',
        message: 'Reindex completed',
        memories: 2,
        summaries: 2,
        topics: 2,
        failures: 0,
      });
      expect(vectors.collections.get('topics')?.get('fruit')?.text).toBe(topicDescription('fruit', ['color']));
      expect(await service.retrieve('apples')).toHaveLength(2);
    });

    it('counts failures', async () => {
      await service.store('apples are red', 'fruit');
      vectors.failOn('upsert', 'summaries');

      const result = await service.reindex();

      expect(result.status).toBe('error');
      if (result.status === 'error') {
        expect(result.error_details).toEqual({ memories: 1, summaries: 0, topics: 1, failures: 1 });
      }
    });
  });
});
