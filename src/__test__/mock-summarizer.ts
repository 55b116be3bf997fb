import type { SummaryGenerator } from '../memory/summarizer.js';
import type { SummaryLength, SummaryStyle } from '../memory/types.js';
import { buildSummarySystemPrompt } from '../memory/prompts.js';

export interface SummaryCall {
  text: string;
  style: SummaryStyle;
  length: SummaryLength;
  query?: string;
}

/**
 * Scripted SummaryGenerator for testing. Answers with the queued responses in
 * order, then with `summary of <first 20 chars>`. A queued null means failure.
 */
export class MockSummaryGenerator implements SummaryGenerator {
  readonly calls: SummaryCall[] = [];
  private queue: (string | null)[] = [];

  respondWith(...responses: (string | null)[]): void {
    this.queue.push(...responses);
  }

  generate(text: string, style: SummaryStyle, length: SummaryLength, query?: string): Promise<string | null> {
    buildSummarySystemPrompt(style, length, query);
    this.calls.push({ text, style, length, query });
    const next = this.queue.length > 0 ? this.queue.shift() : undefined;
    return Promise.resolve(next !== undefined ? next : `summary of ${text.slice(0, 20)}`);
  }
}
