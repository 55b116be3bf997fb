import { chatCompletion } from './llm.js';
import { buildSummaryPrompt, buildSummarySystemPrompt } from './prompts.js';
import type { SummaryLength, SummaryStyle } from './types.js';

/**
 * Turns text into a condensed summary. `generate` resolves to null when the
 * provider fails or answers with nothing; it throws UsageError synchronously
 * when asked for a query_focused summary without a query.
 */
export interface SummaryGenerator {
  generate(text: string, style: SummaryStyle, length: SummaryLength, query?: string): Promise<string | null>;
}

export type CompletionFn = (systemPrompt: string, userMessage: string) => Promise<string>;

export class LlmSummaryGenerator implements SummaryGenerator {
  constructor(private complete: CompletionFn = chatCompletion) {}

  generate(text: string, style: SummaryStyle, length: SummaryLength, query?: string): Promise<string | null> {
    const systemPrompt = buildSummarySystemPrompt(style, length, query);
    return this.run(systemPrompt, buildSummaryPrompt(text));
  }

  private async run(systemPrompt: string, userMessage: string): Promise<string | null> {
    try {
      const summary = (await this.complete(systemPrompt, userMessage)).trim();
      if (summary === '') {
        console.warn('Summary provider returned an empty response');
        return null;
      }
      return summary;
    } catch (err) {
      const detail = err instanceof Error ? err.message : String(err);
      console.warn(`Summary generation failed: ${detail}`);
      return null;
    }
  }
}

/** Used when no summary provider is configured; only direct_tiny summaries get written. */
export class DisabledSummaryGenerator implements SummaryGenerator {
  generate(_text: string, style: SummaryStyle, length: SummaryLength, query?: string): Promise<string | null> {
    buildSummarySystemPrompt(style, length, query);
    return Promise.resolve(null);
  }
}
