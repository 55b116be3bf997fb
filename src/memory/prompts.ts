import { UsageError } from '../errors.js';
import type { SummaryLength, SummaryStyle } from './types.js';

const STYLE_INSTRUCTIONS: Record<Exclude<SummaryStyle, 'query_focused'>, string> = {
  abstractive: 'The summary should be abstractive: rephrase and synthesize the information in your own words.',
  extractive: 'The summary should be extractive: select the key sentences directly from the text.',
};

const LENGTH_INSTRUCTIONS: Record<SummaryLength, string> = {
  short: 'Keep the summary very brief, around 1-2 sentences.',
  medium: 'Aim for a summary of 3-5 sentences.',
  detailed: 'Provide a comprehensive summary covering all important aspects, around 5-10 sentences.',
};

export const SUMMARY_USER_TEMPLATE = `Please summarize the following text:

<text>
{content}
</text>`;

export function buildSummarySystemPrompt(style: SummaryStyle, length: SummaryLength, query?: string): string {
  let styleLine: string;
  if (style === 'query_focused') {
    if (!query || query.trim() === '') {
      throw new UsageError('A query is required for query_focused summaries');
    }
    styleLine = `The summary should focus on answering this query: "${query}".`;
  } else {
    styleLine = STYLE_INSTRUCTIONS[style];
  }

  return [
    `You are a summarization assistant for a long-term memory store. Produce a ${length} summary.`,
    styleLine,
    'Keep it concise and accurate, and capture the main points. Reply with the summary text only.',
    LENGTH_INSTRUCTIONS[length],
  ].join(' ');
}

export function buildSummaryPrompt(content: string): string {
  return SUMMARY_USER_TEMPLATE.replace('{content}', () => content);
}
