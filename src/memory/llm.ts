import OpenAI from 'openai';
import Anthropic from '@anthropic-ai/sdk';
import { getConfig } from '../config.js';
import type { Config } from '../config.js';
import { SummarizerError } from '../errors.js';

/** The key the configured summary provider would use, if any. Ollama needs none. */
export function resolveSummaryApiKey(config: Config): string | undefined {
  if (config.summaryLlmApiKey) return config.summaryLlmApiKey;
  switch (config.summaryLlmProvider) {
    case 'anthropic':
      return config.anthropicApiKey || undefined;
    case 'openrouter':
      return config.openrouterApiKey || undefined;
    case 'openai':
      return config.openaiApiKey || undefined;
    case 'ollama':
      return 'ollama';
  }
}

function resolveBaseUrl(config: Config): string | undefined {
  if (config.summaryLlmBaseUrl) return config.summaryLlmBaseUrl;
  if (config.summaryLlmProvider === 'openrouter') return config.openrouterEndpoint;
  if (config.summaryLlmProvider === 'ollama') return config.ollamaBaseUrl;
  return undefined;
}

/**
 * One bounded completion against the configured summary provider. No retries:
 * a failed or timed-out call surfaces as SummarizerError for the caller to degrade.
 */
export async function chatCompletion(
  systemPrompt: string,
  userMessage: string,
): Promise<string> {
  const config = getConfig();
  const apiKey = resolveSummaryApiKey(config);
  if (!apiKey) {
    throw new SummarizerError(
      `No API key configured for the ${config.summaryLlmProvider} summary provider. Set SUMMARY_LLM_API_KEY or the provider's own key.`,
    );
  }

  if (config.summaryLlmProvider === 'anthropic') {
    const client = new Anthropic({ apiKey, timeout: config.summaryTimeoutMs, maxRetries: 0 });

    try {
      const response = await client.messages.create({
        model: config.summaryLlmModel,
        max_tokens: 1024,
        system: systemPrompt,
        messages: [{ role: 'user', content: userMessage }],
      });

      const block = response.content[0];
      return block?.type === 'text' ? block.text : '';
    } catch (err) {
      throw new SummarizerError('Summary LLM call failed', err);
    }
  }

  // OpenAI-compatible path: openai, openrouter, ollama
  const baseURL = resolveBaseUrl(config);
  const client = new OpenAI({
    apiKey,
    timeout: config.summaryTimeoutMs,
    maxRetries: 0,
    ...(baseURL ? { baseURL } : {}),
  });

  try {
    const response = await client.chat.completions.create({
      model: config.summaryLlmModel,
      messages: [
        { role: 'system', content: systemPrompt },
        { role: 'user', content: userMessage },
      ],
      temperature: 0.2,
    });

    return response.choices[0]?.message?.content ?? '';
  } catch (err) {
    throw new SummarizerError('Summary LLM call failed', err);
  }
}
