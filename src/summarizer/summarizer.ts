/**
 * Text Summarizer
 *
 * Generates a short summary of article text with OpenAI or Azure OpenAI
 */

import OpenAI, { AzureOpenAI } from 'openai';
import { logger } from '../utils/logger.js';

export type Summarizer = (text: string) => Promise<string>;

export interface OpenAiClientOptions {
  apiKey: string;
  azureEndpoint?: string;
  azureApiVersion?: string;
  timeoutMs?: number;
}

/**
 * The slice of the OpenAI client the summarizer calls
 */
export interface ChatCompletionClient {
  chat: {
    completions: {
      create(params: {
        model: string;
        messages: { role: 'system'; content: string }[];
        max_tokens: number;
      }): Promise<{
        choices: { message?: { content?: string | null } }[];
        usage?: { total_tokens?: number };
      }>;
    };
  };
}

export interface OpenAiSummarizerOptions {
  client: ChatCompletionClient;
  model: string;
  maxTokens: number;
}

/**
 * Create an OpenAI client, or an Azure one when an endpoint is configured
 */
export function createOpenAiClient(options: OpenAiClientOptions): OpenAI {
  if (!options.apiKey) {
    throw new Error('OPENAI_API_KEY is not configured');
  }

  if (options.azureEndpoint) {
    return new AzureOpenAI({
      apiKey: options.apiKey,
      endpoint: options.azureEndpoint,
      apiVersion: options.azureApiVersion,
      timeout: options.timeoutMs,
      maxRetries: 0,
    });
  }

  return new OpenAI({ apiKey: options.apiKey, timeout: options.timeoutMs, maxRetries: 0 });
}

export function buildSummaryPrompt(text: string): string {
  return `Summarize the following text:\n\n${text}`;
}

export function createOpenAiSummarizer(options: OpenAiSummarizerOptions): Summarizer {
  const { client, model, maxTokens } = options;

  return async (text: string): Promise<string> => {
    logger.debug({ model, inputLength: text.length }, 'Generating summary');

    const response = await client.chat.completions.create({
      model,
      messages: [{ role: 'system', content: buildSummaryPrompt(text) }],
      max_tokens: maxTokens,
    });

    const content = response.choices[0]?.message?.content?.trim();
    if (!content) {
      throw new Error('Empty response from OpenAI');
    }

    logger.debug(
      { model, summaryLength: content.length, tokensUsed: response.usage?.total_tokens ?? 0 },
      'Summary generated'
    );

    return content;
  };
}
