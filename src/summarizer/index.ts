/**
 * Summarizer Module
 *
 * OpenAI-powered summarization behind a content-addressed cache
 */

export {
  createOpenAiClient,
  createOpenAiSummarizer,
  buildSummaryPrompt,
  type Summarizer,
  type ChatCompletionClient,
  type OpenAiClientOptions,
  type OpenAiSummarizerOptions,
} from './summarizer.js';

export {
  summarizeUrl,
  truncateText,
  type SummarizeDeps,
  type SummarizeOptions,
} from './orchestrator.js';
