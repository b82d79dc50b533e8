/**
 * Main Pipeline
 *
 * Orchestrates one digest run:
 * 1. Fetch raw hits from each source
 * 2. Normalize them into candidate items
 * 3. Filter by scope and deduplicate by URL
 * 4. Summarize each item through the summary cache
 * 5. Assemble, render and deliver the digest
 *
 * Sources and items are processed strictly one after another.
 */

import { writeFile } from 'node:fs/promises';
import { config } from './config/index.js';
import { FsSummaryCache, type SummaryCache } from './cache/index.js';
import { createContentResolver, extractArticleText, type ContentResolver } from './content/index.js';
import { assembleDigest, renderDigestHtml } from './digest/index.js';
import { dedupeByUrl, filterInScope } from './filter/index.js';
import { isEmailAvailable, sendDigestEmail } from './mailer/index.js';
import {
  createConfiguredSources,
  fetchSourceHits,
  normalizeHits,
  type DigestSource,
} from './sources/index.js';
import {
  createOpenAiClient,
  createOpenAiSummarizer,
  summarizeUrl,
  type Summarizer,
} from './summarizer/index.js';
import { logger } from './utils/logger.js';
import type { CandidateItem, DigestRunResult, DigestRunStats } from './types/index.js';

/**
 * Collaborators of a run
 */
export interface PipelineDeps {
  sources: DigestSource[];
  cache: SummaryCache;
  resolver: Pick<ContentResolver, 'resolve'>;
  summarize: Summarizer;
}

/**
 * Pipeline options
 */
export interface PipelineOptions {
  now?: Date;
  maxCharacters: number;
  cacheEmptyExtractions?: boolean;
  dedupeAcrossSources?: boolean;
  skipSummarize?: boolean;
}

function emptyStats(sources: number): DigestRunStats {
  return {
    sources,
    sourceErrors: 0,
    fetched: 0,
    dropped: 0,
    outOfScope: 0,
    duplicates: 0,
    summarized: 0,
    summaryErrors: 0,
    durationMs: 0,
  };
}

/**
 * Fetch, normalize, filter and dedupe one source
 */
async function collectSource(
  source: DigestSource,
  now: Date,
  stats: DigestRunStats
): Promise<CandidateItem[]> {
  const fetched = await fetchSourceHits(source, now);
  if (!fetched.ok) {
    logger.error({ source: source.name, reason: fetched.error }, 'Source fetch failed');
    stats.sourceErrors++;
    return [];
  }

  const { items, dropped } = normalizeHits(fetched.value);
  for (const { raw, reason } of dropped) {
    logger.warn({ source: source.name, reason, hit: raw.hit }, 'Dropping malformed item');
  }

  const { kept, rejected } = filterInScope(items, now, source.criteria);
  const { unique, duplicates } = dedupeByUrl(kept);

  stats.fetched += fetched.value.length;
  stats.dropped += dropped.length;
  stats.outOfScope += rejected.length;
  stats.duplicates += duplicates.length;

  logger.info(
    {
      source: source.name,
      fetched: fetched.value.length,
      dropped: dropped.length,
      outOfScope: rejected.length,
      duplicates: duplicates.length,
      kept: unique.length,
    },
    'Source processed'
  );

  return unique;
}

/**
 * Drop items whose URL an earlier source already produced
 */
function dropSeenUrls(
  items: CandidateItem[],
  seenUrls: Set<string>,
  stats: DigestRunStats
): CandidateItem[] {
  const fresh = items.filter((item) => !seenUrls.has(item.url));
  for (const item of fresh) {
    seenUrls.add(item.url);
  }
  stats.duplicates += items.length - fresh.length;
  return fresh;
}

/**
 * Attach summaries; a failure leaves that item's summary empty
 */
async function summarizeItems(
  items: CandidateItem[],
  deps: PipelineDeps,
  options: PipelineOptions,
  stats: DigestRunStats
): Promise<void> {
  for (const item of items) {
    try {
      item.summary = await summarizeUrl(item.url, deps, {
        maxCharacters: options.maxCharacters,
        cacheEmptyExtractions: options.cacheEmptyExtractions,
      });
      if (item.summary !== '') {
        stats.summarized++;
      }
    } catch (error) {
      stats.summaryErrors++;
      logger.error({ error, url: item.url }, 'Failed to summarize item');
    }
  }
}

/**
 * Run the aggregation pipeline over every source
 */
export async function runDigestPipeline(
  deps: PipelineDeps,
  options: PipelineOptions
): Promise<DigestRunResult> {
  const startTime = Date.now();
  const now = options.now ?? new Date();
  const stats = emptyStats(deps.sources.length);
  const batches: CandidateItem[][] = [];
  const dedupeAcrossSources = options.dedupeAcrossSources ?? true;
  const seenUrls = new Set<string>();

  logger.info({ sources: deps.sources.length, now: now.toISOString() }, 'Starting pipeline');

  for (const source of deps.sources) {
    const collected = await collectSource(source, now, stats);
    // Cross-source duplicates are dropped before any fetch or summarizer call
    const items = dedupeAcrossSources ? dropSeenUrls(collected, seenUrls, stats) : collected;

    if (!options.skipSummarize) {
      await summarizeItems(items, deps, options, stats);
    }

    batches.push(items);
  }

  const { entries, duplicates } = assembleDigest(batches, { dedupeAcrossSources });
  stats.duplicates += duplicates;
  stats.durationMs = Date.now() - startTime;

  logger.info({ stats, entries: entries.length }, 'Pipeline complete');

  return { entries, stats };
}

/**
 * Build the production collaborators from application config
 */
export async function createDefaultDependencies(): Promise<PipelineDeps> {
  const http = { userAgent: config.http.userAgent, timeoutMs: config.http.timeout };

  const client = createOpenAiClient({
    apiKey: config.openai.apiKey,
    azureEndpoint: config.openai.azureEndpoint,
    azureApiVersion: config.openai.azureApiVersion,
    timeoutMs: config.http.timeout,
  });

  return {
    sources: await createConfiguredSources(),
    cache: new FsSummaryCache(config.cache.dir),
    resolver: createContentResolver((url) => extractArticleText(url, http)),
    summarize: createOpenAiSummarizer({
      client,
      model: config.openai.model,
      maxTokens: config.openai.maxTokens,
    }),
  };
}

export interface DigestRunOptions {
  dryRun?: boolean;
}

/**
 * Run the pipeline from config, then render and deliver the digest
 */
export async function runDigest(options: DigestRunOptions = {}): Promise<DigestRunResult> {
  const deps = await createDefaultDependencies();
  const generatedAt = new Date();

  const result = await runDigestPipeline(deps, {
    now: generatedAt,
    maxCharacters: config.digest.maxCharacters,
    cacheEmptyExtractions: config.cache.cacheEmptyExtractions,
    dedupeAcrossSources: config.digest.dedupeAcrossSources,
  });

  const html = renderDigestHtml(result.entries, { heading: config.digest.subject, generatedAt });

  if (options.dryRun) {
    await writeFile(config.digest.outputFile, html, 'utf-8');
    logger.info({ file: config.digest.outputFile }, 'DRY RUN - digest written to file');
  } else if (!isEmailAvailable()) {
    logger.warn('Email not configured, skipping delivery');
  } else {
    await sendDigestEmail({ subject: config.digest.subject, html });
  }

  return result;
}
