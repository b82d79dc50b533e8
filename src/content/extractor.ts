/**
 * Article Content Extractor
 *
 * Downloads a page and extracts its main article text
 */

import { parse, type HTMLElement } from 'node-html-parser';
import { httpGet, type HttpOptions } from '../utils/http.js';
import { logger } from '../utils/logger.js';

const UNWANTED_SELECTORS = [
  'script',
  'style',
  'noscript',
  'nav',
  'header',
  'footer',
  'aside',
  'form',
  '.sidebar',
  '.menu',
  '.navigation',
  '.comments',
  '.social-share',
  '.advertisement',
  '.ads',
  '[class*="cookie"]',
  '[class*="popup"]',
  '[class*="modal"]',
  '[class*="banner"]',
];

const CONTENT_SELECTORS = [
  'article',
  '[class*="article-body"]',
  '[class*="article-content"]',
  '[class*="post-content"]',
  '[class*="entry-content"]',
  '.content',
  'main',
  '[role="main"]',
];

const MIN_CONTAINER_LENGTH = 200;
const MIN_BLOCK_LENGTH = 30;

function cleanText(text: string): string {
  return text.replace(/\s+/g, ' ').trim();
}

function findContentElement(root: HTMLElement): HTMLElement {
  for (const selector of CONTENT_SELECTORS) {
    const el = root.querySelector(selector);
    if (el && el.text.trim().length > MIN_CONTAINER_LENGTH) {
      return el;
    }
  }

  // Fallback to body if no specific container found
  return root.querySelector('body') ?? root;
}

/**
 * Extract readable text from an HTML document, null when nothing substantial remains
 */
export function extractTextFromHtml(html: string): string | null {
  const root = parse(html);

  for (const selector of UNWANTED_SELECTORS) {
    root.querySelectorAll(selector).forEach((el) => el.remove());
  }

  const contentElement = findContentElement(root);

  const paragraphs = contentElement
    .querySelectorAll('p')
    .map((p) => cleanText(p.text))
    .filter((text) => text.length > MIN_BLOCK_LENGTH);

  // If no paragraphs found, split the container text into blocks
  if (paragraphs.length === 0) {
    const blocks = contentElement.text
      .split(/\n\s*\n/)
      .map(cleanText)
      .filter((block) => block.length > MIN_BLOCK_LENGTH);
    paragraphs.push(...blocks);
  }

  return paragraphs.length > 0 ? paragraphs.join('\n\n') : null;
}

/**
 * Fetch a URL and extract its article text
 */
export async function extractArticleText(url: string, options: HttpOptions): Promise<string | null> {
  logger.debug({ url }, 'Fetching article content');

  const response = await httpGet(url, { ...options, accept: 'text/html,application/xhtml+xml' });
  const text = extractTextFromHtml(await response.text());

  logger.debug({ url, contentLength: text?.length ?? 0 }, 'Content extracted');

  return text;
}
