/**
 * Content Module
 */

export { createContentResolver, type ContentResolver, type Extractor } from './resolver.js';
export { extractArticleText, extractTextFromHtml } from './extractor.js';
