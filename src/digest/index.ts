/**
 * Digest Module
 *
 * Assembles summarized items and renders the HTML digest
 */

export { assembleDigest, toDigestEntry, type AssembleOptions } from './assembler.js';
export { renderDigestHtml, escapeHtml, type RenderOptions } from './render.js';
