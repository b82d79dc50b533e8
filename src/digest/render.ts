/**
 * Digest HTML renderer
 */

import type { DigestEntry } from '../types/index.js';

export interface RenderOptions {
  heading: string;
  generatedAt: Date;
}

const STYLES = `
    body {
      font-family: Arial, sans-serif;
      margin: 0;
      padding: 20px;
      background-color: #f9f9f9;
    }
    .container {
      max-width: 600px;
      margin: auto;
      background: white;
      padding: 20px;
      box-shadow: 0 0 10px rgba(0, 0, 0, 0.1);
    }
    h2 {
      color: #333;
      border-bottom: 1px solid #d3d3d3;
      padding-bottom: 10px;
    }
    .news-item {
      margin-bottom: 15px;
    }
    .news-title a {
      color: #000;
      text-decoration: none;
      font-weight: bold;
      font-size: 16px;
    }
    .news-url, .news-meta {
      color: #666;
      margin-top: 5px;
      font-size: 14px;
    }
    .news-summary {
      color: #333;
      margin-top: 5px;
      font-size: 16px;
    }`;

export function escapeHtml(value: string): string {
  return value
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;')
    .replace(/'/g, '&#x27;');
}

function renderEntry(entry: DigestEntry): string {
  const url = escapeHtml(entry.url);
  const meta = entry.publishedAt
    ? `${entry.sourceTag} · ${entry.publishedAt.toISOString().slice(0, 16).replace('T', ' ')} UTC`
    : entry.sourceTag;

  return `
      <div class="news-item">
        <div class="news-title"><a href="${url}" target="_blank">${escapeHtml(entry.title)}</a></div>
        <div class="news-url">${url}</div>
        <div class="news-meta">${escapeHtml(meta)}</div>
        <div class="news-summary">${escapeHtml(entry.summary)}</div>
      </div>`;
}

export function renderDigestHtml(entries: readonly DigestEntry[], options: RenderOptions): string {
  const heading = escapeHtml(options.heading);
  const body =
    entries.length > 0
      ? entries.map(renderEntry).join('')
      : '\n      <p class="news-empty">No new items.</p>';

  return `<html>
  <head>
    <meta charset="UTF-8">
    <title>${heading}</title>
    <style>${STYLES}
    </style>
  </head>
  <body>
    <div class="container">
      <h2>${heading}</h2>
      <p class="news-meta">Generated ${escapeHtml(options.generatedAt.toISOString())}</p>${body}
    </div>
  </body>
</html>
`;
}
