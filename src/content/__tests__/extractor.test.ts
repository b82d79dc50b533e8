import { describe, expect, it } from 'vitest';
import { extractTextFromHtml } from '../extractor.js';

const LONG_PARAGRAPH =
  'The release introduces a new scheduler that places workloads closer to their data, ' +
  'reducing cross-zone traffic for most clusters.';
const SECOND_PARAGRAPH = 'Operators can opt in per namespace while the feature is in beta.';

describe('extractTextFromHtml', () => {
  it('keeps article paragraphs and drops page chrome', () => {
    const html = `<html><body>
      <nav><p>Home | Blog | About us and other navigation links</p></nav>
      <article>
        <h1>Release notes</h1>
        <p>${LONG_PARAGRAPH}</p>
        <p>Short.</p>
        <p>${SECOND_PARAGRAPH}</p>
        <div class="cookie-banner"><p>We use cookies to improve your experience on this site.</p></div>
      </article>
      <footer><p>Copyright notice and a long footer paragraph for the site.</p></footer>
      <script>var tracking = "a long inline script body that should vanish";</script>
    </body></html>`;

    expect(extractTextFromHtml(html)).toBe(`${LONG_PARAGRAPH}\n\n${SECOND_PARAGRAPH}`);
  });

  it('falls back to the body when no container has enough text', () => {
    const html = `<html><body><div><p>${SECOND_PARAGRAPH}</p></div></body></html>`;

    expect(extractTextFromHtml(html)).toBe(SECOND_PARAGRAPH);
  });

  it('collapses whitespace inside paragraphs', () => {
    const html = '<body><p>Line one of a paragraph\n      continues on line two here.</p></body>';

    expect(extractTextFromHtml(html)).toBe('Line one of a paragraph continues on line two here.');
  });

  it('returns null when nothing substantial remains', () => {
    expect(extractTextFromHtml('<html><body><p>Too short.</p></body></html>')).toBeNull();
  });
});
