import { describe, expect, it } from 'vitest';
import type { CandidateItem } from '../../types/index.js';
import {
  containsWholeWord,
  filterInScope,
  isInScope,
  isWithinWindow,
  matchesCategory,
  matchesKeywords,
} from '../scope.js';

const NOW = new Date('2026-10-19T08:00:00.000Z');
const HOUR_MS = 60 * 60 * 1000;
const WINDOW_MS = 24 * HOUR_MS;

const buildItem = (overrides: Partial<CandidateItem> = {}): CandidateItem => ({
  title: 'Cluster autoscaling in practice',
  url: 'https://example.com/autoscaling',
  publishedAt: NOW,
  summary: '',
  sourceTag: 'feed',
  excerpt: 'How we scaled our Kubernetes clusters during peak traffic.',
  categories: [],
  ...overrides,
});

describe('isWithinWindow', () => {
  it('includes an item dated exactly one window before now', () => {
    const item = buildItem({ publishedAt: new Date(NOW.getTime() - WINDOW_MS) });
    expect(isWithinWindow(item, NOW, WINDOW_MS)).toBe(true);
  });

  it('excludes an item dated one millisecond beyond the window', () => {
    const item = buildItem({ publishedAt: new Date(NOW.getTime() - WINDOW_MS - 1) });
    expect(isWithinWindow(item, NOW, WINDOW_MS)).toBe(false);
  });

  it('includes an item dated in the future inside the window', () => {
    const item = buildItem({ publishedAt: new Date(NOW.getTime() + 2 * HOUR_MS) });
    expect(isWithinWindow(item, NOW, WINDOW_MS)).toBe(true);
  });

  it('excludes an item dated further in the future than the window', () => {
    const item = buildItem({ publishedAt: new Date(NOW.getTime() + WINDOW_MS + 1) });
    expect(isWithinWindow(item, NOW, WINDOW_MS)).toBe(false);
  });

  it('treats an undated item as current', () => {
    expect(isWithinWindow(buildItem({ publishedAt: null }), NOW, WINDOW_MS)).toBe(true);
  });
});

describe('matchesCategory', () => {
  it('passes an item without categories', () => {
    expect(matchesCategory(buildItem({ categories: [] }), 'kubernetes')).toBe(true);
  });

  it('requires case-insensitive membership when categories are declared', () => {
    const item = buildItem({ categories: ['DevOps', 'Cloud'] });
    expect(matchesCategory(item, 'devops')).toBe(true);
    expect(matchesCategory(item, 'kubernetes')).toBe(false);
  });

  it('passes everything when no category is requested', () => {
    expect(matchesCategory(buildItem({ categories: ['Security'] }), undefined)).toBe(true);
  });
});

describe('matchesKeywords', () => {
  it('passes when no keywords are given', () => {
    expect(matchesKeywords(buildItem({ excerpt: '' }), undefined)).toBe(true);
    expect(matchesKeywords(buildItem({ excerpt: '' }), [])).toBe(true);
  });

  it('requires one keyword as a whole word in the excerpt', () => {
    const item = buildItem();
    expect(matchesKeywords(item, ['postgres', 'KUBERNETES'])).toBe(true);
    expect(matchesKeywords(item, ['kube'])).toBe(false);
  });

  it('ignores the title', () => {
    const item = buildItem({ title: 'Rust in the kernel', excerpt: 'A look at new drivers.' });
    expect(matchesKeywords(item, ['rust'])).toBe(false);
  });
});

describe('containsWholeWord', () => {
  it('matches across accents and case', () => {
    expect(containsWholeWord('Le Café de Paris', 'cafe')).toBe(true);
  });

  it('matches keywords with symbols at their edges', () => {
    expect(containsWholeWord('Modern C++ idioms', 'c++')).toBe(true);
    expect(containsWholeWord('Migrating to .NET 9', '.net')).toBe(true);
  });

  it('does not match inside a longer word', () => {
    expect(containsWholeWord('Rusty tools', 'rust')).toBe(false);
  });

  it('never matches a blank keyword', () => {
    expect(containsWholeWord('anything', '  ')).toBe(false);
  });
});

describe('isInScope / filterInScope', () => {
  it('ANDs recency, category and keyword predicates', () => {
    const criteria = { windowMs: WINDOW_MS, category: 'devops', keywords: ['kubernetes'] };

    expect(isInScope(buildItem({ categories: ['DevOps'] }), NOW, criteria)).toBe(true);
    expect(isInScope(buildItem({ categories: ['Design'] }), NOW, criteria)).toBe(false);
    expect(isInScope(buildItem({ excerpt: 'Nothing relevant.' }), NOW, criteria)).toBe(false);
    expect(
      isInScope(buildItem({ publishedAt: new Date(NOW.getTime() - 2 * WINDOW_MS) }), NOW, criteria)
    ).toBe(false);
  });

  it('splits items into kept and rejected, preserving order', () => {
    const fresh = buildItem({ url: 'https://example.com/1' });
    const stale = buildItem({
      url: 'https://example.com/2',
      publishedAt: new Date(NOW.getTime() - 3 * WINDOW_MS),
    });
    const undated = buildItem({ url: 'https://example.com/3', publishedAt: null });

    const { kept, rejected } = filterInScope([fresh, stale, undated], NOW, { windowMs: WINDOW_MS });

    expect(kept.map((item) => item.url)).toEqual(['https://example.com/1', 'https://example.com/3']);
    expect(rejected.map((item) => item.url)).toEqual(['https://example.com/2']);
  });
});
