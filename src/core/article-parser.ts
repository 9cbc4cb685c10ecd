/**
 * Article Parser
 *
 * Turns article HTML into {title, author, publishedAt, bodyText}. Two
 * strategies share the metadata helpers:
 *
 * - structured: JSON-LD (NewsArticle / Article / BlogPosting, including
 *   @graph), OpenGraph and article meta tags, itemprop="articleBody"
 * - heuristic: strips page chrome and picks the container holding the
 *   densest run of paragraph text
 *
 * @see https://schema.org/NewsArticle
 * @see https://ogp.me/
 */

import * as cheerio from 'cheerio';
import type { ArticleContent } from '../types/index.js';

const ARTICLE_TYPES = new Set([
  'NewsArticle',
  'Article',
  'BlogPosting',
  'ReportageNewsArticle',
  'AnalysisNewsArticle',
  'OpinionNewsArticle',
  'Report',
]);

/** Elements that never hold article text */
const CHROME_SELECTORS = [
  'script',
  'style',
  'noscript',
  'iframe',
  'svg',
  'nav',
  'header',
  'footer',
  'aside',
  'form',
  'button',
  '[role="navigation"]',
  '[role="complementary"]',
  '[aria-hidden="true"]',
  '.advertisement',
  '.ad',
  '.related',
  '.newsletter',
  '.comments',
];

/** Paragraphs shorter than this are captions, bylines or buttons */
const MIN_PARAGRAPH_CHARS = 25;

type JsonRecord = Record<string, unknown>;

function isRecord(value: unknown): value is JsonRecord {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function normalizeWhitespace(text: string): string {
  return text.replace(/\s+/g, ' ').trim();
}

function nonEmpty(value: string | undefined | null): string | null {
  if (typeof value !== 'string') return null;
  const normalized = normalizeWhitespace(value);
  return normalized ? normalized : null;
}

// ============================================
// JSON-LD
// ============================================

function collectJsonLdNodes(data: unknown, out: JsonRecord[]): void {
  if (Array.isArray(data)) {
    for (const item of data) collectJsonLdNodes(item, out);
    return;
  }
  if (!isRecord(data)) return;

  out.push(data);
  const graph = data['@graph'];
  if (Array.isArray(graph)) {
    collectJsonLdNodes(graph, out);
  }
}

function hasArticleType(node: JsonRecord): boolean {
  const type = node['@type'];
  if (typeof type === 'string') return ARTICLE_TYPES.has(type);
  if (Array.isArray(type)) {
    return type.some((t) => typeof t === 'string' && ARTICLE_TYPES.has(t));
  }
  return false;
}

function stringField(node: JsonRecord, key: string): string | null {
  const value = node[key];
  return typeof value === 'string' ? nonEmpty(value) : null;
}

function authorName(value: unknown): string | null {
  if (typeof value === 'string') return nonEmpty(value);
  if (Array.isArray(value)) {
    const names = value.map(authorName).filter((name): name is string => name !== null);
    return names.length > 0 ? names.join(', ') : null;
  }
  if (isRecord(value)) {
    return stringField(value, 'name');
  }
  return null;
}

/**
 * First JSON-LD node typed as an article, or null
 */
export function findJsonLdArticle($: cheerio.CheerioAPI): JsonRecord | null {
  const nodes: JsonRecord[] = [];

  $('script[type="application/ld+json"]').each((_, el) => {
    const content = $(el).html();
    if (!content) return;
    try {
      const parsed: unknown = JSON.parse(content);
      collectJsonLdNodes(parsed, nodes);
    } catch {
      // Malformed JSON-LD blocks are common; other sources still apply
      return;
    }
  });

  return nodes.find(hasArticleType) ?? null;
}

// ============================================
// META
// ============================================

function metaContent($: cheerio.CheerioAPI, selectors: string[]): string | null {
  for (const selector of selectors) {
    const value = nonEmpty($(selector).first().attr('content'));
    if (value) return value;
  }
  return null;
}

interface ArticleMetadata {
  title: string | null;
  author: string | null;
  publishedAt: string | null;
}

/**
 * Title, author and publication date from JSON-LD, meta tags and markup
 */
export function extractArticleMetadata($: cheerio.CheerioAPI, jsonLd: JsonRecord | null = findJsonLdArticle($)): ArticleMetadata {
  const title =
    (jsonLd && (stringField(jsonLd, 'headline') ?? stringField(jsonLd, 'name'))) ??
    metaContent($, ['meta[property="og:title"]', 'meta[name="twitter:title"]']) ??
    nonEmpty($('h1').first().text()) ??
    nonEmpty($('title').first().text());

  const author =
    (jsonLd && authorName(jsonLd['author'])) ??
    metaContent($, ['meta[name="author"]', 'meta[property="article:author"]', 'meta[name="byl"]']) ??
    nonEmpty($('[itemprop="author"]').first().text()) ??
    nonEmpty($('[rel="author"]').first().text());

  const publishedAt =
    (jsonLd && stringField(jsonLd, 'datePublished')) ??
    metaContent($, [
      'meta[property="article:published_time"]',
      'meta[name="pubdate"]',
      'meta[name="date"]',
      'meta[itemprop="datePublished"]',
    ]) ??
    nonEmpty($('time[datetime]').first().attr('datetime'));

  return { title, author, publishedAt };
}

// ============================================
// STRATEGIES
// ============================================

/**
 * Structured-metadata strategy. Returns null when the page carries no
 * structured article body.
 */
export function parseStructuredArticle(html: string): ArticleContent | null {
  if (!html) return null;
  const $ = cheerio.load(html);
  const jsonLd = findJsonLdArticle($);

  let bodyText = jsonLd ? stringField(jsonLd, 'articleBody') : null;

  if (!bodyText) {
    const container = $('[itemprop="articleBody"]').first();
    const paragraphs: string[] = [];
    container.find('p').each((_, el) => {
      const text = normalizeWhitespace($(el).text());
      if (text) paragraphs.push(text);
    });
    bodyText = paragraphs.length > 0 ? paragraphs.join('\n\n') : nonEmpty(container.text());
  }

  if (!bodyText) return null;

  const metadata = extractArticleMetadata($, jsonLd);
  return {
    title: metadata.title ?? '',
    author: metadata.author,
    publishedAt: metadata.publishedAt,
    bodyText,
  };
}

/**
 * Densest-paragraph strategy. Scores each container by the paragraph text
 * among its direct children and keeps the best one; the first container
 * wins a tie.
 */
export function parseHeuristicArticle(html: string): ArticleContent | null {
  if (!html) return null;
  const $ = cheerio.load(html);
  const metadata = extractArticleMetadata($);

  $(CHROME_SELECTORS.join(', ')).remove();

  let bodyText = '';
  let bestScore = 0;
  $('article, main, section, div, td, body').each((_, el) => {
    const paragraphs: string[] = [];
    let score = 0;
    $(el)
      .children('p')
      .each((_, p) => {
        const text = normalizeWhitespace($(p).text());
        if (text.length < MIN_PARAGRAPH_CHARS) return;
        paragraphs.push(text);
        score += text.length;
      });
    if (score > bestScore) {
      bestScore = score;
      bodyText = paragraphs.join('\n\n');
    }
  });

  if (!bodyText) return null;

  return {
    title: metadata.title ?? '',
    author: metadata.author,
    publishedAt: metadata.publishedAt,
    bodyText,
  };
}
