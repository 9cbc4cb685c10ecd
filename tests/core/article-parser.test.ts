import { describe, it, expect } from 'vitest';
import {
  normalizeWhitespace,
  parseHeuristicArticle,
  parseStructuredArticle,
} from '../../src/core/article-parser.js';

const PARAGRAPH_A = 'The city council approved the budget on Tuesday evening.';
const PARAGRAPH_B = 'Members debated the transit allocation for nearly three hours.';

describe('normalizeWhitespace', () => {
  it('collapses runs of whitespace', () => {
    expect(normalizeWhitespace('  a \n\t b  ')).toBe('a b');
  });
});

describe('parseStructuredArticle', () => {
  it('reads a NewsArticle from JSON-LD', () => {
    const html = `
      <html><head>
        <script type="application/ld+json">
          {"@context": "https://schema.org", "@type": "NewsArticle",
           "headline": "Budget passes", "author": {"@type": "Person", "name": "Dana Reyes"},
           "datePublished": "2024-05-31T18:00:00Z", "articleBody": "${PARAGRAPH_A}"}
        </script>
      </head><body></body></html>`;

    expect(parseStructuredArticle(html)).toEqual({
      title: 'Budget passes',
      author: 'Dana Reyes',
      publishedAt: '2024-05-31T18:00:00Z',
      bodyText: PARAGRAPH_A,
    });
  });

  it('finds the article inside an @graph', () => {
    const html = `
      <script type="application/ld+json">
        {"@graph": [{"@type": "WebPage", "name": "Page"},
                    {"@type": ["Article"], "headline": "Graph story", "articleBody": "Body text"}]}
      </script>`;

    const content = parseStructuredArticle(html);
    expect(content?.title).toBe('Graph story');
    expect(content?.bodyText).toBe('Body text');
  });

  it('joins multiple authors', () => {
    const html = `
      <script type="application/ld+json">
        {"@type": "BlogPosting", "headline": "Joint", "articleBody": "Text",
         "author": [{"name": "A. One"}, {"name": "B. Two"}]}
      </script>`;

    expect(parseStructuredArticle(html)?.author).toBe('A. One, B. Two');
  });

  it('falls back to itemprop="articleBody" and meta tags', () => {
    const html = `
      <html><head>
        <meta property="og:title" content="Meta title">
        <meta name="author" content="Sam Lee">
        <meta property="article:published_time" content="2024-06-01">
      </head><body>
        <div itemprop="articleBody"><p>${PARAGRAPH_A}</p><p>${PARAGRAPH_B}</p></div>
      </body></html>`;

    expect(parseStructuredArticle(html)).toEqual({
      title: 'Meta title',
      author: 'Sam Lee',
      publishedAt: '2024-06-01',
      bodyText: `${PARAGRAPH_A}\n\n${PARAGRAPH_B}`,
    });
  });

  it('skips malformed JSON-LD blocks', () => {
    const html = `
      <script type="application/ld+json">{not json</script>
      <div itemprop="articleBody"><p>${PARAGRAPH_A}</p></div>`;

    expect(parseStructuredArticle(html)?.bodyText).toBe(PARAGRAPH_A);
  });

  it('returns null without a structured body', () => {
    expect(parseStructuredArticle('<html><body><p>Just a page</p></body></html>')).toBeNull();
    expect(parseStructuredArticle('')).toBeNull();
  });
});

describe('parseHeuristicArticle', () => {
  it('picks the densest paragraph container and ignores page chrome', () => {
    const html = `
      <html><head><title>Site | Budget</title></head><body>
        <nav><p>Home, World, Politics, Business, Sports, Opinion</p></nav>
        <h1>Budget passes after long debate</h1>
        <div class="sidebar"><p>Short teaser paragraph for another story.</p></div>
        <article>
          <p>${PARAGRAPH_A}</p>
          <p>By staff</p>
          <p>${PARAGRAPH_B}</p>
        </article>
        <footer><p>Copyright notice and many links to other sections.</p></footer>
      </body></html>`;

    expect(parseHeuristicArticle(html)).toEqual({
      title: 'Budget passes after long debate',
      author: null,
      publishedAt: null,
      bodyText: `${PARAGRAPH_A}\n\n${PARAGRAPH_B}`,
    });
  });

  it('reads the date from a time element', () => {
    const html = `<main><time datetime="2024-05-30">May 30</time><p>${PARAGRAPH_A}</p></main>`;
    expect(parseHeuristicArticle(html)?.publishedAt).toBe('2024-05-30');
  });

  it('returns null when no paragraph is long enough', () => {
    expect(parseHeuristicArticle('<div><p>Too short.</p></div>')).toBeNull();
    expect(parseHeuristicArticle('')).toBeNull();
  });
});
