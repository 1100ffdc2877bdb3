import * as cheerio from 'cheerio';
import { describe, expect, it } from 'vitest';
import type { Article } from '../../../shared/types';
import { TRUNCATION_NOTICE, formatPublishedDate, renderArticle, renderBlock } from '../renderer';

const baseArticle: Article = {
  title: 'Test Title',
  sourceUrl: 'https://medium.com/@someone/test-title-0123',
  blocks: [
    { type: 'paragraph', text: 'Para one.', spans: [{ text: 'Para one.' }] },
    { type: 'paragraph', text: 'Para two.', spans: [{ text: 'Para two.' }] },
  ],
  truncated: false,
  extractedBy: 'structured-data',
};

const RENDER_OPTIONS = { generatedAt: new Date('2026-01-02T03:04:05.678Z') };
const render = (article: Article) => renderArticle(article, RENDER_OPTIONS);

describe('renderArticle', () => {
  it('puts the title heading before the body paragraphs', () => {
    const $ = cheerio.load(render(baseArticle));

    expect($('h1')).toHaveLength(1);
    expect(
      $('h1, .article-body p')
        .toArray()
        .map((el) => [el.name, $(el).text()]),
    ).toEqual([
      ['h1', 'Test Title'],
      ['p', 'Para one.'],
      ['p', 'Para two.'],
    ]);
    expect($('title').text()).toBe('Test Title');
  });

  it('is self-contained', () => {
    const $ = cheerio.load(render(baseArticle));
    expect($('script, link')).toHaveLength(0);
    expect($('style')).toHaveLength(1);
  });

  it('shows the truncation notice only for truncated articles', () => {
    expect(cheerio.load(render(baseArticle))('.truncation-notice')).toHaveLength(0);

    const $ = cheerio.load(render({ ...baseArticle, truncated: true }));
    expect($('aside.truncation-notice').text()).toBe(TRUNCATION_NOTICE);
  });

  it('renders the byline with a formatted date and source link', () => {
    const $ = cheerio.load(
      render({ ...baseArticle, author: 'Jane Doe', publishedDate: '2024-03-05T10:00:00Z', description: 'Sub' }),
    );
    expect($('.article-author').text()).toBe('By Jane Doe');
    expect($('.article-date').text()).toBe('March 5, 2024');
    expect($('.article-source').attr('href')).toBe(baseArticle.sourceUrl);
    expect($('.article-description').text()).toBe('Sub');
  });

  it('escapes text taken from the page', () => {
    const title = '<script>alert("x")</script> & more';
    const html = render({ ...baseArticle, title, author: '<b>Mallory</b>' });
    const $ = cheerio.load(html);

    expect($('script')).toHaveLength(0);
    expect($('h1').text()).toBe(title);
    expect($('.article-author').text()).toBe('By <b>Mallory</b>');
    expect(html).toContain('<h1 class="article-title">&lt;script&gt;alert(&quot;x&quot;)&lt;/script&gt; &amp; more</h1>');
  });

  it('shows a safe lead image under the byline', () => {
    const $ = cheerio.load(render({ ...baseArticle, image: 'https://cdn.example.com/lead.png' }));
    expect($('header .article-meta + img.article-image').attr('src')).toBe('https://cdn.example.com/lead.png');
    expect($('img.article-image').attr('alt')).toBe('Test Title');

    expect(cheerio.load(render(baseArticle))('img.article-image')).toHaveLength(0);
    expect(cheerio.load(render({ ...baseArticle, image: 'javascript:alert(1)' }))('img')).toHaveLength(0);
  });

  it('renders the same document for the same input', () => {
    expect(render(baseArticle)).toBe(render(baseArticle));
  });

  it('stamps the footer with the fetch time', () => {
    const $ = cheerio.load(render(baseArticle));
    expect($('footer time').attr('datetime')).toBe('2026-01-02T03:04:05.678Z');
    expect($('footer time').text()).toBe('2026-01-02 03:04:05 UTC');
  });
});

describe('renderBlock', () => {
  it('keeps the title as the only h1', () => {
    expect(renderBlock({ type: 'heading', level: 1, text: 'Intro' })).toBe('<h2>Intro</h2>');
    expect(renderBlock({ type: 'heading', level: 4, text: 'Deep' })).toBe('<h4>Deep</h4>');
  });

  it('renders inline marks and safe links', () => {
    expect(
      renderBlock({
        type: 'paragraph',
        text: 'See x now',
        spans: [{ text: 'See ' }, { text: 'x', bold: true, italic: true, href: 'https://example.com/x' }, { text: ' now' }],
      }),
    ).toBe('<p>See <a href="https://example.com/x"><strong><em>x</em></strong></a> now</p>');
    expect(
      renderBlock({ type: 'paragraph', text: 'click', spans: [{ text: 'click', href: 'javascript:alert(1)' }] }),
    ).toBe('<p>click</p>');
    expect(renderBlock({ type: 'paragraph', text: 'a < b', spans: [{ text: 'a < b' }] })).toBe('<p>a &lt; b</p>');
  });

  it('renders images with alt text as caption', () => {
    expect(renderBlock({ type: 'image', src: 'https://example.com/a.png', alt: 'A "quoted" alt' })).toBe(
      '<figure><img src="https://example.com/a.png" alt="A &quot;quoted&quot; alt" loading="lazy"><figcaption>A &quot;quoted&quot; alt</figcaption></figure>',
    );
    expect(renderBlock({ type: 'image', src: 'data:image/png;base64,AAAA' })).toBe(
      '<figure><img src="data:image/png;base64,AAAA" alt="" loading="lazy"></figure>',
    );
    expect(renderBlock({ type: 'image', src: 'javascript:alert(1)' })).toBe('');
  });

  it('renders code, quotes and lists', () => {
    expect(renderBlock({ type: 'code', text: 'if (a < b) {}', language: 'TypeScript' })).toBe(
      '<pre><code class="language-typescript">if (a &lt; b) {}</code></pre>',
    );
    expect(renderBlock({ type: 'code', text: 'x', language: 'c"x' })).toBe('<pre><code>x</code></pre>');
    expect(renderBlock({ type: 'quote', text: 'Said it.' })).toBe('<blockquote>Said it.</blockquote>');
    expect(renderBlock({ type: 'list', ordered: true, items: ['One', 'Two & three'] })).toBe(
      '<ol><li>One</li><li>Two &amp; three</li></ol>',
    );
    expect(renderBlock({ type: 'list', ordered: false, items: ['Only'] })).toBe('<ul><li>Only</li></ul>');
  });
});

describe('formatPublishedDate', () => {
  it('formats ISO dates on their calendar day', () => {
    expect(formatPublishedDate('2024-01-05')).toBe('January 5, 2024');
    expect(formatPublishedDate('2024-01-05T23:30:00-05:00')).toBe('January 5, 2024');
  });

  it('returns unparseable values unchanged', () => {
    expect(formatPublishedDate('yesterday')).toBe('yesterday');
    expect(formatPublishedDate('2024-02-30')).toBe('2024-02-30');
  });
});
