import { describe, expect, it } from 'vitest';
import { structuredDataPage } from '../../__tests__/helpers';
import { extractStructuredData, findStructuredDataBlocks, splitBodyIntoParagraphs } from '../structuredData';

const SOURCE_URL = 'https://medium.com/@someone/test-title-0123';

describe('extractStructuredData', () => {
  it('turns an article record into paragraph blocks in body order', () => {
    const html = structuredDataPage({
      '@context': 'https://schema.org',
      '@type': 'Article',
      headline: 'Test Title',
      articleBody: 'Para one.\n\nPara two.',
    });

    const result = extractStructuredData(html, SOURCE_URL);

    expect(result).toEqual({
      kind: 'extracted',
      candidate: {
        title: 'Test Title',
        author: undefined,
        publishedDate: undefined,
        description: undefined,
        sourceUrl: SOURCE_URL,
        blocks: [
          { type: 'paragraph', text: 'Para one.', spans: [{ text: 'Para one.' }] },
          { type: 'paragraph', text: 'Para two.', spans: [{ text: 'Para two.' }] },
        ],
        extractedBy: 'structured-data',
      },
    });
  });

  it('keeps paragraph order for longer bodies', () => {
    const paragraphs = ['Alpha opens.', 'Bravo follows.', 'Charlie continues.', 'Delta nears the end.', 'Echo closes.'];
    const html = structuredDataPage({ '@type': 'BlogPosting', headline: 'Order', articleBody: paragraphs.join('\n\n') });

    const result = extractStructuredData(html, SOURCE_URL);
    if (result.kind !== 'extracted') throw new Error(`expected extraction, got ${result.reason}`);
    expect(result.candidate.blocks.map((block) => (block.type === 'paragraph' ? block.text : block.type))).toEqual(
      paragraphs,
    );
  });

  it('reads records nested in @graph and collects metadata', () => {
    const html = structuredDataPage({
      '@context': 'https://schema.org',
      '@graph': [
        { '@type': 'WebPage', name: 'Wrapper' },
        {
          '@type': ['NewsArticle'],
          headline: '  Graph   Story ',
          text: 'Only body.',
          author: [{ '@type': 'Person', name: 'Jane Doe' }],
          dateCreated: '2024-01-02',
          description: 'A short summary',
        },
      ],
    });

    const result = extractStructuredData(html, SOURCE_URL);
    expect(result).toMatchObject({
      kind: 'extracted',
      candidate: {
        title: 'Graph Story',
        author: 'Jane Doe',
        publishedDate: '2024-01-02',
        description: 'A short summary',
      },
    });
  });

  it('reads the lead image from its string, list and object forms', () => {
    const imageOf = (image: unknown) => {
      const result = extractStructuredData(
        structuredDataPage({ '@type': 'Article', headline: 'Pictured', articleBody: 'Body.', image }),
        SOURCE_URL,
      );
      return result.kind === 'extracted' ? result.candidate.image : `declined: ${result.reason}`;
    };

    expect(imageOf('/lead.png')).toBe('https://medium.com/lead.png');
    expect(imageOf([{ '@type': 'ImageObject', url: 'https://cdn.example.com/1.png' }, 'https://cdn.example.com/2.png'])).toBe(
      'https://cdn.example.com/1.png',
    );
    expect(imageOf({ '@type': 'ImageObject', url: 'https://cdn.example.com/obj.png' })).toBe('https://cdn.example.com/obj.png');
    expect(imageOf('javascript:alert(1)')).toBeUndefined();
    expect(imageOf([])).toBeUndefined();
  });

  it('recovers blocks that are not strict JSON', () => {
    const html = `<html><head><script type="application/ld+json">
      <!-- {"@type": "Article", headline: 'Lenient', articleBody: 'Body text.',} -->
    </script></head><body></body></html>`;

    const result = extractStructuredData(html, SOURCE_URL);
    expect(result).toMatchObject({ kind: 'extracted', candidate: { title: 'Lenient' } });
  });

  it('declines when no article-like record exists', () => {
    expect(extractStructuredData('<html><body><p>Plain</p></body></html>', SOURCE_URL)).toMatchObject({
      kind: 'declined',
      reason: 'no_structured_data',
    });
    const orgOnly = structuredDataPage({ '@type': 'Organization', name: 'Example' });
    expect(extractStructuredData(orgOnly, SOURCE_URL)).toMatchObject({ kind: 'declined', reason: 'no_structured_data' });
  });

  it('declines when the record has no body field', () => {
    const html = structuredDataPage({ '@type': 'Article', headline: 'Headline only' });
    expect(extractStructuredData(html, SOURCE_URL)).toMatchObject({ kind: 'declined', reason: 'no_structured_data' });
  });

  it('declines with empty_body when the body is blank', () => {
    const html = structuredDataPage({ '@type': 'Article', headline: 'Blank', articleBody: '  \n\n ' });
    expect(extractStructuredData(html, SOURCE_URL)).toMatchObject({ kind: 'declined', reason: 'empty_body' });
  });

  it('skips undecodable blocks and keeps looking', () => {
    const html = `<script type="application/ld+json">{ not json at all</script>
      <script type="application/ld+json">{"@type":"Article","headline":"Second","articleBody":"Found."}</script>`;
    expect(extractStructuredData(html, SOURCE_URL)).toMatchObject({ kind: 'extracted', candidate: { title: 'Second' } });
  });
});

describe('findStructuredDataBlocks', () => {
  it('returns raw block contents in page order', () => {
    const html = `<script type="application/ld+json">{"a":1}</script><script>var x;</script><script type='application/ld+json'>[2]</script>`;
    expect(findStructuredDataBlocks(html)).toEqual(['{"a":1}', '[2]']);
  });

  it('ignores commented-out scripts and look-alike attributes', () => {
    const html = `<!-- <script type="application/ld+json">{"old":1}</script> -->
      <script data-type="application/ld+json">{"no":1}</script>
      <script type="Application/LD+JSON">{"yes":1}</script>`;
    expect(findStructuredDataBlocks(html)).toEqual(['{"yes":1}']);
  });
});

describe('splitBodyIntoParagraphs', () => {
  it('splits on blank lines first', () => {
    expect(splitBodyIntoParagraphs('One.\nstill one.\n\nTwo.')).toEqual(['One. still one.', 'Two.']);
  });

  it('falls back to single line breaks', () => {
    expect(splitBodyIntoParagraphs('Line one.\r\nLine two.\nLine three.')).toEqual(['Line one.', 'Line two.', 'Line three.']);
  });
});
