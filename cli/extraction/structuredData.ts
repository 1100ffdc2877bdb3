import * as cheerio from 'cheerio';
import type { ArticleCandidate, ParagraphBlock, StrategyResult } from '../../shared/types';
import { parseLenientJson } from '../utils/jsonExtract';
import { absolutizeUrl, isHttpUrl, normalizeWhitespace } from '../utils/text';
import { defaultMarkupRules, type MarkupRules } from './rules';

type JsonRecord = Record<string, unknown>;

const isRecord = (value: unknown): value is JsonRecord =>
  typeof value === 'object' && value !== null && !Array.isArray(value);

const asText = (value: unknown): string | undefined => {
  if (typeof value !== 'string') return undefined;
  const trimmed = value.trim();
  return trimmed ? trimmed : undefined;
};

/** Raw contents of every ld+json script block, in page order. */
export const findStructuredDataBlocks = (html: string): string[] => {
  const $ = cheerio.load(html);
  return $('script[type="application/ld+json" i]')
    .toArray()
    .map((el) => $(el).html() ?? '');
};

const flattenRecords = (value: unknown, out: JsonRecord[]) => {
  if (Array.isArray(value)) {
    for (const item of value) flattenRecords(item, out);
    return;
  }
  if (!isRecord(value)) return;
  out.push(value);
  if (Array.isArray(value['@graph'])) {
    flattenRecords(value['@graph'], out);
  }
};

const recordTypes = (record: JsonRecord): string[] => {
  const type = record['@type'];
  if (typeof type === 'string') return [type];
  if (Array.isArray(type)) return type.filter((t): t is string => typeof t === 'string');
  return [];
};

export const isArticleLikeRecord = (record: JsonRecord, rules: MarkupRules = defaultMarkupRules): boolean =>
  recordTypes(record).some((type) => {
    const normalized = type.toLowerCase();
    return rules.articleTypes.has(normalized) || normalized.includes('article');
  });

const recordBody = (record: JsonRecord): string | undefined =>
  typeof record.articleBody === 'string' ? record.articleBody : typeof record.text === 'string' ? record.text : undefined;

const hasBodyField = (record: JsonRecord): boolean => recordBody(record) !== undefined;

// `image` is a URL, a list of URLs or ImageObjects, or a single ImageObject.
const imageUrl = (value: unknown): string | undefined => {
  if (typeof value === 'string') return asText(value);
  if (Array.isArray(value)) return value.length ? imageUrl(value[0]) : undefined;
  if (isRecord(value)) return asText(value.url) ?? asText(value.contentUrl);
  return undefined;
};

const httpUrl = (value: string | undefined, base: string): string | undefined => {
  if (!value) return undefined;
  const absolute = absolutizeUrl(value, base);
  return absolute && isHttpUrl(absolute) ? absolute : undefined;
};

const personName = (value: unknown): string | undefined => {
  if (typeof value === 'string') return asText(value);
  if (Array.isArray(value)) {
    for (const entry of value) {
      const name = personName(entry);
      if (name) return name;
    }
    return undefined;
  }
  if (isRecord(value)) return asText(value.name);
  return undefined;
};

/**
 * Splits a plain-text body into paragraphs: blank lines first, single line breaks when the
 * body has no blank lines at all.
 */
export const splitBodyIntoParagraphs = (body: string): string[] => {
  const normalized = body.replace(/\r\n?/g, '\n').trim();
  if (!normalized) return [];
  let chunks = normalized.split(/\n[ \t]*\n/);
  if (chunks.length === 1 && normalized.includes('\n')) {
    chunks = normalized.split('\n');
  }
  return chunks.map((chunk) => normalizeWhitespace(chunk)).filter(Boolean);
};

const toParagraph = (text: string): ParagraphBlock => ({ type: 'paragraph', text, spans: [{ text }] });

export const extractStructuredData = (
  html: string,
  sourceUrl: string,
  rules: MarkupRules = defaultMarkupRules,
): StrategyResult => {
  const records: JsonRecord[] = [];
  for (const block of findStructuredDataBlocks(html)) {
    const decoded = parseLenientJson(block);
    if (decoded !== undefined) flattenRecords(decoded, records);
  }

  const record = records.find(
    (candidate) => isArticleLikeRecord(candidate, rules) && asText(candidate.headline) !== undefined && hasBodyField(candidate),
  );
  if (!record) {
    return { kind: 'declined', reason: 'no_structured_data', detail: `${records.length} record(s) decoded, none article-like` };
  }

  const paragraphs = splitBodyIntoParagraphs(recordBody(record) ?? '');
  if (!paragraphs.length) {
    return { kind: 'declined', reason: 'empty_body', detail: 'structured data body is empty' };
  }

  const candidate: ArticleCandidate = {
    title: normalizeWhitespace(asText(record.headline) ?? ''),
    author: personName(record.author),
    publishedDate: asText(record.datePublished) ?? asText(record.dateCreated),
    description: asText(record.description),
    image: httpUrl(imageUrl(record.image), sourceUrl),
    sourceUrl,
    blocks: paragraphs.map(toParagraph),
    extractedBy: 'structured-data',
  };
  return { kind: 'extracted', candidate };
};
