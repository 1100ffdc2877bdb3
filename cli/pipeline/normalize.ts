import type { AppConfig } from '../../shared/config';
import type {
  Article,
  ArticleCandidate,
  ContentBlock,
  ExtractorName,
  ParseFailureReason,
  StrategyResult,
} from '../../shared/types';
import { PARSE_REASON_TEXT, ParseError } from '../errors';
import { readPageMetadata } from '../extraction/dom';
import { extractFromDom } from '../extraction/domFallback';
import { defaultMarkupRules, isBoilerplateText, type MarkupRules } from '../extraction/rules';
import { extractStructuredData } from '../extraction/structuredData';
import type { Logger } from '../obs/logger';
import { absolutizeUrl, isHttpUrl, looksCutOff } from '../utils/text';

export interface NormalizeOptions {
  truncation: AppConfig['truncation'];
  extraction: AppConfig['extraction'];
  rules?: MarkupRules;
  logger?: Logger;
}

export interface ExtractionStrategy {
  name: ExtractorName;
  run: (html: string, sourceUrl: string) => StrategyResult;
}

export type TruncationSignal = 'html-marker' | 'text-marker' | 'short-body';

export const buildStrategies = (options: NormalizeOptions): ExtractionStrategy[] => {
  const rules = options.rules ?? defaultMarkupRules;
  return [
    { name: 'structured-data', run: (html, sourceUrl) => extractStructuredData(html, sourceUrl, rules) },
    {
      name: 'dom',
      run: (html, sourceUrl) =>
        extractFromDom(html, sourceUrl, {
          minContainerParagraphs: options.extraction.minContainerParagraphs,
          bylineScanDepth: options.extraction.bylineScanDepth,
          rules,
        }),
    },
  ];
};

/** Readable text carried by a block; images contribute their alt text. */
export const blockText = (block: ContentBlock): string => {
  switch (block.type) {
    case 'list':
      return block.items.join(' ');
    case 'image':
      return block.alt ?? '';
    default:
      return block.text;
  }
};

const isStrippable = (block: ContentBlock): boolean =>
  block.type === 'paragraph' || block.type === 'heading' || block.type === 'quote';

/**
 * Explicit preview markers. Text markers are matched against the blocks as extracted, before
 * boilerplate stripping removes the marker lines, and only against blocks no longer than the
 * marker's `maxLength`.
 */
export const findTruncationMarker = (
  html: string,
  blocks: readonly ContentBlock[],
  rules: MarkupRules = defaultMarkupRules,
): TruncationSignal | null => {
  const htmlMarkers = rules.truncationMarkers.filter((marker) => marker.scope === 'html');
  if (htmlMarkers.some((marker) => marker.regex.test(html))) {
    return 'html-marker';
  }
  const textMarkers = rules.truncationMarkers.filter((marker) => marker.scope === 'text');
  const texts = blocks.map(blockText).filter(Boolean);
  const hit = texts.some((text) =>
    textMarkers.some((marker) => text.length <= marker.maxLength && marker.regex.test(text)),
  );
  return hit ? 'text-marker' : null;
};

/** Length check on the content that survives stripping. */
export const isShortBody = (blocks: readonly ContentBlock[], truncation: AppConfig['truncation']): boolean => {
  const texts = blocks.filter((block) => block.type !== 'image').map(blockText).filter(Boolean);
  const totalChars = texts.reduce((sum, text) => sum + text.length, 0);
  if (totalChars >= truncation.minBodyChars) return false;
  if (!truncation.requireCutOffEnding) return true;
  const lastText = texts[texts.length - 1];
  return lastText !== undefined && looksCutOff(lastText);
};

export const stripBoilerplate = (
  blocks: readonly ContentBlock[],
  rules: MarkupRules = defaultMarkupRules,
): ContentBlock[] => blocks.filter((block) => !(isStrippable(block) && isBoilerplateText(blockText(block), rules)));

const leadImageUrl = (value: string | undefined, sourceUrl: string): string | undefined => {
  if (!value) return undefined;
  const absolute = absolutizeUrl(value, sourceUrl);
  return absolute && isHttpUrl(absolute) ? absolute : undefined;
};

const fillMetadata = (candidate: ArticleCandidate, html: string, rules: MarkupRules): ArticleCandidate => {
  if (candidate.author && candidate.publishedDate && candidate.description && candidate.image) {
    return candidate;
  }
  const meta = readPageMetadata(html, rules);
  return {
    ...candidate,
    author: candidate.author ?? meta.author,
    publishedDate: candidate.publishedDate ?? meta.publishedDate,
    description: candidate.description ?? meta.description,
    image: candidate.image ?? leadImageUrl(meta.image, candidate.sourceUrl),
  };
};

const freezeArticle = (article: Article): Article =>
  Object.freeze({
    ...article,
    blocks: Object.freeze(article.blocks.map((block) => Object.freeze(block))),
  });

/**
 * Runs the extraction strategies in order and turns the first candidate into an Article.
 * Blocks always come from exactly one strategy.
 */
export const normalizeArticle = (html: string, sourceUrl: string, options: NormalizeOptions): Article => {
  const rules = options.rules ?? defaultMarkupRules;
  const logger = options.logger;
  const attempts: Array<{ strategy: string; reason: ParseFailureReason }> = [];

  let winner: ArticleCandidate | null = null;
  for (const strategy of buildStrategies(options)) {
    const result = strategy.run(html, sourceUrl);
    if (result.kind === 'extracted') {
      winner = result.candidate;
      logger?.debug('Extraction strategy accepted', { strategy: strategy.name, blocks: result.candidate.blocks.length });
      break;
    }
    attempts.push({ strategy: strategy.name, reason: result.reason });
    logger?.debug('Extraction strategy declined', { strategy: strategy.name, reason: result.reason, detail: result.detail });
  }

  if (!winner) {
    const last = attempts[attempts.length - 1];
    const reason = last ? last.reason : 'no_content';
    throw new ParseError(reason, `${PARSE_REASON_TEXT.no_content}: ${PARSE_REASON_TEXT[reason]}`, attempts);
  }

  const blocks = stripBoilerplate(winner.blocks, rules);
  if (!blocks.length) {
    throw new ParseError('empty_body', `${PARSE_REASON_TEXT.empty_body}: only boilerplate was found`, attempts);
  }
  const removed = winner.blocks.length - blocks.length;
  if (removed > 0) {
    logger?.debug('Stripped boilerplate blocks', { removed });
  }

  const truncationSignal =
    findTruncationMarker(html, winner.blocks, rules) ?? (isShortBody(blocks, options.truncation) ? 'short-body' : null);
  if (truncationSignal) {
    logger?.info('Article looks truncated', { signal: truncationSignal, sourceUrl });
  }

  const candidate = fillMetadata(winner, html, rules);
  return freezeArticle({
    ...candidate,
    blocks,
    truncated: truncationSignal !== null,
  });
};
