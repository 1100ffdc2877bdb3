import * as cheerio from 'cheerio';
import type { CheerioAPI } from 'cheerio';
import { isTag, isText, type AnyNode, type Element } from 'domhandler';
import type {
  ArticleCandidate,
  ContentBlock,
  HeadingLevel,
  ImageBlock,
  InlineSpan,
  ParagraphBlock,
  StrategyResult,
} from '../../shared/types';
import { absolutizeUrl, isHttpUrl, normalizeWhitespace } from '../utils/text';
import { acceptTitle, elementText, firstRuleValue } from './dom';
import { defaultMarkupRules, type MarkupRules } from './rules';

export interface DomExtractionOptions {
  /** Fewest paragraph-like children an element needs to win the density scan. */
  minContainerParagraphs: number;
  /** How many leading text elements of the container are searched for a "By ..." line. */
  bylineScanDepth: number;
  rules?: MarkupRules;
}

const HEADING_TAGS: Record<string, HeadingLevel> = { h1: 1, h2: 2, h3: 3, h4: 4, h5: 5, h6: 6 };
const PARAGRAPH_LIKE = new Set(['p', 'h1', 'h2', 'h3', 'h4', 'h5', 'h6', 'pre', 'blockquote', 'ul', 'ol', 'figure']);
const BLOCK_SELECTOR = 'p, h1, h2, h3, h4, h5, h6, pre, blockquote, ul, ol, figure, picture, img';
const BLOCK_TAGS = new Set([...PARAGRAPH_LIKE, 'picture', 'img']);
// Boundaries between runs of inline content.
const LAYOUT_TAGS = new Set([
  'address', 'article', 'aside', 'details', 'div', 'dl', 'footer', 'header', 'main', 'section', 'table',
]);
const SKIPPED_TAGS = new Set(['hr', 'source', 'link', 'meta']);
const HAS_WORD_RE = /[\p{L}\p{N}]/u;

const hasText = (el: Element): boolean => elementText(el).length > 0;

const countParagraphLikeChildren = (el: Element): number =>
  el.children.filter((child) => isTag(child) && PARAGRAPH_LIKE.has(child.name) && elementText(child).length > 0).length;

export const findBodyContainer = ($: CheerioAPI, rules: MarkupRules, minParagraphs: number): Element | null => {
  for (const selector of rules.bodySelectors) {
    const match = $<Element, string>(selector)
      .filter((_index, el) => hasText(el))
      .first();
    const el = match.get(0);
    if (!el) continue;
    if (el.name !== 'article') {
      const inner = match.find('article').filter((_index, candidate) => hasText(candidate)).get(0);
      if (inner) return inner;
    }
    return el;
  }

  // Density scan: the element with the most direct paragraph-like children wins; ties keep the
  // earlier (outer) element.
  let best: Element | null = null;
  let bestScore = 0;
  for (const el of $('body, body *').toArray()) {
    const score = countParagraphLikeChildren(el);
    if (score > bestScore) {
      best = el;
      bestScore = score;
    }
  }
  return bestScore >= minParagraphs ? best : null;
};

interface Byline {
  name: string;
  /** Full text of the element the name was read from. */
  text: string;
}

const findByline = ($: CheerioAPI, container: Element, rules: MarkupRules, depth: number): Byline | undefined => {
  const leaves = $(container)
    .find('p, span, div, a, address')
    .filter((_index, el) => !el.children.some((child) => isTag(child) && child.name !== 'a' && child.name !== 'span'))
    .toArray()
    .map((el) => elementText(el))
    .filter(Boolean)
    .slice(0, depth);
  for (const text of leaves) {
    const match = rules.bylineRegex.exec(text);
    if (match?.[1]) return { name: match[1].trim(), text };
  }
  return undefined;
};

const sameFlags = (a: InlineSpan, b: InlineSpan): boolean =>
  Boolean(a.bold) === Boolean(b.bold) && Boolean(a.italic) === Boolean(b.italic) && a.href === b.href;

const makeSpan = (text: string, marks: Omit<InlineSpan, 'text'>): InlineSpan => {
  const span: InlineSpan = { text };
  if (marks.bold) span.bold = true;
  if (marks.italic) span.italic = true;
  if (marks.href) span.href = marks.href;
  return span;
};

/** Collapses whitespace across span boundaries and merges neighbours with the same marks. */
export const normalizeSpans = (raw: InlineSpan[]): InlineSpan[] => {
  const out: InlineSpan[] = [];
  for (const span of raw) {
    let text = span.text.replace(/\s+/g, ' ');
    const previous = out[out.length - 1];
    if ((!previous || previous.text.endsWith(' ')) && text.startsWith(' ')) {
      text = text.slice(1);
    }
    if (!text) continue;
    if (previous && sameFlags(previous, span)) {
      previous.text += text;
    } else {
      out.push({ ...span, text });
    }
  }
  const last = out[out.length - 1];
  if (last) {
    last.text = last.text.replace(/\s+$/, '');
    if (!last.text) out.pop();
  }
  return out;
};

const collectSpans = (nodes: readonly AnyNode[], sourceUrl: string): InlineSpan[] => {
  const raw: InlineSpan[] = [];
  const visit = (current: AnyNode, marks: Omit<InlineSpan, 'text'>) => {
    if (isText(current)) {
      raw.push(makeSpan(current.data, marks));
      return;
    }
    if (!isTag(current)) return;
    if (current.name === 'br') {
      raw.push(makeSpan(' ', marks));
      return;
    }
    const next = { ...marks };
    if (current.name === 'strong' || current.name === 'b') next.bold = true;
    if (current.name === 'em' || current.name === 'i') next.italic = true;
    if (current.name === 'a') {
      const href = absolutizeUrl(current.attribs.href ?? '', sourceUrl);
      if (href && isHttpUrl(href)) next.href = href;
    }
    for (const child of current.children) visit(child, next);
  };
  for (const node of nodes) visit(node, {});
  return normalizeSpans(raw);
};

const toParagraph = (nodes: readonly AnyNode[], sourceUrl: string): ParagraphBlock | null => {
  const spans = collectSpans(nodes, sourceUrl);
  const text = spans.map((span) => span.text).join('');
  if (!HAS_WORD_RE.test(text)) return null;
  return { type: 'paragraph', text, spans };
};

const firstSrcsetUrl = (value: string | undefined): string | null => {
  if (!value) return null;
  const first = value.split(',')[0]?.trim().split(/\s+/)[0];
  return first ? first : null;
};

const toImage = ($: CheerioAPI, el: Element, sourceUrl: string): ImageBlock | null => {
  const $el = $(el);
  const img = el.name === 'img' ? $el : $el.find('img').first();
  const raw =
    img.attr('src') ||
    img.attr('data-src') ||
    firstSrcsetUrl(img.attr('srcset')) ||
    firstSrcsetUrl(img.attr('data-srcset')) ||
    firstSrcsetUrl($el.find('source').first().attr('srcset'));
  if (!raw) return null;
  const src = raw.startsWith('data:image/') ? raw : absolutizeUrl(raw, sourceUrl);
  if (!src || !(isHttpUrl(src) || src.startsWith('data:image/'))) return null;
  const caption = $el.find('figcaption').get(0);
  const alt = normalizeWhitespace(img.attr('alt') ?? '') || (caption ? elementText(caption) : '');
  return alt ? { type: 'image', src, alt } : { type: 'image', src };
};

const codeLanguage = ($: CheerioAPI, el: Element): string | undefined => {
  const candidates = [el, ...$(el).find('code, [data-code-block-lang]').toArray()];
  for (const candidate of candidates) {
    const fromData = candidate.attribs['data-code-block-lang'];
    if (fromData) return fromData.trim();
    const fromClass = /\b(?:language|lang)-([\w+#-]+)/.exec(candidate.attribs.class ?? '');
    if (fromClass) return fromClass[1];
  }
  return undefined;
};

const toCode = ($: CheerioAPI, el: Element): ContentBlock | null => {
  const $el = $(el);
  $el.find('br').replaceWith('\n');
  const text = $el.text().replace(/^\n+/, '').replace(/\s+$/, '');
  if (!text.trim()) return null;
  const language = codeLanguage($, el);
  return language ? { type: 'code', text, language } : { type: 'code', text };
};

const toList = ($: CheerioAPI, el: Element): ContentBlock | null => {
  const items = $(el)
    .children('li')
    .toArray()
    .map((li) => elementText(li))
    .filter(Boolean);
  return items.length ? { type: 'list', ordered: el.name === 'ol', items } : null;
};

/**
 * Walks the container in document order and classifies each content node. Runs of text and
 * inline elements between block-level children become paragraphs in place.
 */
export const collectBlocks = ($: CheerioAPI, container: Element, sourceUrl: string): ContentBlock[] => {
  const blocks: ContentBlock[] = [];
  const push = (block: ContentBlock | null) => {
    if (block) blocks.push(block);
  };

  const isBlockLevel = (el: Element): boolean =>
    BLOCK_TAGS.has(el.name) || LAYOUT_TAGS.has(el.name) || $(el).find(BLOCK_SELECTOR).length > 0;

  const visitMixed = (el: Element) => {
    let inline: AnyNode[] = [];
    const flush = () => {
      if (inline.length) push(toParagraph(inline, sourceUrl));
      inline = [];
    };
    for (const child of el.children) {
      if (isTag(child) && isBlockLevel(child)) {
        flush();
        visit(child);
      } else {
        inline.push(child);
      }
    }
    flush();
  };

  const visit = (el: Element) => {
    const name = el.name;
    const level = HEADING_TAGS[name];
    if (level) {
      const text = elementText(el);
      if (text) push({ type: 'heading', level, text });
      return;
    }
    switch (name) {
      case 'pre':
        push(toCode($, el));
        return;
      case 'blockquote': {
        const text = elementText(el);
        if (text) push({ type: 'quote', text });
        return;
      }
      case 'ul':
      case 'ol':
        push(toList($, el));
        return;
      case 'img':
      case 'picture':
        push(toImage($, el, sourceUrl));
        return;
      case 'figure':
        if ($(el).find('img, source').length) {
          push(toImage($, el, sourceUrl));
          return;
        }
        break;
      default:
        if (SKIPPED_TAGS.has(name)) return;
    }
    visitMixed(el);
  };

  visitMixed(container);
  return blocks;
};

export const extractFromDom = (html: string, sourceUrl: string, options: DomExtractionOptions): StrategyResult => {
  const rules = options.rules ?? defaultMarkupRules;
  const $ = cheerio.load(html);
  $(rules.strippedSelector).remove();

  const container = findBodyContainer($, rules, options.minContainerParagraphs);
  if (!container) {
    return { kind: 'declined', reason: 'no_body_container' };
  }

  const title = firstRuleValue($, rules.titleRules, acceptTitle(rules));
  if (!title) {
    return { kind: 'declined', reason: 'empty_title' };
  }

  const metaAuthor = firstRuleValue($, rules.authorRules);
  const byline = findByline($, container, rules, options.bylineScanDepth);

  // the renderer prints the title and byline itself
  const titleKey = title.toLowerCase();
  const blocks = collectBlocks($, container, sourceUrl).filter(
    (block) =>
      !(block.type === 'heading' && block.text.toLowerCase() === titleKey) &&
      !(block.type === 'paragraph' && byline !== undefined && block.text === byline.text),
  );
  if (!blocks.length) {
    return { kind: 'declined', reason: 'empty_body', detail: 'body container produced no blocks' };
  }

  const candidate: ArticleCandidate = {
    title,
    author: metaAuthor ?? byline?.name,
    publishedDate: firstRuleValue($, rules.dateRules),
    description: firstRuleValue($, rules.descriptionRules),
    sourceUrl,
    blocks,
    extractedBy: 'dom',
  };
  return { kind: 'extracted', candidate };
};
