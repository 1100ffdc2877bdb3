import * as cheerio from 'cheerio';
import type { CheerioAPI } from 'cheerio';
import { isTag, isText, type AnyNode } from 'domhandler';
import { normalizeWhitespace } from '../utils/text';
import { defaultMarkupRules, type MarkupRules, type SelectorRule } from './rules';

// Elements whose boundaries separate words when flattening text.
const BREAKING_TAGS = new Set([
  'address', 'article', 'aside', 'blockquote', 'br', 'dd', 'div', 'dl', 'dt', 'figcaption', 'figure', 'footer',
  'h1', 'h2', 'h3', 'h4', 'h5', 'h6', 'header', 'hr', 'li', 'main', 'ol', 'p', 'pre', 'section', 'table', 'td',
  'th', 'tr', 'ul',
]);

/** Flattened, whitespace-normalized text of a node, with block boundaries kept as spaces. */
export const elementText = (node: AnyNode): string => {
  const parts: string[] = [];
  const visit = (current: AnyNode) => {
    if (isText(current)) {
      parts.push(current.data);
      return;
    }
    if (!isTag(current)) return;
    const breaking = BREAKING_TAGS.has(current.name);
    if (breaking) parts.push(' ');
    for (const child of current.children) visit(child);
    if (breaking) parts.push(' ');
  };
  visit(node);
  return normalizeWhitespace(parts.join(''));
};

export const readSelectorRule = ($: CheerioAPI, rule: SelectorRule, scope?: AnyNode): string[] => {
  const matches = scope ? $(scope).find(rule.selector) : $(rule.selector);
  const values: string[] = [];
  matches.each((_index, el) => {
    const raw = rule.attribute ? $(el).attr(rule.attribute) ?? '' : elementText(el);
    const value = normalizeWhitespace(raw);
    if (value) values.push(value);
  });
  return values;
};

/** First value produced by the ordered rules that passes `accept`. */
export const firstRuleValue = (
  $: CheerioAPI,
  rules: readonly SelectorRule[],
  accept: (value: string, rule: SelectorRule) => string | null = (value) => value,
): string | undefined => {
  for (const rule of rules) {
    for (const value of readSelectorRule($, rule)) {
      const accepted = accept(value, rule);
      if (accepted) return accepted;
    }
  }
  return undefined;
};

export const acceptTitle =
  (rules: MarkupRules) =>
  (value: string, rule: SelectorRule): string | null => {
    const cleaned = rule.stripSuffix ? value.replace(rules.titleSuffixRegex, '').trim() : value;
    if (cleaned.length < 3) return null;
    if (rules.rejectedTitles.has(cleaned.toLowerCase())) return null;
    return cleaned;
  };

export interface PageMetadata {
  author?: string;
  publishedDate?: string;
  description?: string;
  /** Lead image as written in the page; may be relative. */
  image?: string;
}

export const readPageMetadata = (html: string, rules: MarkupRules = defaultMarkupRules): PageMetadata => {
  const $ = cheerio.load(html);
  return {
    author: firstRuleValue($, rules.authorRules),
    publishedDate: firstRuleValue($, rules.dateRules),
    description: firstRuleValue($, rules.descriptionRules),
    image: firstRuleValue($, rules.imageRules),
  };
};
