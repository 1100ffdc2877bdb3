import { z } from 'zod';
import rawRules from './markup-rules.json';
import { describeError } from '../errors';

/**
 * Heuristics for the target markup family live in `markup-rules.json` so that markup drift can
 * be patched by editing data. Rules are ordered: earlier entries win.
 */

const SelectorRuleSchema = z.object({
  selector: z.string().min(1),
  attribute: z.string().min(1).optional(),
  stripSuffix: z.boolean().optional(),
});

const PhraseRuleSchema = z.object({
  pattern: z.string().min(1),
  maxLength: z.number().int().positive().optional(),
});

const TruncationMarkerSchema = z.object({
  scope: z.enum(['html', 'text']),
  pattern: z.string().min(1),
  /** Text markers only: longer blocks are prose, not a paywall prompt. */
  maxLength: z.number().int().positive().optional(),
});

export const MarkupRulesSchema = z.object({
  articleTypes: z.array(z.string().min(1)).min(1),
  titleRules: z.array(SelectorRuleSchema).min(1),
  titleSuffixPattern: z.string().min(1),
  rejectedTitles: z.array(z.string()),
  authorRules: z.array(SelectorRuleSchema),
  bylinePattern: z.string().min(1),
  dateRules: z.array(SelectorRuleSchema),
  descriptionRules: z.array(SelectorRuleSchema),
  imageRules: z.array(SelectorRuleSchema),
  bodySelectors: z.array(z.string().min(1)),
  strippedSelectors: z.array(z.string().min(1)),
  boilerplate: z.array(PhraseRuleSchema),
  truncationMarkers: z.array(TruncationMarkerSchema),
});

export type SelectorRule = z.infer<typeof SelectorRuleSchema>;

export const DEFAULT_BOILERPLATE_MAX_LENGTH = 80;
export const DEFAULT_MARKER_MAX_LENGTH = 200;

export interface PhraseMatcher {
  regex: RegExp;
  maxLength: number;
}

export interface TruncationMatcher {
  scope: 'html' | 'text';
  regex: RegExp;
  maxLength: number;
}

export interface MarkupRules {
  articleTypes: ReadonlySet<string>;
  titleRules: readonly SelectorRule[];
  titleSuffixRegex: RegExp;
  rejectedTitles: ReadonlySet<string>;
  authorRules: readonly SelectorRule[];
  bylineRegex: RegExp;
  dateRules: readonly SelectorRule[];
  descriptionRules: readonly SelectorRule[];
  imageRules: readonly SelectorRule[];
  bodySelectors: readonly string[];
  strippedSelector: string;
  boilerplate: readonly PhraseMatcher[];
  truncationMarkers: readonly TruncationMatcher[];
}

const compile = (pattern: string, where: string, flags = 'iu'): RegExp => {
  try {
    return new RegExp(pattern, flags);
  } catch (error) {
    throw new Error(`Invalid pattern in ${where}: ${pattern} (${describeError(error)})`);
  }
};

export const compileMarkupRules = (input: unknown): MarkupRules => {
  const data = MarkupRulesSchema.parse(input);
  return {
    articleTypes: new Set(data.articleTypes.map((type) => type.toLowerCase())),
    titleRules: data.titleRules,
    titleSuffixRegex: compile(data.titleSuffixPattern, 'titleSuffixPattern'),
    rejectedTitles: new Set(data.rejectedTitles.map((title) => title.toLowerCase())),
    authorRules: data.authorRules,
    // case-sensitive: a byline name is told apart from prose by its capitals
    bylineRegex: compile(data.bylinePattern, 'bylinePattern', 'u'),
    dateRules: data.dateRules,
    descriptionRules: data.descriptionRules,
    imageRules: data.imageRules,
    bodySelectors: data.bodySelectors,
    strippedSelector: data.strippedSelectors.join(', '),
    boilerplate: data.boilerplate.map((rule) => ({
      regex: compile(rule.pattern, 'boilerplate'),
      maxLength: rule.maxLength ?? DEFAULT_BOILERPLATE_MAX_LENGTH,
    })),
    truncationMarkers: data.truncationMarkers.map((marker) => ({
      scope: marker.scope,
      regex: compile(marker.pattern, 'truncationMarkers'),
      maxLength: marker.maxLength ?? DEFAULT_MARKER_MAX_LENGTH,
    })),
  };
};

export const defaultMarkupRules: MarkupRules = compileMarkupRules(rawRules);

export const isBoilerplateText = (text: string, rules: MarkupRules = defaultMarkupRules): boolean => {
  const normalized = text.trim();
  if (!normalized) return false;
  return rules.boilerplate.some((rule) => normalized.length <= rule.maxLength && rule.regex.test(normalized));
};
