export type HeadingLevel = 1 | 2 | 3 | 4 | 5 | 6;

export interface InlineSpan {
  text: string;
  bold?: boolean;
  italic?: boolean;
  href?: string;
}

export interface HeadingBlock {
  type: 'heading';
  level: HeadingLevel;
  text: string;
}

export interface ParagraphBlock {
  type: 'paragraph';
  /** Plain text of the paragraph; always the concatenation of `spans`. */
  text: string;
  spans: InlineSpan[];
}

export interface ImageBlock {
  type: 'image';
  src: string;
  alt?: string;
}

export interface CodeBlock {
  type: 'code';
  text: string;
  language?: string;
}

export interface QuoteBlock {
  type: 'quote';
  text: string;
}

export interface ListBlock {
  type: 'list';
  ordered: boolean;
  items: string[];
}

export type ContentBlock = HeadingBlock | ParagraphBlock | ImageBlock | CodeBlock | QuoteBlock | ListBlock;

export type ExtractorName = 'structured-data' | 'dom';

export interface Article {
  title: string;
  author?: string;
  publishedDate?: string;
  description?: string;
  /** Absolute http(s) URL of the lead image shown under the byline. */
  image?: string;
  sourceUrl: string;
  blocks: readonly ContentBlock[];
  truncated: boolean;
  extractedBy: ExtractorName;
}

/**
 * What a single extraction strategy hands to the normalizer. Truncation is decided later,
 * once the winning candidate is known.
 */
export type ArticleCandidate = Omit<Article, 'truncated'>;

export type ParseFailureReason = 'no_structured_data' | 'no_body_container' | 'empty_body' | 'empty_title' | 'no_content';

export type StrategyResult =
  | { kind: 'extracted'; candidate: ArticleCandidate }
  | { kind: 'declined'; reason: ParseFailureReason; detail?: string };

export type StageName = 'fetch' | 'extract' | 'render' | 'save' | 'open';
export type StageStatus = 'start' | 'success' | 'failure';

export interface StageEvent {
  stage: StageName;
  status: StageStatus;
  message?: string;
  ts: string;
}
