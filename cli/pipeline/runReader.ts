import type { AppConfig } from '../../shared/config';
import type { Article, StageName } from '../../shared/types';
import { CancelledError } from '../errors';
import type { MarkupRules } from '../extraction/rules';
import type { Logger } from '../obs/logger';
import type { ArticleStore } from '../persistence/fsStore';
import { renderArticle } from '../render/renderer';
import { fetchArticleHtml, isExpectedHost } from '../services/fetcher';
import { openInDefaultApp, type OpenOutcome } from '../services/opener';
import { normalizeArticle } from './normalize';
import { makeStageEmitter, type StageEventSender } from './stageEmitter';

export type HtmlFetcher = (url: string, config: AppConfig, logger: Logger, signal?: AbortSignal) => Promise<string>;
export type FileOpener = (filePath: string) => Promise<OpenOutcome>;

export interface RunReaderArgs {
  url: string;
  config: AppConfig;
  logger: Logger;
  store: ArticleStore;
  /** Hand the saved file to the default application. */
  open: boolean;
  fetchHtml?: HtmlFetcher;
  openFile?: FileOpener;
  onStage?: StageEventSender;
  rules?: MarkupRules;
  signal?: AbortSignal;
}

export interface RunReaderResult {
  filePath: string;
  article: Article;
  opened: boolean;
  openError?: string;
}

const hostnameOf = (url: string): string | null => {
  try {
    return new URL(url).hostname;
  } catch {
    return null;
  }
};

/**
 * One article end to end: fetch, extract, render, save, then optionally open. Every stage
 * before `open` is fatal on failure, and nothing reaches disk until the document is complete.
 */
export const runReader = async ({
  url,
  config,
  logger,
  store,
  open,
  fetchHtml = fetchArticleHtml,
  openFile = openInDefaultApp,
  onStage,
  rules,
  signal,
}: RunReaderArgs): Promise<RunReaderResult> => {
  const send: StageEventSender = onStage ?? (() => undefined);

  const ensureNotCancelled = (stage: StageName) => {
    if (signal?.aborted) throw new CancelledError(stage);
  };

  const runStage = async <T>(
    stage: StageName,
    message: string,
    task: () => T | Promise<T>,
    describe?: (value: T) => string,
  ): Promise<T> => {
    ensureNotCancelled(stage);
    const emitter = makeStageEmitter(stage, send);
    emitter.start(message);
    try {
      const value = await task();
      emitter.success(describe?.(value));
      return value;
    } catch (error) {
      emitter.failure(error);
      throw error;
    }
  };

  const hostname = hostnameOf(url);
  if (hostname && config.expectedHosts.length && !isExpectedHost(hostname, config.expectedHosts)) {
    logger.warn('URL is outside the supported site family; extraction may be incomplete', {
      host: hostname,
      expectedHosts: config.expectedHosts,
    });
  }

  const html = await runStage('fetch', `Fetching article from ${url}`, () => fetchHtml(url, config, logger, signal));
  const fetchedAt = new Date();

  const article = await runStage(
    'extract',
    'Parsing article content',
    () =>
      normalizeArticle(html, url, {
        truncation: config.truncation,
        extraction: config.extraction,
        rules,
        logger,
      }),
    (value) => `Found "${value.title}" (${value.blocks.length} blocks${value.truncated ? ', preview only' : ''})`,
  );
  logger.info('Article extracted', {
    title: article.title,
    extractedBy: article.extractedBy,
    blocks: article.blocks.length,
    truncated: article.truncated,
  });

  const document = await runStage('render', 'Generating HTML document', () =>
    renderArticle(article, { generatedAt: fetchedAt }),
  );

  const filePath = await runStage(
    'save',
    'Saving article',
    () => store.save(article.title, document),
    (saved) => `Article saved to: ${saved}`,
  );

  if (!open) {
    return { filePath, article, opened: false };
  }

  ensureNotCancelled('open');
  const opener = makeStageEmitter('open', send);
  opener.start('Opening article');
  const outcome = await openFile(filePath);
  if (outcome.opened) {
    opener.success();
    return { filePath, article, opened: true };
  }

  logger.warn('Could not open the saved article', { path: filePath, error: outcome.error });
  opener.failure(outcome.error ?? 'no default application available');
  return { filePath, article, opened: false, openError: outcome.error ?? 'no default application available' };
};
