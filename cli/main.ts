import chalk from 'chalk';
import { ZodError } from 'zod';
import type { AppConfig } from '../shared/config';
import { USAGE, parseArgs, type ParsedArgs } from './args';
import { applyCliOverrides, getPublicConfig, loadConfig } from './config/config';
import {
  CancelledError,
  FilesystemError,
  NetworkError,
  ParseError,
  UsageError,
  describeError,
  isReaderError,
} from './errors';
import { createLogger, type LogSink } from './obs/logger';
import { createFsArticleStore } from './persistence/fsStore';
import { runReader, type FileOpener, type HtmlFetcher } from './pipeline/runReader';
import type { StageEvent } from './pipeline/stageEmitter';

export const EXIT_OK = 0;
export const EXIT_UNEXPECTED = 1;
export const EXIT_USAGE = 2;
export const EXIT_NETWORK = 3;
export const EXIT_PARSE = 4;
export const EXIT_FILESYSTEM = 5;
export const EXIT_CANCELLED = 130;

export interface CliIo {
  out: (line: string) => void;
  err: (line: string) => void;
}

export interface CliDeps {
  io?: CliIo;
  /** Base configuration; read from the environment when omitted. */
  config?: AppConfig;
  fetchHtml?: HtmlFetcher;
  openFile?: FileOpener;
  logSink?: LogSink;
  signal?: AbortSignal;
  color?: boolean;
}

const consoleIo: CliIo = {
  out: (line) => process.stdout.write(`${line}\n`),
  err: (line) => process.stderr.write(`${line}\n`),
};

export const exitCodeFor = (error: unknown): number => {
  if (error instanceof UsageError) return EXIT_USAGE;
  if (error instanceof NetworkError) return EXIT_NETWORK;
  if (error instanceof ParseError) return EXIT_PARSE;
  if (error instanceof FilesystemError) return EXIT_FILESYSTEM;
  if (error instanceof CancelledError) return EXIT_CANCELLED;
  return EXIT_UNEXPECTED;
};

const errorLabel = (error: unknown): string => {
  if (error instanceof NetworkError) return 'Network error';
  if (error instanceof ParseError) return 'Parse error';
  if (error instanceof FilesystemError) return 'Filesystem error';
  if (error instanceof CancelledError) return 'Cancelled';
  return 'Error';
};

const describeConfigError = (error: ZodError): string =>
  error.issues.map((issue) => `${issue.path.join('.') || 'config'}: ${issue.message}`).join('; ');

/** Runs the reader for one command line and returns the process exit code. */
export const runCli = async (argv: readonly string[], deps: CliDeps = {}): Promise<number> => {
  const io = deps.io ?? consoleIo;
  const paint = new chalk.Instance({ level: deps.color === false ? 0 : chalk.level });

  let parsed: ParsedArgs;
  try {
    parsed = parseArgs(argv);
  } catch (error) {
    io.err(paint.red(`Error: ${describeError(error)}`));
    io.err('');
    io.err(USAGE);
    return exitCodeFor(error);
  }

  if (parsed.kind === 'help') {
    io.out(USAGE);
    return EXIT_OK;
  }

  let config: AppConfig;
  try {
    config = applyCliOverrides(deps.config ?? loadConfig(), { outputDir: parsed.outDir, debug: parsed.debug });
  } catch (error) {
    const detail = error instanceof ZodError ? describeConfigError(error) : describeError(error);
    io.err(paint.red(`Configuration error: ${detail}`));
    return EXIT_USAGE;
  }

  const logger = createLogger(config, deps.logSink);
  logger.debug('Configuration loaded', { config: getPublicConfig(config) });
  const store = createFsArticleStore(config, logger);

  const onStage = (event: StageEvent) => {
    if (event.stage === 'open') return;
    if (event.status === 'start' && event.message) io.out(`${event.message}...`);
    if (event.status === 'success' && event.stage === 'save' && event.message) io.out(paint.green(event.message));
  };

  try {
    const result = await runReader({
      url: parsed.url,
      config,
      logger,
      store,
      open: parsed.open,
      fetchHtml: deps.fetchHtml,
      openFile: deps.openFile,
      onStage,
      signal: deps.signal,
    });
    if (result.article.truncated) {
      io.err(paint.yellow('Warning: the page only exposed a preview; the saved article may be incomplete.'));
    }
    if (parsed.open && !result.opened) {
      io.err(paint.yellow(`Warning: could not open the article (${result.openError ?? 'unknown error'}).`));
      io.err(`Please open it manually: ${result.filePath}`);
    }
    io.out('Done!');
    return EXIT_OK;
  } catch (error) {
    io.err(paint.red(`${errorLabel(error)}: ${describeError(error)}`));
    if (isReaderError(error) && error.hint) {
      io.err(paint.dim(`Hint: ${error.hint}`));
    }
    if (error instanceof Error) {
      logger.debug('Run failed', { error, stack: error.stack });
    }
    return exitCodeFor(error);
  }
};
