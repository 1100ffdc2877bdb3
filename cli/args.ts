import { UsageError } from './errors';

export const USAGE = `Usage: article-reader <url> [options]

Fetch an article, extract its content and save a clean, self-contained HTML copy.

Options:
  --no-open          Save the article without opening it
  --out-dir <dir>    Directory for saved articles (default: $ARTICLE_READER_DIR or ~/.article-reader/articles)
  --debug            Verbose logging on stderr
  -h, --help         Show this help

Example: article-reader https://medium.com/@someone/some-story-0123456789ab`;

export type ParsedArgs =
  | { kind: 'help' }
  | {
      kind: 'run';
      url: string;
      open: boolean;
      outDir?: string;
      debug: boolean;
    };

export const parseArgs = (args: readonly string[]): ParsedArgs => {
  let url: string | undefined;
  let open = true;
  let outDir: string | undefined;
  let debug = false;

  for (let i = 0; i < args.length; i += 1) {
    const arg = args[i];
    if (!arg) continue;
    if (arg.startsWith('--out-dir=')) {
      outDir = arg.slice('--out-dir='.length);
      if (!outDir) throw new UsageError('--out-dir requires a directory');
      continue;
    }
    switch (arg) {
      case '-h':
      case '--help':
        return { kind: 'help' };
      case '--no-open':
        open = false;
        break;
      case '--debug':
        debug = true;
        break;
      case '--out-dir': {
        const value = args[i + 1];
        if (!value || value.startsWith('-')) throw new UsageError('--out-dir requires a directory');
        outDir = value;
        i += 1;
        break;
      }
      default:
        if (arg.startsWith('-')) throw new UsageError(`Unknown option: ${arg}`);
        if (url) throw new UsageError(`Unexpected argument: ${arg} (only one URL is accepted)`);
        url = arg;
    }
  }

  if (!url) throw new UsageError('Missing article URL');
  return { kind: 'run', url, open, outDir, debug };
};
