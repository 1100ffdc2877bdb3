import { ConfigSchema, type AppConfig } from '../../shared/config';

export const makeTestConfig = (outputDir = '/tmp/article-reader-test'): AppConfig =>
  ConfigSchema.parse({
    environment: 'test',
    fetch: {
      timeoutMs: 1_000,
      retries: 2,
      retryDelayMs: 0,
      userAgent: 'test-agent',
      acceptLanguage: 'en-US,en;q=0.9',
    },
    extraction: { minContainerParagraphs: 2, bylineScanDepth: 8 },
    truncation: { minBodyChars: 2_000, requireCutOffEnding: true },
    storage: { outputDir, maxSlugLength: 80 },
    expectedHosts: ['medium.com'],
    observability: { logLevel: 'error' },
  });

export const structuredDataPage = (record: unknown, extraHead = ''): string => `<!DOCTYPE html>
<html>
<head>
<title>Ignored Page Title</title>
${extraHead}
<script type="application/ld+json">${JSON.stringify(record)}</script>
</head>
<body><main><p>Navigation chrome</p></main></body>
</html>`;
