import { describe, expect, it } from 'vitest';
import { ConfigSchema } from '../config';

const valid = {
  environment: 'test',
  fetch: { timeoutMs: 1_000, retries: 1, retryDelayMs: 0, userAgent: 'test-agent', acceptLanguage: 'en' },
  extraction: { minContainerParagraphs: 2, bylineScanDepth: 8 },
  truncation: { minBodyChars: 2_000, requireCutOffEnding: true },
  storage: { outputDir: '/tmp/articles', maxSlugLength: 80 },
  expectedHosts: ['medium.com'],
  observability: { logLevel: 'warn' },
};

describe('ConfigSchema', () => {
  it('accepts a complete configuration', () => {
    expect(ConfigSchema.safeParse(valid).success).toBe(true);
  });

  it.each([
    ['a zero timeout', { ...valid, fetch: { ...valid.fetch, timeoutMs: 0 } }, 'fetch.timeoutMs'],
    ['too many retries', { ...valid, fetch: { ...valid.fetch, retries: 11 } }, 'fetch.retries'],
    ['a tiny slug length', { ...valid, storage: { ...valid.storage, maxSlugLength: 4 } }, 'storage.maxSlugLength'],
    ['an empty output dir', { ...valid, storage: { ...valid.storage, outputDir: '' } }, 'storage.outputDir'],
    ['an unknown log level', { ...valid, observability: { logLevel: 'trace' } }, 'observability.logLevel'],
  ])('rejects %s', (_label, input, issuePath) => {
    const result = ConfigSchema.safeParse(input);
    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.error.issues.map((issue) => issue.path.join('.'))).toEqual([issuePath]);
    }
  });
});
