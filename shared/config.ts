import { z } from 'zod';

export const LOG_LEVELS = ['debug', 'info', 'warn', 'error'] as const;

export const ConfigSchema = z.object({
  environment: z.enum(['development', 'test', 'production']),
  fetch: z.object({
    timeoutMs: z.number().int().positive(),
    retries: z.number().int().nonnegative().max(10),
    retryDelayMs: z.number().int().nonnegative(),
    userAgent: z.string().min(1),
    acceptLanguage: z.string().min(1),
  }),
  extraction: z.object({
    minContainerParagraphs: z.number().int().positive(),
    bylineScanDepth: z.number().int().positive(),
  }),
  truncation: z.object({
    minBodyChars: z.number().int().nonnegative(),
    requireCutOffEnding: z.boolean(),
  }),
  storage: z.object({
    outputDir: z.string().min(1),
    maxSlugLength: z.number().int().min(8).max(200),
  }),
  expectedHosts: z.array(z.string().min(1)),
  observability: z.object({
    logLevel: z.enum(LOG_LEVELS),
  }),
});

export type AppConfig = z.infer<typeof ConfigSchema>;
export type LogLevel = AppConfig['observability']['logLevel'];

export interface PublicConfig {
  outputDir: string;
  logLevel: LogLevel;
  fetch: {
    timeoutMs: number;
    retries: number;
  };
  truncation: AppConfig['truncation'];
}

export const getPublicConfig = (config: AppConfig): PublicConfig => ({
  outputDir: config.storage.outputDir,
  logLevel: config.observability.logLevel,
  fetch: {
    timeoutMs: config.fetch.timeoutMs,
    retries: config.fetch.retries,
  },
  truncation: { ...config.truncation },
});
