import { z } from 'zod';

export const DEFAULT_USER_AGENT =
  'Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/120.0.0.0 Safari/537.36';

export const DEFAULT_ACCEPT =
  'text/html,application/xhtml+xml,application/xml;q=0.9,*/*;q=0.8';

const downloadSchema = z
  .object({
    maxWorkers: z.number().int().min(1).max(32).default(5),
    /** Per-request timeout in seconds. */
    timeout: z.number().positive().default(30),
    chunkSize: z.number().int().positive().default(8192),
    /** Total attempts per file, including the first. */
    retryCount: z.number().int().min(1).max(10).default(3),
    retryBaseDelayMs: z.number().int().min(0).default(2000),
    retryMaxDelayMs: z.number().int().min(0).default(10_000),
  })
  .default({});

const outputSchema = z
  .object({
    baseDir: z.string().min(1).default('./downloads'),
    createSubfolder: z.boolean().default(false),
    overwriteExisting: z.boolean().default(false),
  })
  .default({});

const networkSchema = z
  .object({
    userAgent: z.string().min(1).default(DEFAULT_USER_AGENT),
    headers: z.record(z.string()).default({ Accept: DEFAULT_ACCEPT }),
    verifySsl: z.boolean().default(true),
  })
  .default({});

const browserSchema = z
  .object({
    engine: z.enum(['chromium', 'static']).default('chromium'),
    headless: z.boolean().default(true),
    slowMo: z.number().int().min(0).default(100),
    timeoutMs: z.number().int().positive().default(30_000),
    networkIdleTimeoutMs: z.number().int().min(0).default(15_000),
    settleDelayMs: z.number().int().min(0).default(2000),
  })
  .default({});

const loggingSchema = z
  .object({
    level: z
      .enum(['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent'])
      .default('info'),
  })
  .default({});

/**
 * Full configuration schema. Every field has a default, so `{}` parses
 * into a complete configuration.
 */
export const pdfHarvestConfigSchema = z.object({
  download: downloadSchema,
  output: outputSchema,
  network: networkSchema,
  browser: browserSchema,
  logging: loggingSchema,
});

export type PdfHarvestConfig = z.infer<typeof pdfHarvestConfigSchema>;

export type BrowserEngine = PdfHarvestConfig['browser']['engine'];
