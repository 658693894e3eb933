import { z } from 'zod';
import { ConfigurationError } from '../errors.js';
import { RENDER_POLICIES } from '../render/render-decision.js';
import { isValidUrl } from '../utils/url.js';

const DEFAULT_USER_AGENT =
  'Mozilla/5.0 (compatible; SiteCrawler/1.0; +https://example.com/bot)';

const httpUrlSchema = z
  .string()
  .trim()
  .refine(
    (value) => isValidUrl(value) && /^https?:$/.test(new URL(value).protocol),
    (value) => ({ message: `Invalid seed URL "${value}". Provide an absolute http(s) URL.` }),
  );

const positiveInt = (name: string) =>
  z.number().int().min(1, `Invalid ${name}. Provide a positive integer.`);

const nonNegativeInt = (name: string) =>
  z.number().int().min(0, `Invalid ${name}. Provide an integer >= 0.`);

const crawlConfigSchema = z.object({
  seeds: z.array(httpUrlSchema).min(1, 'Provide at least one seed URL.'),
  outputDir: z.string().trim().min(1, 'Invalid outputDir path').default('./scrape_output'),
  allowedDomains: z
    .array(z.string().trim().toLowerCase().min(1))
    .default([]),
  maxPages: positiveInt('maxPages').default(200),
  maxDepth: nonNegativeInt('maxDepth').default(5),
  concurrency: positiveInt('concurrency').default(8),
  perOriginConcurrency: positiveInt('perOriginConcurrency').default(4),
  requestTimeoutMs: positiveInt('requestTimeoutMs').default(20_000),
  renderTimeoutMs: positiveInt('renderTimeoutMs').default(30_000),
  userAgent: z.string().trim().min(1, 'Invalid userAgent').default(DEFAULT_USER_AGENT),
  respectRobots: z.boolean().default(true),
  render: z.enum(RENDER_POLICIES).default('auto'),
  downloadImages: z.boolean().default(true),
  delayMs: nonNegativeInt('delayMs').default(0),
  imageConcurrency: positiveInt('imageConcurrency').default(8),
});

type CrawlConfig = z.output<typeof crawlConfigSchema>;
type CrawlConfigInput = z.input<typeof crawlConfigSchema>;

/** Validates and fills defaults; invalid input is a ConfigurationError. */
function parseCrawlConfig(input: CrawlConfigInput): CrawlConfig {
  const parsed = crawlConfigSchema.safeParse(input);
  if (!parsed.success) {
    throw new ConfigurationError(
      parsed.error.issues[0]?.message ?? 'Invalid crawl configuration',
      { cause: parsed.error },
    );
  }

  return parsed.data;
}

export { DEFAULT_USER_AGENT, crawlConfigSchema, parseCrawlConfig };
export type { CrawlConfig, CrawlConfigInput };
