import { log } from '@workspace/logger';
import { z } from 'zod';
import { parseCrawlConfig, type CrawlConfigInput } from '../config/crawl-config.js';
import { ConfigurationError } from '../errors.js';
import { CrawlOrchestrator } from '../orchestrator/crawler.js';
import { RENDER_POLICIES } from '../render/render-decision.js';

function formatJson(value: unknown, pretty: boolean): string {
  return pretty ? JSON.stringify(value, null, 2) : JSON.stringify(value);
}

const booleanFromCliSchema = z
  .enum(['true', 'false'])
  .transform((value) => value === 'true');

const numberFromCli = (value: unknown): unknown => {
  if (typeof value === 'string') {
    const parsedValue = Number(value);
    return Number.isFinite(parsedValue) ? parsedValue : value;
  }

  return value;
};

const flagFromCli = (value: unknown): unknown => {
  // Defaults arrive here as booleans
  if (value === undefined || typeof value === 'boolean') {
    return String(value ?? false);
  }

  if (typeof value === 'string') {
    return value.toLowerCase();
  }

  return value;
};

const integerOption = (flag: string, min: number) =>
  z
    .preprocess(
      numberFromCli,
      z
        .number()
        .int()
        .min(
          min,
          min > 0
            ? `Invalid --${flag}. Provide a positive integer.`
            : `Invalid --${flag}. Provide an integer >= ${min}.`,
        ),
    )
    .optional();

const secondsOption = (flag: string) =>
  z
    .preprocess(
      numberFromCli,
      z.number().positive(`Invalid --${flag}. Provide a number of seconds > 0.`),
    )
    .optional();

const crawlArgsSchema = z.object({
  seeds: z.array(z.string().trim().min(1)).min(1, 'Provide at least one seed URL.'),
  outputDir: z
    .preprocess(
      (value) => (typeof value === 'string' ? value.trim() || undefined : value),
      z.string().min(1, 'Invalid --outputDir path'),
    )
    .optional(),
  allowedDomains: z
    .preprocess(
      (value) =>
        typeof value === 'string'
          ? value
              .split(',')
              .map((domain) => domain.trim())
              .filter(Boolean)
          : value,
      z.array(z.string()),
    )
    .optional(),
  maxPages: integerOption('maxPages', 1),
  maxDepth: integerOption('maxDepth', 0),
  concurrency: integerOption('concurrency', 1),
  perOrigin: integerOption('perOrigin', 1),
  imageConcurrency: integerOption('imageConcurrency', 1),
  timeout: secondsOption('timeout'),
  renderTimeout: secondsOption('renderTimeout'),
  userAgent: z.string().trim().min(1, 'Invalid --userAgent').optional(),
  render: z
    .preprocess(
      (value) => (typeof value === 'string' ? value.trim().toLowerCase() : value),
      z.enum(RENDER_POLICIES, {
        errorMap: () => ({ message: 'Invalid --render. Use auto, always or never.' }),
      }),
    )
    .optional(),
  delayMs: integerOption('delayMs', 0),
  noRobots: z.preprocess(flagFromCli, booleanFromCliSchema).default(false),
  noImages: z.preprocess(flagFromCli, booleanFromCliSchema).default(false),
  pretty: z.preprocess(flagFromCli, booleanFromCliSchema).default(false),
});

type CrawlArgs = z.infer<typeof crawlArgsSchema>;

/** Maps CLI flags onto the crawl configuration; absent flags keep defaults. */
function toCrawlConfigInput(args: CrawlArgs): CrawlConfigInput {
  return {
    seeds: args.seeds,
    outputDir: args.outputDir,
    allowedDomains: args.allowedDomains,
    maxPages: args.maxPages,
    maxDepth: args.maxDepth,
    concurrency: args.concurrency,
    perOriginConcurrency: args.perOrigin,
    imageConcurrency: args.imageConcurrency,
    requestTimeoutMs:
      args.timeout === undefined ? undefined : Math.round(args.timeout * 1000),
    renderTimeoutMs:
      args.renderTimeout === undefined
        ? undefined
        : Math.round(args.renderTimeout * 1000),
    userAgent: args.userAgent,
    respectRobots: !args.noRobots,
    render: args.render,
    downloadImages: !args.noImages,
    delayMs: args.delayMs,
  };
}

export async function runCrawlAction(args: CrawlArgs): Promise<number> {
  try {
    const config = parseCrawlConfig(toCrawlConfigInput(args));
    log.info(
      'Starting crawl',
      JSON.stringify({
        seeds: config.seeds,
        outputDir: config.outputDir,
        maxPages: config.maxPages,
        maxDepth: config.maxDepth,
        render: config.render,
      }),
    );

    const crawler = new CrawlOrchestrator(config);
    const summary = await crawler.run();

    console.log(formatJson(summary, args.pretty));
    return summary.cancelled ? 130 : 0;
  } catch (error) {
    if (error instanceof ConfigurationError) {
      log.error(error.message);
      return 1;
    }
    throw error;
  }
}

export { crawlArgsSchema, toCrawlConfigInput };
export type { CrawlArgs };
