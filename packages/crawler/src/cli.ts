#!/usr/bin/env -S node --import tsx
import { log } from '@workspace/logger';
import { errorMessage } from './errors.js';
import { crawlArgsSchema, runCrawlAction } from './actions/crawl.js';

type ParsedArgs = {
  positionals: string[];
  options: Record<string, string>;
};

// Flags that never take a value, so a following seed URL is not swallowed
const BOOLEAN_FLAGS = new Set(['noRobots', 'noImages', 'pretty', 'help']);

function parseArgs(argv: string[]): ParsedArgs {
  const positionals: string[] = [];
  const options: Record<string, string> = {};

  for (let index = 0; index < argv.length; index += 1) {
    const arg = argv[index];
    if (!arg) {
      continue;
    }

    if (arg === '-h') {
      options.help = 'true';
      continue;
    }

    if (!arg.startsWith('--')) {
      positionals.push(arg);
      continue;
    }

    const [key, maybeValue] = arg.slice(2).split('=', 2);
    if (!key) {
      continue;
    }

    if (maybeValue !== undefined) {
      options[key] = maybeValue;
      continue;
    }

    const next = argv[index + 1];
    if (!BOOLEAN_FLAGS.has(key) && next && !next.startsWith('--')) {
      options[key] = next;
      index += 1;
      continue;
    }

    options[key] = 'true';
  }

  return { positionals, options };
}

function printHelp(): void {
  console.log(`site-crawler CLI

Usage:
  site-crawler <seed...> [options]
  site-crawler https://example.com/
  site-crawler https://example.com/ --allowedDomains=example.com --maxPages=50
  site-crawler https://example.com/ https://blog.example.com/ --maxDepth 2 --concurrency 4
  site-crawler https://example.com/ --render never --noImages
  site-crawler https://example.com/ --outputDir ./tmp/crawl --delayMs 500 --pretty

Options:
  --outputDir       Output directory (default: ./scrape_output).
  --allowedDomains  Comma-separated domains; subdomains included (default: any).
  --maxPages        Maximum number of pages to process (default: 200).
  --maxDepth        Maximum link depth from the seeds (default: 5).
  --concurrency     Maximum fetches in flight overall (default: 8).
  --perOrigin       Maximum fetches in flight per origin (default: 4).
  --timeout         Request timeout in seconds (default: 20).
  --renderTimeout   Headless render timeout in seconds (default: 30).
  --userAgent       User-Agent header and robots.txt agent.
  --noRobots        Ignore robots.txt.
  --render          auto, always or never (default: auto).
  --noImages        Do not download images.
  --imageConcurrency  Parallel image downloads (default: 8).
  --delayMs         Minimum spacing between requests to one origin (default: 0).
  --pretty          Pretty-print the summary JSON.
  --help, -h        Show this help message.

Environment:
  LOG_LEVEL         fatal, error, warn, info, debug, trace or silent (default: info).
`);
}

async function main(): Promise<number> {
  const { positionals, options } = parseArgs(process.argv.slice(2));

  if (options.help === 'true' || positionals.length === 0) {
    printHelp();
    return positionals.length === 0 && options.help !== 'true' ? 1 : 0;
  }

  const parsedCrawlArgs = crawlArgsSchema.safeParse({
    ...options,
    seeds: positionals,
  });
  if (!parsedCrawlArgs.success) {
    console.error(parsedCrawlArgs.error.issues[0]?.message ?? 'Invalid arguments');
    printHelp();
    return 1;
  }

  return runCrawlAction(parsedCrawlArgs.data);
}

try {
  process.exitCode = await main();
} catch (error) {
  log.fatal('Crawl aborted:', errorMessage(error));
  process.exitCode = 1;
}
