import * as cheerio from 'cheerio';
import { createLogger } from '@workspace/logger';
import { errorMessage } from '../errors.js';
import {
  Extractor,
  type JsonLdObject,
  type PageMetadata,
  type StructuredData,
} from './types.js';

const log = createLogger('Extractor');

const IMAGE_SOURCE_ATTRIBUTES = ['src', 'data-src', 'data-original', 'data-lazy-src'];
const PAGINATION_TEXT_HINTS = ['next', 'older', 'more'];

const collapseWhitespace = (value: string): string =>
  value.replace(/\s+/g, ' ').trim();

const isJsonLdObject = (value: unknown): value is JsonLdObject =>
  typeof value === 'object' && value !== null && !Array.isArray(value);

const resolveAgainst = (baseUrl: string, href: string): string | undefined => {
  try {
    return new URL(href, baseUrl).toString();
  } catch {
    return undefined;
  }
};

const unique = (values: string[]): string[] => Array.from(new Set(values));

/** `<base href>` when present, otherwise the page address. */
const baseUrlOf = ($: cheerio.CheerioAPI, pageUrl: string): string => {
  const href = $('base[href]').first().attr('href')?.trim();
  return (href && resolveAgainst(pageUrl, href)) || pageUrl;
};

export class CheerioExtractor extends Extractor {
  metadata(html: string, _url: string): PageMetadata {
    const $ = cheerio.load(html);

    const content = (selector: string): string | undefined =>
      $(selector).first().attr('content')?.trim() || undefined;

    return {
      title: $('title').first().text().trim() || undefined,
      metaDescription: content('meta[name="description"]'),
      metaKeywords: content('meta[name="keywords"]'),
      ogTitle: content('meta[property="og:title"]'),
      ogDescription: content('meta[property="og:description"]'),
      ogType: content('meta[property="og:type"]'),
      ogUrl: content('meta[property="og:url"]'),
      canonical: $('link[rel~="canonical"]').first().attr('href')?.trim() || undefined,
    };
  }

  /** Visible text, one line per text run, blank lines dropped. */
  text(html: string): string {
    const $ = cheerio.load(html);
    $('script, style, noscript').remove();

    // Element boundaries become line breaks
    $('*').each((_, element) => {
      $(element).prepend('\n').append('\n');
    });

    return $.root()
      .text()
      .split(/\r?\n/)
      .map(collapseWhitespace)
      .filter(Boolean)
      .join('\n');
  }

  structuredData(html: string, url: string): StructuredData {
    const $ = cheerio.load(html);
    const jsonLd: JsonLdObject[] = [];

    $('script[type*="ld+json"]').each((_, element) => {
      const raw = $(element).html() ?? '';

      let data: unknown;
      try {
        data = JSON.parse(raw);
      } catch (error) {
        log.debug(`Skipping malformed JSON-LD block on ${url}:`, errorMessage(error));
        return;
      }

      if (Array.isArray(data)) {
        jsonLd.push(...data.filter(isJsonLdObject));
      } else if (isJsonLdObject(data)) {
        jsonLd.push(data);
      }
    });

    return { jsonLd };
  }

  links(html: string, url: string): string[] {
    const $ = cheerio.load(html);
    const baseUrl = baseUrlOf($, url);

    const links: string[] = [];

    $('a[href]').each((_, element) => {
      const href = $(element).attr('href')?.trim();
      const resolved = href ? resolveAgainst(baseUrl, href) : undefined;
      if (resolved) {
        links.push(resolved);
      }
    });

    return links;
  }

  paginationHints(html: string, url: string): string[] {
    const $ = cheerio.load(html);
    const baseUrl = baseUrlOf($, url);
    const candidates: string[] = [];

    const push = (href: string | undefined): void => {
      const resolved = href ? resolveAgainst(baseUrl, href) : undefined;
      if (resolved) {
        candidates.push(resolved);
      }
    };

    $('link[rel~="next"]').each((_, element) => {
      push($(element).attr('href'));
    });

    $('a[href]').each((_, element) => {
      const anchor = $(element);
      const rel = (anchor.attr('rel') ?? '').toLowerCase().split(/\s+/);
      const aria = (anchor.attr('aria-label') ?? '').toLowerCase();
      const text = collapseWhitespace(anchor.text()).slice(0, 100).toLowerCase();

      if (
        rel.includes('next') ||
        aria.includes('next') ||
        PAGINATION_TEXT_HINTS.some((hint) => text.includes(hint))
      ) {
        push(anchor.attr('href'));
      }
    });

    return unique(candidates);
  }

  imageSources(html: string, url: string): string[] {
    const $ = cheerio.load(html);
    const baseUrl = baseUrlOf($, url);
    const sources: string[] = [];

    $('img').each((_, element) => {
      const image = $(element);
      for (const attribute of IMAGE_SOURCE_ATTRIBUTES) {
        const value = image.attr(attribute)?.trim();
        if (!value) {
          continue;
        }

        const resolved = resolveAgainst(baseUrl, value);
        if (resolved) {
          sources.push(resolved);
        }
        break;
      }
    });

    return unique(sources);
  }
}
