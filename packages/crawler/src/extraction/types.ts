type PageMetadata = {
  title?: string;
  metaDescription?: string;
  metaKeywords?: string;
  ogTitle?: string;
  ogDescription?: string;
  ogType?: string;
  ogUrl?: string;
  canonical?: string;
};

type JsonLdObject = Record<string, unknown>;

type StructuredData = {
  jsonLd: JsonLdObject[];
};

/**
 * Pure functions of a document and its address. Link-like results are
 * absolute addresses resolved against the document's base URL.
 */
abstract class Extractor {
  abstract metadata(html: string, url: string): PageMetadata;

  abstract text(html: string): string;

  /** Malformed blocks are skipped; the rest of the page still counts. */
  abstract structuredData(html: string, url: string): StructuredData;

  abstract links(html: string, url: string): string[];

  /** Links that look like "next page" navigation, deduplicated. */
  abstract paginationHints(html: string, url: string): string[];

  abstract imageSources(html: string, url: string): string[];
}

export { Extractor };
export type { JsonLdObject, PageMetadata, StructuredData };
