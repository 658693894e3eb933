import type { PageMetadata, StructuredData } from '../extraction/types.js';

type SavedImage = {
  src: string;
  /** Undefined when the download failed. */
  savedPath?: string;
};

type PageRecord = {
  url: string;
  documentPath: string;
  metadata: PageMetadata;
  text: string;
  structuredData: StructuredData;
  links: string[];
  paginationLinks: string[];
  images: SavedImage[];
};

/**
 * Output collaborator. Records are appended, one per processed page, and
 * never rewritten.
 */
abstract class CrawlStorage {
  /** Creates whatever layout the storage needs before the first write. */
  abstract initialize(): Promise<void>;

  abstract saveDocument(url: string, html: string): Promise<string>;

  abstract saveBinary(
    url: string,
    bytes: Uint8Array,
    suggestedName?: string,
  ): Promise<string>;

  abstract appendRecord(record: PageRecord): Promise<void>;
}

export { CrawlStorage };
export type { PageRecord, SavedImage };
