import { appendFileSync, mkdirSync } from 'node:fs';
import { writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import { sanitizeFilename, sha1 } from '../utils/url.js';
import { CrawlStorage, type PageRecord } from './types.js';

/**
 * Output directory layout:
 *
 * ```
 * <outputDir>/data.jsonl           one PageRecord per line
 * <outputDir>/pages/<sha1>.html    saved documents
 * <outputDir>/assets/images/...    downloaded images
 * ```
 */
export class FileSystemStorage extends CrawlStorage {
  readonly recordsPath: string;
  readonly pagesDir: string;
  readonly imagesDir: string;
  private recordCount: number;

  constructor(outputDir: string) {
    super();
    this.recordsPath = join(outputDir, 'data.jsonl');
    this.pagesDir = join(outputDir, 'pages');
    this.imagesDir = join(outputDir, 'assets', 'images');
    this.recordCount = 0;
  }

  async initialize(): Promise<void> {
    mkdirSync(this.pagesDir, { recursive: true });
    mkdirSync(this.imagesDir, { recursive: true });
  }

  async saveDocument(url: string, html: string): Promise<string> {
    const filePath = join(this.pagesDir, `${sha1(url)}.html`);
    await writeFile(filePath, html, 'utf-8');
    return filePath;
  }

  // The URL hash prefix keeps same-named images from different pages apart
  async saveBinary(
    url: string,
    bytes: Uint8Array,
    suggestedName?: string,
  ): Promise<string> {
    const name = suggestedName ? sanitizeFilename(suggestedName) : sha1(bytes);
    const filePath = join(this.imagesDir, `${sha1(url).slice(0, 12)}-${name}`);
    await writeFile(filePath, bytes);
    return filePath;
  }

  async appendRecord(record: PageRecord): Promise<void> {
    appendFileSync(this.recordsPath, JSON.stringify(record) + '\n', 'utf-8');
    this.recordCount += 1;
  }

  get recordsWritten(): number {
    return this.recordCount;
  }
}
