import type { PageRecord } from '../storage/types.js';

type PageContent = {
  html: string;
  /** Fallback filename hint for images that come without one. */
  contentDisposition?: string;
};

type ProcessResult = {
  record: PageRecord;
  /** Links newly added to the frontier. */
  enqueued: number;
};

export type { PageContent, ProcessResult };
