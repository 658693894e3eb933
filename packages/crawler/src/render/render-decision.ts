const RENDER_POLICIES = ['auto', 'always', 'never'] as const;

type RenderPolicy = (typeof RENDER_POLICIES)[number];

const MIN_TEXT_LENGTH = 400;
const MIN_SCRIPT_COUNT = 5;

// Root markers left by client-side frameworks
const SPA_MARKERS = [
  'id="__next"',
  'data-reactroot',
  'ng-version',
  'id="app"',
  'id="root"',
];

/**
 * Guesses whether a raw document is rendered client side: little visible
 * text with many scripts, or a known single-page-app root marker.
 */
const shouldRender = (html: string): boolean => {
  const textLength = html.replace(/<[^>]+>/g, '').replace(/\s+/g, '').length;
  const scriptCount = html.match(/<script[\s>]/gi)?.length ?? 0;

  if (textLength < MIN_TEXT_LENGTH && scriptCount >= MIN_SCRIPT_COUNT) {
    return true;
  }

  return SPA_MARKERS.some((marker) => html.includes(marker));
};

/** `rawHtml` is undefined when the raw retrieval produced no content. */
const needsRender = (
  policy: RenderPolicy,
  rawHtml: string | undefined,
): boolean => {
  switch (policy) {
    case 'never':
      return false;
    case 'always':
      return true;
    case 'auto':
      return rawHtml === undefined || shouldRender(rawHtml);
  }
};

export { RENDER_POLICIES, needsRender, shouldRender };
export type { RenderPolicy };
