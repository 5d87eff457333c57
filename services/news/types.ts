// ─── SearchCursor ────────────────────────────────────────────────────────────
/** Keyword and requested page, rebuilt from the query string on every request. requestedPage is always >= 1. */
export interface SearchCursor {
  keyword: string;
  requestedPage: number;
}

// ─── Article ─────────────────────────────────────────────────────────────────
/**
 * One article from the upstream payload. Null upstream strings are decoded to "".
 * sourceId is whatever the upstream sends for source.id (string or number), absent when null.
 */
export interface Article {
  sourceId?: string | number;
  sourceName: string;
  author: string;
  title: string;
  description: string;
  url: string;
  imageUrl: string;
  publishedAt: Date;
  content: string;
}

// ─── UpstreamError ───────────────────────────────────────────────────────────
/** Structured error body returned by the upstream on a non-2xx response. */
export interface UpstreamError {
  status: string;
  code: string;
  message: string;
}

// ─── Pagination ──────────────────────────────────────────────────────────────
/**
 * Derived page state for one result page.
 * - previousPage: 0 on the first page (no previous link)
 * - nextPage: equals currentPage on the last page (no further advance offered)
 */
export interface Pagination {
  currentPage: number;
  nextPage: number;
  previousPage: number;
  totalPages: number;
  totalResults: number;
  isLastPage: boolean;
}

// ─── SearchResult ────────────────────────────────────────────────────────────
/** Final value handed to the view: keyword, articles for the page, and pagination. Frozen. */
export interface SearchResult extends Pagination {
  keyword: string;
  articles: Article[];
}
