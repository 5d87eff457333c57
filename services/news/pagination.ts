import type { Pagination } from "./types.ts";

/** Articles requested per upstream call. */
export const DEFAULT_PAGE_SIZE = 20;

/**
 * Derive page state from the requested page and the upstream total count.
 * totalPages uses real division before the ceiling, so 45 results at 20 per page is 3 pages.
 */
export function paginate(
  requestedPage: number,
  totalResults: number,
  pageSize: number = DEFAULT_PAGE_SIZE
): Pagination {
  const totalPages = Math.ceil(totalResults / pageSize);
  const currentPage = requestedPage;
  const isLastPage = currentPage >= totalPages;

  return {
    currentPage,
    nextPage: isLastPage ? currentPage : currentPage + 1,
    previousPage: currentPage - 1,
    totalPages,
    totalResults,
    isLastPage,
  };
}
