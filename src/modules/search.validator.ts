import { z } from "zod";
import type { SearchCursor } from "../../services/news/types.ts";

const DEFAULT_PAGE = 1;

/** Repeated query params arrive as arrays; the first value wins. */
const firstValue = (v: unknown) => (Array.isArray(v) ? v[0] : v);

/**
 * Validates the page parameter.
 * - Absent or "": page 1.
 * - Otherwise only plain decimal digits naming a safe integer >= 1.
 * - Rejects "0", "-1", "+2", "1.5", " 3", "abc". No coercion or trim.
 */
const pageSchema = z.preprocess(
  firstValue,
  z
    .union([z.string(), z.undefined()])
    .transform((v, ctx) => {
      if (v === undefined || v === "") return DEFAULT_PAGE;
      const n = /^[0-9]+$/.test(v) ? Number(v) : NaN;
      if (!Number.isSafeInteger(n) || n < DEFAULT_PAGE) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          message: "must be a positive integer",
        });
        return z.NEVER;
      }
      return n;
    })
);

export const SearchQuerySchema = z.object({
  q: z.preprocess(firstValue, z.string().optional()).transform((v) => v ?? ""),
  page: pageSchema,
});

export type SearchQuery = z.infer<typeof SearchQuerySchema>;

// ─── Parse failures ─────────────────────────────────────────────────────────

export const SearchRequestErrorCode = {
  INVALID_PAGE_NUMBER: "INVALID_PAGE_NUMBER",
  INVALID_QUERY: "INVALID_QUERY",
} as const;

export type SearchRequestErrorCode =
  (typeof SearchRequestErrorCode)[keyof typeof SearchRequestErrorCode];

export class SearchRequestError extends Error {
  readonly code: SearchRequestErrorCode;

  constructor(code: SearchRequestErrorCode, message: string) {
    super(message);
    this.name = "SearchRequestError";
    this.code = code;
    Object.setPrototypeOf(this, SearchRequestError.prototype);
  }
}

export type ParseSearchRequestResult =
  | { success: true; data: SearchCursor }
  | { success: false; error: SearchRequestError };

/** Build a SearchCursor from the raw query map. Pure; never throws. */
export function parseSearchRequest(rawQuery: unknown): ParseSearchRequestResult {
  const query = SearchQuerySchema.safeParse(rawQuery ?? {});

  if (!query.success) {
    const pageIssue = query.error.issues.some((e) => e.path[0] === "page");
    const errorMessages = query.error.issues.map((e) => {
      const path = e.path.length ? e.path.join('.') : 'value';
      return `${path}: ${e.message}`;
    }).join("; ");
    return {
      success: false,
      error: new SearchRequestError(
        pageIssue ? SearchRequestErrorCode.INVALID_PAGE_NUMBER : SearchRequestErrorCode.INVALID_QUERY,
        `Invalid query parameters: ${errorMessages}`
      ),
    };
  }

  return {
    success: true,
    data: Object.freeze({ keyword: query.data.q, requestedPage: query.data.page }),
  };
}
