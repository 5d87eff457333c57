/**
 * Article fetcher: sends one request to the news API per search, reads the whole body,
 * then decodes it as a page of articles or as an upstream error.
 * Nothing is retried or cached. A timeout, when wanted, arrives as `signal` from the caller.
 */

import type { FastifyBaseLogger } from "fastify";
import type { z } from "zod";
import { ArticleFetchError, ArticleFetchErrorCode } from "./errors.ts";
import { EverythingResponseSchema, UpstreamErrorSchema } from "./newsapi.schema.ts";
import { DEFAULT_PAGE_SIZE, paginate } from "./pagination.ts";
import type { SearchCursor, SearchResult } from "./types.ts";

// ─── Constants ──────────────────────────────────────────────────────────────

export const DEFAULT_BASE_URL = "https://newsapi.org/v2";
export const DEFAULT_LANGUAGE = "en";
const SORT_BY = "publishedAt";

// ─── Options ────────────────────────────────────────────────────────────────

export interface FetchArticlesOptions {
  apiKey: string;
  pageSize?: number;
  baseUrl?: string;
  language?: string;
  fetch?: typeof fetch;
  signal?: AbortSignal;
  logger?: FastifyBaseLogger;
}

// ─── Helpers ────────────────────────────────────────────────────────────────

/** GET <base>/everything?q=..&pageSize=..&page=..&apiKey=..&sortBy=publishedAt&language=.. */
export function buildEverythingUrl(
  cursor: SearchCursor,
  options: Pick<FetchArticlesOptions, "apiKey" | "pageSize" | "baseUrl" | "language">
): string {
  const base = (options.baseUrl ?? DEFAULT_BASE_URL).replace(/\/+$/, "");
  const params = new URLSearchParams({
    q: cursor.keyword,
    pageSize: String(options.pageSize ?? DEFAULT_PAGE_SIZE),
    page: String(cursor.requestedPage),
    apiKey: options.apiKey,
    sortBy: SORT_BY,
    language: options.language ?? DEFAULT_LANGUAGE,
  });
  return `${base}/everything?${params.toString()}`;
}

/** Reads the body to the end; a failed read is a transport fault. */
async function readBody(response: Response): Promise<string> {
  try {
    return await response.text();
  } catch (error) {
    throw new ArticleFetchError(
      ArticleFetchErrorCode.UPSTREAM_UNREACHABLE,
      "Upstream response body could not be read",
      { httpStatus: response.status, cause: error }
    );
  }
}

/** JSON.parse then schema decode; any failure is a protocol error. */
function decode<S extends z.ZodTypeAny>(schema: S, body: string, httpStatus: number): z.output<S> {
  let json: unknown;
  try {
    json = JSON.parse(body);
  } catch (error) {
    throw new ArticleFetchError(
      ArticleFetchErrorCode.UPSTREAM_PROTOCOL_ERROR,
      "Upstream response is not valid JSON",
      { httpStatus, cause: error }
    );
  }

  const parsed = schema.safeParse(json);
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((e) => `${e.path.length ? e.path.join(".") : "value"}: ${e.message}`)
      .join("; ");
    throw new ArticleFetchError(
      ArticleFetchErrorCode.UPSTREAM_PROTOCOL_ERROR,
      `Upstream response has an unexpected shape: ${issues}`,
      { httpStatus, cause: parsed.error }
    );
  }
  return parsed.data;
}

// ─── Public API ─────────────────────────────────────────────────────────────

/**
 * Fetch one page of articles for the cursor and derive its pagination.
 * Throws ArticleFetchError on every failure; the response body is read to the end before decoding.
 */
export async function fetchArticles(
  cursor: SearchCursor,
  options: FetchArticlesOptions
): Promise<SearchResult> {
  const pageSize = options.pageSize ?? DEFAULT_PAGE_SIZE;
  const doFetch = options.fetch ?? fetch;
  const log = options.logger;
  const url = buildEverythingUrl(cursor, { ...options, pageSize });

  const started = performance.now();
  let response: Response;
  try {
    response = await doFetch(url, {
      headers: { Accept: "application/json" },
      signal: options.signal,
    });
  } catch (error) {
    log?.warn({ err: error, keyword: cursor.keyword, page: cursor.requestedPage }, "news api unreachable");
    throw new ArticleFetchError(
      ArticleFetchErrorCode.UPSTREAM_UNREACHABLE,
      "Upstream news API is unreachable",
      { cause: error }
    );
  }

  try {
    const body = await readBody(response);
    log?.debug(
      {
        keyword: cursor.keyword,
        page: cursor.requestedPage,
        status: response.status,
        durationMs: Math.round(performance.now() - started),
      },
      "news api responded"
    );

    if (!response.ok) {
      const upstream = decode(UpstreamErrorSchema, body, response.status);
      throw new ArticleFetchError(ArticleFetchErrorCode.UPSTREAM_REJECTED, upstream.message, {
        httpStatus: response.status,
        upstream,
      });
    }

    const payload = decode(EverythingResponseSchema, body, response.status);
    const pagination = paginate(cursor.requestedPage, payload.totalResults, pageSize);

    return Object.freeze({
      keyword: cursor.keyword,
      articles: payload.articles,
      ...pagination,
    });
  } catch (error) {
    if (error instanceof ArticleFetchError) {
      log?.warn({ code: error.code, httpStatus: error.httpStatus, keyword: cursor.keyword }, error.message);
    }
    throw error;
  }
}
