import type { UpstreamError } from "./types.ts";

// ─── Fetch failures ─────────────────────────────────────────────────────────

export const ArticleFetchErrorCode = {
  UPSTREAM_UNREACHABLE: "UPSTREAM_UNREACHABLE",
  UPSTREAM_PROTOCOL_ERROR: "UPSTREAM_PROTOCOL_ERROR",
  UPSTREAM_REJECTED: "UPSTREAM_REJECTED",
} as const;

export type ArticleFetchErrorCode =
  (typeof ArticleFetchErrorCode)[keyof typeof ArticleFetchErrorCode];

export interface ArticleFetchErrorDetails {
  /** HTTP status of the upstream response, when one was received. */
  httpStatus?: number;
  /** Decoded upstream error body (UPSTREAM_REJECTED only). */
  upstream?: UpstreamError;
  cause?: unknown;
}

export class ArticleFetchError extends Error {
  readonly code: ArticleFetchErrorCode;
  readonly httpStatus?: number;
  readonly upstream?: UpstreamError;

  constructor(code: ArticleFetchErrorCode, message: string, details: ArticleFetchErrorDetails = {}) {
    super(message, details.cause === undefined ? undefined : { cause: details.cause });
    this.name = "ArticleFetchError";
    this.code = code;
    this.httpStatus = details.httpStatus;
    this.upstream = details.upstream;
    Object.setPrototypeOf(this, ArticleFetchError.prototype);
  }
}

/** Message shown to the user for internal failures; upstream rejections show their own text. */
export const UNEXPECTED_SERVER_ERROR = "Unexpected server error";

/** HTTP status and body text the search route answers with for a fetch failure. */
export function describeFetchError(error: ArticleFetchError): { status: number; message: string } {
  switch (error.code) {
    case ArticleFetchErrorCode.UPSTREAM_REJECTED:
      return { status: 500, message: error.message };
    case ArticleFetchErrorCode.UPSTREAM_PROTOCOL_ERROR:
    case ArticleFetchErrorCode.UPSTREAM_UNREACHABLE:
      return { status: 500, message: UNEXPECTED_SERVER_ERROR };
  }
}
