import type { SearchResult } from "../../services/news/types.ts";

export interface SearchSuccess {
  result: SearchResult;
}

/** HTTP-shaped failure: status code and the text/plain body to send. */
export interface SearchFailure {
  status: number;
  error: string;
  code: string;
}

export type SearchResponse = SearchSuccess | SearchFailure;
