import fp from "fastify-plugin";
import type { FastifyBaseLogger, FastifyPluginAsync } from "fastify";
import { fetchArticles } from "../../services/news/article.fetcher.ts";
import type { SearchCursor, SearchResult } from "../../services/news/types.ts";

export interface NewsApiPluginOptions {
  apiKey: string;
  baseUrl: string;
  language: string;
  pageSize: number;
  timeoutMs: number;
  /** Replaces global fetch; tests pass a stub here. */
  fetch?: typeof fetch;
}

export interface NewsApiClient {
  search(cursor: SearchCursor, logger?: FastifyBaseLogger): Promise<SearchResult>;
}

declare module "fastify" {
  interface FastifyInstance {
    newsApi: NewsApiClient;
  }
}

/** Binds the credential and upstream settings once; each search gets its own timeout signal. */
const newsApi: FastifyPluginAsync<NewsApiPluginOptions> = async function newsApiPlugin(app, opts) {
  const client: NewsApiClient = {
    search(cursor, logger) {
      return fetchArticles(cursor, {
        apiKey: opts.apiKey,
        baseUrl: opts.baseUrl,
        language: opts.language,
        pageSize: opts.pageSize,
        fetch: opts.fetch,
        signal: AbortSignal.timeout(opts.timeoutMs),
        logger,
      });
    },
  };

  app.decorate("newsApi", client);
};

export const newsApiPlugin = fp(newsApi, { name: "news-api" });
