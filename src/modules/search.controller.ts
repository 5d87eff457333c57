import type { FastifyBaseLogger } from "fastify";
import { parseSearchRequest } from "./search.validator.ts";
import type { SearchResponse } from "./search.types.ts";
import type { NewsApiClient } from "../plugins/news-api.plugin.ts";
import { ArticleFetchError, describeFetchError } from "../../services/news/errors.ts";

export async function search(
    queryParams: unknown,
    newsApi: NewsApiClient,
    logger?: FastifyBaseLogger
): Promise<SearchResponse> {
    const query = parseSearchRequest(queryParams);

    if (!query.success) {
        return {
            error: query.error.message,
            code: query.error.code,
            status: 400,
        };
    }

    try {
        const result = await newsApi.search(query.data, logger);
        return { result };
    } catch (error) {
        if (!(error instanceof ArticleFetchError)) throw error;
        const { status, message } = describeFetchError(error);
        return { error: message, code: error.code, status };
    }
}
