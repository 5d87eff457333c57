/**
 * Live search against the real news API. Run with: npx tsx scripts/search-news.mts <keyword> [page]
 *
 * Uses NEWS_API_KEY from .env (or --apikey <key>).
 * 1. Parses keyword and page the same way GET /search does
 * 2. Runs one upstream fetch and logs the pagination
 * 3. Prints the first few articles
 */

import { loadConfig, loadEnvFile } from "../src/config/env.ts";
import { parseSearchRequest } from "../src/modules/search.validator.ts";
import { fetchArticles } from "../services/news/article.fetcher.ts";
import { formatPublishedDate } from "../services/news/article.ts";

function elapsed(ms: number): string {
  return `${(ms / 1000).toFixed(2)}s`;
}

async function main() {
  loadEnvFile();
  const config = loadConfig();
  const [q = "", page] = process.argv.slice(2).filter((a) => !a.startsWith("--"));

  const parsed = parseSearchRequest({ q, page });
  if (!parsed.success) {
    console.error(`❌ ${parsed.error.message}`);
    process.exit(1);
  }

  console.log("Cursor:", parsed.data, "\n");

  const t0 = performance.now();
  const result = await fetchArticles(parsed.data, {
    ...config.newsApi,
    signal: AbortSignal.timeout(config.newsApi.timeoutMs),
  });
  console.log(`✓ ${result.articles.length} articles (${elapsed(performance.now() - t0)})`);
  console.log(
    `  page ${result.currentPage}/${result.totalPages}, next ${result.nextPage}, total ${result.totalResults}\n`
  );

  for (const article of result.articles.slice(0, 5)) {
    console.log(`- ${article.title}`);
    console.log(`  ${article.sourceName} · ${formatPublishedDate(article)} · ${article.url}`);
  }
}

main().then(() => process.exit(0)).catch((e) => {
  console.error(e);
  process.exit(1);
});
