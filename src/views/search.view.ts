import { escapeHtml, renderLayout, safeUrl } from "./html.ts";
import { formatPublishedDate } from "../../services/news/article.ts";
import type { Article, SearchResult } from "../../services/news/types.ts";

/** Relative link to another page of the same search. */
export function searchHref(keyword: string, page: number): string {
  return `/search?${new URLSearchParams({ q: keyword, page: String(page) }).toString()}`;
}

export function renderIndexPage(): string {
  return renderLayout({
    title: "News Search",
    body: `<p class="meta">Search the latest news articles by keyword.</p>`,
  });
}

function renderArticle(article: Article): string {
  const imageUrl = safeUrl(article.imageUrl);
  const image = imageUrl
    ? `<img src="${escapeHtml(imageUrl)}" alt="">`
    : "";
  const byline = [article.sourceName, article.author].filter(Boolean).map(escapeHtml).join(" · ");

  return `<li class="article">
${image}
<div>
<h3><a href="${escapeHtml(safeUrl(article.url) ?? "#")}" target="_blank" rel="noopener noreferrer">${escapeHtml(article.title)}</a></h3>
<p class="meta">${byline ? `${byline} · ` : ""}${formatPublishedDate(article)}</p>
<p>${escapeHtml(article.description)}</p>
</div>
</li>`;
}

function renderPagination(result: SearchResult): string {
  const previous = result.previousPage > 0
    ? `<a class="previous" href="${escapeHtml(searchHref(result.keyword, result.previousPage))}">Previous</a>`
    : "<span></span>";
  const next = !result.isLastPage
    ? `<a class="next" href="${escapeHtml(searchHref(result.keyword, result.nextPage))}">Next</a>`
    : "<span></span>";
  return `<nav class="pagination">${previous}${next}</nav>`;
}

/** Results page. Page counter only shows when there is at least one page. */
export function renderSearchPage(result: SearchResult): string {
  const summary = result.totalPages > 0
    ? `<p class="meta">Page ${result.currentPage} of ${result.totalPages} · ${result.totalResults} results for <strong>${escapeHtml(result.keyword)}</strong></p>`
    : `<p class="meta">No results for <strong>${escapeHtml(result.keyword)}</strong></p>`;

  return renderLayout({
    title: result.keyword ? `${result.keyword} · News Search` : "News Search",
    keyword: result.keyword,
    body: `${summary}
<ul class="articles">
${result.articles.map(renderArticle).join("\n")}
</ul>
${renderPagination(result)}`,
  });
}
