import { format } from "date-fns";
import { TZDate } from "@date-fns/tz";
import type { Article } from "./types.ts";

/**
 * "<Month> <Day>, <Year>", e.g. "March 4, 2024", on the calendar of the offset the upstream sent.
 * A plain Date (no zone attached) is read in UTC.
 */
export function formatPublishedDate(article: Pick<Article, "publishedAt">): string {
  const date = article.publishedAt instanceof TZDate
    ? article.publishedAt
    : new TZDate(article.publishedAt.getTime(), "UTC");
  return format(date, "MMMM d, yyyy");
}
