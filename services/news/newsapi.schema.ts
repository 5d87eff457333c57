import { z } from "zod";
import { TZDate } from "@date-fns/tz";
import type { Article, UpstreamError } from "./types.ts";

/** Trailing "+05:30", "+0530" or "+05" as "+05:30" / "+05:00"; "Z" or none is UTC. */
function offsetZone(timestamp: string): string {
  const match = /([+-])(\d{2}):?(\d{2})?$/.exec(timestamp);
  if (!match) return "UTC";
  return `${match[1]}${match[2]}:${match[3] ?? "00"}`;
}

/** Keeps the offset the upstream sent, so the calendar day is the upstream's. */
export function parsePublishedAt(timestamp: string): TZDate {
  return new TZDate(Date.parse(timestamp), offsetZone(timestamp));
}

/** Upstream strings may be null or missing; both decode to "". */
const text = z
  .string()
  .nullish()
  .transform((v) => v ?? "");

const ArticleSchema = z
  .object({
    source: z
      .object({
        id: z.union([z.string(), z.number()]).nullish(),
        name: text,
      })
      .nullish(),
    author: text,
    title: text,
    description: text,
    url: text,
    urlToImage: text,
    publishedAt: z.string().datetime({ offset: true }),
    content: text,
  })
  .transform((a): Article => {
    const article: Article = {
      sourceName: a.source?.name ?? "",
      author: a.author,
      title: a.title,
      description: a.description,
      url: a.url,
      imageUrl: a.urlToImage,
      publishedAt: parsePublishedAt(a.publishedAt),
      content: a.content,
    };
    const sourceId = a.source?.id;
    if (sourceId !== undefined && sourceId !== null) {
      article.sourceId = sourceId;
    }
    return Object.freeze(article);
  });

/** 2xx body of GET /everything. */
export const EverythingResponseSchema = z.object({
  status: z.string(),
  totalResults: z.number().int().nonnegative(),
  articles: z.array(ArticleSchema),
});

export type EverythingResponse = z.infer<typeof EverythingResponseSchema>;

/** Non-2xx body. Only message is required; it is what the user sees. */
export const UpstreamErrorSchema = z
  .object({
    status: z.string().optional(),
    code: z.string().optional(),
    message: z.string(),
  })
  .transform(
    (e): UpstreamError => ({
      status: e.status ?? "",
      code: e.code ?? "",
      message: e.message,
    })
  );
