/** Upstream-shaped payload builders for tests. */

export interface UpstreamArticle {
  source: { id: string | number | null; name: string } | null;
  author: string | null;
  title: string | null;
  description: string | null;
  url: string | null;
  urlToImage: string | null;
  publishedAt: string;
  content: string | null;
}

export function upstreamArticle(i: number, overrides: Partial<UpstreamArticle> = {}): UpstreamArticle {
  return {
    source: { id: "example-wire", name: "Example Wire" },
    author: "Sam Writer",
    title: `Story ${i}`,
    description: `Summary of story ${i}`,
    url: `https://news.example.com/story-${i}`,
    urlToImage: `https://news.example.com/story-${i}.jpg`,
    publishedAt: "2024-03-04T10:15:00Z",
    content: `Body of story ${i}`,
    ...overrides,
  };
}

export function everythingPayload(totalResults: number, count: number) {
  return {
    status: "ok",
    totalResults,
    articles: Array.from({ length: count }, (_, i) => upstreamArticle(i + 1)),
  };
}

export function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { "content-type": "application/json" },
  });
}
