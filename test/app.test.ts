import { afterEach, describe, expect, it, vi } from "vitest";
import type { FastifyInstance } from "fastify";
import { buildApp } from "../src/app.ts";
import { loadConfig } from "../src/config/env.ts";
import { everythingPayload, jsonResponse } from "./fixtures.ts";

const config = loadConfig({ NEWS_API_KEY: "test-key" }, []);

describe("http routes", () => {
  let app: FastifyInstance | undefined;

  afterEach(async () => {
    await app?.close();
    app = undefined;
  });

  async function appWith(respond: () => Promise<Response>) {
    const fetchStub = vi.fn(async (..._args: Parameters<typeof fetch>) => respond());
    app = await buildApp(config, { logger: false, fetch: fetchStub });
    return { app, fetchStub };
  }

  it("answers health checks", async () => {
    const { app } = await appWith(async () => jsonResponse({}));
    const res = await app.inject({ method: "GET", url: "/health" });
    expect(res.statusCode).toBe(200);
    expect(res.json()).toEqual({ status: "ok" });
  });

  it("serves the search form", async () => {
    const { app } = await appWith(async () => jsonResponse({}));
    const res = await app.inject({ method: "GET", url: "/" });
    expect(res.statusCode).toBe(200);
    expect(res.headers["content-type"]).toBe("text/html; charset=utf-8");
    expect(res.body).toContain('<form action="/search" method="GET" role="search">');
  });

  it("renders a single page of results", async () => {
    const { app, fetchStub } = await appWith(async () => jsonResponse(everythingPayload(5, 5)));

    const res = await app.inject({ method: "GET", url: "/search?q=rust&page=1" });

    expect(res.statusCode).toBe(200);
    expect(res.body).toContain("Page 1 of 1 · 5 results for <strong>rust</strong>");
    expect(res.body.match(/<li class="article">/g)).toHaveLength(5);
    expect(res.body).not.toContain('class="next"');
    expect(res.body).not.toContain('class="previous"');
    const [url] = fetchStub.mock.calls[0];
    expect(String(url)).toBe(
      "https://newsapi.org/v2/everything?q=rust&pageSize=20&page=1&apiKey=test-key&sortBy=publishedAt&language=en"
    );
  });

  it("links to the previous and next pages", async () => {
    const { app } = await appWith(async () => jsonResponse(everythingPayload(100, 20)));

    const res = await app.inject({ method: "GET", url: "/search?q=rust&page=3" });

    expect(res.statusCode).toBe(200);
    expect(res.body).toContain("Page 3 of 5 · 100 results");
    expect(res.body).toContain('<a class="previous" href="/search?q=rust&amp;page=2">Previous</a>');
    expect(res.body).toContain('<a class="next" href="/search?q=rust&amp;page=4">Next</a>');
  });

  it("escapes the keyword for the upstream call", async () => {
    const { app, fetchStub } = await appWith(async () => jsonResponse(everythingPayload(0, 0)));

    const res = await app.inject({ method: "GET", url: "/search?q=rust%20lang" });

    expect(res.statusCode).toBe(200);
    expect(res.body).toContain("No results for <strong>rust lang</strong>");
    const [url] = fetchStub.mock.calls[0];
    expect(String(url)).toContain("?q=rust+lang&pageSize=20&page=1&");
  });

  it("rejects an invalid page without calling upstream", async () => {
    const { app, fetchStub } = await appWith(async () => jsonResponse(everythingPayload(5, 5)));

    const res = await app.inject({ method: "GET", url: "/search?q=rust&page=abc" });

    expect(res.statusCode).toBe(400);
    expect(res.body).toBe("Invalid query parameters: page: must be a positive integer");
    expect(fetchStub).not.toHaveBeenCalled();
  });

  it("shows the upstream message when the request is rejected", async () => {
    const { app } = await appWith(async () =>
      jsonResponse({ status: "error", code: "rateLimited", message: "You have made too many requests recently." }, 429)
    );

    const res = await app.inject({ method: "GET", url: "/search?q=rust" });

    expect(res.statusCode).toBe(500);
    expect(res.headers["content-type"]).toBe("text/plain; charset=utf-8");
    expect(res.body).toBe("You have made too many requests recently.");
  });

  it("hides protocol errors behind a generic message", async () => {
    const { app } = await appWith(async () => new Response("upstream exploded", { status: 502 }));

    const res = await app.inject({ method: "GET", url: "/search?q=rust" });

    expect(res.statusCode).toBe(500);
    expect(res.body).toBe("Unexpected server error");
  });

  it("hides transport failures behind a generic message", async () => {
    const { app } = await appWith(async () => {
      throw new TypeError("fetch failed");
    });

    const res = await app.inject({ method: "GET", url: "/search?q=rust" });

    expect(res.statusCode).toBe(500);
    expect(res.body).toBe("Unexpected server error");
  });
});
