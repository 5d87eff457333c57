import { describe, expect, it } from "vitest";
import { ConfigError, loadConfig } from "../src/config/env.ts";

describe("loadConfig", () => {
  it("applies defaults", () => {
    expect(loadConfig({ NEWS_API_KEY: "test-key" }, [])).toEqual({
      newsApi: {
        apiKey: "test-key",
        baseUrl: "https://newsapi.org/v2",
        language: "en",
        pageSize: 20,
        timeoutMs: 10_000,
      },
      port: 2000,
      host: "0.0.0.0",
      logLevel: "info",
    });
  });

  it("reads overrides from the environment", () => {
    const config = loadConfig(
      {
        NEWS_API_KEY: "test-key",
        NEWS_API_BASE_URL: "http://upstream.test/v2",
        NEWS_API_LANGUAGE: "fr",
        NEWS_API_TIMEOUT_MS: "2500",
        PORT: "8080",
        LOG_LEVEL: "debug",
      },
      []
    );
    expect(config.newsApi.baseUrl).toBe("http://upstream.test/v2");
    expect(config.newsApi.language).toBe("fr");
    expect(config.newsApi.timeoutMs).toBe(2500);
    expect(config.port).toBe(8080);
    expect(config.logLevel).toBe("debug");
  });

  it("lets --apikey override the environment", () => {
    expect(loadConfig({ NEWS_API_KEY: "env-key" }, ["--apikey", "cli-key"]).newsApi.apiKey).toBe("cli-key");
    expect(loadConfig({}, ["--apikey=cli-key"]).newsApi.apiKey).toBe("cli-key");
  });

  it("requires an api key", () => {
    expect(() => loadConfig({}, [])).toThrow(ConfigError);
    expect(() => loadConfig({ NEWS_API_KEY: "" }, [])).toThrow(
      "Invalid configuration: NEWS_API_KEY: is required (or pass --apikey)"
    );
  });

  it("lists every invalid value", () => {
    expect(() => loadConfig({ PORT: "not-a-port", LOG_LEVEL: "loud" }, [])).toThrow(
      /NEWS_API_KEY: .*; PORT: .*; LOG_LEVEL: /
    );
  });

  it("returns a frozen config", () => {
    const config = loadConfig({ NEWS_API_KEY: "test-key" }, []);
    expect(Object.isFrozen(config)).toBe(true);
    expect(Object.isFrozen(config.newsApi)).toBe(true);
  });
});
