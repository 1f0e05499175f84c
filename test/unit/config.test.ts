import { describe, it, expect } from "vitest";
import { ENV_BASE_URL, parseConfig } from "../../src/config.js";

describe("parseConfig", () => {
  it("fills in defaults", () => {
    expect(parseConfig(["--base-url", "http://localhost:8000"], {})).toEqual({
      baseUrl: "http://localhost:8000",
      headless: true,
      concurrency: 1,
      viewports: ["desktop", "mobile"],
      defaultFilter: "unread",
    });
  });

  it("reads every flag", () => {
    const config = parseConfig(
      [
        "--base-url",
        "http://localhost:8000",
        "--cdp-url",
        "http://127.0.0.1:9222",
        "--headed",
        "--artifacts",
        "out",
        "--concurrency",
        "4",
        "--only",
        "scroll",
        "--viewport",
        "mobile",
        "--default-filter",
        "all",
        "--feed-url",
        "http://localhost:9000/feed.xml",
      ],
      {},
    );
    expect(config).toEqual({
      baseUrl: "http://localhost:8000",
      cdpUrl: "http://127.0.0.1:9222",
      headless: false,
      artifactsDir: "out",
      concurrency: 4,
      only: "scroll",
      viewports: ["mobile"],
      defaultFilter: "all",
      feedUrl: "http://localhost:9000/feed.xml",
    });
  });

  it("falls back to the environment for the base URL", () => {
    expect(parseConfig([], { [ENV_BASE_URL]: "http://reader.test" }).baseUrl).toBe("http://reader.test");
    expect(parseConfig(["--base-url", "http://a.test"], { [ENV_BASE_URL]: "http://b.test" }).baseUrl).toBe(
      "http://a.test",
    );
  });

  it("requires a base URL", () => {
    expect(() => parseConfig([], {})).toThrow(
      `Invalid configuration: baseUrl: base URL is required (--base-url or ${ENV_BASE_URL})`,
    );
  });

  it("rejects unknown options with the usage text", () => {
    expect(() => parseConfig(["--verbose"], {})).toThrow(/^Unknown option --verbose\n\nUsage: settlecheck/);
  });

  it("rejects a flag without its value", () => {
    expect(() => parseConfig(["--base-url", "http://a.test", "--only"], {})).toThrow("--only needs a value");
    expect(() => parseConfig(["--artifacts", "--headed"], {})).toThrow("--artifacts needs a value");
  });

  it("validates values", () => {
    expect(() => parseConfig(["--base-url", "http://a.test", "--concurrency", "0"], {})).toThrow(
      /^Invalid configuration: concurrency: /,
    );
    expect(() => parseConfig(["--base-url", "http://a.test", "--viewport", "tablet"], {})).toThrow(
      /^Invalid configuration: viewports\.0: /,
    );
    expect(() => parseConfig(["--base-url", "not a url"], {})).toThrow(/^Invalid configuration: baseUrl: /);
  });

  it("marks every failure CONFIG_INVALID", () => {
    let caught: unknown;
    try {
      parseConfig(["--default-filter", "starred"], { [ENV_BASE_URL]: "http://a.test" });
    } catch (err) {
      caught = err;
    }
    expect(caught).toMatchObject({ code: "CONFIG_INVALID" });
  });
});
