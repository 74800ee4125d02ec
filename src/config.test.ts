import { describe, expect, it } from "vitest";
import { DEFAULT_BASE_URL, DEFAULT_USER_AGENT, loadConfig } from "./config";
import { UsageError } from "./errors";

describe("loadConfig", () => {
  it("falls back to defaults", () => {
    expect(loadConfig({})).toEqual({
      databasePath: "land_records.db",
      baseUrl: DEFAULT_BASE_URL,
      requestTimeoutMs: 40_000,
      nakalHtmlDir: undefined,
      userAgent: DEFAULT_USER_AGENT,
    });
  });

  it("reads overrides from the environment", () => {
    const config = loadConfig({
      DATABASE_PATH: "data/records.db",
      JAMABANDI_BASE_URL: "http://localhost:8080/land%20records/",
      REQUEST_TIMEOUT_MS: "5000",
      NAKAL_HTML_DIR: "data/nakal",
      USER_AGENT: "land-record-test",
    });

    expect(config).toEqual({
      databasePath: "data/records.db",
      baseUrl: "http://localhost:8080/land%20records/",
      requestTimeoutMs: 5000,
      nakalHtmlDir: "data/nakal",
      userAgent: "land-record-test",
    });
  });

  it("adds the trailing slash the page paths resolve against", () => {
    expect(loadConfig({ JAMABANDI_BASE_URL: "http://localhost/land%20records" }).baseUrl).toBe(
      "http://localhost/land%20records/"
    );
  });

  it("treats blank values as unset", () => {
    const config = loadConfig({ DATABASE_PATH: "  ", NAKAL_HTML_DIR: "", REQUEST_TIMEOUT_MS: " " });

    expect(config.databasePath).toBe("land_records.db");
    expect(config.nakalHtmlDir).toBeUndefined();
    expect(config.requestTimeoutMs).toBe(40_000);
  });

  it.each(["0", "-5", "1.5", "soon"])("rejects REQUEST_TIMEOUT_MS=%s", (value) => {
    expect(() => loadConfig({ REQUEST_TIMEOUT_MS: value })).toThrow(UsageError);
    expect(() => loadConfig({ REQUEST_TIMEOUT_MS: value })).toThrow(
      `REQUEST_TIMEOUT_MS must be a positive integer, got "${value}"`
    );
  });
});
