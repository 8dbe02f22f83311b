import { describe, test, expect, vi, afterEach } from "vitest";
import { deepMerge, getApiConfig, validateConfig, DEFAULT_BASE_URL } from "./index.ts";
import { CliError, EXIT_USAGE } from "../utils/errors.ts";

describe("deepMerge", () => {
  test("merges nested objects and skips null overrides", () => {
    const merged = deepMerge(
      { api: { base_url: "https://a.example/api/v4", timeout: 30 }, defaults: { project: "x" } },
      { api: { timeout: 5 }, defaults: null },
    );
    expect(merged).toEqual({
      api: { base_url: "https://a.example/api/v4", timeout: 5 },
      defaults: { project: "x" },
    });
  });
});

describe("validateConfig", () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  test("returns the defaults for an empty file", () => {
    expect(validateConfig(undefined)).toEqual({
      auth: {},
      api: { base_url: DEFAULT_BASE_URL, timeout: 30 },
      defaults: {},
    });
  });

  test("merges user values over defaults", () => {
    const config = validateConfig({
      auth: { token: "test-secret" },
      api: { base_url: "https://gitlab.example.com/api/v4" },
      defaults: { project: "group/project" },
    });
    expect(config).toEqual({
      auth: { token: "test-secret" },
      api: { base_url: "https://gitlab.example.com/api/v4", timeout: 30 },
      defaults: { project: "group/project" },
    });
  });

  test("collects every problem into one error", () => {
    let caught: unknown;
    try {
      validateConfig({ auth: { token: 1 }, api: { base_url: "ftp://x", timeout: 0 } });
    } catch (err) {
      caught = err;
    }
    expect(caught).toBeInstanceOf(CliError);
    if (!(caught instanceof CliError)) return;
    expect(caught.code).toBe(EXIT_USAGE);
    expect(caught.message.split("\n")).toEqual([
      "Config error: auth.token must be a string, got 1",
      'Config error: api.base_url must be an http(s) URL, got "ftp://x"',
      "Config error: api.timeout must be a positive integer, got 0",
    ]);
  });

  test("warns about unknown keys and drops them", () => {
    const warn = vi.spyOn(console, "error").mockImplementation(() => {});
    const config = validateConfig({ theme: "dark" });
    expect(warn).toHaveBeenCalledWith('Config warning: unknown top-level key "theme" will be ignored');
    expect(config).not.toHaveProperty("theme");
  });

  test("rejects a config that is not a table", () => {
    expect(() => validateConfig(["a"])).toThrow("Config error: configuration must be an object");
  });
});

describe("getApiConfig", () => {
  afterEach(() => {
    vi.unstubAllEnvs();
  });

  test("takes LABELCTL_BASE_URL over the file", () => {
    vi.stubEnv("LABELCTL_BASE_URL", "https://gitlab.example.com/api/v4");
    expect(getApiConfig({ api: { base_url: "https://other.example/api/v4", timeout: 10 } })).toEqual({
      base_url: "https://gitlab.example.com/api/v4",
      timeout: 10,
    });
  });

  test("rejects a LABELCTL_BASE_URL without a scheme", () => {
    vi.stubEnv("LABELCTL_BASE_URL", "gitlab.example.com/api/v4");
    let caught: unknown;
    try {
      getApiConfig({});
    } catch (err) {
      caught = err;
    }
    expect(caught).toBeInstanceOf(CliError);
    if (!(caught instanceof CliError)) return;
    expect(caught.code).toBe(EXIT_USAGE);
    expect(caught.message).toBe('LABELCTL_BASE_URL must be an http(s) URL, got "gitlab.example.com/api/v4"');
  });
});
