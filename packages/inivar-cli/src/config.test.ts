import { mkdtempSync, rmSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { ConfigError, loadConfig, validateConfig } from "./config.js";

describe("validateConfig", () => {
  it("should accept global options and defaults", () => {
    const config = validateConfig({
      global: { "log-level": "DEBUG", "comment-chars": ";#", interpolate: false },
      defaults: { owner: "ops", retries: 3, verbose: true },
    });

    expect(config).toEqual({
      global: { "log-level": "debug", "comment-chars": ";#", interpolate: false },
      defaults: { owner: "ops", retries: "3", verbose: "true" },
    });
  });

  it("should accept an empty table", () => {
    expect(validateConfig({})).toEqual({});
  });

  it("should reject unknown sections", () => {
    expect(() => validateConfig({ agent: {} })).toThrow("[agent] is not a valid section");
  });

  it("should reject unknown global options", () => {
    expect(() => validateConfig({ global: { colour: true } })).toThrow(
      "[global].colour is not a valid option",
    );
  });

  it("should reject invalid option values", () => {
    expect(() => validateConfig({ global: { "log-level": "loud" } })).toThrow(
      "[global].log-level must be one of: silly, trace, debug, info, warn, error, fatal",
    );
    expect(() => validateConfig({ global: { interpolate: "yes" } })).toThrow(
      "[global].interpolate must be a boolean",
    );
    expect(() => validateConfig({ global: { "comment-chars": 1 } })).toThrow(
      "[global].comment-chars must be a string",
    );
  });

  it("should reject nested tables in defaults", () => {
    expect(() => validateConfig({ defaults: { nested: { a: "b" } } })).toThrow(
      "[defaults].nested must be a string, number or boolean",
    );
  });

  it("should prefix errors with the config path", () => {
    const validate = () => validateConfig({ global: "nope" }, "/tmp/cli.toml");

    expect(validate).toThrow(ConfigError);
    expect(validate).toThrow("/tmp/cli.toml: [global] must be a table");
  });
});

describe("loadConfig", () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), "inivar-config-"));
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it("should return an empty config when the file is missing", () => {
    expect(loadConfig(join(dir, "missing.toml"))).toEqual({});
  });

  it("should load and validate a TOML file", () => {
    const path = join(dir, "cli.toml");
    writeFileSync(
      path,
      ['[global]', 'log-level = "info"', "", "[defaults]", 'owner = "ops"', ""].join("\n"),
    );

    expect(loadConfig(path)).toEqual({
      global: { "log-level": "info" },
      defaults: { owner: "ops" },
    });
  });

  it("should report invalid TOML", () => {
    const path = join(dir, "cli.toml");
    writeFileSync(path, "[global\nlog-level = ");

    expect(() => loadConfig(path)).toThrow(`${path}: Invalid TOML syntax`);
  });
});
