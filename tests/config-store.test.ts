import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { readFileSync, writeFileSync } from "node:fs";
import { join } from "node:path";
import { ConfigStore } from "../src/storage/config-store.js";
import { DEFAULT_RUNTIME_CONFIG } from "../src/types/config.js";
import { InvalidConfigError } from "../src/types/errors.js";
import { createTempDir, removeTempDir } from "./helpers.js";

describe("ConfigStore", () => {
  let home: string;

  beforeEach(() => {
    home = createTempDir();
  });

  afterEach(() => {
    removeTempDir(home);
  });

  it("falls back to the defaults without a config file", () => {
    const config = new ConfigStore(home).load({});

    expect(config).toEqual({ ...DEFAULT_RUNTIME_CONFIG, home });
    expect(Object.isFrozen(config)).toBe(true);
    expect(Object.isFrozen(config.searchPaths)).toBe(true);
  });

  it("merges the file over the defaults", () => {
    writeFileSync(join(home, "config.json"), JSON.stringify({ maxInclusionBytes: 100, searchPaths: ["docs"] }));
    const config = new ConfigStore(home).load({});

    expect(config.maxInclusionBytes).toBe(100);
    expect(config.searchPaths).toEqual(["docs"]);
    expect(config.defaultModel).toBe(DEFAULT_RUNTIME_CONFIG.defaultModel);
  });

  it("lets the environment override the inclusion limit", () => {
    writeFileSync(join(home, "config.json"), JSON.stringify({ maxInclusionBytes: 100 }));
    const store = new ConfigStore(home);

    expect(store.load({ CHATDECK_MAX_INCLUSION_BYTES: "50" }).maxInclusionBytes).toBe(50);
    expect(store.load({ CHATDECK_MAX_INCLUSION_BYTES: "" }).maxInclusionBytes).toBe(100);
    expect(() => store.load({ CHATDECK_MAX_INCLUSION_BYTES: "abc" })).toThrow(InvalidConfigError);
    expect(() => store.load({ CHATDECK_MAX_INCLUSION_BYTES: "-5" })).toThrow(InvalidConfigError);
  });

  it("rejects malformed and out-of-range files", () => {
    const path = join(home, "config.json");

    writeFileSync(path, "{ nope");
    expect(() => new ConfigStore(home).load({})).toThrow(InvalidConfigError);

    writeFileSync(path, JSON.stringify({ maxInclusionBytes: -1 }));
    expect(() => new ConfigStore(home).load({})).toThrow(InvalidConfigError);
  });

  it("saves a validated patch", () => {
    const store = new ConfigStore(home);
    store.save({ includeFileHeaders: true });
    store.save({ retry: { maxRetries: 1, baseDelayMs: 5, maxDelayMs: 50 } });

    const config = store.load({});
    expect(config.includeFileHeaders).toBe(true);
    expect(config.retry).toEqual({ maxRetries: 1, baseDelayMs: 5, maxDelayMs: 50 });
  });

  it("leaves the file alone when a patch is invalid", () => {
    const store = new ConfigStore(home);
    store.save({ maxInclusionBytes: 10 });
    const before = readFileSync(store.configPath, "utf-8");

    expect(() => store.save({ maxInclusionBytes: 0 })).toThrow(InvalidConfigError);
    expect(readFileSync(store.configPath, "utf-8")).toBe(before);
  });
});
