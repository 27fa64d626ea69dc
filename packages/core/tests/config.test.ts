/**
 * Tests for the configuration layer
 */

import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";
import { config, defineConfig, isDebugEnabled, isFusionEnabled } from "../src/index.js";

describe("config", () => {
  beforeEach(() => {
    config.reset();
  });

  afterEach(() => {
    vi.unstubAllEnvs();
    config.reset();
  });

  describe("defaults", () => {
    it("has debug off and fusion on", () => {
      expect(config.get("debug")).toBe(false);
      expect(config.get("fusion")).toBe(true);
      expect(isDebugEnabled()).toBe(false);
      expect(isFusionEnabled()).toBe(true);
    });

    it("returns undefined for unknown paths", () => {
      expect(config.get("nope.nothing")).toBeUndefined();
      expect(config.has("nope")).toBe(false);
    });
  });

  describe("programmatic overrides", () => {
    it("set merges nested values", () => {
      config.set({ trace: { cache: true } });
      config.set({ trace: { list: false } });
      expect(config.get("trace.cache")).toBe(true);
      expect(config.get("trace.list")).toBe(false);
      expect(config.has("trace.cache")).toBe(true);
    });

    it("fusion can be switched off", () => {
      config.set({ fusion: false });
      expect(isFusionEnabled()).toBe(false);
    });

    it("reset drops overrides", () => {
      config.set({ debug: true });
      config.reset();
      expect(config.get("debug")).toBe(false);
    });
  });

  describe("environment variables", () => {
    it("SEQFUSE_DEBUG=1 turns debug on", () => {
      vi.stubEnv("SEQFUSE_DEBUG", "1");
      expect(isDebugEnabled()).toBe(true);
    });

    it("SEQFUSE_FUSION=false turns fusion off", () => {
      vi.stubEnv("SEQFUSE_FUSION", "false");
      expect(isFusionEnabled()).toBe(false);
    });

    it("double underscores nest and numbers parse", () => {
      vi.stubEnv("SEQFUSE_TRACE__LIMIT", "42");
      expect(config.get("trace.limit")).toBe(42);
    });

    it("environment wins over defaults but not over later set()", () => {
      vi.stubEnv("SEQFUSE_DEBUG", "true");
      expect(config.get("debug")).toBe(true);
      config.set({ debug: false });
      expect(config.get("debug")).toBe(false);
    });
  });

  it("defineConfig returns its argument", () => {
    const cfg = { debug: true, fusion: false };
    expect(defineConfig(cfg)).toBe(cfg);
  });

  it("getAll exposes the merged store", () => {
    config.set({ custom: "value" });
    expect(config.getAll()).toMatchObject({ debug: false, fusion: true, custom: "value" });
  });
});
