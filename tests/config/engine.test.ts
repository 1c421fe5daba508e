/**
 * Engine Config Tests
 */

import fs from "fs";
import os from "os";
import path from "path";
import { afterEach, describe, it, expect } from "vitest";
import {
  DEFAULT_ENGINE_CONFIG,
  DEFAULT_FOMC_DATES,
  loadEngineConfig,
  parseEngineConfig,
} from "../../src/config/engine.js";

describe("parseEngineConfig", () => {
  it("should fill every section with defaults", () => {
    const cfg = parseEngineConfig({});
    expect(cfg.signals.skewing).toBe(0.05);
    expect(cfg.signals.rip).toBe(70);
    expect(cfg.composite.minTier1Firing).toBe(2);
    expect(cfg.calendar.opexModifier).toBe(1.5);
    expect(cfg.sizing.accountCapital).toBe(250_000);
    expect(cfg.selector.defaultIvRank).toBe(50);
  });

  it("should merge partial overrides with defaults", () => {
    const cfg = parseEngineConfig({
      signals: { skewing: 0.07 },
      selector: { weights: { bullPutSpread: { highIv: 4 } } },
    });
    expect(cfg.signals.skewing).toBe(0.07);
    expect(cfg.signals.rip).toBe(70);
    expect(cfg.selector.weights.bullPutSpread).toEqual({ highIv: 4, steepSkew: 2, contango: 1 });
  });

  it("should parse sizing tables into maps", () => {
    const { sizing } = DEFAULT_ENGINE_CONFIG;
    expect(sizing.coreMultipliers.get(4)).toBe(1.5);
    expect(sizing.coreMultipliers.get(2)).toBeUndefined();
    expect(sizing.compositeMultipliers.get("FEAR_BOUNCE_LONG")).toBe(0.7);
  });

  it("should reject out-of-range values with the field path", () => {
    expect(() => parseEngineConfig({ sizing: { baseRiskPct: 2 } })).toThrow(/sizing\.baseRiskPct/);
    expect(() => parseEngineConfig({ sizing: { coreMultipliers: { three: 1 } } })).toThrow(
      /Core multiplier keys must be integers/
    );
    expect(() => parseEngineConfig({ calendar: { fomcDates: ["Sep 16"] } })).toThrow(
      /Dates must be YYYY-MM-DD/
    );
  });

  it("should ship the FOMC calendar", () => {
    expect(DEFAULT_FOMC_DATES).toContain("2026-09-16");
    expect(DEFAULT_ENGINE_CONFIG.calendar.fomcDates).toEqual([...DEFAULT_FOMC_DATES]);
  });
});

describe("loadEngineConfig", () => {
  let dir: string | undefined;

  afterEach(() => {
    if (dir) fs.rmSync(dir, { recursive: true, force: true });
    dir = undefined;
  });

  const writeConfig = (body: string): string => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), "engine-config-"));
    const file = path.join(dir, "engine.json");
    fs.writeFileSync(file, body);
    return file;
  };

  it("should return defaults without a path or when the file is missing", () => {
    expect(loadEngineConfig()).toBe(DEFAULT_ENGINE_CONFIG);
    expect(loadEngineConfig(path.join(os.tmpdir(), "no-such-engine-config.json"))).toBe(
      DEFAULT_ENGINE_CONFIG
    );
  });

  it("should load overrides from a JSON file", () => {
    const file = writeConfig(JSON.stringify({ composite: { compositeMin: 4 } }));
    expect(loadEngineConfig(file).composite.compositeMin).toBe(4);
  });

  it("should name the file when content is invalid", () => {
    const broken = writeConfig("{ not json");
    expect(() => loadEngineConfig(broken)).toThrow(/Failed to read engine config/);
  });

  it("should name the file when the schema rejects it", () => {
    const file = writeConfig(JSON.stringify({ signals: { rip: "high" } }));
    expect(() => loadEngineConfig(file)).toThrow(/engine\.json: Invalid engine config/);
  });
});
