import { mkdtemp, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterEach, describe, expect, it } from "vitest";
import {
  configure,
  defaults,
  getConfig,
  loadConfigFile,
  parseConfigOverrides,
  resetConfig,
} from "../src/config.js";
import { ConfigError } from "../src/errors.js";
import { thrown } from "./helpers.js";

describe("config", () => {
  afterEach(() => resetConfig());

  it("starts from the defaults", () => {
    expect(getConfig()).toEqual(defaults);
    expect(getConfig().limits.maxConcurrency).toBe(1);
    expect(getConfig().timeouts.run).toBe(0);
    expect(Object.isFrozen(defaults)).toBe(true);
  });

  it("merges overrides deeply and keeps sibling values", () => {
    configure({ variantFilter: { minQuality: 45 }, execution: { haltOnFailure: true } });
    expect(getConfig().variantFilter.minQuality).toBe(45);
    expect(getConfig().variantFilter.maxPopulationFreq).toBe(0.01);
    expect(getConfig().execution.haltOnFailure).toBe(true);
    expect(getConfig().timeouts).toEqual(defaults.timeouts);
  });

  it("replaces arrays instead of merging them", () => {
    configure({ variantFilter: { consequenceTypes: ["stop_gained"] } });
    expect(getConfig().variantFilter.consequenceTypes).toEqual(["stop_gained"]);
    expect(defaults.variantFilter.consequenceTypes).toHaveLength(5);
  });

  it("applies each configure call on top of the defaults, not the previous call", () => {
    configure({ limits: { maxConcurrency: 4 } });
    configure({ timeouts: { run: 1_000 } });
    expect(getConfig().limits.maxConcurrency).toBe(1);
    expect(getConfig().timeouts.run).toBe(1_000);
    resetConfig();
    expect(getConfig().timeouts.run).toBe(0);
  });
});

describe("parseConfigOverrides", () => {
  it("parses partial YAML", () => {
    expect(parseConfigOverrides("limits:\n  maxConcurrency: 3\ncritic:\n  checks:\n    coverage: false\n")).toEqual({
      limits: { maxConcurrency: 3 },
      critic: { checks: { coverage: false } },
    });
    expect(parseConfigOverrides("")).toEqual({});
  });

  it("rejects unknown sections and out-of-range values", () => {
    const unknown = thrown(() => parseConfigOverrides("server:\n  port: 80\n"));
    expect(unknown).toBeInstanceOf(ConfigError);
    expect(unknown).toMatchObject({ code: "CONFIG_ERROR" });

    expect(thrown(() => parseConfigOverrides("limits:\n  maxConcurrency: 0\n", "test.yaml"))).toMatchObject({
      message: "Invalid config test.yaml:\n  limits.maxConcurrency: Number must be greater than 0",
    });
  });

  it("rejects text that is not YAML", () => {
    expect(thrown(() => parseConfigOverrides("limits: [1\n", "broken.yaml"))).toMatchObject({
      message: "Config broken.yaml is not valid YAML",
    });
  });
});

describe("loadConfigFile", () => {
  let dir: string | undefined;

  afterEach(async () => {
    resetConfig();
    if (dir) await rm(dir, { recursive: true, force: true });
    dir = undefined;
  });

  it("applies a YAML file on top of the defaults", async () => {
    dir = await mkdtemp(join(tmpdir(), "config-"));
    const path = join(dir, "orchestrator.yaml");
    await writeFile(path, "timeouts:\n  run: 5000\nevidence:\n  topK: 3\n", "utf8");

    const config = loadConfigFile(path);
    expect(config.timeouts).toEqual({ task: defaults.timeouts.task, run: 5_000 });
    expect(config.evidence).toEqual({ topK: 3, minSimilarity: 0.3 });
    expect(getConfig()).toBe(config);
  });

  it("reports a missing file as a ConfigError", () => {
    const missing = join(tmpdir(), "no-such-dir", "orchestrator.yaml");
    expect(thrown(() => loadConfigFile(missing))).toMatchObject({
      code: "CONFIG_ERROR",
      message: `Cannot read config file ${missing}`,
    });
  });
});
