import { mkdtempSync, rmSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";

import { afterEach, describe, expect, it } from "vitest";

import {
  DEFAULT_CONFIG_FILE,
  loadLauncherConfig,
  parseLauncherConfig,
  parsePortOption,
  resolveLaunchSettings
} from "../src/core/config.js";
import { ConfigError, UserInputError } from "../src/core/errors.js";
import { getPreset } from "../src/core/presets.js";

describe("launcher config", () => {
  const tempRoots: string[] = [];

  function createDir(): string {
    const dir = mkdtempSync(join(tmpdir(), "dashboard-launcher-config-"));
    tempRoots.push(dir);
    return dir;
  }

  afterEach(() => {
    while (tempRoots.length > 0) {
      const dir = tempRoots.pop();
      if (!dir) continue;
      rmSync(dir, { recursive: true, force: true });
    }
  });

  it("uses preset defaults when no config file exists", () => {
    const cwd = createDir();
    const settings = resolveLaunchSettings(getPreset("dashboard"), loadLauncherConfig(cwd), {}, cwd);

    expect(settings.port).toBe(8080);
    expect(settings.url).toBe("http://localhost:8080/lizzy_alpha_dashboard.html");
    expect(settings.projectsDir).toBe(join(cwd, "projects"));
    expect(settings.openBrowser).toBe(true);
    expect(settings.interpreters).toEqual(["python3", "python"]);
  });

  it("layers the config file over the preset and CLI flags over both", () => {
    const cwd = createDir();
    writeFileSync(
      join(cwd, DEFAULT_CONFIG_FILE),
      JSON.stringify({
        projectsDir: "stories",
        openBrowser: false,
        presets: { modern: { port: 6001, monitorIntervalMs: 2000, interpreters: ["python3.12"] } }
      })
    );

    const config = loadLauncherConfig(cwd);
    const fromConfig = resolveLaunchSettings(getPreset("modern"), config, {}, cwd);
    expect(fromConfig.port).toBe(6001);
    expect(fromConfig.monitorIntervalMs).toBe(2000);
    expect(fromConfig.interpreters).toEqual(["python3.12"]);
    expect(fromConfig.projectsDir).toBe(join(cwd, "stories"));
    expect(fromConfig.openBrowser).toBe(false);
    expect(fromConfig.url).toBe("http://localhost:6001/");

    const fromFlags = resolveLaunchSettings(
      getPreset("modern"),
      config,
      { port: 7000, projectsDir: "elsewhere", openBrowser: true },
      cwd
    );
    expect(fromFlags.port).toBe(7000);
    expect(fromFlags.projectsDir).toBe(join(cwd, "elsewhere"));
    expect(fromFlags.openBrowser).toBe(true);
  });

  it("rejects unknown keys and out-of-range ports", () => {
    expect(() => parseLauncherConfig(JSON.stringify({ colour: "blue" }), "inline")).toThrow(ConfigError);
    expect(() =>
      parseLauncherConfig(JSON.stringify({ presets: { dashboard: { port: 70000 } } }), "inline")
    ).toThrow(/presets\.dashboard\.port/);
  });

  it("rejects malformed JSON", () => {
    expect(() => parseLauncherConfig("{ nope", "broken.json")).toThrow("Config file broken.json is not valid JSON.");
  });

  it("requires an explicitly named config file to exist", () => {
    const cwd = createDir();
    expect(() => loadLauncherConfig(cwd, "missing.json")).toThrow(ConfigError);
  });

  it("parses --port values", () => {
    expect(parsePortOption(undefined)).toBeUndefined();
    expect(parsePortOption(" 5003 ")).toBe(5003);
    expect(() => parsePortOption("0")).toThrow(UserInputError);
    expect(() => parsePortOption("80a")).toThrow('Invalid --port value "80a"');
  });
});
