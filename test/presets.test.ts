import { describe, expect, it } from "vitest";

import { UserInputError } from "../src/core/errors.js";
import { getPreset, listPresets, renderChildCommand } from "../src/core/presets.js";

describe("launch presets", () => {
  it("defaults to the static dashboard", () => {
    const preset = getPreset(undefined);
    expect(preset.name).toBe("dashboard");
    expect(preset.monitorIntervalMs).toBe(5000);
    expect(preset.urlPath).toBe("/lizzy_alpha_dashboard.html");
    expect(preset.reportProjects).toBe(false);
  });

  it("accepts preset names case-insensitively", () => {
    expect(getPreset(" Modern ").port).toBe(5003);
  });

  it("rejects unknown presets", () => {
    expect(() => getPreset("legacy")).toThrow(UserInputError);
    expect(() => getPreset("legacy")).toThrow('Unknown preset "legacy". Expected one of: dashboard, integrated, modern.');
  });

  it("lists every preset once", () => {
    expect(listPresets().map((preset) => preset.name)).toEqual(["dashboard", "integrated", "modern"]);
  });

  it("renders the static server command", () => {
    const command = renderChildCommand(getPreset("integrated").command, { interpreter: "python3", port: 8080 });
    expect(command).toEqual({ executable: "python3", args: ["-m", "http.server", "8080"] });
  });

  it("renders the application server command", () => {
    const command = renderChildCommand(getPreset("modern").command, { interpreter: "python", port: 5003 });
    expect(command).toEqual({ executable: "python", args: ["modern_api.py"] });
  });

  it("only offers a remedy for the Flask dependency check", () => {
    const withRemedy = getPreset("modern").preflight.filter((check) => check.remedy !== undefined);
    expect(withRemedy.map((check) => check.statement)).toEqual(["import flask, flask_cors"]);
  });
});
