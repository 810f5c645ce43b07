import { log } from "@clack/prompts";

import { DEFAULT_PRESET, listPresets } from "../core/presets.js";

export function runPresets(): void {
  for (const preset of listPresets()) {
    const marker = preset.name === DEFAULT_PRESET ? " (default)" : "";
    log.message(
      [
        `${preset.name}${marker}: ${preset.title}`,
        `  http://localhost:${preset.port}${preset.urlPath}`,
        `  ${[preset.command.executable, ...preset.command.args].join(" ")}`
      ].join("\n")
    );
  }
}
