import type { PlatformCapabilities } from "../platform/index.js";

export interface BrowserOpener {
  name: string;
  command: string;
  platforms: readonly NodeJS.Platform[] | "unix";
  args(url: string): string[];
}

export const BROWSER_OPENERS: readonly BrowserOpener[] = [
  { name: "open", command: "open", platforms: ["darwin"], args: (url) => [url] },
  { name: "xdg-open", command: "xdg-open", platforms: "unix", args: (url) => [url] },
  { name: "start", command: "cmd", platforms: ["win32"], args: (url) => ["/c", "start", "", url] }
];

function appliesTo(opener: BrowserOpener, platform: NodeJS.Platform): boolean {
  if (opener.platforms === "unix") return platform !== "win32" && platform !== "darwin";
  return opener.platforms.includes(platform);
}

export function openersFor(platform: NodeJS.Platform): BrowserOpener[] {
  return BROWSER_OPENERS.filter((opener) => appliesTo(opener, platform));
}

/**
 * Tries each opener for the platform in order. Resolves the name of the one
 * that launched, or null when the caller should print the URL instead.
 */
export async function openBrowser(
  url: string,
  platform: Pick<PlatformCapabilities, "platform" | "hasBinary" | "launchDetached">
): Promise<string | null> {
  for (const opener of openersFor(platform.platform)) {
    if (!platform.hasBinary(opener.command)) continue;
    if (await platform.launchDetached(opener.command, opener.args(url))) {
      return opener.name;
    }
  }
  return null;
}
