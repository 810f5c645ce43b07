import { describe, expect, it } from "vitest";

import { openBrowser, openersFor } from "../src/core/supervisor/browser.js";

describe("openersFor", () => {
  it("keeps the open, xdg-open, start order per platform", () => {
    expect(openersFor("darwin").map((opener) => opener.name)).toEqual(["open"]);
    expect(openersFor("linux").map((opener) => opener.name)).toEqual(["xdg-open"]);
    expect(openersFor("freebsd").map((opener) => opener.name)).toEqual(["xdg-open"]);
    expect(openersFor("win32").map((opener) => opener.name)).toEqual(["start"]);
  });
});

describe("openBrowser", () => {
  const url = "http://localhost:8080/dashboard.html";

  it("launches the first available opener", async () => {
    const launches: string[][] = [];
    const opener = await openBrowser(url, {
      platform: "linux",
      hasBinary: (command) => command === "xdg-open",
      launchDetached: async (command, args) => {
        launches.push([command, ...args]);
        return true;
      }
    });

    expect(opener).toBe("xdg-open");
    expect(launches).toEqual([["xdg-open", url]]);
  });

  it("passes the URL through cmd start on Windows", async () => {
    const launches: string[][] = [];
    await openBrowser(url, {
      platform: "win32",
      hasBinary: () => true,
      launchDetached: async (command, args) => {
        launches.push([command, ...args]);
        return true;
      }
    });

    expect(launches).toEqual([["cmd", "/c", "start", "", url]]);
  });

  it("returns null when no opener is installed", async () => {
    const opener = await openBrowser(url, {
      platform: "linux",
      hasBinary: () => false,
      launchDetached: async () => true
    });

    expect(opener).toBeNull();
  });

  it("returns null when the opener fails to launch", async () => {
    const opener = await openBrowser(url, {
      platform: "darwin",
      hasBinary: () => true,
      launchDetached: async () => false
    });

    expect(opener).toBeNull();
  });
});
