import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { MarqueeApp } from "../src/app.js";
import { loadConfig, type ServerConfig } from "../src/config/config.js";
import type { FontLoader } from "../src/fonts/font.js";
import { NoFontsLoadedError } from "../src/render/errors.js";
import { createFontDirectory, removeDirectory } from "./helpers/fontFixtures.js";

const stubLoader: FontLoader = (name, fontPath) => ({
  name,
  path: fontPath,
  render: (text) => text,
});

function testConfig(fontPath: string): ServerConfig {
  const config = loadConfig({
    MARQUEE_VERSION: "test",
    MARQUEE_SERVER_HOST: "127.0.0.1",
    MARQUEE_SERVER_SHUTDOWN_GRACE: "1",
    MARQUEE_FONTS_PATH: fontPath,
    MARQUEE_FONTS_ALLOWED: "standard,slant",
    MARQUEE_LOG_CONSOLE: "false",
  });
  config.server.port = 0;
  return config;
}

describe("MarqueeApp", () => {
  let dir: string;
  let app: MarqueeApp | null;

  beforeEach(() => {
    app = null;
  });

  afterEach(async () => {
    await app?.stop();
    removeDirectory(dir);
  });

  it("should load fonts and serve", async () => {
    dir = createFontDirectory({ standard: 1, slant: 1 });
    app = new MarqueeApp(testConfig(dir), { loader: stubLoader });

    const port = await app.start();
    const res = await fetch(`http://127.0.0.1:${port}/health`);

    expect(await res.json()).toEqual({
      status: "ok",
      version: "test",
      activeStreams: 0,
      maxStreams: 100,
      fonts: 2,
    });
  });

  it("should start with a subset of fonts", async () => {
    dir = createFontDirectory({ standard: 1 });
    app = new MarqueeApp(testConfig(dir), { loader: stubLoader });

    await app.start();

    expect(app.cache.list()).toEqual(["standard"]);
  });

  it("should refuse to start without fonts", async () => {
    dir = createFontDirectory({});
    const idle = new MarqueeApp(testConfig(dir), { loader: stubLoader });

    await expect(idle.start()).rejects.toBeInstanceOf(NoFontsLoadedError);
    expect(idle.server.isRunning()).toBe(false);
  });

  it("should refuse to start without the default font", async () => {
    dir = createFontDirectory({ slant: 1 });
    const idle = new MarqueeApp(testConfig(dir), { loader: stubLoader });

    await expect(idle.start()).rejects.toThrow(`default font "standard" could not be loaded from ${dir}`);
  });

  it("should share one shutdown between callers", async () => {
    dir = createFontDirectory({ standard: 1 });
    app = new MarqueeApp(testConfig(dir), { loader: stubLoader });
    await app.start();

    const first = app.stop();
    const second = app.stop();

    expect(second).toBe(first);
    expect(await first).toEqual({ drained: 0, abandoned: 0 });
    expect(app.server.isRunning()).toBe(false);
  });
});
