import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";
import type { RenderDefaults } from "@marquee/protocol";
import { AnimationStreamer } from "../src/animation/streamer.js";
import { CURSOR_HOME, STREAM_EPILOGUE, STREAM_PREAMBLE } from "../src/animation/ansi.js";
import { colorizeFrame, resolveColorScheme, type CellPainter } from "../src/animation/colors.js";
import { StreamAdmission } from "../src/concurrency/admission.js";
import { FontCache } from "../src/fonts/cache.js";
import type { FontLoader } from "../src/fonts/font.js";
import { HttpServer, type HttpServerConfig } from "../src/http/server.js";
import { RateLimiter } from "../src/http/rateLimit.js";
import { createFontDirectory, removeDirectory } from "./helpers/fontFixtures.js";

const defaults: RenderDefaults = {
  font: "standard",
  color: "rainbow",
  maxWidth: 0,
  speed: 10,
  align: "left",
  border: "none",
};

// Every font draws the text twice, one row each.
const stubLoader: FontLoader = (name, fontPath) => ({
  name,
  path: fontPath,
  render: (text) => `${text}\n${text}`,
});

describe("HttpServer", () => {
  let dir: string;
  let cache: FontCache;
  let admission: StreamAdmission;
  let streamer: AnimationStreamer;
  let server: HttpServer;
  let baseUrl: string;

  async function startServer(overrides: Partial<HttpServerConfig> = {}): Promise<void> {
    server = new HttpServer({
      port: 0,
      host: "127.0.0.1",
      version: "test",
      cache,
      admission,
      streamer,
      defaults,
      maxTextLength: 20,
      ...overrides,
    });
    const port = await server.start();
    baseUrl = `http://127.0.0.1:${port}`;
  }

  beforeEach(async () => {
    dir = createFontDirectory({ standard: 1, slant: 1 });
    cache = new FontCache({ loader: stubLoader });
    await cache.populate(dir, ["standard", "slant"]);
    admission = new StreamAdmission(2);
    streamer = new AnimationStreamer({
      admission,
      cache,
      animation: {
        defaultFont: "standard",
        defaultTimeoutSeconds: 1,
        maxTimeoutSeconds: 2,
        speed: { min: 1, max: 20 },
      },
    });
  });

  afterEach(async () => {
    await server.stop(0);
    removeDirectory(dir);
  });

  describe("service endpoints", () => {
    beforeEach(async () => {
      await startServer();
    });

    it("should report health", async () => {
      const res = await fetch(`${baseUrl}/health`);

      expect(res.status).toBe(200);
      expect(await res.json()).toEqual({
        status: "ok",
        version: "test",
        activeStreams: 0,
        maxStreams: 2,
        fonts: 2,
      });
    });

    it("should list loaded fonts", async () => {
      const res = await fetch(`${baseUrl}/fonts`);

      expect(await res.json()).toEqual({ default: "standard", fonts: ["slant", "standard"] });
      expect(server.getMetrics().get("fontRequests")).toBe(1);
    });

    it("should serve usage text at the root", async () => {
      const res = await fetch(`${baseUrl}/`);
      const body = await res.text();

      expect(res.status).toBe(200);
      expect(body.split("\n")[0]).toBe("marquee: block-letter text over HTTP");
    });

    it("should serve counters", async () => {
      await fetch(`${baseUrl}/Hi`).then((res) => res.text());
      const res = await fetch(`${baseUrl}/metrics`);

      expect(await res.json()).toEqual({
        staticRequests: 1,
        partyRequests: 0,
        fontRequests: 0,
        rejectedStreams: 0,
        totalErrors: 0,
      });
    });

    it("should answer 404 for other methods", async () => {
      const res = await fetch(`${baseUrl}/Hi`, { method: "POST" });

      expect(res.status).toBe(404);
      expect(await res.json()).toEqual({ error: { code: "NOT_FOUND", message: "no route for POST /Hi" } });
    });

    it("should answer 404 for favicon requests", async () => {
      const res = await fetch(`${baseUrl}/favicon.ico`);

      expect(res.status).toBe(404);
      expect(await res.json()).toEqual({ error: { code: "NOT_FOUND", message: "not found" } });
    });
  });

  describe("static render", () => {
    beforeEach(async () => {
      await startServer();
    });

    it("should render text once as plain text", async () => {
      const res = await fetch(`${baseUrl}/Hi`);

      expect(res.status).toBe(200);
      expect(res.headers.get("content-type")).toBe("text/plain; charset=utf-8");
      expect(await res.text()).toBe("Hi\nHi\n");
    });

    it("should decode and clean the path text", async () => {
      const res = await fetch(`${baseUrl}/Hello%20%20World`);

      expect(await res.text()).toBe("Hello World\nHello World\n");
    });

    it("should draw a border", async () => {
      const res = await fetch(`${baseUrl}/Hello%20World?border=ascii`);

      expect(await res.text()).toBe(
        ["+-------------+", "| Hello World |", "| Hello World |", "+-------------+", ""].join("\n"),
      );
    });

    it("should align within the requested width", async () => {
      const res = await fetch(`${baseUrl}/Hi?a=center&mw=20`);

      expect(await res.text()).toBe("         Hi\n         Hi\n");
    });

    it("should color the output only when asked", async () => {
      const res = await fetch(`${baseUrl}/ab?c=mono`);
      const cell = (char: string) => `\x1b[38;5;240m${char}\x1b[39m`;
      const line = cell("a") + cell("b");

      expect(await res.text()).toBe(`${line}\n${line}\n`);
    });

    it("should color with the default scheme for prototype names", async () => {
      const expected = colorizeFrame(["ab", "ab"], resolveColorScheme("rainbow"), 0).join("\n") + "\n";

      for (const color of ["constructor", "__proto__"]) {
        const res = await fetch(`${baseUrl}/ab?c=${color}`);
        expect(res.status).toBe(200);
        expect(await res.text()).toBe(expected);
      }
    });

    it("should reject malformed options", async () => {
      const res = await fetch(`${baseUrl}/Hi?speed=fast`);

      expect(res.status).toBe(400);
      expect(await res.json()).toEqual({
        error: { code: "INVALID_OPTION", message: "speed must be an integer" },
      });
    });

    it("should reject text over the configured length", async () => {
      const res = await fetch(`${baseUrl}/${"x".repeat(21)}`);

      expect(res.status).toBe(400);
      expect(await res.json()).toEqual({
        error: { code: "INVALID_OPTION", message: "text exceeds maximum length of 20 characters" },
      });
    });

    it("should reject broken percent-encoding", async () => {
      const res = await fetch(`${baseUrl}/%E0%A4%A`);

      expect(res.status).toBe(400);
      expect(await res.json()).toEqual({
        error: { code: "INVALID_OPTION", message: "text is not valid URL encoding" },
      });
    });

    it("should answer 500 when no fonts are loaded", async () => {
      await server.stop(0);
      cache = new FontCache({ loader: stubLoader });
      await startServer({ cache });

      const res = await fetch(`${baseUrl}/Hi`);

      expect(res.status).toBe(500);
      expect(await res.json()).toEqual({ error: { code: "NO_FONTS_LOADED", message: "no fonts loaded" } });
      expect(server.getMetrics().get("totalErrors")).toBe(1);
    });
  });

  describe("animated stream", () => {
    beforeEach(async () => {
      await startServer();
    });

    it("should stream frames until the timeout", async () => {
      const res = await fetch(`${baseUrl}/party/Hi?t=1`);

      expect(res.status).toBe(200);
      expect(res.headers.get("content-type")).toBe("text/plain; charset=utf-8");
      expect(res.headers.get("cache-control")).toBe("no-cache");

      const body = await res.text();
      const firstFrame = CURSOR_HOME + colorizeFrame(["Hi", "Hi"], resolveColorScheme("rainbow"), 0).join("\n") + "\n";
      expect(body.startsWith(STREAM_PREAMBLE + firstFrame)).toBe(true);
      expect(body.endsWith(STREAM_EPILOGUE)).toBe(true);
      expect(admission.activeCount()).toBe(0);
      expect(server.getMetrics().get("partyRequests")).toBe(1);
    });

    it("should stream with the default scheme for prototype names", async () => {
      const res = await fetch(`${baseUrl}/party/Hi?t=1&c=constructor`);
      const body = await res.text();

      const firstFrame = CURSOR_HOME + colorizeFrame(["Hi", "Hi"], resolveColorScheme("rainbow"), 0).join("\n") + "\n";
      expect(res.status).toBe(200);
      expect(body.startsWith(STREAM_PREAMBLE + firstFrame)).toBe(true);
      expect(admission.activeCount()).toBe(0);
    });

    it("should end a stream whose frames fail to color", async () => {
      await server.stop(0);
      const broken: CellPainter = {
        ansi256: () => {
          throw new Error("palette exploded");
        },
      };
      streamer = new AnimationStreamer({
        admission,
        cache,
        colors: broken,
        animation: { defaultFont: "standard", defaultTimeoutSeconds: 1, maxTimeoutSeconds: 2, speed: { min: 1, max: 20 } },
      });
      await startServer({ streamer });

      const res = await fetch(`${baseUrl}/party/Hi`);

      expect(res.status).toBe(200);
      expect(await res.text()).toBe(STREAM_PREAMBLE + STREAM_EPILOGUE);
      expect(admission.activeCount()).toBe(0);
      expect(streamer.activeStreams()).toBe(0);
      expect(server.getMetrics().get("totalErrors")).toBe(1);
    });

    it("should reject empty text", async () => {
      const res = await fetch(`${baseUrl}/party/`);

      expect(res.status).toBe(400);
      expect(await res.json()).toEqual({ error: { code: "INVALID_OPTION", message: "text must not be empty" } });
    });

    it("should answer 503 at capacity and release slots on disconnect", async () => {
      const first = new AbortController();
      const second = new AbortController();
      await fetch(`${baseUrl}/party/one?t=2`, { signal: first.signal });
      await fetch(`${baseUrl}/party/two?t=2`, { signal: second.signal });
      expect(admission.activeCount()).toBe(2);

      const res = await fetch(`${baseUrl}/party/three`);
      expect(res.status).toBe(503);
      expect(res.headers.get("retry-after")).toBe("5");
      expect(await res.json()).toEqual({
        error: { code: "CAPACITY_EXCEEDED", message: "too many active streams, try again later" },
      });
      expect(server.getMetrics().get("rejectedStreams")).toBe(1);

      first.abort();
      second.abort();
      await vi.waitFor(() => {
        expect(admission.activeCount()).toBe(0);
      });
    });

    it("should drain open streams on stop", async () => {
      const res = await fetch(`${baseUrl}/party/Hi?t=2`);
      expect(admission.activeCount()).toBe(1);

      const stopping = server.stop(1000);
      const body = await res.text();

      expect(await stopping).toEqual({ drained: 1, abandoned: 0 });
      expect(body.endsWith(STREAM_EPILOGUE)).toBe(true);
      expect(server.isRunning()).toBe(false);
    });
  });

  describe("rate limiting", () => {
    beforeEach(async () => {
      await startServer({ rateLimiter: new RateLimiter(60, 2) });
    });

    it("should answer 429 once the burst is spent", async () => {
      expect((await fetch(`${baseUrl}/fonts`)).status).toBe(200);
      expect((await fetch(`${baseUrl}/fonts`)).status).toBe(200);

      const res = await fetch(`${baseUrl}/fonts`);
      expect(res.status).toBe(429);
      expect(res.headers.get("retry-after")).toBe("1");
      expect(await res.json()).toEqual({ error: { code: "RATE_LIMITED", message: "rate limit exceeded" } });
    });

    it("should not limit health checks", async () => {
      for (let i = 0; i < 5; i++) {
        expect((await fetch(`${baseUrl}/health`)).status).toBe(200);
      }
    });
  });
});
