import type { ServerResponse } from "http";
import { HTTP_STATUS, createErrorBody, type ErrorCodeValue } from "@marquee/protocol";
import type { FrameSink } from "../animation/streamer.js";

export const TEXT_CONTENT_TYPE = "text/plain; charset=utf-8";

export function sendJson(res: ServerResponse, status: number, body: unknown, headers: Record<string, string> = {}): void {
  if (res.destroyed) {
    return;
  }
  const payload = JSON.stringify(body);
  res.writeHead(status, {
    "Content-Type": "application/json; charset=utf-8",
    "Content-Length": Buffer.byteLength(payload),
    "Cache-Control": "no-cache",
    ...headers,
  });
  res.end(payload);
}

export function sendText(res: ServerResponse, status: number, text: string): void {
  res.writeHead(status, {
    "Content-Type": TEXT_CONTENT_TYPE,
    "Content-Length": Buffer.byteLength(text),
  });
  res.end(text);
}

/**
 * Send a JSON error body with the status mapped from its code.
 */
export function sendError(
  res: ServerResponse,
  code: ErrorCodeValue,
  message: string,
  headers: Record<string, string> = {},
): void {
  sendJson(res, HTTP_STATUS[code], createErrorBody(code, message), headers);
}

/**
 * Streams frames into an HTTP response. Headers go out with the first frame,
 * so a stream that fails to render can still answer with an error status.
 */
export class ResponseSink implements FrameSink {
  private started = false;

  constructor(private readonly res: ServerResponse) {}

  write(chunk: string): Promise<void> {
    if (this.res.destroyed || this.res.writableEnded) {
      return Promise.reject(new Error("connection closed"));
    }
    if (!this.started) {
      this.started = true;
      this.res.writeHead(200, {
        "Content-Type": TEXT_CONTENT_TYPE,
        "Cache-Control": "no-cache",
        "X-Accel-Buffering": "no",
      });
      this.res.socket?.setNoDelay(true);
    }
    return new Promise((resolve, reject) => {
      this.res.write(chunk, (error) => {
        if (error) {
          reject(error);
        } else {
          resolve();
        }
      });
    });
  }
}
