import type * as express from "express";

import type { ReadableChannel } from "../core/AsyncChannel";
import { createLogger, type Logger } from "../logger";
import type { TaskEvent } from "../types";
import { encodeCloseEvent, encodeTaskEvent, KEEP_ALIVE_FRAME } from "./codec";

export interface SseStreamOptions {
  keepAliveIntervalMs: number;
  logger?: Logger;
}

/** The part of an HTTP response the event pipe writes to. `express.Response` satisfies it. */
export interface SseSink {
  readonly writableEnded: boolean;
  write(chunk: string): boolean;
  end(): void;
  on(event: "close" | "drain", listener: () => void): unknown;
  off(event: "close" | "drain", listener: () => void): unknown;
}

/** Writes the SSE response headers and flushes them to the client. */
export function startSseResponse(res: express.Response): void {
  res.status(200);
  res.setHeader("Content-Type", "text/event-stream");
  res.setHeader("Cache-Control", "no-cache");
  res.setHeader("Connection", "keep-alive");
  res.flushHeaders();
}

/**
 * Pipes a subscriber channel into an SSE response. Keep-alive comments are sent
 * on an interval while the stream is open. When the channel closes a `close`
 * frame is written and the response ended. If the client goes away first,
 * `abort` is called so the subscription is released.
 *
 * When the socket buffer is full the pipe stops reading from the channel until
 * the response drains. A client that never drains lets its channel fill up,
 * and the subscriber registry then drops it as stalled.
 */
export async function pipeTaskEvents(
  taskId: string,
  channel: ReadableChannel<TaskEvent>,
  res: SseSink,
  abort: AbortController,
  options: SseStreamOptions,
): Promise<void> {
  const log = options.logger ?? createLogger("SseResponseWriter");
  const state = { draining: false };

  const onClose = () => {
    if (!abort.signal.aborted) {
      log.info({ taskId }, "SSE connection closed by client");
      abort.abort();
    }
  };
  res.on("close", onClose);

  const keepAlive = setInterval(() => {
    if (!res.writableEnded && !state.draining) writeFrame(res, KEEP_ALIVE_FRAME, log, taskId);
  }, options.keepAliveIntervalMs);

  try {
    for await (const event of channel) {
      if (res.writableEnded || abort.signal.aborted) break;
      const written = writeFrame(res, encodeTaskEvent(event), log, taskId);
      if (written === "failed") break;
      if (written === "full") {
        state.draining = true;
        const drained = await waitForDrain(res, abort.signal);
        state.draining = false;
        if (!drained) break;
      }
    }
    if (!res.writableEnded && !abort.signal.aborted) {
      writeFrame(res, encodeCloseEvent(taskId), log, taskId);
    }
  } finally {
    clearInterval(keepAlive);
    res.off("close", onClose);
    // release the subscription if the loop stopped before the channel closed
    if (!abort.signal.aborted) abort.abort();
    if (!res.writableEnded) res.end();
    log.debug({ taskId }, "SSE stream ended");
  }
}

type WriteResult = "written" | "full" | "failed";

function writeFrame(res: SseSink, frame: string, log: Logger, taskId: string): WriteResult {
  try {
    return res.write(frame) ? "written" : "full";
  } catch (err) {
    log.error({ taskId, err }, "Failed to write SSE frame");
    return "failed";
  }
}

/** Resolves true on `drain`, false if the response closes or `signal` aborts first. */
function waitForDrain(res: SseSink, signal: AbortSignal): Promise<boolean> {
  if (signal.aborted) return Promise.resolve(false);
  return new Promise<boolean>((resolve) => {
    const finish = (drained: boolean) => {
      res.off("drain", onDrain);
      res.off("close", onClose);
      signal.removeEventListener("abort", onAbort);
      resolve(drained);
    };
    const onDrain = () => finish(true);
    const onClose = () => finish(false);
    const onAbort = () => finish(false);
    res.on("drain", onDrain);
    res.on("close", onClose);
    signal.addEventListener("abort", onAbort, { once: true });
  });
}
