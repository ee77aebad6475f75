// client/src/A2AClient.ts
// -----------------------------------------------------------------------------
// A2AClient: JSON-RPC calls against one agent endpoint, plus SSE task streams
// delivered through a bounded channel.
// -----------------------------------------------------------------------------

import type { z } from "zod";

import { AsyncChannel, type ReadableChannel } from "../../src/core/AsyncChannel";
import { A2AError, A2ATransportError, errorMessage } from "../../src/errors";
import { createLogger, type Logger } from "../../src/logger";
import { zJsonRpcResponse, zTask, zTaskPushNotificationConfig } from "../../src/schemas";
import { decodeTaskEvent } from "../../src/sse/codec";
import { SseEventReader } from "../../src/sse/EventReader";
import {
  A2AMethods,
  SseEventTypes,
  type A2AMethod,
  type JsonRpcRequest,
  type Task,
  type TaskEvent,
  type TaskIdParams,
  type TaskPushNotificationConfig,
  type TaskQueryParams,
  type TaskSendParams,
} from "../../src/types";

export const DEFAULT_TIMEOUT_MS = 60_000;
export const DEFAULT_EVENT_BUFFER = 10;

type HeaderMap = Record<string, string>;

export interface A2AClientOptions {
  /** Applies to unary calls and to stream setup; an open stream has no deadline. */
  timeoutMs?: number;
  userAgent?: string;
  headers?: HeaderMap;
  /** Called before every request; merged over `headers`. */
  getAuthHeaders?: () => Promise<HeaderMap> | HeaderMap;
  eventBufferSize?: number;
  logger?: Logger;
}

interface RequestScope {
  signal: AbortSignal;
  dispose(): void;
}

export class A2AClient {
  readonly agentUrl: string;
  private readonly timeoutMs: number;
  private readonly eventBufferSize: number;
  private readonly log: Logger;

  constructor(agentUrl: string, private readonly options: A2AClientOptions = {}) {
    try {
      this.agentUrl = new URL(agentUrl).toString();
    } catch (err) {
      throw new A2ATransportError(`Invalid agent URL: ${agentUrl}`, { cause: err });
    }
    this.timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
    this.eventBufferSize = options.eventBufferSize ?? DEFAULT_EVENT_BUFFER;
    this.log = options.logger ?? createLogger("A2AClient");
  }

  // --- Unary methods ---

  sendTask(params: TaskSendParams): Promise<Task> {
    return this.rpc(A2AMethods.SendTask, params, zTask);
  }

  getTask(params: TaskQueryParams): Promise<Task> {
    return this.rpc(A2AMethods.GetTask, params, zTask);
  }

  cancelTask(params: TaskIdParams): Promise<Task> {
    return this.rpc(A2AMethods.CancelTask, params, zTask);
  }

  setPushNotification(params: TaskPushNotificationConfig): Promise<TaskPushNotificationConfig> {
    return this.rpc(A2AMethods.SetPushNotification, params, zTaskPushNotificationConfig);
  }

  getPushNotification(params: TaskIdParams): Promise<TaskPushNotificationConfig> {
    return this.rpc(A2AMethods.GetPushNotification, params, zTaskPushNotificationConfig);
  }

  // --- Streaming methods ---

  /** Sends a message and streams the task's events (`tasks/sendSubscribe`). */
  streamTask(params: TaskSendParams, signal?: AbortSignal): Promise<ReadableChannel<TaskEvent>> {
    return this.openStream(A2AMethods.SendTaskSubscribe, params, signal);
  }

  /** Re-attaches to a task's live events (`tasks/resubscribe`). */
  resubscribeTask(params: TaskIdParams, signal?: AbortSignal): Promise<ReadableChannel<TaskEvent>> {
    return this.openStream(A2AMethods.Resubscribe, params, signal);
  }

  // --- Transport ---

  private async rpc<T>(method: A2AMethod, params: { id: string }, resultSchema: z.ZodType<T>): Promise<T> {
    const scope = this.requestScope();
    try {
      let response: Response;
      try {
        response = await fetch(this.agentUrl, {
          method: "POST",
          headers: await this.buildHeaders("application/json"),
          body: JSON.stringify(this.envelope(method, params)),
          signal: scope.signal,
        });
      } catch (err) {
        throw new A2ATransportError(`${method} request failed: ${errorMessage(err)}`, { cause: err });
      }

      let body: string;
      try {
        body = await response.text();
      } catch (err) {
        throw new A2ATransportError(`${method} response body could not be read: ${errorMessage(err)}`, {
          status: response.status,
          cause: err,
        });
      }

      const envelope = parseEnvelope(body);
      if (!envelope) {
        throw new A2ATransportError(
          response.ok ? `${method} returned a malformed JSON-RPC response` : `${method} failed with HTTP ${response.status}`,
          { status: response.status, body },
        );
      }
      if (envelope.error !== undefined && envelope.result !== undefined) {
        throw new A2ATransportError(`${method} response carries both result and error`, { status: response.status, body });
      }
      if (envelope.error !== undefined) throw A2AError.fromJsonRpcError(envelope.error);
      if (!response.ok) {
        throw new A2ATransportError(`${method} failed with HTTP ${response.status}`, { status: response.status, body });
      }

      const result = resultSchema.safeParse(envelope.result);
      if (!result.success) {
        this.log.warn({ method, issues: result.error.issues }, "Unexpected result shape");
        throw new A2ATransportError(`${method} returned an invalid result`, { status: response.status, body });
      }
      return result.data;
    } finally {
      scope.dispose();
    }
  }

  private async openStream(
    method: A2AMethod,
    params: { id: string },
    signal?: AbortSignal,
  ): Promise<ReadableChannel<TaskEvent>> {
    if (signal?.aborted) throw new A2ATransportError(`${method} aborted before it was sent`, { cause: signal.reason });

    // Aborted by the caller's signal for the whole stream, by the timeout only until setup completes
    const controller = new AbortController();
    const onCallerAbort = () => controller.abort(signal?.reason);
    signal?.addEventListener("abort", onCallerAbort, { once: true });
    const detach = () => signal?.removeEventListener("abort", onCallerAbort);

    const timer = setTimeout(
      () => controller.abort(new A2ATransportError(`${method} timed out after ${this.timeoutMs}ms`)),
      this.timeoutMs,
    );

    let response: Response;
    try {
      response = await fetch(this.agentUrl, {
        method: "POST",
        headers: await this.buildHeaders("text/event-stream"),
        body: JSON.stringify(this.envelope(method, params)),
        signal: controller.signal,
      });
    } catch (err) {
      detach();
      throw new A2ATransportError(`${method} request failed: ${errorMessage(err)}`, { cause: err });
    } finally {
      clearTimeout(timer);
    }

    const contentType = response.headers.get("content-type") ?? "";
    if (response.status !== 200 || !contentType.includes("text/event-stream") || !response.body) {
      detach();
      throw await this.streamSetupError(method, response, contentType);
    }

    const reader = new SseEventReader(response.body.getReader());
    const channel = new AsyncChannel<TaskEvent>(this.eventBufferSize);
    this.pump(params.id, reader, channel, controller.signal, detach).catch((err: unknown) =>
      this.log.error({ taskId: params.id, err }, "SSE reader stopped unexpectedly"),
    );
    return channel;
  }

  /** Reads frames into `channel` until EOF, a `close` frame, a read error or abort; closes it exactly once. */
  private async pump(
    taskId: string,
    reader: SseEventReader,
    channel: AsyncChannel<TaskEvent>,
    signal: AbortSignal,
    onDone: () => void,
  ): Promise<void> {
    const onAbort = () => {
      this.log.debug({ taskId }, "Stream canceled by caller");
      channel.close();
      this.release(taskId, reader);
    };
    signal.addEventListener("abort", onAbort, { once: true });

    try {
      for (;;) {
        const frame = await reader.readEvent();
        if (!frame) break;
        if (frame.event === SseEventTypes.Close) {
          this.log.debug({ taskId }, "Server closed the stream");
          break;
        }
        const event = decodeTaskEvent(frame.event, frame.data, this.log);
        if (!event) continue;
        if (!(await channel.send(event, signal))) break;
      }
    } catch (err) {
      if (!signal.aborted) this.log.warn({ taskId, err }, "SSE stream read failed");
    } finally {
      signal.removeEventListener("abort", onAbort);
      channel.close();
      this.release(taskId, reader);
      onDone();
    }
  }

  private release(taskId: string, reader: SseEventReader): void {
    reader.cancel().catch((err: unknown) => this.log.debug({ taskId, err }, "SSE body already released"));
  }

  private async streamSetupError(method: A2AMethod, response: Response, contentType: string): Promise<Error> {
    let body = "";
    try {
      body = await response.text();
    } catch (err) {
      this.log.debug({ method, err }, "Could not read stream setup error body");
    }
    const envelope = parseEnvelope(body);
    if (envelope?.error) return A2AError.fromJsonRpcError(envelope.error);
    return new A2ATransportError(
      `${method} did not open an event stream (HTTP ${response.status}, content-type "${contentType}")`,
      { status: response.status, body },
    );
  }

  private envelope<P extends { id: string }>(method: A2AMethod, params: P): JsonRpcRequest<P> {
    return { jsonrpc: "2.0", id: params.id, method, params };
  }

  private async buildHeaders(accept: string): Promise<HeaderMap> {
    const headers: HeaderMap = {
      "Content-Type": "application/json; charset=utf-8",
      Accept: accept,
      ...this.options.headers,
    };
    if (this.options.userAgent) headers["User-Agent"] = this.options.userAgent;
    if (this.options.getAuthHeaders) Object.assign(headers, await this.options.getAuthHeaders());
    return headers;
  }

  private requestScope(): RequestScope {
    const controller = new AbortController();
    const timer = setTimeout(
      () => controller.abort(new A2ATransportError(`Request timed out after ${this.timeoutMs}ms`)),
      this.timeoutMs,
    );
    return { signal: controller.signal, dispose: () => clearTimeout(timer) };
  }
}

function parseEnvelope(body: string): z.infer<typeof zJsonRpcResponse> | null {
  let raw: unknown;
  try {
    raw = JSON.parse(body);
  } catch {
    return null;
  }
  const parsed = zJsonRpcResponse.safeParse(raw);
  return parsed.success ? parsed.data : null;
}
