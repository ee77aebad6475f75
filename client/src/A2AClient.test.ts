// client/src/A2AClient.test.ts
import sinon from "sinon";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";

import { A2AError, A2ATransportError } from "../../src/errors";
import { encodeCloseEvent, encodeTaskEvent } from "../../src/sse/codec";
import type { Task, TaskArtifactUpdateEvent, TaskEvent, TaskStatusUpdateEvent } from "../../src/types";
import type { ReadableChannel } from "../../src/core/AsyncChannel";
import { A2AClient } from "./A2AClient";

const AGENT_URL = "http://agent.test/a2a";
const TS = "2024-01-01T00:00:00.000Z";

const task: Task = { id: "t1", status: { state: "submitted", timestamp: TS } };
const working: TaskStatusUpdateEvent = { id: "t1", status: { state: "working", timestamp: TS }, final: false };
const completed: TaskStatusUpdateEvent = { id: "t1", status: { state: "completed", timestamp: TS }, final: true };
const chunk: TaskArtifactUpdateEvent = { id: "t1", artifact: { index: 0, parts: [{ type: "text", text: "hello" }] } };

const sendParams = { id: "t1", message: { role: "user" as const, parts: [{ type: "text" as const, text: "hi" }] } };

function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), { status, headers: { "Content-Type": "application/json" } });
}

function sseResponse(body: string | ReadableStream<Uint8Array>): Response {
  return new Response(body, { status: 200, headers: { "Content-Type": "text/event-stream" } });
}

async function drain(channel: ReadableChannel<TaskEvent>): Promise<TaskEvent[]> {
  const events: TaskEvent[] = [];
  for await (const event of channel) events.push(event);
  return events;
}

async function rejectionOf(promise: Promise<unknown>): Promise<unknown> {
  try {
    await promise;
  } catch (err) {
    return err;
  }
  throw new Error("expected the promise to reject");
}

const stubFetch = () => sinon.stub(globalThis, "fetch");

// A fetch that only settles when its request is aborted
function hangUntilAborted(_input: unknown, init?: RequestInit): Promise<Response> {
  return new Promise<Response>((_resolve, reject) => {
    const signal = init?.signal;
    signal?.addEventListener("abort", () => reject(signal.reason), { once: true });
  });
}

describe("A2AClient", () => {
  let fetchStub: ReturnType<typeof stubFetch>;

  beforeEach(() => {
    fetchStub = stubFetch();
  });

  afterEach(() => {
    sinon.restore();
  });

  it("rejects an invalid agent URL", () => {
    expect(() => new A2AClient("not a url")).toThrow(A2ATransportError);
  });

  describe("unary calls", () => {
    it("posts a JSON-RPC envelope keyed by the task id", async () => {
      fetchStub.resolves(jsonResponse({ jsonrpc: "2.0", id: "t1", result: task }));
      const client = new A2AClient(AGENT_URL, { userAgent: "a2a-test/1.0", headers: { Authorization: "Bearer test-secret" } });

      expect(await client.sendTask(sendParams)).toEqual(task);

      const [url, init] = fetchStub.firstCall.args;
      expect(url).toBe(AGENT_URL);
      expect(init?.method).toBe("POST");
      const headers = new Headers(init?.headers);
      expect(headers.get("content-type")).toBe("application/json; charset=utf-8");
      expect(headers.get("accept")).toBe("application/json");
      expect(headers.get("user-agent")).toBe("a2a-test/1.0");
      expect(headers.get("authorization")).toBe("Bearer test-secret");
      expect(typeof init?.body === "string" ? JSON.parse(init.body) : undefined).toEqual({
        jsonrpc: "2.0",
        id: "t1",
        method: "tasks/send",
        params: sendParams,
      });
    });

    it("merges headers from getAuthHeaders over the static ones", async () => {
      fetchStub.resolves(jsonResponse({ jsonrpc: "2.0", id: "t1", result: task }));
      const client = new A2AClient(AGENT_URL, {
        headers: { Authorization: "Bearer stale" },
        getAuthHeaders: async () => ({ Authorization: "Bearer test-secret" }),
      });

      await client.getTask({ id: "t1" });
      expect(new Headers(fetchStub.firstCall.args[1]?.headers).get("authorization")).toBe("Bearer test-secret");
    });

    it("throws the server's JSON-RPC error as an A2AError", async () => {
      fetchStub.resolves(
        jsonResponse(
          {
            jsonrpc: "2.0",
            id: "t1",
            error: { code: -32001, message: "Task not found", data: "Task with ID 't1' was not found." },
          },
          404,
        ),
      );
      const client = new A2AClient(AGENT_URL);

      const err = await rejectionOf(client.getTask({ id: "t1" }));
      expect(err).toBeInstanceOf(A2AError);
      expect(err).toMatchObject({ code: -32001, message: "Task not found", data: "Task with ID 't1' was not found." });
    });

    it("throws a transport error for a non-JSON HTTP failure", async () => {
      fetchStub.resolves(new Response("Bad Gateway", { status: 502 }));
      const client = new A2AClient(AGENT_URL);

      const err = await rejectionOf(client.cancelTask({ id: "t1" }));
      expect(err).toBeInstanceOf(A2ATransportError);
      expect(err).toMatchObject({ status: 502, body: "Bad Gateway", message: "tasks/cancel failed with HTTP 502" });
    });

    it("throws a transport error when the result does not match the expected shape", async () => {
      fetchStub.resolves(jsonResponse({ jsonrpc: "2.0", id: "t1", result: { id: "t1" } }));
      const client = new A2AClient(AGENT_URL);

      await expect(client.getTask({ id: "t1" })).rejects.toThrow("tasks/get returned an invalid result");
    });

    it("refuses a response carrying both result and error", async () => {
      fetchStub.resolves(
        jsonResponse({ jsonrpc: "2.0", id: "t1", result: task, error: { code: -32603, message: "Internal error" } }),
      );
      const client = new A2AClient(AGENT_URL);

      await expect(client.getTask({ id: "t1" })).rejects.toThrow("tasks/get response carries both result and error");
    });

    it("wraps network failures in a transport error", async () => {
      fetchStub.rejects(new TypeError("fetch failed"));
      const client = new A2AClient(AGENT_URL);

      const err = await rejectionOf(client.getTask({ id: "t1" }));
      expect(err).toBeInstanceOf(A2ATransportError);
      expect(err).toMatchObject({ message: "tasks/get request failed: fetch failed" });
    });

    it("gives up on a call that outlasts timeoutMs", async () => {
      fetchStub.callsFake(hangUntilAborted);
      const client = new A2AClient(AGENT_URL, { timeoutMs: 20 });

      const err = await rejectionOf(client.getTask({ id: "t1" }));
      expect(err).toBeInstanceOf(A2ATransportError);
      expect(err).toMatchObject({ message: "tasks/get request failed: Request timed out after 20ms" });
    });

    it("returns the push notification config", async () => {
      const config = { id: "t1", pushNotificationConfig: { url: "https://hooks.example.com/a2a" } };
      fetchStub.resolves(jsonResponse({ jsonrpc: "2.0", id: "t1", result: config }));
      const client = new A2AClient(AGENT_URL);

      expect(await client.getPushNotification({ id: "t1" })).toEqual(config);
      const init = fetchStub.firstCall.args[1];
      expect(typeof init?.body === "string" ? JSON.parse(init.body).method : undefined).toBe("tasks/pushNotification/get");
    });
  });

  describe("streaming", () => {
    it("delivers decoded events and closes at end of stream", async () => {
      fetchStub.resolves(sseResponse(encodeTaskEvent(working) + encodeTaskEvent(chunk) + encodeTaskEvent(completed)));
      const client = new A2AClient(AGENT_URL);

      const channel = await client.streamTask(sendParams);
      expect(await drain(channel)).toEqual([working, chunk, completed]);

      const init = fetchStub.firstCall.args[1];
      expect(new Headers(init?.headers).get("accept")).toBe("text/event-stream");
      expect(typeof init?.body === "string" ? JSON.parse(init.body).method : undefined).toBe("tasks/sendSubscribe");
    });

    it("stops at a close frame even with more bytes after it", async () => {
      fetchStub.resolves(sseResponse(encodeTaskEvent(working) + encodeCloseEvent("t1") + encodeTaskEvent(completed)));
      const client = new A2AClient(AGENT_URL);

      expect(await drain(await client.resubscribeTask({ id: "t1" }))).toEqual([working]);
    });

    it("skips malformed and unknown events", async () => {
      const body =
        encodeTaskEvent(working) +
        "event: task_status_update\ndata: {broken\n\n" +
        'event: task_progress\ndata: {"id":"t1"}\n\n' +
        encodeTaskEvent(completed);
      fetchStub.resolves(sseResponse(body));
      const client = new A2AClient(AGENT_URL);

      expect(await drain(await client.streamTask(sendParams))).toEqual([working, completed]);
    });

    it("throws before returning a channel when the server answers 404", async () => {
      fetchStub.resolves(new Response("Not Found", { status: 404, headers: { "Content-Type": "text/plain" } }));
      const client = new A2AClient(AGENT_URL);

      const err = await rejectionOf(client.streamTask(sendParams));
      expect(err).toBeInstanceOf(A2ATransportError);
      expect(err).toMatchObject({ status: 404, body: "Not Found" });
    });

    it("surfaces a JSON-RPC error answered instead of a stream", async () => {
      fetchStub.resolves(
        jsonResponse({ jsonrpc: "2.0", id: "t1", error: { code: -32001, message: "Task not found" } }, 404),
      );
      const client = new A2AClient(AGENT_URL);

      const err = await rejectionOf(client.resubscribeTask({ id: "t1" }));
      expect(err).toBeInstanceOf(A2AError);
      expect(err).toMatchObject({ code: -32001 });
    });

    it("rejects a 200 response that is not an event stream", async () => {
      fetchStub.resolves(jsonResponse({ jsonrpc: "2.0", id: "t1", result: task }));
      const client = new A2AClient(AGENT_URL);

      await expect(client.streamTask(sendParams)).rejects.toThrow(A2ATransportError);
    });

    it("closes the channel and releases the body when the caller aborts", async () => {
      let released = false;
      const encoder = new TextEncoder();
      const body = new ReadableStream<Uint8Array>({
        start(controller) {
          controller.enqueue(encoder.encode(encodeTaskEvent(working)));
        },
        cancel() {
          released = true;
        },
      });
      fetchStub.resolves(sseResponse(body));
      const client = new A2AClient(AGENT_URL);
      const controller = new AbortController();

      const channel = await client.streamTask(sendParams, controller.signal);
      expect(await channel.receive()).toEqual({ value: working, done: false });

      controller.abort();

      expect(await channel.receive()).toEqual({ value: undefined, done: true });
      await vi.waitFor(() => expect(released).toBe(true));
    });

    it("times out a stream whose setup hangs", async () => {
      fetchStub.callsFake(hangUntilAborted);
      const client = new A2AClient(AGENT_URL, { timeoutMs: 20 });

      const err = await rejectionOf(client.streamTask(sendParams));
      expect(err).toBeInstanceOf(A2ATransportError);
      expect(err).toMatchObject({
        message: "tasks/sendSubscribe request failed: tasks/sendSubscribe timed out after 20ms",
      });
    });

    it("keeps an established stream open past timeoutMs", async () => {
      const encoder = new TextEncoder();
      const body = new ReadableStream<Uint8Array>({
        start(controller) {
          controller.enqueue(encoder.encode(encodeTaskEvent(working)));
          setTimeout(() => {
            controller.enqueue(encoder.encode(encodeTaskEvent(completed)));
            controller.close();
          }, 60);
        },
      });
      fetchStub.resolves(sseResponse(body));
      const client = new A2AClient(AGENT_URL, { timeoutMs: 20 });

      expect(await drain(await client.streamTask(sendParams))).toEqual([working, completed]);
    });

    it("refuses to start with an already aborted signal", async () => {
      const client = new A2AClient(AGENT_URL);
      await expect(client.streamTask(sendParams, AbortSignal.abort())).rejects.toThrow(A2ATransportError);
      expect(fetchStub.called).toBe(false);
    });
  });
});
