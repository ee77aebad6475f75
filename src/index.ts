// Public surface of the task engine

export * from "./types";
export { A2AError, A2ATransportError, errorMessage } from "./errors";
export type { A2ATransportErrorOptions } from "./errors";
export * from "./schemas";
export { applyArtifactUpdate } from "./artifacts";
export type { ArtifactUpdate, AppliedArtifact } from "./artifacts";
export { loadServerConfig } from "./config";
export type { ServerConfig } from "./config";
export { createLogger, rootLogger } from "./logger";
export type { Logger } from "./logger";

// Core
export { AsyncChannel } from "./core/AsyncChannel";
export type { ReadableChannel } from "./core/AsyncChannel";
export { FINAL_TASK_STATES, assertTransition, canTransition, isFinalState } from "./core/taskState";
export { DEFAULT_SUBSCRIBER_BUFFER, SubscriberRegistry } from "./core/SubscriberRegistry";
export { TaskManager } from "./core/TaskManager";
export type { TaskManagerConfig } from "./core/TaskManager";

// Interfaces & persistence
export type { CreateTaskParams, TaskStore } from "./interfaces/TaskStore";
export { ProcessorCancellationError } from "./interfaces/processor";
export type { ProcessorContext, TaskProcessor, TaskUpdater } from "./interfaces/processor";
export { InMemoryTaskStore } from "./persistence/InMemoryTaskStore";

// SSE
export { decodeTaskEvent, encodeCloseEvent, encodeTaskEvent, formatSseEvent, KEEP_ALIVE_FRAME } from "./sse/codec";
export { SseEventReader } from "./sse/EventReader";
export type { SseFrame } from "./sse/EventReader";
export { pipeTaskEvents, startSseResponse } from "./sse/SseResponseWriter";
export type { SseSink, SseStreamOptions } from "./sse/SseResponseWriter";

// Express
export { createA2AExpressHandlers, startA2AExpressServer, statusForErrorCode } from "./express/server";
export type { A2AExpressHandlerOptions, A2AExpressHandlers, A2AServerHandle, A2AServerOptions } from "./express/server";
