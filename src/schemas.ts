import { z } from "zod";

import type {
  Artifact,
  Message,
  Part,
  PushNotificationConfig,
  Task,
  TaskArtifactUpdateEvent,
  TaskIdParams,
  TaskPushNotificationConfig,
  TaskQueryParams,
  TaskSendParams,
  TaskStatus,
  TaskStatusUpdateEvent,
} from "./types";

// -----------------------------------------------------------------------------
// Zod schemas for the wire objects. Server side they validate RPC params, client
// side they validate results and streamed event payloads.
// -----------------------------------------------------------------------------

const zMetadata = z.record(z.unknown());

const zTextPart = z.object({ type: z.literal("text"), text: z.string(), metadata: zMetadata.optional() });
const zFilePart = z.object({
  type: z.literal("file"),
  file: z.object({
    name: z.string().optional(),
    mimeType: z.string().optional(),
    bytes: z.string().optional(),
    uri: z.string().optional(),
  }),
  metadata: zMetadata.optional(),
});
const zDataPart = z.object({ type: z.literal("data"), data: z.record(z.unknown()), metadata: zMetadata.optional() });

export const zPart: z.ZodType<Part> = z.discriminatedUnion("type", [zTextPart, zFilePart, zDataPart]);

export const zTaskState = z.enum(["submitted", "working", "input-required", "completed", "canceled", "failed"]);

export const zMessage: z.ZodType<Message> = z.object({
  role: z.enum(["user", "agent"]),
  parts: z.array(zPart),
  metadata: zMetadata.optional(),
});

export const zArtifact: z.ZodType<Artifact> = z.object({
  index: z.number().int().min(0),
  name: z.string().optional(),
  description: z.string().optional(),
  parts: z.array(zPart),
  append: z.boolean().optional(),
  lastChunk: z.boolean().optional(),
  metadata: zMetadata.optional(),
});

export const zTaskStatus: z.ZodType<TaskStatus> = z.object({
  state: zTaskState,
  message: zMessage.optional(),
  timestamp: z.string(),
});

export const zTask: z.ZodType<Task> = z.object({
  id: z.string(),
  sessionId: z.string().optional(),
  status: zTaskStatus,
  history: z.array(zMessage).optional(),
  artifacts: z.array(zArtifact).optional(),
  metadata: zMetadata.optional(),
});

export const zPushNotificationConfig: z.ZodType<PushNotificationConfig> = z.object({
  url: z.string().url(),
  token: z.string().optional(),
  authentication: z.object({ schemes: z.array(z.string()), credentials: z.string().optional() }).optional(),
});

// --- Params ---

const zTaskId = z.string().min(1, "task ID is required");

export const zSendParams: z.ZodType<TaskSendParams> = z.object({
  id: zTaskId,
  sessionId: z.string().optional(),
  message: zMessage.refine((m) => m.parts.length > 0, "message must have at least one part"),
  historyLength: z.number().int().min(0).optional(),
  pushNotification: zPushNotificationConfig.optional(),
  metadata: zMetadata.optional(),
});

export const zQueryParams: z.ZodType<TaskQueryParams> = z.object({
  id: zTaskId,
  historyLength: z.number().int().min(0).optional(),
  metadata: zMetadata.optional(),
});

export const zIdParams: z.ZodType<TaskIdParams> = z.object({
  id: zTaskId,
  metadata: zMetadata.optional(),
});

export const zTaskPushNotificationConfig: z.ZodType<TaskPushNotificationConfig> = z.object({
  id: zTaskId,
  pushNotificationConfig: zPushNotificationConfig,
});

// --- Events ---

export const zTaskStatusUpdateEvent: z.ZodType<TaskStatusUpdateEvent> = z.object({
  id: z.string(),
  status: zTaskStatus,
  final: z.boolean(),
  metadata: zMetadata.optional(),
});

export const zTaskArtifactUpdateEvent: z.ZodType<TaskArtifactUpdateEvent> = z.object({
  id: z.string(),
  artifact: zArtifact,
  metadata: zMetadata.optional(),
});

// --- Envelope ---

export const zJsonRpcId = z.union([z.string(), z.number(), z.null()]);

export const zJsonRpcError = z.object({
  code: z.number().int(),
  message: z.string(),
  data: z.unknown().optional(),
});

export const zJsonRpcRequest = z.object({
  jsonrpc: z.literal("2.0"),
  id: zJsonRpcId.optional(),
  method: z.string(),
  params: z.unknown().optional(),
});

/** Loose envelope: the "exactly one of result / error" rule is checked by the caller. */
export const zJsonRpcResponse = z.object({
  jsonrpc: z.literal("2.0").optional(),
  id: zJsonRpcId.optional(),
  result: z.unknown().optional(),
  error: zJsonRpcError.optional(),
});

/** Parse `raw` with `schema`, mapping validation failures to a thrown error built by `onError`. */
export function parseWith<T>(schema: z.ZodType<T>, raw: unknown, onError: (issues: z.ZodIssue[]) => Error): T {
  const parsed = schema.safeParse(raw);
  if (!parsed.success) throw onError(parsed.error.issues);
  return parsed.data;
}
