// --- JSON-RPC Base ---
export type JsonRpcId = string | number | null;

export interface JsonRpcRequest<T = unknown> {
  jsonrpc: "2.0";
  id: JsonRpcId;
  method: string;
  params?: T;
}

export interface JsonRpcSuccessResponse<T = unknown> {
  jsonrpc: "2.0";
  id: JsonRpcId;
  result: T;
}

export interface JsonRpcError {
  code: number;
  message: string;
  data?: unknown;
}

export interface JsonRpcErrorResponse {
  jsonrpc: "2.0";
  id: JsonRpcId;
  error: JsonRpcError;
}

export type JsonRpcResponse<T = unknown> = JsonRpcSuccessResponse<T> | JsonRpcErrorResponse;

export const A2AMethods = {
  SendTask: "tasks/send",
  GetTask: "tasks/get",
  CancelTask: "tasks/cancel",
  SendTaskSubscribe: "tasks/sendSubscribe",
  Resubscribe: "tasks/resubscribe",
  SetPushNotification: "tasks/pushNotification/set",
  GetPushNotification: "tasks/pushNotification/get",
} as const;

export type A2AMethod = (typeof A2AMethods)[keyof typeof A2AMethods];

// --- A2A Core Objects ---

export type TaskState =
  | "submitted"
  | "working"
  | "input-required"
  | "completed"
  | "canceled"
  | "failed";

export interface TextPart {
  type: "text";
  text: string;
  metadata?: Record<string, unknown>;
}

export interface FilePart {
  type: "file";
  file: {
    name?: string;
    mimeType?: string;
    bytes?: string; // base64 encoded content
    uri?: string;
  };
  metadata?: Record<string, unknown>;
}

export interface DataPart {
  type: "data";
  data: Record<string, unknown>;
  metadata?: Record<string, unknown>;
}

export type Part = TextPart | FilePart | DataPart;

export interface Message {
  role: "user" | "agent";
  parts: Part[];
  metadata?: Record<string, unknown>;
}

export interface Artifact {
  index: number;
  name?: string;
  description?: string;
  parts: Part[];
  append?: boolean; // For streaming: extend the artifact at `index` instead of replacing it
  lastChunk?: boolean;
  metadata?: Record<string, unknown>;
}

export interface TaskStatus {
  state: TaskState;
  message?: Message;
  timestamp: string; // ISO datetime of this status
}

export interface Task {
  id: string;
  sessionId?: string;
  status: TaskStatus;
  history?: Message[];
  artifacts?: Artifact[];
  metadata?: Record<string, unknown>;
}

// --- Push Notifications ---
export interface PushNotificationConfig {
  url: string;
  token?: string;
  authentication?: {
    schemes: string[];
    credentials?: string;
  };
}

export interface TaskPushNotificationConfig {
  id: string;
  pushNotificationConfig: PushNotificationConfig;
}

// --- A2A Method Params ---
export interface TaskSendParams {
  id: string;
  sessionId?: string;
  message: Message;
  historyLength?: number;
  pushNotification?: PushNotificationConfig;
  metadata?: Record<string, unknown>;
}

export interface TaskQueryParams {
  id: string;
  historyLength?: number;
  metadata?: Record<string, unknown>;
}

export interface TaskIdParams {
  id: string;
  metadata?: Record<string, unknown>;
}

// --- Streaming ---
export interface TaskStatusUpdateEvent {
  id: string; // Task ID
  status: TaskStatus;
  final: boolean;
  metadata?: Record<string, unknown>;
}

export interface TaskArtifactUpdateEvent {
  id: string; // Task ID
  artifact: Artifact;
  metadata?: Record<string, unknown>;
}

export type TaskEvent = TaskStatusUpdateEvent | TaskArtifactUpdateEvent;

export function isStatusUpdateEvent(event: TaskEvent): event is TaskStatusUpdateEvent {
  return "status" in event;
}

export const SseEventTypes = {
  TaskStatusUpdate: "task_status_update",
  TaskArtifactUpdate: "task_artifact_update",
  Close: "close",
} as const;

export type SseEventType = (typeof SseEventTypes)[keyof typeof SseEventTypes];

// --- Agent Card ---
export interface AgentCard {
  name: string;
  description: string;
  url: string;
  version: string;
  documentationUrl?: string;
  capabilities: {
    streaming?: boolean;
    pushNotifications?: boolean;
    stateTransitionHistory?: boolean;
  };
  authentication: {
    schemes: string[];
    credentials?: string;
  };
  defaultInputModes: string[];
  defaultOutputModes: string[];
  skills: {
    id: string;
    name: string;
    description: string;
    tags?: string[];
    examples?: string[];
  }[];
}

// --- A2A Error Codes ---
export enum A2AErrorCodes {
  // JSON-RPC Standard
  ParseError = -32700,
  InvalidRequest = -32600,
  MethodNotFound = -32601,
  InvalidParams = -32602,
  InternalError = -32603,
  // A2A Specific (Server Errors -32000 to -32099)
  TaskNotFound = -32001,
  TaskFinalState = -32002,
  PushNotificationNotConfigured = -32003,
  UnsupportedOperation = -32004,
}
