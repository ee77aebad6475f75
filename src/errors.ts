import { A2AErrorCodes, type JsonRpcError, type TaskState } from "./types";

/**
 * Protocol-level error. Carries a JSON-RPC error code so that callers (and the
 * HTTP endpoint) can branch on it. Raised by the task manager for domain errors
 * and by the client when the server answers with a JSON-RPC error object.
 */
export class A2AError extends Error {
  constructor(public readonly code: number, message: string, public readonly data?: unknown) {
    super(message);
    this.name = "A2AError";
  }

  toJsonRpcError(): JsonRpcError {
    const error: JsonRpcError = { code: this.code, message: this.message };
    if (this.data !== undefined) error.data = this.data;
    return error;
  }

  static fromJsonRpcError(error: JsonRpcError): A2AError {
    return new A2AError(error.code, error.message, error.data);
  }

  static taskNotFound(taskId: string): A2AError {
    return new A2AError(A2AErrorCodes.TaskNotFound, "Task not found", `Task with ID '${taskId}' was not found.`);
  }

  static taskFinalState(taskId: string, state: TaskState): A2AError {
    return new A2AError(
      A2AErrorCodes.TaskFinalState,
      "Task is in final state",
      `Task '${taskId}' is already in final state: ${state}`,
    );
  }

  /** Same code as taskFinalState; used for rejected moves between non-final states. */
  static invalidTransition(taskId: string, from: TaskState, to: TaskState): A2AError {
    return new A2AError(
      A2AErrorCodes.TaskFinalState,
      "Invalid task state transition",
      `Task '${taskId}' cannot move from ${from} to ${to}`,
    );
  }

  static pushNotificationNotConfigured(taskId: string): A2AError {
    return new A2AError(
      A2AErrorCodes.PushNotificationNotConfigured,
      "Push Notification not configured",
      `Task '${taskId}' does not have push notifications configured.`,
    );
  }

  static invalidParams(data?: unknown): A2AError {
    return new A2AError(A2AErrorCodes.InvalidParams, "Invalid params", data);
  }

  static invalidRequest(data?: unknown): A2AError {
    return new A2AError(A2AErrorCodes.InvalidRequest, "Invalid Request", data);
  }

  static methodNotFound(method: string): A2AError {
    return new A2AError(A2AErrorCodes.MethodNotFound, "Method not found", `Method '${method}' is not supported.`);
  }

  static parseError(data?: unknown): A2AError {
    return new A2AError(A2AErrorCodes.ParseError, "Parse error", data);
  }

  static internal(data?: unknown): A2AError {
    return new A2AError(A2AErrorCodes.InternalError, "Internal error", data);
  }
}

export interface A2ATransportErrorOptions {
  status?: number;
  body?: string;
  cause?: unknown;
}

/**
 * HTTP failure, unreadable body or malformed envelope. Never used for an error
 * the server reported through JSON-RPC.
 */
export class A2ATransportError extends Error {
  readonly status?: number;
  readonly body?: string;

  constructor(message: string, options: A2ATransportErrorOptions = {}) {
    super(message, options.cause === undefined ? undefined : { cause: options.cause });
    this.name = "A2ATransportError";
    this.status = options.status;
    this.body = options.body;
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
