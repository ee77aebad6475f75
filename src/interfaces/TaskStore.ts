import type { Message, PushNotificationConfig, Task, TaskStatus } from "../types";

export interface CreateTaskParams {
  id: string;
  sessionId?: string;
  message: Message;
  metadata?: Record<string, unknown>;
  status: TaskStatus;
}

/**
 * Interface for storing and retrieving task state.
 *
 * The store does not enforce the task lifecycle; the task manager checks every
 * transition and serializes writes per task before calling in here.
 */
export interface TaskStore {
  /**
   * Creates a task with `params.message` as its first history entry.
   * Fails if a task with the same ID already exists.
   */
  createTask(params: CreateTaskParams): Promise<Task>;

  /**
   * Retrieves a task by its ID, history and artifacts included.
   *
   * @returns A copy of the stored Task, or null if not found.
   */
  getTask(taskId: string): Promise<Task | null>;

  /**
   * Updates specific fields of an existing task.
   *
   * @returns The updated Task object, or null if not found.
   */
  updateTask(taskId: string, updates: Partial<Pick<Task, "status" | "artifacts" | "metadata">>): Promise<Task | null>;

  /** Appends a message to the task's history. */
  addTaskHistory(taskId: string, message: Message): Promise<void>;

  /**
   * Retrieves the history for a task, limited to the most recent `limit`
   * messages (0 for none, undefined for all).
   */
  getTaskHistory(taskId: string, limit?: number): Promise<Message[]>;

  /** Sets the push notification configuration for a task. */
  setPushConfig(taskId: string, config: PushNotificationConfig): Promise<void>;

  /** Gets the push notification configuration for a task, or null if not set. */
  getPushConfig(taskId: string): Promise<PushNotificationConfig | null>;
}
