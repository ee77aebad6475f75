import type { CreateTaskParams, TaskStore } from "../interfaces/TaskStore";
import { createLogger } from "../logger";
import type { Message, PushNotificationConfig, Task } from "../types";

const log = createLogger("InMemoryTaskStore");

type StoredTask = Omit<Task, "history">;

/**
 * Process-lifetime task store. Records are never deleted; every read returns a
 * deep copy so callers cannot mutate stored state.
 */
export class InMemoryTaskStore implements TaskStore {
  private tasks = new Map<string, StoredTask>();
  private history = new Map<string, Message[]>();
  private pushConfigs = new Map<string, PushNotificationConfig>();

  async createTask(params: CreateTaskParams): Promise<Task> {
    if (this.tasks.has(params.id)) {
      throw new Error(`Task ${params.id} already exists`);
    }

    const task: StoredTask = {
      id: params.id,
      status: params.status,
      artifacts: [],
    };
    if (params.sessionId !== undefined) task.sessionId = params.sessionId;
    if (params.metadata !== undefined) task.metadata = params.metadata;

    this.tasks.set(params.id, structuredClone(task));
    this.history.set(params.id, [structuredClone(params.message)]);
    log.debug({ taskId: params.id }, "Created task");
    return this.snapshot(params.id, task);
  }

  async getTask(id: string): Promise<Task | null> {
    const task = this.tasks.get(id);
    return task ? this.snapshot(id, task) : null;
  }

  async updateTask(id: string, updates: Partial<Pick<Task, "status" | "artifacts" | "metadata">>): Promise<Task | null> {
    const task = this.tasks.get(id);
    if (!task) return null;

    const updated: StoredTask = { ...task };
    if (updates.status) updated.status = structuredClone(updates.status);
    if (updates.artifacts) updated.artifacts = structuredClone(updates.artifacts);
    if (updates.metadata) updated.metadata = structuredClone(updates.metadata);
    this.tasks.set(id, updated);

    log.debug({ taskId: id, state: updated.status.state, fields: Object.keys(updates) }, "Updated task");
    return this.snapshot(id, updated);
  }

  async addTaskHistory(id: string, message: Message): Promise<void> {
    const taskHistory = this.history.get(id);
    if (!taskHistory) {
      log.warn({ taskId: id }, "Attempted to add history for unknown task");
      return;
    }
    taskHistory.push(structuredClone(message));
  }

  async getTaskHistory(id: string, limit?: number): Promise<Message[]> {
    const taskHistory = this.history.get(id) ?? [];
    if (limit === undefined) return structuredClone(taskHistory);
    return limit > 0 ? structuredClone(taskHistory.slice(-limit)) : [];
  }

  async setPushConfig(id: string, config: PushNotificationConfig): Promise<void> {
    this.pushConfigs.set(id, structuredClone(config));
  }

  async getPushConfig(id: string): Promise<PushNotificationConfig | null> {
    const config = this.pushConfigs.get(id);
    return config ? structuredClone(config) : null;
  }

  private snapshot(id: string, task: StoredTask): Task {
    return { ...structuredClone(task), history: structuredClone(this.history.get(id) ?? []) };
  }
}
