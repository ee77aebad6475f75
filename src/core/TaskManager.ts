// -----------------------------------------------------------------------------
// TaskManager: the task lifecycle engine. Owns the state machine, the per-task
// locks, processor invocation and the subscriber fan-out.
// -----------------------------------------------------------------------------

import { Mutex } from "async-mutex";
import type { z } from "zod";

import { applyArtifactUpdate, type ArtifactUpdate } from "../artifacts";
import { A2AError, errorMessage } from "../errors";
import { ProcessorCancellationError, type ProcessorContext, type TaskProcessor } from "../interfaces/processor";
import type { TaskStore } from "../interfaces/TaskStore";
import { createLogger, type Logger } from "../logger";
import { InMemoryTaskStore } from "../persistence/InMemoryTaskStore";
import { parseWith, zIdParams, zQueryParams, zSendParams, zTaskPushNotificationConfig } from "../schemas";
import type {
  Artifact,
  Message,
  Task,
  TaskEvent,
  TaskPushNotificationConfig,
  TaskSendParams,
  TaskState,
  TaskStatus,
  TaskStatusUpdateEvent,
} from "../types";
import { AsyncChannel, type ReadableChannel } from "./AsyncChannel";
import { DEFAULT_SUBSCRIBER_BUFFER, SubscriberRegistry } from "./SubscriberRegistry";
import { TaskHandle } from "./TaskHandle";
import { assertTransition, isFinalState, nextTimestamp } from "./taskState";

// Messages sent to a running task that its processor has not read yet
const INPUT_BUFFER = 32;
const DEFAULT_SHUTDOWN_TIMEOUT_MS = 5000;

export interface TaskManagerConfig {
  processor: TaskProcessor;
  taskStore?: TaskStore;
  subscriberBufferSize?: number;
  /** How long `shutdown()` waits for processors to settle after aborting them. */
  shutdownTimeoutMs?: number;
  logger?: Logger;
}

interface RunningTask {
  controller: AbortController;
  inputs: AsyncChannel<Message>;
  done: Promise<void>;
}

type ProcessorOutcome = { ok: true } | { ok: false; error: unknown };

interface AcceptOptions {
  subscribe: boolean;
  signal?: AbortSignal;
}

export class TaskManager {
  private readonly store: TaskStore;
  private readonly processor: TaskProcessor;
  private readonly subscribers: SubscriberRegistry;
  private readonly log: Logger;
  private readonly shutdownTimeoutMs: number;
  // one mutex per task: every read-check-write of a task record runs under it
  private readonly locks = new Map<string, Mutex>();
  private readonly running = new Map<string, RunningTask>();

  constructor(cfg: TaskManagerConfig) {
    this.store = cfg.taskStore ?? new InMemoryTaskStore();
    this.processor = cfg.processor;
    this.log = cfg.logger ?? createLogger("TaskManager");
    this.shutdownTimeoutMs = cfg.shutdownTimeoutMs ?? DEFAULT_SHUTDOWN_TIMEOUT_MS;
    this.subscribers = new SubscriberRegistry(cfg.subscriberBufferSize ?? DEFAULT_SUBSCRIBER_BUFFER, this.log);
  }

  // ---------------------------------------------------------------------------
  // 1. tasks/send
  async sendTask(raw: unknown): Promise<Task> {
    const params = this._parse(zSendParams, raw);
    const { task } = await this._accept(params, { subscribe: false });
    return this._withHistory(task, params.historyLength);
  }

  // ---------------------------------------------------------------------------
  // 2. tasks/sendSubscribe
  async sendTaskSubscribe(raw: unknown, signal?: AbortSignal): Promise<ReadableChannel<TaskEvent>> {
    const params = this._parse(zSendParams, raw);
    const { channel } = await this._accept(params, { subscribe: true, signal });
    if (!channel) throw A2AError.internal(`No subscription registered for task ${params.id}`);
    return channel;
  }

  // ---------------------------------------------------------------------------
  // 3. tasks/get
  async getTask(raw: unknown): Promise<Task> {
    const params = this._parse(zQueryParams, raw);
    const task = await this._load(params.id);
    return this._withHistory(task, params.historyLength);
  }

  // ---------------------------------------------------------------------------
  // 4. tasks/cancel
  async cancelTask(raw: unknown): Promise<Task> {
    const params = this._parse(zIdParams, raw);
    const task = await this._lock(params.id).runExclusive(async () => {
      const current = await this._load(params.id);
      assertTransition(params.id, current.status.state, "canceled");
      return this._applyStatus(current, "canceled");
    });

    const run = this.running.get(params.id);
    if (run && !run.controller.signal.aborted) {
      this.log.info({ taskId: params.id }, "Signalling cancellation to running processor");
      run.controller.abort(new ProcessorCancellationError());
    }
    return task;
  }

  // ---------------------------------------------------------------------------
  // 5. tasks/resubscribe
  async resubscribe(raw: unknown, signal?: AbortSignal): Promise<ReadableChannel<TaskEvent>> {
    const params = this._parse(zIdParams, raw);
    return this._lock(params.id).runExclusive(async () => {
      const task = await this._load(params.id);
      if (isFinalState(task.status.state)) {
        const channel = new AsyncChannel<TaskEvent>(1);
        channel.trySend({ id: task.id, status: task.status, final: true });
        channel.close();
        return channel;
      }
      // Live task: future events only, nothing already emitted is replayed
      return this.subscribers.subscribe(task.id, signal);
    });
  }

  // ---------------------------------------------------------------------------
  // 6. tasks/pushNotification/set & get
  async setPushNotification(raw: unknown): Promise<TaskPushNotificationConfig> {
    const params = this._parse(zTaskPushNotificationConfig, raw);
    return this._lock(params.id).runExclusive(async () => {
      await this._load(params.id);
      await this.store.setPushConfig(params.id, params.pushNotificationConfig);
      this.log.info({ taskId: params.id }, "Push notification config set");
      return params;
    });
  }

  async getPushNotification(raw: unknown): Promise<TaskPushNotificationConfig> {
    const params = this._parse(zIdParams, raw);
    await this._load(params.id);
    const config = await this.store.getPushConfig(params.id);
    if (!config) throw A2AError.pushNotificationNotConfigured(params.id);
    return { id: params.id, pushNotificationConfig: config };
  }

  // ---------------------------------------------------------------------------
  // Processor handle entry points (see TaskHandle)

  async updateStatus(taskId: string, state: TaskState, message?: Message): Promise<Task> {
    return this._lock(taskId).runExclusive(async () => {
      const task = await this._load(taskId);
      assertTransition(taskId, task.status.state, state);
      return this._applyStatus(task, state, message);
    });
  }

  async addArtifact(taskId: string, update: ArtifactUpdate): Promise<Artifact> {
    return this._lock(taskId).runExclusive(async () => {
      const task = await this._load(taskId);
      if (isFinalState(task.status.state)) throw A2AError.taskFinalState(taskId, task.status.state);

      const { artifacts, chunk } = applyArtifactUpdate(task.artifacts ?? [], update);
      await this.store.updateTask(taskId, { artifacts });
      this.subscribers.broadcast(taskId, { id: taskId, artifact: chunk });
      return chunk;
    });
  }

  // ---------------------------------------------------------------------------
  // Lifecycle

  subscriberCount(taskId: string): number {
    return this.subscribers.subscriberCount(taskId);
  }

  /** Resolves once the processor run of `taskId` (if any) has finished and settled. */
  async whenSettled(taskId: string): Promise<void> {
    await this.running.get(taskId)?.done;
  }

  /**
   * Cancels every running task, closes every subscriber and waits up to
   * `shutdownTimeoutMs` for processors to settle. Processors still running
   * after that are logged and left behind.
   */
  async shutdown(): Promise<void> {
    const runs = [...this.running.entries()];
    this.log.info({ running: runs.length }, "Shutting down task manager");
    for (const [taskId] of runs) {
      try {
        await this.cancelTask({ id: taskId });
      } catch (err) {
        this.log.warn({ taskId, err }, "Task could not be canceled during shutdown");
      }
    }
    for (const [, run] of runs) {
      if (!run.controller.signal.aborted) run.controller.abort(new ProcessorCancellationError("Server shutting down"));
    }
    this.subscribers.closeAll();

    const pending = new Set(runs.map(([taskId]) => taskId));
    const settled = Promise.all(runs.map(([taskId, run]) => run.done.then(() => pending.delete(taskId))));
    let timer: ReturnType<typeof setTimeout> | undefined;
    const timedOut = new Promise<boolean>((resolve) => {
      timer = setTimeout(() => resolve(true), this.shutdownTimeoutMs);
    });
    const expired = await Promise.race([settled.then(() => false), timedOut]);
    clearTimeout(timer);
    if (expired) {
      this.log.warn({ taskIds: [...pending], timeoutMs: this.shutdownTimeoutMs }, "Processors ignored cancellation; shutdown continues without them");
    }
  }

  // ---------------------------------------------------------------------------
  // Internal helpers

  private _parse<T>(schema: z.ZodType<T>, raw: unknown): T {
    return parseWith(schema, raw, (issues) => A2AError.invalidParams(issues));
  }

  private _lock(taskId: string): Mutex {
    let lock = this.locks.get(taskId);
    if (!lock) {
      lock = new Mutex();
      this.locks.set(taskId, lock);
    }
    return lock;
  }

  private async _load(taskId: string): Promise<Task> {
    const task = await this.store.getTask(taskId);
    if (!task) throw A2AError.taskNotFound(taskId);
    return task;
  }

  private async _withHistory(task: Task, historyLength?: number): Promise<Task> {
    if (historyLength === undefined) return task;
    return { ...task, history: await this.store.getTaskHistory(task.id, historyLength) };
  }

  /**
   * Creates a new task or resumes a live one. The subscriber (if requested) is
   * registered and the processor started while the task lock is still held, so
   * no event can be emitted before the subscription exists.
   */
  private async _accept(
    params: TaskSendParams,
    options: AcceptOptions,
  ): Promise<{ task: Task; channel: ReadableChannel<TaskEvent> | null }> {
    return this._lock(params.id).runExclusive(async () => {
      const existing = await this.store.getTask(params.id);
      let task: Task;
      let created = false;

      if (existing) {
        if (isFinalState(existing.status.state)) throw A2AError.taskFinalState(params.id, existing.status.state);
        await this.store.addTaskHistory(params.id, params.message);
        if (params.pushNotification) await this.store.setPushConfig(params.id, params.pushNotification);
        const run = this.running.get(params.id);
        if (run && !run.inputs.trySend(params.message)) {
          this.log.warn({ taskId: params.id }, "Processor input queue unavailable; message kept in history only");
        }
        task = await this._load(params.id);
        this.log.info({ taskId: params.id, state: task.status.state }, "Resumed existing task with new message");
      } else {
        task = await this.store.createTask({
          id: params.id,
          sessionId: params.sessionId,
          message: params.message,
          metadata: params.metadata,
          status: { state: "submitted", timestamp: nextTimestamp() },
        });
        if (params.pushNotification) await this.store.setPushConfig(params.id, params.pushNotification);
        created = true;
        this.log.info({ taskId: params.id }, "Created task");
      }

      let channel: ReadableChannel<TaskEvent> | null = null;
      if (options.subscribe) {
        const initialEvent: TaskStatusUpdateEvent = { id: task.id, status: task.status, final: false };
        channel = this.subscribers.subscribe(task.id, options.signal, initialEvent);
      }
      if (created) this._startProcessor(task, params.message);
      return { task, channel };
    });
  }

  /** Writes a new status, records an agent message in history and broadcasts. Caller holds the lock. */
  private async _applyStatus(task: Task, state: TaskState, message?: Message): Promise<Task> {
    const status: TaskStatus = { state, timestamp: nextTimestamp(task.status.timestamp) };
    if (message) status.message = message;

    const updated = await this.store.updateTask(task.id, { status });
    if (!updated) throw A2AError.taskNotFound(task.id);
    if (message?.role === "agent") await this.store.addTaskHistory(task.id, message);

    const final = isFinalState(state);
    this.subscribers.broadcast(task.id, { id: task.id, status, final });
    if (final) {
      // Wake a processor blocked in nextInput(); there is nothing left to read
      this.running.get(task.id)?.inputs.close();
    }
    this.log.info({ taskId: task.id, state, final }, "Task status updated");
    return this._load(task.id);
  }

  private _startProcessor(task: Task, message: Message): void {
    const controller = new AbortController();
    const inputs = new AsyncChannel<Message>(INPUT_BUFFER);
    const handle = new TaskHandle(task.id, controller.signal, this, inputs);

    const context: ProcessorContext = { taskId: task.id, message, signal: controller.signal };
    if (task.sessionId !== undefined) context.sessionId = task.sessionId;
    if (task.metadata !== undefined) context.metadata = task.metadata;

    const run: RunningTask = { controller, inputs, done: Promise.resolve() };
    this.running.set(task.id, run);
    run.done = this._runProcessor(context, handle).finally(() => {
      inputs.close();
      if (this.running.get(task.id) === run) this.running.delete(task.id);
    });
  }

  /** Runs the processor to completion and settles the task. Never rejects. */
  private async _runProcessor(context: ProcessorContext, handle: TaskHandle): Promise<void> {
    const { taskId } = context;
    let outcome: ProcessorOutcome;
    try {
      // Yield first so the processor never runs inside the caller's critical section
      await Promise.resolve();
      this.log.debug({ taskId }, "Invoking processor");
      await this.processor.process(context, handle);
      outcome = { ok: true };
    } catch (error) {
      outcome = { ok: false, error };
    }

    try {
      await this._settle(taskId, outcome);
    } catch (err) {
      this.log.error({ taskId, err }, "Failed to settle task after processor finished");
    }
  }

  /**
   * Guarantees a final state once the processor is done: normal return without
   * one completes the task, an error fails it. Applies from any non-final state.
   */
  private async _settle(taskId: string, outcome: ProcessorOutcome): Promise<void> {
    await this._lock(taskId).runExclusive(async () => {
      const task = await this.store.getTask(taskId);
      if (!task) {
        this.log.error({ taskId }, "Task disappeared while its processor was running");
        return;
      }
      if (isFinalState(task.status.state)) {
        if (!outcome.ok) {
          this.log.debug({ taskId, state: task.status.state, err: outcome.error }, "Processor ended after task reached final state");
        }
        return;
      }

      if (outcome.ok) {
        this.log.info({ taskId, from: task.status.state }, "Processor returned without a final state; completing task");
        await this._applyStatus(task, "completed");
        return;
      }

      this.log.warn({ taskId, err: outcome.error }, "Processor failed");
      const failure: Message = {
        role: "agent",
        parts: [{ type: "text", text: `Task failed: ${errorMessage(outcome.error)}` }],
      };
      await this._applyStatus(task, "failed", failure);
    });
  }
}
