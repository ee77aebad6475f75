import type { ArtifactUpdate } from "../artifacts";
import type { Artifact, Message, Task, TaskState } from "../types";

/** Everything a processor gets to know about the task it was started for. */
export interface ProcessorContext {
  taskId: string;
  sessionId?: string;
  /** The message that created the task. */
  message: Message;
  metadata?: Record<string, unknown>;
  /** Aborted when the task is canceled or the manager shuts down. */
  signal: AbortSignal;
}

/**
 * Handle provided to TaskProcessors to signal updates back to the core system.
 * Every call goes through the task manager's locked mutation path and fan-out,
 * and rejects with a -32002 error once the task is final.
 */
export interface TaskUpdater {
  readonly taskId: string;
  readonly signal: AbortSignal;

  /** Update the task's status, optionally with an agent message (added to history). */
  updateStatus(state: TaskState, message?: Message): Promise<Task>;

  /** Add or extend an artifact; resolves with the chunk as broadcast. */
  addArtifact(artifact: ArtifactUpdate): Promise<Artifact>;

  /**
   * Waits for the next message a client sends to this task while it is running
   * (typically after `input-required`). Resolves null once the task is canceled
   * or the processor's run is over.
   */
  nextInput(): Promise<Message | null>;
}

/**
 * The agent developer's unit of work. Invoked once per newly created task.
 * Returning without reaching a final state completes the task; throwing fails it.
 */
export interface TaskProcessor {
  process(context: ProcessorContext, updater: TaskUpdater): Promise<void>;
}

// --- Error Type for Cancellation ---
export class ProcessorCancellationError extends Error {
  constructor(message = "Task canceled") {
    super(message);
    this.name = "ProcessorCancellationError";
  }
}
