import type { ArtifactUpdate } from "../artifacts";
import type { TaskUpdater } from "../interfaces/processor";
import type { Artifact, Message, Task, TaskState } from "../types";
import type { ReadableChannel } from "./AsyncChannel";
import type { TaskManager } from "./TaskManager";

/**
 * Implementation of TaskUpdater passed to processors. Every call is routed to
 * the task manager, which owns the record and the subscriber fan-out.
 */
export class TaskHandle implements TaskUpdater {
  constructor(
    readonly taskId: string,
    readonly signal: AbortSignal,
    private readonly manager: TaskManager,
    private readonly inputs: ReadableChannel<Message>,
  ) {}

  updateStatus(state: TaskState, message?: Message): Promise<Task> {
    return this.manager.updateStatus(this.taskId, state, message);
  }

  addArtifact(artifact: ArtifactUpdate): Promise<Artifact> {
    return this.manager.addArtifact(this.taskId, artifact);
  }

  async nextInput(): Promise<Message | null> {
    const next = await this.inputs.receive();
    return next.done ? null : next.value;
  }
}
