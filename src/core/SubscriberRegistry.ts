import { createLogger, type Logger } from "../logger";
import { isStatusUpdateEvent, type TaskEvent } from "../types";
import { AsyncChannel, type ReadableChannel } from "./AsyncChannel";

// Structure stored per live subscription
interface Subscription {
  channel: AsyncChannel<TaskEvent>;
  signal?: AbortSignal;
  onAbort?: () => void;
}

export const DEFAULT_SUBSCRIBER_BUFFER = 16;

/**
 * Live event channels per task. Broadcasting never waits on a consumer: aborted
 * subscribers are dropped, a full buffer marks the subscriber as stalled and
 * drops it too. A final status event closes every channel of its task.
 */
export class SubscriberRegistry {
  private readonly subscriptions: Map<string, Subscription[]> = new Map();
  private readonly log: Logger;

  constructor(private readonly bufferSize: number = DEFAULT_SUBSCRIBER_BUFFER, logger?: Logger) {
    this.log = logger ?? createLogger("SubscriberRegistry");
  }

  /**
   * Registers a new subscriber for `taskId`, optionally seeded with
   * `initialEvent`. When `signal` aborts the subscription is removed and its
   * channel closed.
   */
  subscribe(taskId: string, signal?: AbortSignal, initialEvent?: TaskEvent): ReadableChannel<TaskEvent> {
    const channel = new AsyncChannel<TaskEvent>(this.bufferSize);
    if (signal?.aborted) {
      channel.close();
      return channel;
    }
    if (initialEvent) channel.trySend(initialEvent);

    const subscription: Subscription = { channel, signal };
    if (signal) {
      subscription.onAbort = () => {
        this.log.debug({ taskId }, "Subscriber aborted");
        this.remove(taskId, subscription);
      };
      signal.addEventListener("abort", subscription.onAbort, { once: true });
    }

    let taskSubscriptions = this.subscriptions.get(taskId);
    if (!taskSubscriptions) {
      taskSubscriptions = [];
      this.subscriptions.set(taskId, taskSubscriptions);
    }
    taskSubscriptions.push(subscription);
    this.log.debug({ taskId, total: taskSubscriptions.length }, "Added subscriber");
    return channel;
  }

  /**
   * Delivers `event` to every live subscriber of `taskId` and returns how many
   * accepted it. Closes and forgets the task's subscribers after a final event.
   */
  broadcast(taskId: string, event: TaskEvent): number {
    const taskSubscriptions = this.subscriptions.get(taskId);
    const isFinalEvent = isStatusUpdateEvent(event) && event.final;
    if (!taskSubscriptions || taskSubscriptions.length === 0) {
      if (isFinalEvent) this.subscriptions.delete(taskId);
      return 0;
    }

    let delivered = 0;
    // Iterate over a copy: removals below mutate the stored list
    for (const subscription of [...taskSubscriptions]) {
      if (subscription.signal?.aborted) {
        this.remove(taskId, subscription);
        continue;
      }
      if (subscription.channel.trySend(event)) {
        delivered++;
      } else {
        this.log.warn({ taskId, bufferSize: this.bufferSize }, "Subscriber buffer full; dropping stalled subscriber");
        this.remove(taskId, subscription);
      }
    }

    if (isFinalEvent) this.closeTask(taskId);
    return delivered;
  }

  /** Closes every channel of `taskId` and removes the task from the live set. */
  closeTask(taskId: string): void {
    const taskSubscriptions = this.subscriptions.get(taskId);
    if (!taskSubscriptions) return;
    for (const subscription of [...taskSubscriptions]) {
      this.remove(taskId, subscription);
    }
    this.subscriptions.delete(taskId);
    this.log.debug({ taskId }, "Closed all subscribers");
  }

  hasSubscribers(taskId: string): boolean {
    return this.subscriberCount(taskId) > 0;
  }

  subscriberCount(taskId: string): number {
    return this.subscriptions.get(taskId)?.length ?? 0;
  }

  closeAll(): void {
    for (const taskId of [...this.subscriptions.keys()]) {
      this.closeTask(taskId);
    }
  }

  private remove(taskId: string, subscription: Subscription): void {
    if (subscription.onAbort) subscription.signal?.removeEventListener("abort", subscription.onAbort);
    subscription.channel.close();

    const taskSubscriptions = this.subscriptions.get(taskId);
    if (!taskSubscriptions) return;
    const index = taskSubscriptions.indexOf(subscription);
    if (index !== -1) taskSubscriptions.splice(index, 1);
    if (taskSubscriptions.length === 0) this.subscriptions.delete(taskId);
  }
}
