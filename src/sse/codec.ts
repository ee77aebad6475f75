import type { Logger } from "../logger";
import { zTaskArtifactUpdateEvent, zTaskStatusUpdateEvent } from "../schemas";
import { isStatusUpdateEvent, SseEventTypes, type TaskEvent } from "../types";

export const KEEP_ALIVE_FRAME = ":keep-alive\n\n";

/**
 * Formats one SSE frame. Each line of the serialized payload gets its own
 * `data:` field so that payloads containing newlines survive framing.
 */
export function formatSseEvent(type: string, payload: unknown): string {
  const lines = JSON.stringify(payload).split(/\r\n|\r|\n/);
  return `event: ${type}\n${lines.map((line) => `data: ${line}\n`).join("")}\n`;
}

export function encodeTaskEvent(event: TaskEvent): string {
  const type = isStatusUpdateEvent(event) ? SseEventTypes.TaskStatusUpdate : SseEventTypes.TaskArtifactUpdate;
  return formatSseEvent(type, event);
}

export function encodeCloseEvent(taskId: string): string {
  return formatSseEvent(SseEventTypes.Close, { id: taskId });
}

/**
 * Turns one received frame into a task event. Returns null (after a warning)
 * for malformed JSON, a payload that does not match its event schema, or an
 * event type this decoder does not know. `close` is handled by the caller.
 */
export function decodeTaskEvent(eventType: string, data: string, log: Logger): TaskEvent | null {
  let payload: unknown;
  try {
    payload = JSON.parse(data);
  } catch (err) {
    log.warn({ eventType, err }, "Skipping SSE event with malformed JSON");
    return null;
  }

  switch (eventType) {
    case SseEventTypes.TaskStatusUpdate: {
      const parsed = zTaskStatusUpdateEvent.safeParse(payload);
      if (parsed.success) return parsed.data;
      log.warn({ eventType, issues: parsed.error.issues }, "Skipping invalid status update event");
      return null;
    }
    case SseEventTypes.TaskArtifactUpdate: {
      const parsed = zTaskArtifactUpdateEvent.safeParse(payload);
      if (parsed.success) return parsed.data;
      log.warn({ eventType, issues: parsed.error.issues }, "Skipping invalid artifact update event");
      return null;
    }
    default:
      log.warn({ eventType }, "Skipping unknown SSE event type");
      return null;
  }
}
