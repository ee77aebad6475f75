import { A2AError } from "../errors";
import type { TaskState } from "../types";

export const FINAL_TASK_STATES: ReadonlySet<TaskState> = new Set<TaskState>(["completed", "failed", "canceled"]);

// Outgoing edges per state. A non-final state may also be re-entered to publish
// a fresh status message (e.g. working → working with progress text).
const TRANSITIONS: Readonly<Record<TaskState, readonly TaskState[]>> = {
  submitted: ["working", "canceled"],
  working: ["input-required", "completed", "failed", "canceled"],
  "input-required": ["working", "canceled"],
  completed: [],
  failed: [],
  canceled: [],
};

/** True if the task state is one of the terminal end‑states. */
export function isFinalState(state: TaskState): boolean {
  return FINAL_TASK_STATES.has(state);
}

export function canTransition(from: TaskState, to: TaskState): boolean {
  if (isFinalState(from)) return false;
  return from === to || TRANSITIONS[from].includes(to);
}

/** Throws the -32002 error for any move the transition table does not allow. */
export function assertTransition(taskId: string, from: TaskState, to: TaskState): void {
  if (isFinalState(from)) throw A2AError.taskFinalState(taskId, from);
  if (!canTransition(from, to)) throw A2AError.invalidTransition(taskId, from, to);
}

/**
 * Timestamp for a new status. Never earlier than `previous`, so a task's status
 * timestamps stay non-decreasing even if the wall clock steps back.
 */
export function nextTimestamp(previous?: string, now: Date = new Date()): string {
  const candidate = now.toISOString();
  return previous !== undefined && previous > candidate ? previous : candidate;
}
