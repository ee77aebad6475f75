import { describe, expect, it } from "vitest";

import { A2AError } from "../errors";
import { A2AErrorCodes, type TaskState } from "../types";
import { assertTransition, canTransition, isFinalState, nextTimestamp } from "./taskState";

describe("task state machine", () => {
  it("marks completed, failed and canceled as final", () => {
    const states: TaskState[] = ["submitted", "working", "input-required", "completed", "failed", "canceled"];
    expect(states.filter(isFinalState)).toEqual(["completed", "failed", "canceled"]);
  });

  it.each<[TaskState, TaskState]>([
    ["submitted", "working"],
    ["submitted", "canceled"],
    ["working", "input-required"],
    ["working", "completed"],
    ["working", "failed"],
    ["working", "canceled"],
    ["input-required", "working"],
    ["input-required", "canceled"],
    ["working", "working"],
  ])("allows %s -> %s", (from, to) => {
    expect(canTransition(from, to)).toBe(true);
    expect(() => assertTransition("t1", from, to)).not.toThrow();
  });

  it.each<[TaskState, TaskState]>([
    ["submitted", "input-required"],
    ["submitted", "completed"],
    ["input-required", "completed"],
  ])("rejects %s -> %s as an invalid transition", (from, to) => {
    expect(canTransition(from, to)).toBe(false);
    expect(() => assertTransition("t1", from, to)).toThrow(
      expect.objectContaining({ code: A2AErrorCodes.TaskFinalState, message: "Invalid task state transition" }),
    );
  });

  it("rejects every move out of a final state, including to itself", () => {
    for (const from of ["completed", "failed", "canceled"] as const) {
      for (const to of ["working", "completed", "canceled"] as const) {
        expect(canTransition(from, to)).toBe(false);
      }
    }

    let caught: unknown;
    try {
      assertTransition("t1", "completed", "working");
    } catch (err) {
      caught = err;
    }
    expect(caught).toBeInstanceOf(A2AError);
    expect(caught).toMatchObject({
      code: -32002,
      message: "Task is in final state",
      data: "Task 't1' is already in final state: completed",
    });
  });

  describe("nextTimestamp", () => {
    it("uses the current time when it is later than the previous status", () => {
      const now = new Date("2024-05-01T10:00:01.000Z");
      expect(nextTimestamp("2024-05-01T10:00:00.000Z", now)).toBe("2024-05-01T10:00:01.000Z");
    });

    it("never goes back before the previous timestamp", () => {
      const now = new Date("2024-05-01T09:59:59.000Z");
      expect(nextTimestamp("2024-05-01T10:00:00.000Z", now)).toBe("2024-05-01T10:00:00.000Z");
    });

    it("returns an ISO timestamp without a previous value", () => {
      expect(nextTimestamp(undefined, new Date(0))).toBe("1970-01-01T00:00:00.000Z");
    });
  });
});
