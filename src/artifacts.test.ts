import { describe, expect, it } from "vitest";

import { applyArtifactUpdate } from "./artifacts";
import { A2AError } from "./errors";
import type { Artifact } from "./types";

const text = (value: string) => ({ type: "text" as const, text: value });

describe("applyArtifactUpdate", () => {
  it("adds a new artifact at the end when no index is given", () => {
    const { artifacts, chunk } = applyArtifactUpdate([], { name: "report", parts: [text("one")] });

    expect(artifacts).toEqual([{ name: "report", parts: [text("one")], index: 0 }]);
    expect(chunk).toEqual({ name: "report", parts: [text("one")], index: 0 });
  });

  it("appends parts to the last artifact and strips streaming flags from the stored copy", () => {
    const first = applyArtifactUpdate([], { name: "stream", parts: [text("a")], lastChunk: false });
    const second = applyArtifactUpdate(first.artifacts, { parts: [text("b")], append: true, lastChunk: true });

    expect(second.artifacts).toEqual([{ name: "stream", parts: [text("a"), text("b")], index: 0 }]);
    expect(second.chunk).toEqual({ parts: [text("b")], append: true, lastChunk: true, index: 0 });
  });

  it("replaces an existing artifact when append is not set", () => {
    const current: Artifact[] = [{ index: 0, name: "draft", parts: [text("old")] }];
    const { artifacts } = applyArtifactUpdate(current, { index: 0, name: "final", parts: [text("new")] });

    expect(artifacts).toEqual([{ index: 0, name: "final", parts: [text("new")] }]);
    // input list untouched
    expect(current[0]?.name).toBe("draft");
  });

  it("keeps the artifact's name when an appended chunk carries none", () => {
    const current: Artifact[] = [{ index: 0, name: "log", description: "run log", parts: [text("1")] }];
    const { artifacts } = applyArtifactUpdate(current, { index: 0, append: true, parts: [text("2")] });

    expect(artifacts[0]).toEqual({ index: 0, name: "log", description: "run log", parts: [text("1"), text("2")] });
  });

  it("rejects an index past the end of the list", () => {
    let caught: unknown;
    try {
      applyArtifactUpdate([], { index: 5, parts: [text("x")] });
    } catch (err) {
      caught = err;
    }
    expect(caught).toBeInstanceOf(A2AError);
    expect(caught).toMatchObject({ code: -32602, data: "Artifact index 5 is out of range (0..0)" });
  });
});
