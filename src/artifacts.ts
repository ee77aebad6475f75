import { A2AError } from "./errors";
import type { Artifact } from "./types";

/** What a processor hands in: the index may be left for the engine to assign. */
export type ArtifactUpdate = Omit<Artifact, "index"> & { index?: number };

export interface AppliedArtifact {
  /** The new artifact list (the input list is not modified). */
  artifacts: Artifact[];
  /** The update as it goes out on the wire, with its resolved index. */
  chunk: Artifact;
}

/**
 * Applies one artifact update (possibly a streamed chunk) to an artifact list.
 *
 * - no index: the end of the list, or the last artifact when `append` is set
 * - `append` on an existing index: parts are added to that artifact
 * - no `append` on an existing index: the artifact is replaced
 * - index equal to the list length: a new artifact
 *
 * Stored artifacts never keep the `append` / `lastChunk` streaming flags.
 */
export function applyArtifactUpdate(current: readonly Artifact[], update: ArtifactUpdate): AppliedArtifact {
  const artifacts = [...current];
  const append = update.append === true;
  const index = update.index ?? (append && artifacts.length > 0 ? artifacts.length - 1 : artifacts.length);

  if (!Number.isInteger(index) || index < 0 || index > artifacts.length) {
    throw A2AError.invalidParams(`Artifact index ${index} is out of range (0..${artifacts.length})`);
  }

  const { append: _append, lastChunk: _lastChunk, ...content } = update;
  const existing = artifacts[index];

  if (existing && append) {
    const merged: Artifact = { ...existing, index, parts: [...existing.parts, ...update.parts] };
    if (content.name !== undefined) merged.name = content.name;
    if (content.description !== undefined) merged.description = content.description;
    if (content.metadata !== undefined) merged.metadata = content.metadata;
    artifacts[index] = merged;
  } else {
    artifacts[index] = { ...content, index };
  }

  return { artifacts, chunk: { ...update, index } };
}
