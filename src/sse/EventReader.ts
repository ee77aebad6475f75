/** One complete SSE frame as read off the wire. */
export interface SseFrame {
  event: string;
  data: string;
  id?: string;
}

// Frames without an `event:` field carry the default type
const DEFAULT_EVENT = "message";

/**
 * Incremental SSE frame reader over a byte stream. Lines may end in `\n`,
 * `\r\n` or `\r`, and a line break may be split across chunks. Only complete
 * frames are returned; comment-only and data-less frames are skipped.
 */
export class SseEventReader {
  private readonly decoder = new TextDecoder();
  private buffer = "";
  private eof = false;
  // a chunk ended in "\r": a "\n" at the start of the next chunk belongs to it
  private pendingCr = false;

  private event = "";
  private dataLines: string[] = [];
  private id: string | undefined;

  constructor(private readonly reader: ReadableStreamDefaultReader<Uint8Array>) {}

  /** Next complete frame, or null at end of stream. Read errors propagate. */
  async readEvent(): Promise<SseFrame | null> {
    for (;;) {
      const line = this.takeLine();
      if (line !== null) {
        const frame = this.processLine(line);
        if (frame) return frame;
        continue;
      }
      if (this.eof) return null;
      await this.fill();
    }
  }

  async cancel(reason?: unknown): Promise<void> {
    await this.reader.cancel(reason);
  }

  private async fill(): Promise<void> {
    const { value, done } = await this.reader.read();
    if (done) {
      this.buffer += this.decoder.decode();
      // A trailing line without terminator cannot complete a frame; drop it
      this.eof = true;
      return;
    }
    let text = this.decoder.decode(value, { stream: true });
    if (this.pendingCr && text.startsWith("\n")) text = text.slice(1);
    this.pendingCr = false;
    this.buffer += text;
  }

  private takeLine(): string | null {
    const match = /\r\n|\r|\n/.exec(this.buffer);
    if (!match) return null;
    const terminator = match[0];
    // "\r" as the last buffered char may be the first half of "\r\n"
    if (terminator === "\r" && match.index === this.buffer.length - 1 && !this.eof) {
      this.pendingCr = true;
    }
    const line = this.buffer.slice(0, match.index);
    this.buffer = this.buffer.slice(match.index + terminator.length);
    return line;
  }

  private processLine(line: string): SseFrame | null {
    if (line === "") return this.dispatch();
    if (line.startsWith(":")) return null;

    const colon = line.indexOf(":");
    const field = colon === -1 ? line : line.slice(0, colon);
    let value = colon === -1 ? "" : line.slice(colon + 1);
    if (value.startsWith(" ")) value = value.slice(1);

    switch (field) {
      case "event":
        this.event = value;
        break;
      case "data":
        this.dataLines.push(value);
        break;
      case "id":
        this.id = value;
        break;
      default:
        // retry and unknown fields are ignored
        break;
    }
    return null;
  }

  private dispatch(): SseFrame | null {
    const hasData = this.dataLines.length > 0;
    const frame: SseFrame = { event: this.event || DEFAULT_EVENT, data: this.dataLines.join("\n") };
    if (this.id !== undefined) frame.id = this.id;

    this.event = "";
    this.dataLines = [];
    this.id = undefined;
    return hasData ? frame : null;
  }
}
