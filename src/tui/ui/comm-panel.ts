import blessed from "blessed";
import type { StreamChunk } from "../../drivers/types.js";
import { commLine, type CommSpeaker } from "../format.js";

const MAX_LINES = 500;

/**
 * Radio log. A reply in progress is shown as a live line that grows with
 * each streamed chunk and is committed when the reply completes.
 */
export class CommPanel {
  private lines: string[] = [];
  private pending: string | null = null;

  constructor(
    private box: blessed.Widgets.BoxElement,
    private screen: blessed.Widgets.Screen,
  ) {}

  append(speaker: CommSpeaker, text: string): void {
    this.lines.push(commLine(speaker, text));
    if (this.lines.length > MAX_LINES) this.lines.splice(0, this.lines.length - MAX_LINES);
    this.render();
  }

  beginReply(): void {
    this.pending = "";
    this.render();
  }

  appendChunk(chunk: StreamChunk): void {
    if (this.pending === null) this.pending = "";
    if (chunk.text) this.pending = this.pending ? `${this.pending} ${chunk.text}` : chunk.text;
    this.render();
  }

  /** Commit the live line, replacing it with `text` when given. */
  endReply(text?: string): void {
    const final = text ?? this.pending;
    this.pending = null;
    if (final) this.append("atc", final);
    else this.render();
  }

  /** Drop the live line without committing it. */
  abortReply(): void {
    this.pending = null;
    this.render();
  }

  private render(): void {
    const rows = [...this.lines];
    if (this.pending !== null) rows.push(`${commLine("atc", this.pending)}{gray-fg}...{/gray-fg}`);
    this.box.setContent(rows.join("\n"));
    this.box.setScrollPerc(100);
    this.screen.render();
  }
}
