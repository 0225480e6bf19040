import blessed from "blessed";

/** Fixed-content panel redrawn wholesale (telemetry, status). */
export class InfoPanel {
  constructor(
    private box: blessed.Widgets.BoxElement,
    private screen: blessed.Widgets.Screen,
  ) {}

  /** Lines may carry blessed tags; escape user text before passing it in. */
  setLines(lines: string[]): void {
    this.box.setContent(lines.join("\n"));
    this.screen.render();
  }
}
