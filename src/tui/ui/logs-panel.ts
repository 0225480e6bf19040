import blessed from "blessed";
import type { LogLevel } from "../../logger.js";

const LEVEL_COLORS: Record<LogLevel, string> = {
  debug: "gray",
  info: "blue",
  warn: "yellow",
  error: "red",
};

export class LogsPanel {
  constructor(
    private logWidget: blessed.Widgets.Log,
    private screen: blessed.Widgets.Screen,
  ) {}

  appendLog(line: string, level?: LogLevel): void {
    let prefix = "";
    if (level) {
      const color = LEVEL_COLORS[level];
      prefix = `{${color}-fg}[${level}]{/${color}-fg} `;
    }
    // Multi-line messages (stacks, JSON fields) become separate log rows.
    for (const row of line.split(/\r?\n/)) {
      this.logWidget.log(prefix + blessed.escape(row));
    }
    this.screen.render();
  }
}
