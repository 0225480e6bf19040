import blessed from "blessed";
import type { PanelRatios } from "../types.js";
import { CommPanel } from "./comm-panel.js";
import { InfoPanel } from "./info-panel.js";
import { LogsPanel } from "./logs-panel.js";
import { HELP_TEXT } from "./screen.js";

export interface Layout {
  commPanel: CommPanel;
  telemetryPanel: InfoPanel;
  statusPanel: InfoPanel;
  logsPanel: LogsPanel;
  inputBox: blessed.Widgets.TextareaElement;
  helpBar: blessed.Widgets.BoxElement;
  focusables: blessed.Widgets.BlessedElement[];
}

// ─── Arrow-key scroll helper ──────────────────────────────────────────────────
// Each scrollable box gets arrow-key + vim bindings when focused.
// The input box keeps its own arrow-key behaviour (cursor movement) so we
// only attach to the read-only panels.
function bindScrollKeys(
  el: blessed.Widgets.ScrollableBoxElement,
  screen: blessed.Widgets.Screen,
  scrollLines = 3,
): void {
  const page = () => (typeof el.height === "number" ? el.height : 10);

  el.key(["up", "k"], () => {
    el.scroll(-scrollLines);
    screen.render();
  });

  el.key(["down", "j"], () => {
    el.scroll(scrollLines);
    screen.render();
  });

  el.key(["pageup", "b"], () => {
    el.scroll(-page());
    screen.render();
  });

  el.key(["pagedown", "f"], () => {
    el.scroll(page());
    screen.render();
  });

  el.key(["g"], () => { el.setScrollPerc(0); screen.render(); }); // top
  el.key(["G", "S-g"], () => { el.setScrollPerc(100); screen.render(); }); // bottom
}

// ─── Layout factory ───────────────────────────────────────────────────────────
export function createLayout(
  screen: blessed.Widgets.Screen,
  panelRatios: PanelRatios,
): Layout {
  const [commPct, infoPct, logsPct] = panelRatios;
  const total = commPct + infoPct + logsPct;
  const commWidth = Math.round((commPct / total) * 100);
  const infoWidth = Math.round((infoPct / total) * 100);

  // ── Help bar ────────────────────────────────────────────────────────────────
  const helpBar = blessed.box({
    parent: screen,
    bottom: 0,
    left: 0,
    width: "100%",
    height: 1,
    tags: true,
    style: { bg: "blue", fg: "white" },
    content: HELP_TEXT,
  });

  // ── Comm log ────────────────────────────────────────────────────────────────
  const commBox = blessed.box({
    parent: screen,
    label: " Comms ",
    left: 0,
    top: 0,
    width: `${commWidth}%`,
    height: "100%-4",
    border: { type: "line" },
    scrollable: true,
    alwaysScroll: true,
    scrollbar: { ch: "│", style: { fg: "cyan" } },
    keys: true,
    vi: true,
    mouse: true,
    tags: true,
    wrap: true,
    style: {
      border: { fg: "cyan" },
      label: { fg: "cyan", bold: true },
    },
  });
  bindScrollKeys(commBox, screen);

  // ── Input box ───────────────────────────────────────────────────────────────
  const inputBox = blessed.textarea({
    parent: screen,
    label: " Transmit > ",
    left: 0,
    bottom: 1,
    width: `${commWidth}%`,
    height: 3,
    border: { type: "line" },
    inputOnFocus: true,
    mouse: true,
    keys: true,
    style: {
      border: { fg: "green" },
      label: { fg: "green", bold: true },
      focus: {
        border: { fg: "white" },
      },
    },
  });

  // ── Telemetry (upper) and status (lower) share the middle column ──────────
  const telemetryBox = blessed.box({
    parent: screen,
    label: " Telemetry ",
    left: `${commWidth}%`,
    top: 0,
    width: `${infoWidth}%`,
    height: "60%",
    border: { type: "line" },
    tags: true,
    style: {
      border: { fg: "yellow" },
      label: { fg: "yellow", bold: true },
    },
  });

  const statusBox = blessed.box({
    parent: screen,
    label: " Status ",
    left: `${commWidth}%`,
    top: "60%",
    width: `${infoWidth}%`,
    height: "40%-1",
    border: { type: "line" },
    tags: true,
    style: {
      border: { fg: "green" },
      label: { fg: "green", bold: true },
    },
  });

  // ── Logs panel ──────────────────────────────────────────────────────────────
  const logsBox = blessed.log({
    parent: screen,
    label: " Logs ",
    left: `${commWidth + infoWidth}%`,
    top: 0,
    width: `${100 - commWidth - infoWidth}%`,
    height: "100%-1",
    border: { type: "line" },
    scrollable: true,
    alwaysScroll: true,
    scrollbar: { ch: "│", style: { fg: "magenta" } },
    keys: true,
    vi: true,
    mouse: true,
    tags: true,
    style: {
      border: { fg: "magenta" },
      label: { fg: "magenta", bold: true },
    },
  });
  bindScrollKeys(logsBox, screen);

  return {
    commPanel: new CommPanel(commBox, screen),
    telemetryPanel: new InfoPanel(telemetryBox, screen),
    statusPanel: new InfoPanel(statusBox, screen),
    logsPanel: new LogsPanel(logsBox, screen),
    inputBox,
    helpBar,
    focusables: [inputBox, commBox, logsBox],
  };
}
