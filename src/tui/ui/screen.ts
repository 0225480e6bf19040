import blessed from "blessed";
import type { ConsoleKeyHandlers } from "../types.js";

export const HELP_TEXT =
  " {bold}Enter{/bold}: Send  {bold}Tab{/bold}: Focus  {bold}Esc{/bold}: Input" +
  "  {bold}↑↓/jk{/bold}: Scroll  {bold}Ctrl+W{/bold}: Warm Model  {bold}Ctrl+R{/bold}: Retry  {bold}Ctrl+C{/bold}: Quit";

// ─── Screen factory ───────────────────────────────────────────────────────────
export function createScreen(): blessed.Widgets.Screen {
  return blessed.screen({
    smartCSR: true,
    title: "Stratus ATC",
    fullUnicode: true,
  });
}

// ─── Global key bindings ──────────────────────────────────────────────────────
export function setupGlobalKeys(
  screen: blessed.Widgets.Screen,
  focusables: blessed.Widgets.BlessedElement[],
  inputBox: blessed.Widgets.TextareaElement,
  handlers: ConsoleKeyHandlers,
): void {
  let focusIndex = 0;

  screen.key(["C-c"], () => { handlers.onQuit(); });
  screen.key(["C-w"], () => { handlers.onForcePing(); });
  screen.key(["C-r"], () => { handlers.onRetry(); });

  // ── Tab / Shift+Tab: cycle focus ──────────────────────────────────────────
  screen.key(["tab"], () => {
    focusIndex = (focusIndex + 1) % focusables.length;
    focusables[focusIndex].focus();
    screen.render();
  });

  screen.key(["S-tab"], () => {
    focusIndex = (focusIndex - 1 + focusables.length) % focusables.length;
    focusables[focusIndex].focus();
    screen.render();
  });

  // ── Escape: return focus to input ─────────────────────────────────────────
  screen.key(["escape"], () => {
    focusIndex = 0;
    inputBox.focus();
    inputBox.readInput();
    screen.render();
  });
}
