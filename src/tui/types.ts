/** Relative widths of the comm, info and logs columns. */
export type PanelRatios = [number, number, number];

export const DEFAULT_PANEL_RATIOS: PanelRatios = [50, 25, 25];

export interface ConsoleKeyHandlers {
  onQuit: () => void;
  onForcePing: () => void;
  onRetry: () => void;
}
