export const HEADER_HEIGHT = 2;
export const FOOTER_HEIGHT = 2;
export const SIDE_PANEL_WIDTH = 32;
/** Below this width the cursor-day panel is dropped and the grid takes the whole screen. */
export const SIDE_PANEL_MIN_TERMINAL_WIDTH = 90;

export interface FrameLayout {
  gridLeft: number;
  gridTop: number;
  cellWidth: number;
  cellHeight: number;
  /** 0 when the side panel is hidden. */
  sideWidth: number;
  sideLeft: number;
  footerTop: number;
}

/** `rows` is 6 for the month grid and 1 for the week view. */
export function computeLayout(width: number, height: number, rows = 6): FrameLayout {
  const sideWidth = width >= SIDE_PANEL_MIN_TERMINAL_WIDTH ? SIDE_PANEL_WIDTH : 0;
  const gridWidth = Math.max(7, width - sideWidth - (sideWidth > 0 ? 1 : 0));
  const gridHeight = Math.max(rows, height - HEADER_HEIGHT - FOOTER_HEIGHT);
  const cellWidth = Math.max(1, Math.floor(gridWidth / 7));
  const cellHeight = Math.max(1, Math.floor(gridHeight / rows));

  return {
    gridLeft: 1,
    gridTop: HEADER_HEIGHT + 1,
    cellWidth,
    cellHeight,
    sideWidth,
    sideLeft: cellWidth * 7 + 2,
    footerTop: Math.max(HEADER_HEIGHT + 7, height - FOOTER_HEIGHT + 1),
  };
}

/** How many task lines fit under the day number, keeping one for "+N more". */
export function visibleTaskLines(cellHeight: number, taskCount: number): { shown: number; overflow: number } {
  const available = Math.max(0, cellHeight - 1);
  if (taskCount <= available) return { shown: taskCount, overflow: 0 };
  const shown = Math.max(0, available - 1);
  return { shown, overflow: taskCount - shown };
}
