// Screen geometry shared by the renderer and the mouse mapping.

export const MIN_WIDTH = 40;
export const MIN_HEIGHT = 10;

/** Sidebar lines above the first note row: the "Notes" heading and a blank line. */
export const HEADER_HEIGHT = 2;
/** Lines per note in the sidebar: title, preview, blank. */
export const ROW_HEIGHT = 3;
/** Help line and status line at the bottom of the screen. */
export const FOOTER_HEIGHT = 2;
/** Preview lines above the note body: title, rule, blank line. */
export const PREVIEW_HEADER_HEIGHT = 3;
/** Preview lines moved per mouse wheel step. */
export const WHEEL_SCROLL_LINES = 3;

export interface Viewport {
  width: number;
  height: number;
}

export function isTooSmall(viewport: Viewport): boolean {
  return viewport.width < MIN_WIDTH || viewport.height < MIN_HEIGHT;
}

export function sidebarWidth(width: number): number {
  return Math.floor(width / 3);
}

export function bodyHeight(height: number): number {
  return height - FOOTER_HEIGHT;
}

/** Columns right of the sidebar and its divider. */
export function previewWidth(width: number): number {
  return width - sidebarWidth(width) - 1;
}

/** Lines of the note body visible in the preview; also the page size. */
export function previewBodyHeight(height: number): number {
  return Math.max(1, bodyHeight(height) - PREVIEW_HEADER_HEIGHT);
}

export function visibleRows(height: number): number {
  return Math.max(1, Math.floor((bodyHeight(height) - HEADER_HEIGHT) / ROW_HEIGHT));
}

/**
 * Index of the first note drawn in the sidebar; the list scrolls just far
 * enough to keep the selection visible.
 */
export function firstVisibleRow(selection: number, height: number): number {
  return Math.max(0, selection - visibleRows(height) + 1);
}

/**
 * Map a 0-based screen cell to a note index, or `undefined` when the cell is
 * outside the sidebar rows or past the end of the list.
 */
export function noteIndexAt(
  viewport: Viewport,
  selection: number,
  count: number,
  x: number,
  y: number
): number | undefined {
  if (x < 0 || x >= sidebarWidth(viewport.width) || y < HEADER_HEIGHT) {
    return undefined;
  }
  const row = Math.floor((y - HEADER_HEIGHT) / ROW_HEIGHT);
  if (row >= visibleRows(viewport.height)) {
    return undefined;
  }
  const index = firstVisibleRow(selection, viewport.height) + row;
  return index < count ? index : undefined;
}
