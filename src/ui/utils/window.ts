/**
 * Range of list rows to draw so the selected row stays visible.
 */
export interface ListWindow {
  start: number;
  end: number;
}

/**
 * Computes which slice of a list to render.
 *
 * The selection is kept in view and roughly centred; the window never runs
 * past either end of the list.
 *
 * @example
 * listWindow(100, 50, 10) // { start: 45, end: 55 }
 * listWindow(3, 0, 10)    // { start: 0, end: 3 }
 */
export function listWindow(length: number, selectedIndex: number, size: number): ListWindow {
  if (length <= size) {
    return { start: 0, end: length };
  }
  const half = Math.floor(size / 2);
  const start = Math.max(0, Math.min(selectedIndex - half, length - size));
  return { start, end: start + size };
}
