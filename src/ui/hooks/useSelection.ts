import { useState, useEffect, useCallback, useMemo } from 'react';

/**
 * Return type for the useSelection hook.
 */
export interface UseSelectionResult<T> {
  /** Currently selected item, or null if no selection */
  selected: T | null;
  /** Index of the selected item (-1 if list is empty) */
  selectedIndex: number;
  /** Select the next item (wraps to start at end) */
  selectNext: () => void;
  /** Select the previous item (wraps to end at start) */
  selectPrev: () => void;
  /** Select an item by index (clamped to valid range) */
  selectByIndex: (index: number) => void;
}

/**
 * Index after moving one step forward, wrapping at the end.
 */
export function nextIndex(current: number, length: number): number {
  if (length === 0) return -1;
  if (current === -1) return 0;
  return current >= length - 1 ? 0 : current + 1;
}

/**
 * Index after moving one step back, wrapping at the start.
 */
export function prevIndex(current: number, length: number): number {
  if (length === 0) return -1;
  if (current === -1) return length - 1;
  return current <= 0 ? length - 1 : current - 1;
}

/**
 * Index kept valid after the list changed length.
 */
export function clampIndex(current: number, length: number): number {
  if (length === 0) return -1;
  if (current === -1) return 0;
  return Math.max(0, Math.min(current, length - 1));
}

/**
 * Hook for managing list selection state.
 *
 * Provides navigation through a list with wrapping behavior and automatic
 * adjustment when the list grows or shrinks, as it does while results are
 * still arriving.
 *
 * @example
 * ```tsx
 * const { selected, selectNext, selectPrev } = useSelection(streams);
 *
 * useKeyboard({ handlers: { down: selectNext, up: selectPrev } });
 * ```
 */
export function useSelection<T>(items: readonly T[]): UseSelectionResult<T> {
  const [selectedIndex, setSelectedIndex] = useState<number>(() =>
    items.length > 0 ? 0 : -1
  );

  // Adjust selection when the list changes
  useEffect(() => {
    const clamped = clampIndex(selectedIndex, items.length);
    if (clamped !== selectedIndex) {
      setSelectedIndex(clamped);
    }
  }, [items.length, selectedIndex]);

  const selectNext = useCallback(() => {
    setSelectedIndex((current) => nextIndex(current, items.length));
  }, [items.length]);

  const selectPrev = useCallback(() => {
    setSelectedIndex((current) => prevIndex(current, items.length));
  }, [items.length]);

  const selectByIndex = useCallback(
    (index: number) => {
      setSelectedIndex(items.length === 0 ? -1 : clampIndex(index, items.length));
    },
    [items.length]
  );

  const selected = useMemo(() => {
    if (selectedIndex === -1 || selectedIndex >= items.length) {
      return null;
    }
    return items[selectedIndex];
  }, [items, selectedIndex]);

  return {
    selected,
    selectedIndex,
    selectNext,
    selectPrev,
    selectByIndex,
  };
}

export default useSelection;
