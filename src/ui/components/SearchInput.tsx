import React, { useRef, useEffect } from 'react';
import { Box, Text, useInput } from 'ink';
import { colors, borders, symbols } from '../theme/index.js';

/**
 * Props for the SearchInput component.
 */
export interface SearchInputProps {
  /** Current value of the input */
  value: string;
  /** Callback fired when the value changes */
  onChange: (value: string) => void;
  /** Callback fired when Enter is pressed */
  onSubmit?: (value: string) => void;
  /** Callback fired when Escape is pressed */
  onCancel?: () => void;
  /** Placeholder text shown when input is empty */
  placeholder?: string;
  /** Width of the input box (including borders) */
  width?: number;
  /** Whether the input is focused and accepting input */
  focused?: boolean;
  /** Shows a spinner frame after the label while results arrive */
  loading?: boolean;
  /** Index into the spinner frames */
  spinnerFrame?: number;
}

/** Cursor character displayed at the end of input text */
const CURSOR_CHAR = '▌';

const LABEL = ' Search ';

/**
 * Applies one key press to the input value.
 *
 * Returns null when the key does not edit the value.
 */
export function editValue(
  value: string,
  input: string,
  key: { backspace: boolean; delete: boolean; ctrl: boolean; meta: boolean }
): string | null {
  if (key.backspace || key.delete) {
    return value.length > 0 ? value.slice(0, -1) : null;
  }
  if (key.ctrl || key.meta) {
    return null;
  }
  return input.length > 0 ? value + input : null;
}

/**
 * SearchInput component for the Marquee TUI
 *
 * A controlled, bordered query field. The label sits in the top border and
 * turns into a spinner while a search is running.
 *
 * @example
 * ```tsx
 * <SearchInput
 *   value={query}
 *   onChange={setQuery}
 *   onSubmit={search}
 *   onCancel={() => setFocused(false)}
 *   focused={focused}
 *   loading={loading}
 * />
 * ```
 *
 * Layout:
 * ```
 * ╭ Search ──────────────────────────────────╮
 * │ breaking bad▌                            │
 * ╰──────────────────────────────────────────╯
 * ```
 */
export const SearchInput: React.FC<SearchInputProps> = ({
  value,
  onChange,
  onSubmit,
  onCancel,
  placeholder = 'Title of a movie or series',
  width = 50,
  focused = false,
  loading = false,
  spinnerFrame = 0,
}) => {
  // Use refs to avoid stale closure issues in useInput callback
  const valueRef = useRef(value);
  const onChangeRef = useRef(onChange);
  const onSubmitRef = useRef(onSubmit);
  const onCancelRef = useRef(onCancel);

  useEffect(() => {
    valueRef.current = value;
  }, [value]);

  useEffect(() => {
    onChangeRef.current = onChange;
    onSubmitRef.current = onSubmit;
    onCancelRef.current = onCancel;
  }, [onChange, onSubmit, onCancel]);

  useInput(
    (input, key) => {
      if (key.return) {
        onSubmitRef.current?.(valueRef.current);
        return;
      }

      if (key.escape) {
        onCancelRef.current?.();
        return;
      }

      if (key.upArrow || key.downArrow || key.leftArrow || key.rightArrow || key.tab) {
        return;
      }

      const next = editValue(valueRef.current, input, key);
      if (next !== null) {
        valueRef.current = next; // Update immediately for fast typing
        onChangeRef.current(next);
      }
    },
    { isActive: focused }
  );

  const innerWidth = Math.max(width - 4, 1);

  const isEmpty = value.length === 0;
  const displayText = isEmpty ? placeholder : value;

  const cursorSpace = focused ? 1 : 0;
  const maxVisibleLength = innerWidth - cursorSpace;
  const visibleText =
    displayText.length > maxVisibleLength
      ? displayText.slice(displayText.length - maxVisibleLength)
      : displayText;
  const padding = ' '.repeat(Math.max(0, innerWidth - visibleText.length - cursorSpace));

  const borderColor = focused ? colors.primary : colors.muted;

  const spinner = symbols.spinner[spinnerFrame % symbols.spinner.length];
  const label = loading ? `${LABEL}${spinner} ` : LABEL;
  const topRule = borders.horizontal.repeat(Math.max(0, width - 2 - label.length));
  const bottomRule = borders.horizontal.repeat(width - 2);

  return (
    <Box flexDirection="column" width={width}>
      <Text wrap="truncate">
        <Text color={borderColor}>{borders.rounded.topLeft}</Text>
        <Text color={colors.primary} bold>{label}</Text>
        <Text color={borderColor}>
          {topRule}
          {borders.rounded.topRight}
        </Text>
      </Text>

      <Text wrap="truncate">
        <Text color={borderColor}>{borders.vertical}</Text>
        <Text color={isEmpty ? colors.muted : undefined}>
          {` ${visibleText}${focused ? CURSOR_CHAR : ''}${padding} `}
        </Text>
        <Text color={borderColor}>{borders.vertical}</Text>
      </Text>

      <Text wrap="truncate">
        <Text color={borderColor}>
          {borders.rounded.bottomLeft}
          {bottomRule}
          {borders.rounded.bottomRight}
        </Text>
      </Text>
    </Box>
  );
};

export default SearchInput;
