import React from 'react';
import { Box, Text } from 'ink';
import { colors, getProgressColor, progressChars } from '../theme/index.js';

export interface ProgressBarProps {
  /** Progress value between 0 and 1 */
  progress: number;
  /** Width of the bar in characters (default: 20) */
  width?: number;
  /** Whether to show percentage text after the bar (default: true) */
  showPercentage?: boolean;
  /** Text shown after the percentage */
  label?: string;
}

/**
 * Number of filled cells for a progress value.
 */
export function filledCells(progress: number, width: number): number {
  const clamped = Math.max(0, Math.min(1, progress));
  return Math.round(clamped * width);
}

/**
 * Visual progress indicator component
 *
 * Displays a progress bar using filled (█) and empty (░) blocks coloured by
 * how far along it is, with optional percentage and label.
 *
 * @example
 * <ProgressBar progress={0.4} width={10} label="20.0 MB / 50.0 MB" />
 * // Output: "████░░░░░░  40% 20.0 MB / 50.0 MB"
 */
export const ProgressBar: React.FC<ProgressBarProps> = ({
  progress,
  width = 20,
  showPercentage = true,
  label,
}) => {
  const clampedProgress = Math.max(0, Math.min(1, progress));
  const filledCount = filledCells(clampedProgress, width);

  // Only show 100% when truly complete
  const percentage = clampedProgress >= 1 ? 100 : Math.floor(clampedProgress * 100);

  return (
    <Box>
      <Text color={getProgressColor(clampedProgress)}>
        {progressChars.filled.repeat(filledCount)}
      </Text>
      <Text color={colors.muted}>{progressChars.empty.repeat(width - filledCount)}</Text>
      {showPercentage && (
        <Text color={colors.muted}> {percentage.toString().padStart(3)}%</Text>
      )}
      {label && <Text color={colors.text}> {label}</Text>}
    </Box>
  );
};

export default ProgressBar;
