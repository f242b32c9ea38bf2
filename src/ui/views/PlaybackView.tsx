/**
 * PlaybackView - progress of the download-to-playback run.
 *
 * @module ui/views/PlaybackView
 */

import React from 'react';
import { Box, Text } from 'ink';
import { colors, getSpeedColor, getStateColor, symbols } from '../theme/index.js';
import { useKeyboard } from '../hooks/useKeyboard.js';
import { ProgressBar } from '../components/ProgressBar.js';
import { streamHeadline } from '../components/StreamList.js';
import { formatBytes, formatSpeed, formatStateLabel } from '../utils/format.js';
import type { UsePlaybackResult } from '../hooks/usePlayback.js';
import { PlaybackState, type Stream } from '../../core/types.js';

export interface PlaybackViewProps {
  playback: UsePlaybackResult;
  /** Stream the playback was started for */
  stream: Stream;
  /** What is being played, e.g. "Breaking Bad S01E02" */
  label: string;
  /** Leaves the view; the playback must be inactive */
  onBack: () => void;
  onQuit: () => void;
  width?: number;
  keyboardEnabled?: boolean;
}

/**
 * Ordered steps shown as a checklist
 */
const STEPS: PlaybackState[] = [
  PlaybackState.REGISTERING,
  PlaybackState.RESOLVING_METADATA,
  PlaybackState.SELECTING_FILE,
  PlaybackState.BUFFERING,
  PlaybackState.PLAYING,
  PlaybackState.CLEANUP,
];

/**
 * How far a step is relative to the current state.
 */
export function stepStatus(step: PlaybackState, current: PlaybackState): 'done' | 'active' | 'pending' {
  if (current === PlaybackState.FINISHED) return 'done';
  const stepIndex = STEPS.indexOf(step);
  const currentIndex = STEPS.indexOf(current);
  if (currentIndex === -1) return 'pending';
  if (stepIndex < currentIndex) return 'done';
  return stepIndex === currentIndex ? 'active' : 'pending';
}

export const PlaybackView: React.FC<PlaybackViewProps> = ({
  playback,
  stream,
  label,
  onBack,
  onQuit,
  width = 80,
  keyboardEnabled = true,
}) => {
  const leave = () => {
    if (playback.active) {
      playback.abort();
    } else {
      onBack();
    }
  };

  useKeyboard({
    handlers: { b: leave, escape: leave, q: onQuit },
    enabled: keyboardEnabled,
  });

  const { state, bufferedBytes, threshold } = playback;
  const bufferProgress = threshold > 0 ? bufferedBytes / threshold : 0;

  return (
    <Box flexDirection="column" paddingX={1}>
      <Text color={colors.primary} bold>
        {label}
      </Text>
      <Text color={colors.muted} wrap="truncate">
        {streamHeadline(stream)}
      </Text>

      <Box flexDirection="column" marginY={1}>
        {STEPS.map((step) => {
          const status = stepStatus(step, state);
          const marker =
            status === 'done' ? symbols.check : status === 'active' ? symbols.selected : symbols.bullet;
          return (
            <Text key={step} color={status === 'pending' ? colors.dim : getStateColor(step)}>
              {marker} {formatStateLabel(step)}
            </Text>
          );
        })}
      </Box>

      {playback.filename && (
        <Text color={colors.muted} wrap="truncate">
          File: {playback.filename}
        </Text>
      )}

      {state === PlaybackState.BUFFERING && (
        <ProgressBar
          progress={bufferProgress}
          width={Math.min(40, Math.max(10, width - 40))}
          label={`${formatBytes(bufferedBytes)} / ${formatBytes(threshold)}`}
        />
      )}

      <Box gap={2}>
        <Text color={colors.muted}>Peers {playback.peers}</Text>
        <Text color={getSpeedColor(playback.downloadSpeed)}>
          {symbols.download} {formatSpeed(playback.downloadSpeed)}
        </Text>
      </Box>

      {playback.outcome && (
        <Text color={colors.success}>
          Player exited with code {playback.outcome.exitCode ?? 'none'} after{' '}
          {formatBytes(playback.outcome.downloadedBytes)}
        </Text>
      )}
      {playback.error && (
        <Text color={colors.error}>
          {symbols.cross} {playback.error}
        </Text>
      )}
      {!playback.active && state === PlaybackState.FAILED && !playback.error && (
        <Text color={colors.warning}>Playback stopped</Text>
      )}

      <Box marginTop={1}>
        <Text color={colors.dim}>
          {playback.active ? 'Press b to stop' : 'Press b to go back'}
        </Text>
      </Box>
    </Box>
  );
};

export default PlaybackView;
