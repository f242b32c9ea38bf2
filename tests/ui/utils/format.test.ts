import { describe, it, expect } from 'vitest';
import {
  formatBytes,
  formatSpeed,
  formatTimestamp,
  formatDate,
  truncateText,
  formatEpisodeCode,
  formatSeasonLabel,
  formatStateLabel,
} from '../../../src/ui/utils/format.js';
import { listWindow } from '../../../src/ui/utils/window.js';
import { PlaybackState } from '../../../src/core/types.js';

describe('Format Utilities', () => {
  describe('formatBytes', () => {
    it('should return "0 B" for 0', () => {
      expect(formatBytes(0)).toBe('0 B');
    });

    it('should format bytes correctly (< 1024)', () => {
      expect(formatBytes(512)).toBe('512 B');
      expect(formatBytes(1023)).toBe('1023 B');
    });

    it('should format larger units with one decimal', () => {
      expect(formatBytes(1024)).toBe('1.0 KB');
      expect(formatBytes(50 * 1024 * 1024)).toBe('50.0 MB');
      expect(formatBytes(1.5 * 1024 * 1024 * 1024)).toBe('1.5 GB');
    });
  });

  describe('formatSpeed', () => {
    it('should return "0 B/s" for 0', () => {
      expect(formatSpeed(0)).toBe('0 B/s');
    });

    it('should pick precision by magnitude', () => {
      expect(formatSpeed(1024)).toBe('1.00 KB/s');
      expect(formatSpeed(20 * 1024)).toBe('20.0 KB/s');
      expect(formatSpeed(256 * 1024)).toBe('256 KB/s');
    });
  });

  describe('formatTimestamp', () => {
    it('should format local time as HH:MM:SS', () => {
      expect(formatTimestamp(new Date(2024, 0, 1, 9, 5, 3))).toBe('09:05:03');
    });
  });

  describe('formatDate', () => {
    it('should format a date as YYYY-MM-DD', () => {
      expect(formatDate(new Date('2008-01-20T00:00:00.000Z'))).toBe('2008-01-20');
    });

    it('should return "--" for missing or invalid dates', () => {
      expect(formatDate(undefined)).toBe('--');
      expect(formatDate(new Date('not a date'))).toBe('--');
    });
  });

  describe('truncateText', () => {
    it('should leave short text alone', () => {
      expect(truncateText('Pilot', 10)).toBe('Pilot');
    });

    it('should cut long text and add an ellipsis', () => {
      expect(truncateText('Breaking Bad', 8)).toBe('Breakin…');
    });
  });

  describe('formatEpisodeCode', () => {
    it('should zero-pad season and episode', () => {
      expect(formatEpisodeCode(1, 2)).toBe('S01E02');
      expect(formatEpisodeCode(12, 105)).toBe('S12E105');
    });

    it('should mark specials', () => {
      expect(formatEpisodeCode(-1, 3)).toBe('SPE03');
    });
  });

  describe('formatSeasonLabel', () => {
    it('should label numbered seasons and specials', () => {
      expect(formatSeasonLabel(0)).toBe('Season 0');
      expect(formatSeasonLabel(4)).toBe('Season 4');
      expect(formatSeasonLabel(null)).toBe('Specials');
    });
  });

  describe('formatStateLabel', () => {
    it('should describe playback states', () => {
      expect(formatStateLabel(PlaybackState.RESOLVING_METADATA)).toBe('Resolving metadata');
      expect(formatStateLabel(PlaybackState.BUFFERING)).toBe('Buffering');
    });
  });

  describe('listWindow', () => {
    it('should show the whole list when it fits', () => {
      expect(listWindow(3, 2, 10)).toEqual({ start: 0, end: 3 });
    });

    it('should centre the selection', () => {
      expect(listWindow(100, 50, 10)).toEqual({ start: 45, end: 55 });
    });

    it('should not run past either end', () => {
      expect(listWindow(100, 1, 10)).toEqual({ start: 0, end: 10 });
      expect(listWindow(100, 99, 10)).toEqual({ start: 90, end: 100 });
    });
  });
});
