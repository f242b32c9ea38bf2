import { describe, it, expect } from 'vitest';
import React from 'react';
import { render } from 'ink-testing-library';
import { plain } from '../../helpers/frame.js';
import { LogView } from '../../../src/ui/components/LogView.js';
import { Header } from '../../../src/ui/components/Header.js';
import type { LogEntry } from '../../../src/utils/logger.js';

function entry(level: LogEntry['level'], scope: string, message: string, second: number): LogEntry {
  return { timestamp: new Date(2024, 0, 1, 12, 0, second), level, scope, message };
}

describe('LogView', () => {
  it('should render an empty state', () => {
    const { lastFrame } = render(<LogView logs={[]} />);
    expect(plain(lastFrame())).toContain('No activity recorded');
  });

  it('should render newest entries first with level and scope', () => {
    const logs = [
      entry('info', 'services', 'Opened with 3 bootstrap trackers', 1),
      entry('warn', 'catalog', 'Search failed for series', 2),
    ];
    const { lastFrame } = render(<LogView logs={logs} />);
    const frame = plain(lastFrame());

    expect(frame).toContain('12:00:02');
    expect(frame).toContain('WRN');
    expect(frame).toContain('catalog');
    expect(frame.indexOf('Search failed for series')).toBeLessThan(
      frame.indexOf('Opened with 3 bootstrap trackers')
    );
  });

  it('should limit the number of entries', () => {
    const logs = [entry('info', 'a', 'first', 1), entry('info', 'a', 'second', 2)];
    const { lastFrame } = render(<LogView logs={logs} maxEntries={1} />);
    const frame = plain(lastFrame());

    expect(frame).toContain('second');
    expect(frame).not.toContain('first');
  });
});

describe('Header', () => {
  it('should render the version and location', () => {
    const { lastFrame } = render(<Header version="0.1.0" location="Alpha Movie" />);
    const frame = plain(lastFrame());

    expect(frame).toContain('v0.1.0');
    expect(frame).toContain('▶ Alpha Movie');
  });
});
