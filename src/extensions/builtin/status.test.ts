import { describe, expect, it } from 'vitest';
import { formatDuration, renderStatus } from './status.js';

describe('formatDuration', () => {
  it('renders seconds, minutes and hours', () => {
    expect(formatDuration(0)).toBe('0s');
    expect(formatDuration(45_900)).toBe('45s');
    expect(formatDuration(125_000)).toBe('2m 5s');
    expect(formatDuration(3_723_000)).toBe('1h 2m');
  });

  it('clamps negative durations to zero', () => {
    expect(formatDuration(-5000)).toBe('0s');
  });
});

describe('renderStatus', () => {
  it('reports a bot that is still starting', () => {
    expect(
      renderStatus({ readySince: null, countsByClient: new Map(), clients: ['A'], extensions: [], now: 0 }),
    ).toBe(['**Status:** starting', '**Tracked accounts:** 0', '- A: 0', '**Extensions:** (none)'].join('\n'));
  });

  it('lists configured clients first, then unknown ones', () => {
    const text = renderStatus({
      readySince: 1_000,
      countsByClient: new Map([['B', 1], ['A', 2]]),
      clients: ['A', 'C'],
      extensions: ['ping', 'tracking'],
      now: 91_000,
    });
    expect(text).toBe(
      [
        '**Status:** operational for 1m 30s',
        '**Tracked accounts:** 3',
        '- A: 2',
        '- C: 0',
        '- B: 1 (not configured)',
        '**Extensions:** ping, tracking',
      ].join('\n'),
    );
  });
});
