import { describe, it, expect } from 'vitest';
import { formatLapTime, formatDelta, toLapRows } from './format';
import { summarizeSession } from './telemetry-engine';
import { evenSectors } from './track-config';
import { makeLap } from '@/testing/sample-factory';

describe('formatLapTime', () => {
  it('formats minutes, seconds and milliseconds', () => {
    expect(formatLapTime(95.123)).toBe('1:35.123');
    expect(formatLapTime(19)).toBe('0:19.000');
  });

  it('carries rounding into the next minute', () => {
    expect(formatLapTime(59.9996)).toBe('1:00.000');
  });
});

describe('formatDelta', () => {
  it('signs non-zero deltas', () => {
    expect(formatDelta(1)).toBe('+1.000');
    expect(formatDelta(-0.5)).toBe('-0.500');
  });

  it('shows zero without a sign', () => {
    expect(formatDelta(0)).toBe('0.000');
    expect(formatDelta(0.0004)).toBe('0.000');
  });

  it('shows N/A for a missing delta', () => {
    expect(formatDelta(null)).toBe('N/A');
  });
});

describe('toLapRows', () => {
  it('flattens a summary into display rows', () => {
    const sectors = evenSectors(300, 2);
    const summary = summarizeSession(
      [...makeLap(1, [0, 9, 10, 20], [1, 1, 2, 2]), ...makeLap(2, [100, 108, 110, 119], [1, 1, 2, 2])],
      { sectors }
    );

    const rows = toLapRows(summary);

    expect(rows[0]).toEqual({
      lap: 1,
      lapTime: 20,
      lapTimeFormatted: '0:20.000',
      delta: 1,
      deltaFormatted: '+1.000',
      consistent: false,
      pace: 'slow',
      sectorWarning: false,
      sectors: [
        { name: 'S1', sectorTime: 9, delta: 1, deltaFormatted: '+1.000' },
        { name: 'S2', sectorTime: 10, delta: 1, deltaFormatted: '+1.000' },
      ],
    });
    expect(rows[1].deltaFormatted).toBe('0.000');
  });
});
