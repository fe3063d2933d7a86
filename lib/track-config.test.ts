import { describe, it, expect, vi, afterEach } from 'vitest';
import { evenSectors, getTrackSectors, getTrackLength, getRuntimeSettings } from './track-config';

afterEach(() => {
  vi.restoreAllMocks();
});

describe('getTrackSectors', () => {
  it('looks tracks up case-insensitively', () => {
    const sectors = getTrackSectors('Barber');
    expect(sectors).toHaveLength(6);
    expect(sectors?.[0]).toEqual({ name: 'S1.a', start: 0, end: 400 });
  });

  it('returns a copy callers can modify', () => {
    const first = getTrackSectors('cota');
    if (first) first[0].end = 1;
    expect(getTrackSectors('cota')?.[0].end).toBe(900);
  });

  it('returns null for unknown tracks', () => {
    expect(getTrackSectors('monza')).toBeNull();
  });
});

describe('getTrackLength', () => {
  it('is the end of the last sector', () => {
    expect(getTrackLength(getTrackSectors('cota') ?? [])).toBe(5513);
    expect(getTrackLength([])).toBe(0);
  });
});

describe('evenSectors', () => {
  it('divides the lap into equal named sectors', () => {
    expect(evenSectors(300, 3)).toEqual([
      { name: 'S1', start: 0, end: 100 },
      { name: 'S2', start: 100, end: 200 },
      { name: 'S3', start: 200, end: 300 },
    ]);
  });

  it('rejects non-positive counts and lengths', () => {
    expect(() => evenSectors(300, 0)).toThrow(RangeError);
    expect(() => evenSectors(300, 2.5)).toThrow(RangeError);
    expect(() => evenSectors(0, 3)).toThrow(RangeError);
  });
});

describe('getRuntimeSettings', () => {
  it('falls back to defaults', () => {
    expect(getRuntimeSettings({})).toEqual({ consistencyThresholdPct: 2, defaultTrack: 'cota' });
  });

  it('reads overrides from the environment', () => {
    const settings = getRuntimeSettings({
      LAPLENS_CONSISTENCY_THRESHOLD_PCT: '3.5',
      LAPLENS_DEFAULT_TRACK: 'Barber',
    });
    expect(settings).toEqual({ consistencyThresholdPct: 3.5, defaultTrack: 'barber' });
  });

  it('warns about and ignores invalid values', () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});
    const settings = getRuntimeSettings({
      LAPLENS_CONSISTENCY_THRESHOLD_PCT: 'fast',
      LAPLENS_DEFAULT_TRACK: 'monza',
    });
    expect(settings).toEqual({ consistencyThresholdPct: 2, defaultTrack: 'cota' });
    expect(warn).toHaveBeenCalledTimes(2);
  });
});
