import type { SectorDefinition } from '@/types/telemetry';

// Distances in metres from the start/finish line
export const TRACK_SECTORS: Record<string, SectorDefinition[]> = {
  barber: [
    { name: 'S1.a', start: 0, end: 400 },
    { name: 'S1.b', start: 400, end: 800 },
    { name: 'S2.a', start: 800, end: 1200 },
    { name: 'S2.b', start: 1200, end: 1600 },
    { name: 'S3.a', start: 1600, end: 2000 },
    { name: 'S3.b', start: 2000, end: 2400 },
  ],
  cota: [
    { name: 'S1.a', start: 0, end: 900 },
    { name: 'S1.b', start: 900, end: 1800 },
    { name: 'S2.a', start: 1800, end: 2700 },
    { name: 'S2.b', start: 2700, end: 3600 },
    { name: 'S3.a', start: 3600, end: 4500 },
    { name: 'S3.b', start: 4500, end: 5513 },
  ],
};

export const DEFAULT_CONSISTENCY_THRESHOLD_PCT = 2;
export const DEFAULT_TRACK = 'cota';

export interface RuntimeSettings {
  consistencyThresholdPct: number;
  defaultTrack: string;
}

export function getTrackSectors(trackName: string): SectorDefinition[] | null {
  const sectors = TRACK_SECTORS[trackName.toLowerCase()];
  return sectors ? sectors.map((s) => ({ ...s })) : null;
}

export function getTrackLength(sectors: readonly SectorDefinition[]): number {
  return sectors.length > 0 ? sectors[sectors.length - 1].end : 0;
}

/**
 * Splits a lap of `trackLength` metres into `count` equal sectors named S1..Sn.
 */
export function evenSectors(trackLength: number, count: number): SectorDefinition[] {
  if (!Number.isInteger(count) || count < 1) {
    throw new RangeError(`Sector count must be a positive integer, got ${count}`);
  }
  if (!(trackLength > 0)) {
    throw new RangeError(`Track length must be positive, got ${trackLength}`);
  }

  const width = trackLength / count;
  return Array.from({ length: count }, (_, i) => ({
    name: `S${i + 1}`,
    start: i * width,
    end: i === count - 1 ? trackLength : (i + 1) * width,
  }));
}

export function getRuntimeSettings(
  env: Record<string, string | undefined> = process.env
): RuntimeSettings {
  let consistencyThresholdPct = DEFAULT_CONSISTENCY_THRESHOLD_PCT;
  const rawThreshold = env.LAPLENS_CONSISTENCY_THRESHOLD_PCT;

  if (rawThreshold !== undefined && rawThreshold !== '') {
    const parsed = Number(rawThreshold);
    if (Number.isFinite(parsed) && parsed >= 0) {
      consistencyThresholdPct = parsed;
    } else {
      console.warn(
        `Ignoring LAPLENS_CONSISTENCY_THRESHOLD_PCT=${rawThreshold}, using ${DEFAULT_CONSISTENCY_THRESHOLD_PCT}`
      );
    }
  }

  const rawTrack = env.LAPLENS_DEFAULT_TRACK?.toLowerCase();
  let defaultTrack = DEFAULT_TRACK;
  if (rawTrack) {
    if (TRACK_SECTORS[rawTrack]) {
      defaultTrack = rawTrack;
    } else {
      console.warn(`Unknown LAPLENS_DEFAULT_TRACK=${rawTrack}, using ${DEFAULT_TRACK}`);
    }
  }

  return { consistencyThresholdPct, defaultTrack };
}
