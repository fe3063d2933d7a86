import type { Sample, SectorDefinition } from '@/types/telemetry';
import { getTrackLength } from '@/lib/track-config';

export const LAP_DISTANCE_THRESHOLD = 100;
// Lap counter value the ECU logs when it loses track of the lap
export const ERRONEOUS_LAP_NUMBER = 32768;

export interface DetectLapsOptions {
  trackLength?: number;
  threshold?: number;
}

export interface NormalizeOptions {
  assignSectors?: boolean;
}

/**
 * Numbers laps from the lap-distance channel: a new lap begins where distance
 * wraps from near the track length back to near zero.
 */
export function detectLaps(samples: readonly Sample[], options: DetectLapsOptions = {}): Sample[] {
  if (samples.length === 0) return [];

  const threshold = options.threshold ?? LAP_DISTANCE_THRESHOLD;
  const trackLength = options.trackLength ?? Math.max(...samples.map((s) => s.distance));

  let lapNumber = 1;
  const result: Sample[] = [{ ...samples[0], lap: lapNumber }];

  for (let i = 1; i < samples.length; i++) {
    const prevDistance = samples[i - 1].distance;
    const currDistance = samples[i].distance;

    if (prevDistance > trackLength - threshold && currDistance < threshold) {
      lapNumber++;
    }

    result.push({ ...samples[i], lap: lapNumber });
  }

  return result;
}

export function sectorIndexForDistance(distance: number, sectors: readonly SectorDefinition[]): number {
  if (sectors.length === 0) {
    throw new RangeError('At least one sector definition is required');
  }

  const index = sectors.findIndex((s) => distance >= s.start && distance < s.end);
  if (index !== -1) return index;

  return distance < sectors[0].start ? 0 : sectors.length - 1;
}

export function assignSectors(samples: readonly Sample[], sectors: readonly SectorDefinition[]): Sample[] {
  return samples.map((sample) => ({
    ...sample,
    sector: sectorIndexForDistance(sample.distance, sectors) + 1,
  }));
}

/**
 * Repairs lap numbering when the logger reported the erroneous lap counter, and
 * optionally rebuilds sector numbers from distance. Never mutates the input.
 */
export function normalizeSession(
  samples: readonly Sample[],
  sectors: readonly SectorDefinition[],
  options: NormalizeOptions = {}
): Sample[] {
  let result: Sample[] = samples.slice();

  if (result.some((s) => s.lap === ERRONEOUS_LAP_NUMBER)) {
    console.warn(`Lap counter reported ${ERRONEOUS_LAP_NUMBER}; deriving laps from distance`);
    const trackLength = getTrackLength(sectors);
    result = detectLaps(result, trackLength > 0 ? { trackLength } : {});
  }

  if (options.assignSectors) {
    result = assignSectors(result, sectors);
  }

  return result;
}
