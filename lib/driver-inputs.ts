import type {
  AccelerationZone,
  BrakeZone,
  BrakingZone,
  RiskIndex,
  Sample,
  SectorDefinition,
  ThrottleZone,
} from '@/types/telemetry';
import { sectorIndexForDistance } from '@/lib/lap-detection';
import { round } from '@/lib/consistency';

export const BRAKE_THRESHOLD = 20;
export const HEAVY_BRAKE_THRESHOLD = 50;
export const THROTTLE_PARTIAL_THRESHOLD = 50;
export const THROTTLE_FULL_THRESHOLD = 90;

// A zone must last longer than this many samples to be reported
const MIN_ZONE_SAMPLES = 3;

const RISK_WEIGHTS = { braking: 0.4, throttle: 0.3, speed: 0.3 };

interface LapSamples {
  lapNumber: number;
  samples: readonly Sample[];
}

export function classifyBrake(brake: number): BrakeZone {
  if (brake <= BRAKE_THRESHOLD) return 'none';
  if (brake <= HEAVY_BRAKE_THRESHOLD) return 'light';
  return 'heavy';
}

export function classifyThrottle(throttle: number): ThrottleZone {
  if (throttle <= THROTTLE_PARTIAL_THRESHOLD) return 'off';
  if (throttle <= THROTTLE_FULL_THRESHOLD) return 'partial';
  return 'full';
}

function mean(values: number[]): number {
  return values.reduce((a, b) => a + b, 0) / values.length;
}

/**
 * Contiguous stretches of a lap where `inZone` holds, keeping those longer
 * than MIN_ZONE_SAMPLES. A stretch still open at the end of the lap closes there.
 */
function findZones(samples: readonly Sample[], inZone: (sample: Sample) => boolean): Sample[][] {
  const zones: Sample[][] = [];
  let zoneStartIndex = -1;

  for (let i = 0; i <= samples.length; i++) {
    const active = i < samples.length && inZone(samples[i]);

    if (active && zoneStartIndex === -1) {
      zoneStartIndex = i;
    } else if (!active && zoneStartIndex !== -1) {
      if (i - zoneStartIndex > MIN_ZONE_SAMPLES) {
        zones.push(samples.slice(zoneStartIndex, i));
      }
      zoneStartIndex = -1;
    }
  }

  return zones;
}

function zoneSector(zone: readonly Sample[], sectors: readonly SectorDefinition[]): { name: string; distance: number } {
  const distance = zone[Math.floor(zone.length / 2)].distance;
  return { name: sectors[sectorIndexForDistance(distance, sectors)].name, distance };
}

export function findBrakingZones(
  laps: readonly LapSamples[],
  sectors: readonly SectorDefinition[]
): BrakingZone[] {
  const brakingZones: BrakingZone[] = [];

  for (const lap of laps) {
    for (const zone of findZones(lap.samples, (s) => classifyBrake(s.brake) !== 'none')) {
      const { name, distance } = zoneSector(zone, sectors);
      const peakBrake = Math.max(...zone.map((s) => s.brake));

      brakingZones.push({
        lapNumber: lap.lapNumber,
        sector: name,
        startTime: zone[0].timestamp,
        endTime: zone[zone.length - 1].timestamp,
        distance,
        entrySpeed: zone[0].speed,
        exitSpeed: zone[zone.length - 1].speed,
        avgBrake: round(mean(zone.map((s) => s.brake)), 2),
        peakBrake,
        intensity: peakBrake > HEAVY_BRAKE_THRESHOLD ? 'heavy' : 'light',
      });
    }
  }

  return brakingZones;
}

export function findAccelerationZones(
  laps: readonly LapSamples[],
  sectors: readonly SectorDefinition[]
): AccelerationZone[] {
  const accelZones: AccelerationZone[] = [];

  for (const lap of laps) {
    const isAccelerating = (s: Sample) =>
      classifyThrottle(s.throttle) === 'full' && classifyBrake(s.brake) === 'none';

    for (const zone of findZones(lap.samples, isAccelerating)) {
      const { name, distance } = zoneSector(zone, sectors);

      accelZones.push({
        lapNumber: lap.lapNumber,
        sector: name,
        startTime: zone[0].timestamp,
        endTime: zone[zone.length - 1].timestamp,
        distance,
        entrySpeed: zone[0].speed,
        exitSpeed: zone[zone.length - 1].speed,
        avgThrottle: round(mean(zone.map((s) => s.throttle)), 2),
      });
    }
  }

  return accelZones;
}

function riskRating(score: number): string {
  if (score >= 8) return 'Very Aggressive';
  if (score >= 6.5) return 'Aggressive';
  if (score >= 5) return 'Balanced';
  if (score >= 3.5) return 'Conservative';
  return 'Very Conservative';
}

/**
 * 0-10 driving aggression index: share of heavy braking, share of full
 * throttle and speed variation, each scaled to 0-10 and weighted 0.4/0.3/0.3.
 */
export function scoreRisk(samples: readonly Sample[]): RiskIndex {
  if (samples.length === 0) {
    return { score: 0, rating: 'N/A', components: null };
  }

  const heavyBrakingPct =
    (samples.filter((s) => classifyBrake(s.brake) === 'heavy').length / samples.length) * 100;
  const fullThrottlePct =
    (samples.filter((s) => classifyThrottle(s.throttle) === 'full').length / samples.length) * 100;

  // Sample standard deviation
  const speeds = samples.map((s) => s.speed);
  const avgSpeed = mean(speeds);
  const speedStd =
    speeds.length > 1
      ? Math.sqrt(speeds.reduce((sum, v) => sum + Math.pow(v - avgSpeed, 2), 0) / (speeds.length - 1))
      : 0;
  const speedCv = avgSpeed > 0 ? (speedStd / avgSpeed) * 100 : 0;

  const brakingAggression = Math.min(10, heavyBrakingPct * 2);
  const throttleAggression = Math.min(10, fullThrottlePct / 5);
  const speedVariance = Math.min(10, speedCv / 2);

  const score =
    brakingAggression * RISK_WEIGHTS.braking +
    throttleAggression * RISK_WEIGHTS.throttle +
    speedVariance * RISK_WEIGHTS.speed;

  return {
    score: round(score, 1),
    rating: riskRating(score),
    components: {
      brakingAggression: round(brakingAggression, 2),
      throttleAggression: round(throttleAggression, 2),
      speedVariance: round(speedVariance, 2),
    },
  };
}
