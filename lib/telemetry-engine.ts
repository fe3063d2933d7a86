import type {
  Sample,
  SectorDefinition,
  SummarizeOptions,
  LapSummary,
  SectorSummary,
  SessionSummary,
  BestSector,
  LapWarning,
  PaceCategory,
} from '@/types/telemetry';
import { MalformedInputError, SectorMismatchError } from '@/lib/errors';
import { scoreConsistency } from '@/lib/consistency';
import { analyzeTrajectory, describeSectors, findBreakthrough, findOptimalLap } from '@/lib/session-insights';
import {
  findAccelerationZones,
  findBrakingZones,
  scoreRisk,
  THROTTLE_FULL_THRESHOLD,
} from '@/lib/driver-inputs';
import { DEFAULT_CONSISTENCY_THRESHOLD_PCT } from '@/lib/track-config';

const FAST_PACE_RATIO = 1.02;
const MEDIUM_PACE_RATIO = 1.05;

export interface LapRun {
  lapNumber: number;
  samples: Sample[];
}

export interface SectorTiming {
  index: number;
  sectorNumber: number;
  name: string;
  startTime: number;
  endTime: number;
  sectorTime: number;
  avgSpeed: number;
  maxSpeed: number;
}

interface LapDraft {
  run: LapRun;
  lapTime: number;
  sectors: SectorTiming[];
  complete: boolean;
  warnings: LapWarning[];
}

function contiguousRuns(samples: readonly Sample[], key: (sample: Sample) => number): Sample[][] {
  const runs: Sample[][] = [];

  for (const sample of samples) {
    const current = runs[runs.length - 1];
    if (current && key(current[0]) === key(sample)) {
      current.push(sample);
    } else {
      runs.push([sample]);
    }
  }

  return runs;
}

function mean(values: number[]): number {
  return values.reduce((a, b) => a + b, 0) / values.length;
}

function elapsed(samples: readonly Sample[]): number {
  return samples[samples.length - 1].timestamp - samples[0].timestamp;
}

/**
 * Splits an ordered session into one run per lap number.
 * Throws MalformedInputError on empty input, time or lap numbers going
 * backwards, and laps too short to time.
 */
export function splitLaps(samples: readonly Sample[]): LapRun[] {
  if (samples.length === 0) {
    throw new MalformedInputError('No telemetry samples provided');
  }

  for (let i = 1; i < samples.length; i++) {
    const prev = samples[i - 1];
    const curr = samples[i];

    if (curr.timestamp < prev.timestamp) {
      throw new MalformedInputError(
        `Timestamp went backwards at sample ${i} (${prev.timestamp} -> ${curr.timestamp})`,
        curr.lap
      );
    }
    if (curr.lap < prev.lap) {
      throw new MalformedInputError(
        `Lap number decreased at sample ${i} (${prev.lap} -> ${curr.lap})`,
        curr.lap
      );
    }
  }

  return contiguousRuns(samples, (s) => s.lap).map((run) => {
    const lapNumber = run[0].lap;
    if (run.length < 2) {
      throw new MalformedInputError(
        `Lap ${lapNumber} has ${run.length} sample; at least 2 are needed to time it`,
        lapNumber
      );
    }
    return { lapNumber, samples: run };
  });
}

export function splitSectors(lap: LapRun, sectors: readonly SectorDefinition[]): SectorTiming[] {
  const runs = contiguousRuns(lap.samples, (s) => s.sector);

  if (runs.length !== sectors.length) {
    throw new SectorMismatchError(lap.lapNumber, sectors.length, runs.length);
  }

  const visited = runs.map((run) => run[0].sector);
  if (visited.some((sector, index) => sector !== index + 1)) {
    const cycle = sectors.map((_, index) => index + 1);
    throw new SectorMismatchError(
      lap.lapNumber,
      sectors.length,
      runs.length,
      `Lap ${lap.lapNumber} visits sectors ${visited.join(',')}, expected ${cycle.join(',')}`
    );
  }

  return runs.map((run, index) => {
    const speeds = run.map((s) => s.speed);
    return {
      index,
      sectorNumber: run[0].sector,
      name: sectors[index].name,
      startTime: run[0].timestamp,
      endTime: run[run.length - 1].timestamp,
      sectorTime: elapsed(run),
      avgSpeed: mean(speeds),
      maxSpeed: Math.max(...speeds),
    };
  });
}

function lapMetrics(samples: readonly Sample[]) {
  const speeds = samples.map((s) => s.speed);
  const throttles = samples.map((s) => s.throttle);
  const brakes = samples.map((s) => s.brake);
  const longitudinal = samples.map((s) => s.longitudinalG);
  const fullThrottleCount = throttles.filter((t) => t > THROTTLE_FULL_THRESHOLD).length;

  return {
    maxSpeed: Math.max(...speeds),
    avgSpeed: mean(speeds),
    minSpeed: Math.min(...speeds),
    avgThrottle: mean(throttles),
    fullThrottlePct: (fullThrottleCount / samples.length) * 100,
    avgBrake: mean(brakes),
    maxBrake: Math.max(...brakes),
    maxAccelG: Math.max(...longitudinal),
    maxDecelG: Math.min(...longitudinal),
    maxLateralG: Math.max(...samples.map((s) => Math.abs(s.lateralG))),
  };
}

function toWarning(error: SectorMismatchError): LapWarning {
  return {
    kind: 'sector-mismatch',
    lapNumber: error.lapNumber,
    expected: error.expected,
    actual: error.actual,
    message: error.message,
  };
}

function draftLap(run: LapRun, sectors: readonly SectorDefinition[]): LapDraft {
  try {
    return {
      run,
      lapTime: elapsed(run.samples),
      sectors: splitSectors(run, sectors),
      complete: true,
      warnings: [],
    };
  } catch (error) {
    if (!(error instanceof SectorMismatchError)) throw error;
    return {
      run,
      lapTime: elapsed(run.samples),
      sectors: [],
      complete: false,
      warnings: [toWarning(error)],
    };
  }
}

function findBestLap(drafts: LapDraft[]): LapDraft | null {
  let best: LapDraft | null = null;
  for (const draft of drafts) {
    if (!draft.complete) continue;
    if (!best || draft.lapTime < best.lapTime) {
      best = draft;
    }
  }
  return best;
}

function findBestSectors(drafts: LapDraft[], sectorCount: number): Array<BestSector | null> {
  const bestSectors: Array<BestSector | null> = [];

  for (let index = 0; index < sectorCount; index++) {
    let best: BestSector | null = null;
    for (const draft of drafts) {
      const sector = draft.sectors[index];
      if (!sector) continue;
      if (!best || sector.sectorTime < best.sectorTime) {
        best = {
          index,
          name: sector.name,
          lapNumber: draft.run.lapNumber,
          sectorTime: sector.sectorTime,
        };
      }
    }
    bestSectors.push(best);
  }

  return bestSectors;
}

export function categorizePace(lapTime: number, bestTime: number, isBest: boolean): PaceCategory {
  if (isBest || lapTime === bestTime) return 'best';
  if (lapTime <= bestTime * FAST_PACE_RATIO) return 'fast';
  if (lapTime <= bestTime * MEDIUM_PACE_RATIO) return 'medium';
  return 'slow';
}

export function isConsistentLap(lapTime: number, bestTime: number, thresholdPct: number): boolean {
  return Math.abs(lapTime - bestTime) <= bestTime * (thresholdPct / 100);
}

/**
 * Summarizes one vehicle's session into per-lap and per-sector records with
 * deltas to the fastest lap and to the fastest time at each sector position.
 *
 * Only laps covering every configured sector, in order, compete for best
 * lap, so a session that ends mid-lap cannot win on a short partial time.
 * Ties go to the lowest lap number. Session-level trend, sector spread and
 * driver-input analytics are derived from the same lap table. The input is
 * never mutated.
 */
export function summarizeSession(samples: readonly Sample[], options: SummarizeOptions): SessionSummary {
  const { sectors, referenceLap } = options;
  const thresholdPct = options.consistencyThresholdPct ?? DEFAULT_CONSISTENCY_THRESHOLD_PCT;

  if (sectors.length === 0) {
    throw new MalformedInputError('At least one sector definition is required');
  }
  if (!Number.isFinite(thresholdPct) || thresholdPct < 0) {
    throw new MalformedInputError(`Consistency threshold must be a non-negative number, got ${thresholdPct}`);
  }

  const drafts = splitLaps(samples).map((run) => draftLap(run, sectors));

  let referenceTime: number | null = null;
  if (referenceLap !== undefined) {
    const reference = drafts.find((d) => d.run.lapNumber === referenceLap);
    if (!reference) {
      throw new MalformedInputError(`Reference lap ${referenceLap} is not in this session`, referenceLap);
    }
    referenceTime = reference.lapTime;
  }

  const bestLap = findBestLap(drafts);
  const bestSectors = findBestSectors(drafts, sectors.length);

  const laps: LapSummary[] = drafts.map((draft, i) => {
    const isBest = bestLap !== null && draft === bestLap;
    const previous = i > 0 ? drafts[i - 1] : null;

    const sectorSummaries: SectorSummary[] = draft.sectors.map((sector) => {
      const best = bestSectors[sector.index];
      const bestTime = best ? best.sectorTime : sector.sectorTime;
      return {
        ...sector,
        deltaToBest: sector.sectorTime - bestTime,
        isBest: best !== null && best.lapNumber === draft.run.lapNumber,
      };
    });

    return {
      lapNumber: draft.run.lapNumber,
      startTime: draft.run.samples[0].timestamp,
      endTime: draft.run.samples[draft.run.samples.length - 1].timestamp,
      lapTime: draft.lapTime,
      sampleCount: draft.run.samples.length,
      ...lapMetrics(draft.run.samples),
      sectors: sectorSummaries,
      complete: draft.complete,
      deltaToBest: bestLap ? draft.lapTime - bestLap.lapTime : null,
      deltaToPrevious: previous ? draft.lapTime - previous.lapTime : null,
      deltaToReference: referenceTime !== null ? draft.lapTime - referenceTime : null,
      isBest,
      consistent: bestLap !== null && isConsistentLap(draft.lapTime, bestLap.lapTime, thresholdPct),
      pace:
        bestLap && draft.complete ? categorizePace(draft.lapTime, bestLap.lapTime, isBest) : 'unranked',
      warnings: draft.warnings,
    };
  });

  const theoreticalBest = bestSectors.reduce<number | null>(
    (sum, s) => (sum === null || s === null ? null : sum + s.sectorTime),
    0
  );

  const completeLaps = laps.filter((l) => l.complete);
  const runs = drafts.map((d) => d.run);

  return {
    laps,
    bestLap: bestLap ? { lapNumber: bestLap.run.lapNumber, lapTime: bestLap.lapTime } : null,
    bestSectors,
    theoreticalBest,
    consistency: scoreConsistency(completeLaps.map((l) => l.lapTime)),
    trajectory: analyzeTrajectory(completeLaps),
    breakthrough: findBreakthrough(completeLaps),
    optimalLap: findOptimalLap(laps, bestSectors, theoreticalBest),
    sectorInsights: describeSectors(laps),
    risk: scoreRisk(samples),
    brakingZones: findBrakingZones(runs, sectors),
    accelerationZones: findAccelerationZones(runs, sectors),
    warnings: drafts.flatMap((d) => d.warnings),
  };
}
