import type {
  BestSector,
  BreakthroughMoment,
  LapSummary,
  LapTime,
  OptimalLap,
  PerformanceTrajectory,
  SectorGap,
  SectorInsight,
  Stint,
} from '@/types/telemetry';
import { round } from '@/lib/consistency';

const MIN_LAPS_FOR_TREND = 3;
const TREND_SLOPE_THRESHOLD = 0.1; // s/lap
const STINT_LENGTH = 3;
const BREAKTHROUGH_THRESHOLD = 0.3; // s
const SECTOR_GAP_THRESHOLD = 0.05; // s
const STRENGTH_RANGE = 0.1;
const NEUTRAL_RANGE = 0.3;

function slopeOf(laps: readonly LapTime[]): number {
  const meanX = laps.reduce((sum, l) => sum + l.lapNumber, 0) / laps.length;
  const meanY = laps.reduce((sum, l) => sum + l.lapTime, 0) / laps.length;

  let covariance = 0;
  let variance = 0;
  for (const lap of laps) {
    covariance += (lap.lapNumber - meanX) * (lap.lapTime - meanY);
    variance += Math.pow(lap.lapNumber - meanX, 2);
  }

  return variance === 0 ? 0 : covariance / variance;
}

/**
 * Fastest run of `length` consecutive entries by average lap time. The
 * earliest stint wins a tie.
 */
export function findFastestStint(laps: readonly LapTime[], length = STINT_LENGTH): Stint | null {
  if (laps.length < length) return null;

  let best: Stint | null = null;
  for (let i = 0; i + length <= laps.length; i++) {
    const stint = laps.slice(i, i + length);
    const avgTime = stint.reduce((sum, l) => sum + l.lapTime, 0) / length;
    if (!best || avgTime < best.avgTime) {
      best = {
        startLap: stint[0].lapNumber,
        endLap: stint[length - 1].lapNumber,
        avgTime,
        laps: length,
      };
    }
  }

  return best;
}

/**
 * Least-squares trend of lap time against lap number. Slopes within
 * ±0.1 s/lap count as consistent.
 */
export function analyzeTrajectory(laps: readonly LapTime[]): PerformanceTrajectory {
  if (laps.length < MIN_LAPS_FOR_TREND) {
    return { trend: 'insufficient-data', slope: 0, improvementRate: 0, fastestStint: null };
  }

  const slope = slopeOf(laps);
  const trend =
    slope < -TREND_SLOPE_THRESHOLD ? 'improving' : slope > TREND_SLOPE_THRESHOLD ? 'declining' : 'consistent';

  return {
    trend,
    slope: round(slope, 3),
    improvementRate: round(Math.abs(slope), 3),
    fastestStint: findFastestStint(laps),
  };
}

// First lap to beat the one before it by more than 0.3 s, else the best lap
export function findBreakthrough(laps: readonly LapTime[]): BreakthroughMoment | null {
  if (laps.length < 2) return null;

  for (let i = 1; i < laps.length; i++) {
    const improvement = laps[i - 1].lapTime - laps[i].lapTime;
    if (improvement > BREAKTHROUGH_THRESHOLD) {
      return { lapNumber: laps[i].lapNumber, kind: 'breakthrough', improvement: round(improvement, 3) };
    }
  }

  const best = laps.reduce((a, b) => (b.lapTime < a.lapTime ? b : a));
  return { lapNumber: best.lapNumber, kind: 'best-lap', improvement: 0 };
}

/**
 * Compares the best lap with the sum of best sectors and lists the sectors
 * where the best lap lost more than 0.05 s, largest gap first.
 */
export function findOptimalLap(
  laps: readonly LapSummary[],
  bestSectors: ReadonlyArray<BestSector | null>,
  theoreticalBest: number | null
): OptimalLap | null {
  const bestLap = laps.find((l) => l.isBest);
  if (!bestLap || theoreticalBest === null) return null;

  const gapBreakdown: SectorGap[] = [];
  for (const sector of bestLap.sectors) {
    const best = bestSectors[sector.index];
    if (!best) continue;
    const gap = sector.sectorTime - best.sectorTime;
    if (gap > SECTOR_GAP_THRESHOLD) {
      gapBreakdown.push({ index: sector.index, name: sector.name, gap: round(gap, 3) });
    }
  }
  gapBreakdown.sort((a, b) => b.gap - a.gap);

  return {
    optimalTime: round(theoreticalBest, 3),
    actualBest: round(bestLap.lapTime, 3),
    potentialGain: round(bestLap.lapTime - theoreticalBest, 3),
    gapBreakdown,
  };
}

/**
 * Spread of each sector position's times across laps with a sector
 * breakdown. Widest range first.
 */
export function describeSectors(laps: readonly LapSummary[]): SectorInsight[] {
  const byIndex = new Map<number, { name: string; times: number[] }>();

  for (const lap of laps) {
    for (const sector of lap.sectors) {
      const entry = byIndex.get(sector.index) ?? { name: sector.name, times: [] };
      entry.times.push(sector.sectorTime);
      byIndex.set(sector.index, entry);
    }
  }

  const insights = [...byIndex.entries()]
    .sort(([a], [b]) => a - b)
    .map(([index, { name, times }]): SectorInsight => {
      const bestTime = Math.min(...times);
      const worstTime = Math.max(...times);
      const range = worstTime - bestTime;

      return {
        index,
        name,
        performance: range < STRENGTH_RANGE ? 'strength' : range < NEUTRAL_RANGE ? 'neutral' : 'weakness',
        consistency: range < STRENGTH_RANGE ? 'excellent' : range < NEUTRAL_RANGE ? 'good' : 'inconsistent',
        bestTime,
        worstTime,
        avgTime: round(times.reduce((a, b) => a + b, 0) / times.length, 3),
        range: round(range, 3),
        lapCount: times.length,
      };
    });

  return insights.sort((a, b) => b.range - a.range);
}
