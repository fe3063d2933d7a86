import type { ConsistencyMetrics } from '@/types/telemetry';

const MIN_LAPS_FOR_SCORE = 3;

export function round(value: number, digits: number): number {
  const factor = Math.pow(10, digits);
  return Math.round(value * factor) / factor;
}

function cvToScore(cv: number): number {
  if (cv < 0.5) return 10;
  if (cv < 2) return 10 - (cv - 0.5) * (2.5 / 1.5);
  if (cv < 10) return 7.5 - (cv - 2) * (5 / 8);
  return Math.max(0, 2.5 - (cv - 10) * (2.5 / 5));
}

function scoreToRating(score: number): string {
  if (score >= 8.5) return 'Excellent';
  if (score >= 7) return 'Very Good';
  if (score >= 5.5) return 'Good';
  if (score >= 4) return 'Fair';
  return 'Needs Improvement';
}

/**
 * Scores lap-time repeatability on a 0-10 scale from the coefficient of variation.
 * Sessions with fewer than three laps are not scored.
 */
export function scoreConsistency(lapTimes: number[]): ConsistencyMetrics {
  if (lapTimes.length < MIN_LAPS_FOR_SCORE) {
    return {
      score: 0,
      rating: 'N/A',
      stdDeviation: 0,
      range: 0,
      coefficientOfVariation: 0,
      lapCount: lapTimes.length,
    };
  }

  const avgLapTime = lapTimes.reduce((a, b) => a + b, 0) / lapTimes.length;
  const variance =
    lapTimes.reduce((sum, time) => sum + Math.pow(time - avgLapTime, 2), 0) / lapTimes.length;
  const stdDeviation = Math.sqrt(variance);
  const range = Math.max(...lapTimes) - Math.min(...lapTimes);

  const cv = avgLapTime > 0 ? (stdDeviation / avgLapTime) * 100 : 0;
  const score = cvToScore(cv);

  return {
    score: round(score, 1),
    rating: scoreToRating(score),
    stdDeviation: round(stdDeviation, 3),
    range: round(range, 3),
    coefficientOfVariation: round(cv, 2),
    lapCount: lapTimes.length,
  };
}
