import type { LapRow, SessionSummary } from '@/types/telemetry';

export function formatLapTime(timeInSeconds: number): string {
  const totalMs = Math.round(timeInSeconds * 1000);
  const minutes = Math.floor(totalMs / 60000);
  const seconds = Math.floor((totalMs % 60000) / 1000);
  const milliseconds = totalMs % 1000;

  return `${minutes}:${seconds.toString().padStart(2, '0')}.${milliseconds.toString().padStart(3, '0')}`;
}

export function formatDelta(delta: number | null): string {
  if (delta === null) return 'N/A';
  const rounded = Math.round(delta * 1000) / 1000;
  if (rounded === 0) return '0.000';
  return `${rounded > 0 ? '+' : '-'}${Math.abs(rounded).toFixed(3)}`;
}

// One row per lap, shaped for a table or chart layer
export function toLapRows(summary: SessionSummary): LapRow[] {
  return summary.laps.map((lap) => ({
    lap: lap.lapNumber,
    lapTime: lap.lapTime,
    lapTimeFormatted: formatLapTime(lap.lapTime),
    delta: lap.deltaToBest,
    deltaFormatted: formatDelta(lap.deltaToBest),
    consistent: lap.consistent,
    pace: lap.pace,
    sectorWarning: lap.warnings.length > 0,
    sectors: lap.sectors.map((sector) => ({
      name: sector.name,
      sectorTime: sector.sectorTime,
      delta: sector.deltaToBest,
      deltaFormatted: formatDelta(sector.deltaToBest),
    })),
  }));
}
