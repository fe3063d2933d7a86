export interface Sample {
  timestamp: number;
  distance: number;
  speed: number;
  throttle: number;
  brake: number;
  steeringAngle: number;
  lateralG: number;
  longitudinalG: number;
  gear: number;
  rpm: number;
  lap: number;
  sector: number;
  latitude: number;
  longitude: number;
}

export interface SectorDefinition {
  name: string;
  start: number;
  end: number;
}

export interface SummarizeOptions {
  sectors: SectorDefinition[];
  consistencyThresholdPct?: number;
  referenceLap?: number;
}

export type PaceCategory = 'best' | 'fast' | 'medium' | 'slow' | 'unranked';

export interface LapWarning {
  kind: 'sector-mismatch';
  lapNumber: number;
  expected: number;
  actual: number;
  message: string;
}

export interface SectorSummary {
  index: number;
  sectorNumber: number;
  name: string;
  startTime: number;
  endTime: number;
  sectorTime: number;
  avgSpeed: number;
  maxSpeed: number;
  deltaToBest: number;
  isBest: boolean;
}

export interface LapSummary {
  lapNumber: number;
  startTime: number;
  endTime: number;
  lapTime: number;
  sampleCount: number;
  maxSpeed: number;
  avgSpeed: number;
  minSpeed: number;
  avgThrottle: number;
  fullThrottlePct: number;
  avgBrake: number;
  maxBrake: number;
  maxAccelG: number;
  maxDecelG: number;
  maxLateralG: number;
  sectors: SectorSummary[];
  complete: boolean;
  deltaToBest: number | null;
  deltaToPrevious: number | null;
  deltaToReference: number | null;
  isBest: boolean;
  consistent: boolean;
  pace: PaceCategory;
  warnings: LapWarning[];
}

export interface BestSector {
  index: number;
  name: string;
  lapNumber: number;
  sectorTime: number;
}

export interface ConsistencyMetrics {
  score: number; // 0-10, higher is better
  rating: string;
  stdDeviation: number;
  range: number;
  coefficientOfVariation: number;
  lapCount: number;
}

export interface LapTime {
  lapNumber: number;
  lapTime: number;
}

export type TrajectoryTrend = 'improving' | 'declining' | 'consistent' | 'insufficient-data';

export interface Stint {
  startLap: number;
  endLap: number;
  avgTime: number;
  laps: number;
}

export interface PerformanceTrajectory {
  trend: TrajectoryTrend;
  slope: number; // seconds per lap, negative when lap times fall
  improvementRate: number;
  fastestStint: Stint | null;
}

export interface BreakthroughMoment {
  lapNumber: number;
  kind: 'breakthrough' | 'best-lap';
  improvement: number;
}

export interface RiskIndex {
  score: number; // 0-10, higher is more aggressive
  rating: string;
  components: {
    brakingAggression: number;
    throttleAggression: number;
    speedVariance: number;
  } | null;
}

export interface SectorGap {
  index: number;
  name: string;
  gap: number;
}

export interface OptimalLap {
  optimalTime: number;
  actualBest: number;
  potentialGain: number;
  gapBreakdown: SectorGap[];
}

export type SectorPerformance = 'strength' | 'neutral' | 'weakness';

export interface SectorInsight {
  index: number;
  name: string;
  performance: SectorPerformance;
  consistency: 'excellent' | 'good' | 'inconsistent';
  bestTime: number;
  worstTime: number;
  avgTime: number;
  range: number;
  lapCount: number;
}

export type BrakeZone = 'none' | 'light' | 'heavy';
export type ThrottleZone = 'off' | 'partial' | 'full';

export interface BrakingZone {
  lapNumber: number;
  sector: string;
  startTime: number;
  endTime: number;
  distance: number;
  entrySpeed: number;
  exitSpeed: number;
  avgBrake: number;
  peakBrake: number;
  intensity: Exclude<BrakeZone, 'none'>;
}

export interface AccelerationZone {
  lapNumber: number;
  sector: string;
  startTime: number;
  endTime: number;
  distance: number;
  entrySpeed: number;
  exitSpeed: number;
  avgThrottle: number;
}

export interface SessionSummary {
  laps: LapSummary[];
  bestLap: LapTime | null;
  bestSectors: Array<BestSector | null>;
  theoreticalBest: number | null;
  consistency: ConsistencyMetrics;
  trajectory: PerformanceTrajectory;
  breakthrough: BreakthroughMoment | null;
  optimalLap: OptimalLap | null;
  sectorInsights: SectorInsight[];
  risk: RiskIndex;
  brakingZones: BrakingZone[];
  accelerationZones: AccelerationZone[];
  warnings: LapWarning[];
}

export interface LapRow {
  lap: number;
  lapTime: number;
  lapTimeFormatted: string;
  delta: number | null;
  deltaFormatted: string;
  consistent: boolean;
  pace: PaceCategory;
  sectorWarning: boolean;
  sectors: Array<{
    name: string;
    sectorTime: number;
    delta: number;
    deltaFormatted: string;
  }>;
}
