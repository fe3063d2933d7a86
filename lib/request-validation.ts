import type { Sample, SectorDefinition } from '@/types/telemetry';
import { InvalidRequestError } from '@/lib/errors';
import { evenSectors, getTrackSectors, type RuntimeSettings } from '@/lib/track-config';

export interface SummarizeRequest {
  samples: Sample[];
  sectors: SectorDefinition[];
  consistencyThresholdPct: number;
  referenceLap?: number;
  assignSectorsFromDistance: boolean;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isFiniteNumber(value: unknown): value is number {
  return typeof value === 'number' && Number.isFinite(value);
}

function optionalNumber(body: Record<string, unknown>, key: string): number | undefined {
  const value = body[key];
  if (value === undefined || value === null) return undefined;
  if (!isFiniteNumber(value)) {
    throw new InvalidRequestError(`${key} must be a number`);
  }
  return value;
}

function parseSample(raw: unknown, index: number, requireSector: boolean): Sample {
  if (!isRecord(raw)) {
    throw new InvalidRequestError(`samples[${index}] must be an object`);
  }

  const read = (field: string, required: boolean): number => {
    const value = raw[field];
    if (value === undefined || value === null) {
      if (required) {
        throw new InvalidRequestError(`samples[${index}].${field} is required`);
      }
      return 0;
    }
    if (!isFiniteNumber(value)) {
      throw new InvalidRequestError(`samples[${index}].${field} must be a number`);
    }
    return value;
  };

  const readIndex = (field: string, required: boolean): number => {
    const value = read(field, required);
    if (required && !(Number.isInteger(value) && value >= 1)) {
      throw new InvalidRequestError(`samples[${index}].${field} must be a positive integer`);
    }
    return value;
  };

  return {
    timestamp: read('timestamp', true),
    lap: readIndex('lap', true),
    sector: readIndex('sector', requireSector),
    distance: read('distance', false),
    speed: read('speed', false),
    throttle: read('throttle', false),
    brake: read('brake', false),
    steeringAngle: read('steeringAngle', false),
    lateralG: read('lateralG', false),
    longitudinalG: read('longitudinalG', false),
    gear: read('gear', false),
    rpm: read('rpm', false),
    latitude: read('latitude', false),
    longitude: read('longitude', false),
  };
}

function parseSectorDefinitions(raw: unknown): SectorDefinition[] {
  if (!Array.isArray(raw) || raw.length === 0) {
    throw new InvalidRequestError('sectors must be a non-empty array');
  }

  const sectors = raw.map((entry: unknown, i) => {
    if (!isRecord(entry) || typeof entry.name !== 'string') {
      throw new InvalidRequestError(`sectors[${i}] must have a name`);
    }
    const { start, end } = entry;
    if (!isFiniteNumber(start) || !isFiniteNumber(end) || end <= start) {
      throw new InvalidRequestError(`sectors[${i}] must have numeric start < end`);
    }
    return { name: entry.name, start, end };
  });

  for (let i = 1; i < sectors.length; i++) {
    if (sectors[i].start < sectors[i - 1].end) {
      throw new InvalidRequestError(`sectors[${i}] overlaps the previous sector`);
    }
  }

  return sectors;
}

function resolveSectors(body: Record<string, unknown>, settings: RuntimeSettings): SectorDefinition[] {
  if (body.sectors !== undefined) {
    return parseSectorDefinitions(body.sectors);
  }

  const sectorCount = optionalNumber(body, 'sectorCount');
  if (sectorCount !== undefined) {
    const trackLength = optionalNumber(body, 'trackLength');
    if (trackLength === undefined) {
      throw new InvalidRequestError('trackLength is required with sectorCount');
    }
    try {
      return evenSectors(trackLength, sectorCount);
    } catch (error) {
      if (error instanceof RangeError) throw new InvalidRequestError(error.message);
      throw error;
    }
  }

  const track = body.track ?? settings.defaultTrack;
  if (typeof track !== 'string') {
    throw new InvalidRequestError('track must be a string');
  }
  const sectors = getTrackSectors(track);
  if (!sectors) {
    throw new InvalidRequestError(`Unknown track: ${track}`);
  }
  return sectors;
}

/**
 * Validates an untyped JSON body for the summarize route. Sectors come from,
 * in order: explicit `sectors`, `sectorCount` with `trackLength`, `track`,
 * then the configured default track.
 */
export function parseSummarizeRequest(body: unknown, settings: RuntimeSettings): SummarizeRequest {
  if (!isRecord(body)) {
    throw new InvalidRequestError('Request body must be a JSON object');
  }

  const assignFlag = body.assignSectorsFromDistance;
  if (assignFlag !== undefined && typeof assignFlag !== 'boolean') {
    throw new InvalidRequestError('assignSectorsFromDistance must be a boolean');
  }
  const assignSectorsFromDistance = assignFlag === true;

  if (!Array.isArray(body.samples)) {
    throw new InvalidRequestError('samples must be an array');
  }
  const samples = body.samples.map((raw: unknown, i) => parseSample(raw, i, !assignSectorsFromDistance));

  const consistencyThresholdPct =
    optionalNumber(body, 'consistencyThresholdPct') ?? settings.consistencyThresholdPct;
  if (consistencyThresholdPct < 0) {
    throw new InvalidRequestError('consistencyThresholdPct must not be negative');
  }

  const referenceLap = optionalNumber(body, 'referenceLap');

  return {
    samples,
    sectors: resolveSectors(body, settings),
    consistencyThresholdPct,
    referenceLap,
    assignSectorsFromDistance,
  };
}
