import { describe, it, expect } from 'vitest';
import { parseSummarizeRequest } from './request-validation';
import { InvalidRequestError } from './errors';
import type { RuntimeSettings } from './track-config';

const settings: RuntimeSettings = { consistencyThresholdPct: 2, defaultTrack: 'cota' };

const samples = [
  { timestamp: 0, lap: 1, sector: 1, speed: 140 },
  { timestamp: 1, lap: 1, sector: 1, speed: 150 },
];

describe('parseSummarizeRequest', () => {
  it('fills missing optional channels with zero', () => {
    const request = parseSummarizeRequest({ samples }, settings);

    expect(request.samples[0]).toEqual({
      timestamp: 0,
      lap: 1,
      sector: 1,
      distance: 0,
      speed: 140,
      throttle: 0,
      brake: 0,
      steeringAngle: 0,
      lateralG: 0,
      longitudinalG: 0,
      gear: 0,
      rpm: 0,
      latitude: 0,
      longitude: 0,
    });
  });

  it('uses the default track and threshold when none are given', () => {
    const request = parseSummarizeRequest({ samples }, settings);

    expect(request.sectors).toHaveLength(6);
    expect(request.sectors[5]).toEqual({ name: 'S3.b', start: 4500, end: 5513 });
    expect(request.consistencyThresholdPct).toBe(2);
    expect(request.referenceLap).toBeUndefined();
    expect(request.assignSectorsFromDistance).toBe(false);
  });

  it('prefers explicit sectors over a track name', () => {
    const request = parseSummarizeRequest(
      { samples, track: 'barber', sectors: [{ name: 'Lap', start: 0, end: 1000 }] },
      settings
    );
    expect(request.sectors).toEqual([{ name: 'Lap', start: 0, end: 1000 }]);
  });

  it('builds even sectors from a count and track length', () => {
    const request = parseSummarizeRequest({ samples, sectorCount: 4, trackLength: 2000 }, settings);
    expect(request.sectors.map((s) => s.start)).toEqual([0, 500, 1000, 1500]);
  });

  it('passes through threshold and reference lap', () => {
    const request = parseSummarizeRequest(
      { samples, consistencyThresholdPct: 5, referenceLap: 1 },
      settings
    );
    expect(request.consistencyThresholdPct).toBe(5);
    expect(request.referenceLap).toBe(1);
  });

  it('lets sector be omitted when sectors come from distance', () => {
    const request = parseSummarizeRequest(
      { samples: [{ timestamp: 0, lap: 1, distance: 50 }], assignSectorsFromDistance: true },
      settings
    );
    expect(request.samples[0].sector).toBe(0);
    expect(request.assignSectorsFromDistance).toBe(true);
  });

  it('accepts any sector number when sectors come from distance', () => {
    const request = parseSummarizeRequest(
      { samples: [{ timestamp: 0, lap: 1, sector: 0.3, distance: 50 }], assignSectorsFromDistance: true },
      settings
    );
    expect(request.samples[0].sector).toBe(0.3);
  });

  it.each([
    ['a non-object body', [], 'Request body must be a JSON object'],
    ['missing samples', {}, 'samples must be an array'],
    ['a sample without a lap', { samples: [{ timestamp: 0, sector: 1 }] }, 'samples[0].lap is required'],
    ['a sample without a sector', { samples: [{ timestamp: 0, lap: 1 }] }, 'samples[0].sector is required'],
    [
      'a non-numeric channel',
      { samples: [{ timestamp: 0, lap: 1, sector: 1, speed: 'fast' }] },
      'samples[0].speed must be a number',
    ],
    ['a zero lap number', { samples: [{ timestamp: 0, lap: 0, sector: 1 }] }, 'samples[0].lap must be a positive integer'],
    [
      'a negative lap number',
      { samples: [{ timestamp: 0, lap: -2, sector: 1 }] },
      'samples[0].lap must be a positive integer',
    ],
    [
      'a fractional lap number',
      { samples: [...samples, { timestamp: 2, lap: 1.5, sector: 1 }] },
      'samples[2].lap must be a positive integer',
    ],
    [
      'a fractional sector number',
      { samples: [{ timestamp: 0, lap: 1, sector: 0.3 }] },
      'samples[0].sector must be a positive integer',
    ],
    ['a zero sector number', { samples: [{ timestamp: 0, lap: 1, sector: 0 }] }, 'samples[0].sector must be a positive integer'],
    ['an unknown track', { samples, track: 'monza' }, 'Unknown track: monza'],
    ['empty sectors', { samples, sectors: [] }, 'sectors must be a non-empty array'],
    [
      'overlapping sectors',
      {
        samples,
        sectors: [
          { name: 'A', start: 0, end: 100 },
          { name: 'B', start: 50, end: 200 },
        ],
      },
      'sectors[1] overlaps the previous sector',
    ],
    ['a sector count without length', { samples, sectorCount: 3 }, 'trackLength is required with sectorCount'],
    [
      'a fractional sector count',
      { samples, sectorCount: 2.5, trackLength: 1000 },
      'Sector count must be a positive integer, got 2.5',
    ],
    ['a negative threshold', { samples, consistencyThresholdPct: -1 }, 'consistencyThresholdPct must not be negative'],
    [
      'a non-boolean distance flag',
      { samples, assignSectorsFromDistance: 'yes' },
      'assignSectorsFromDistance must be a boolean',
    ],
  ])('rejects %s', (_label, body, message) => {
    expect(() => parseSummarizeRequest(body, settings)).toThrow(new InvalidRequestError(message));
  });
});
