import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { NextRequest } from 'next/server';
import { POST } from './route';

function post(body: string) {
  return new NextRequest('http://localhost/api/summarize', {
    method: 'POST',
    headers: { 'Content-Type': 'application/json' },
    body,
  });
}

function lap(lapNumber: number, timestamps: number[]) {
  return timestamps.map((timestamp) => ({ timestamp, lap: lapNumber, sector: 1, speed: 150 }));
}

const sectors = [{ name: 'Lap', start: 0, end: 5000 }];
const samples = lap(1, [0, 1]);

beforeEach(() => {
  vi.spyOn(console, 'warn').mockImplementation(() => {});
  vi.spyOn(console, 'error').mockImplementation(() => {});
});

afterEach(() => {
  vi.restoreAllMocks();
});

describe('POST /api/summarize', () => {
  it('returns the summary and display rows', async () => {
    const response = await POST(
      post(JSON.stringify({ samples: [...lap(1, [0, 10, 20]), ...lap(2, [100, 108, 119])], sectors }))
    );
    const json = await response.json();

    expect(response.status).toBe(200);
    expect(json.summary.bestLap).toEqual({ lapNumber: 2, lapTime: 19 });
    expect(json.rows.map((r: { deltaFormatted: string }) => r.deltaFormatted)).toEqual(['+1.000', '0.000']);
  });

  it('answers 422 for a session with lap numbers going backwards', async () => {
    const samples = [...lap(1, [0, 1]), ...lap(2, [2, 3]), ...lap(1, [4, 5])];
    const response = await POST(post(JSON.stringify({ samples, sectors })));

    expect(response.status).toBe(422);
    expect(await response.json()).toEqual({
      error: 'Lap number decreased at sample 4 (2 -> 1)',
      lapNumber: 1,
    });
  });

  it('answers 400 for an invalid request body', async () => {
    const response = await POST(post(JSON.stringify({ samples, track: 'monza' })));

    expect(response.status).toBe(400);
    expect(await response.json()).toEqual({ error: 'Unknown track: monza' });
  });

  it('answers 400 for unreadable JSON', async () => {
    const response = await POST(post('{"samples": ['));

    expect(response.status).toBe(400);
    expect(await response.json()).toEqual({ error: 'Request body must be valid JSON' });
  });

  it('derives sectors from distance when asked', async () => {
    const samples = [0, 1000, 2000, 3000, 4000, 5000].map((distance, i) => ({
      timestamp: i * 10,
      lap: 1,
      distance,
    }));
    const response = await POST(
      post(JSON.stringify({ samples, track: 'cota', assignSectorsFromDistance: true }))
    );
    const json = await response.json();

    expect(response.status).toBe(200);
    expect(json.summary.laps[0].complete).toBe(true);
    expect(json.summary.bestLap).toEqual({ lapNumber: 1, lapTime: 50 });
  });
});
