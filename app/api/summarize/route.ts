import { NextRequest, NextResponse } from 'next/server';
import { summarizeSession } from '@/lib/telemetry-engine';
import { normalizeSession } from '@/lib/lap-detection';
import { parseSummarizeRequest } from '@/lib/request-validation';
import { getRuntimeSettings } from '@/lib/track-config';
import { toLapRows } from '@/lib/format';
import { InvalidRequestError, MalformedInputError } from '@/lib/errors';

export const dynamic = 'force-dynamic';

export async function POST(request: NextRequest) {
  let body: unknown;
  try {
    body = await request.json();
  } catch (error) {
    console.warn('Rejected summarize request with unreadable body:', error);
    return NextResponse.json({ error: 'Request body must be valid JSON' }, { status: 400 });
  }

  try {
    const settings = getRuntimeSettings();
    const parsed = parseSummarizeRequest(body, settings);

    const samples = normalizeSession(parsed.samples, parsed.sectors, {
      assignSectors: parsed.assignSectorsFromDistance,
    });

    const summary = summarizeSession(samples, {
      sectors: parsed.sectors,
      consistencyThresholdPct: parsed.consistencyThresholdPct,
      referenceLap: parsed.referenceLap,
    });

    if (summary.warnings.length > 0) {
      console.warn(
        `Sector breakdown omitted for ${summary.warnings.length} lap(s):`,
        summary.warnings.map((w) => w.message).join('; ')
      );
    }

    return NextResponse.json({
      summary,
      rows: toLapRows(summary),
    });
  } catch (error) {
    if (error instanceof InvalidRequestError) {
      return NextResponse.json({ error: error.message }, { status: 400 });
    }

    if (error instanceof MalformedInputError) {
      console.warn('Lap analysis unavailable:', error.message);
      return NextResponse.json(
        { error: error.message, lapNumber: error.lapNumber },
        { status: 422 }
      );
    }

    console.error('Summarize error:', error);
    return NextResponse.json(
      { error: error instanceof Error ? error.message : 'Failed to summarize telemetry' },
      { status: 500 }
    );
  }
}
