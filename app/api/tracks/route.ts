import { NextResponse } from 'next/server';
import { TRACK_SECTORS, getRuntimeSettings } from '@/lib/track-config';

export async function GET() {
  const { defaultTrack } = getRuntimeSettings();

  return NextResponse.json({
    defaultTrack,
    tracks: Object.entries(TRACK_SECTORS).map(([name, sectors]) => ({ name, sectors })),
  });
}
