import { NextRequest, NextResponse } from 'next/server';
import { errorResponse, readUploadedFrame } from '@/lib/http';
import { getPostureSessionService } from '@/lib/runtime';
import { toWireMetrics } from '@/lib/stream/messages';

export const runtime = 'nodejs';
export const dynamic = 'force-dynamic';

export async function POST(request: NextRequest) {
  const sessionId = request.nextUrl.searchParams.get('session_id');
  if (!sessionId) {
    return NextResponse.json({ error: 'session_id is required' }, { status: 400 });
  }

  try {
    const service = getPostureSessionService();
    // Unknown ids are rejected before the upload is read.
    service.registry.require(sessionId, 'Please start a session first.');

    const frame = await readUploadedFrame(request);
    const { analysis, statistics } = await service.analyzeSessionFrame(sessionId, frame);

    return NextResponse.json({
      status: 'success',
      session_id: sessionId,
      posture_status: analysis.label,
      posture_score: analysis.score,
      is_good_posture: analysis.isGoodPosture,
      session_stats: statistics,
      ...(analysis.kind === 'detected'
        ? {
            metrics: toWireMetrics(analysis, { includeDistance: true }),
            landmarks: analysis.landmarks,
          }
        : {}),
    });
  } catch (error) {
    return errorResponse(error, 'Error analyzing posture frame');
  }
}
