import { NextRequest, NextResponse } from 'next/server';
import { errorResponse, readUploadedFrame } from '@/lib/http';
import { getPostureSessionService } from '@/lib/runtime';
import { toWireMetrics } from '@/lib/stream/messages';

export const runtime = 'nodejs';
export const dynamic = 'force-dynamic';

// Single-image analysis; nothing is recorded against a session.
export async function POST(request: NextRequest) {
  try {
    const frame = await readUploadedFrame(request);
    const analysis = await getPostureSessionService().quickAnalyze(frame);

    return NextResponse.json({
      status: 'success',
      posture_status: analysis.label,
      posture_score: analysis.score,
      is_good_posture: analysis.isGoodPosture,
      ...(analysis.kind === 'detected'
        ? { metrics: toWireMetrics(analysis, { includeDistance: true }) }
        : {}),
    });
  } catch (error) {
    return errorResponse(error, 'Error in quick posture analysis');
  }
}
