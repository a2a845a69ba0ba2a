import { NextRequest, NextResponse } from 'next/server';
import { errorResponse } from '@/lib/http';
import { getPostureSessionService } from '@/lib/runtime';

export const runtime = 'nodejs';
export const dynamic = 'force-dynamic';

export async function POST(request: NextRequest) {
  const sessionId = request.nextUrl.searchParams.get('session_id');
  if (!sessionId) {
    return NextResponse.json({ error: 'session_id is required' }, { status: 400 });
  }

  try {
    const { statistics, saved } = await getPostureSessionService().endSession(sessionId);

    return NextResponse.json({
      status: 'success',
      message: saved ? 'Session ended and saved successfully' : 'Session ended but save failed',
      session_statistics: statistics,
      saved_to_database: saved,
    });
  } catch (error) {
    return errorResponse(error, 'Error ending posture session');
  }
}
