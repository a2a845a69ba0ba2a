import { NextResponse } from 'next/server';
import { errorResponse } from '@/lib/http';
import { getPostureSessionService } from '@/lib/runtime';

export const runtime = 'nodejs';

export async function POST() {
  try {
    const { sessionId, startTime } = getPostureSessionService().startSession();

    return NextResponse.json({
      status: 'success',
      session_id: sessionId,
      message: 'Posture session started successfully',
      start_time: startTime,
    });
  } catch (error) {
    return errorResponse(error, 'Error starting posture session');
  }
}
