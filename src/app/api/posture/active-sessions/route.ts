import { NextResponse } from 'next/server';
import { errorResponse } from '@/lib/http';
import { getPostureSessionService } from '@/lib/runtime';

export const runtime = 'nodejs';
export const dynamic = 'force-dynamic';

export async function GET() {
  try {
    const active = getPostureSessionService().listActiveSessions();

    return NextResponse.json({
      status: 'success',
      count: active.length,
      active_sessions: active,
    });
  } catch (error) {
    return errorResponse(error, 'Error getting active sessions');
  }
}
