import { NextRequest, NextResponse } from 'next/server';
import { errorResponse } from '@/lib/http';
import { getPostureSessionService } from '@/lib/runtime';

export const runtime = 'nodejs';
export const dynamic = 'force-dynamic';

const DEFAULT_LIMIT = 10;

export async function GET(request: NextRequest) {
  const rawLimit = request.nextUrl.searchParams.get('limit');
  const limit = rawLimit === null ? DEFAULT_LIMIT : Number(rawLimit);

  if (!Number.isInteger(limit) || limit < 0) {
    return NextResponse.json({ error: 'limit must be a non-negative integer' }, { status: 400 });
  }

  try {
    const sessions = await getPostureSessionService().getHistory(limit);

    return NextResponse.json({
      status: 'success',
      count: sessions.length,
      sessions,
    });
  } catch (error) {
    return errorResponse(error, 'Error getting posture history');
  }
}
