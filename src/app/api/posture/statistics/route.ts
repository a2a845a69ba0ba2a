import { NextResponse } from 'next/server';
import { errorResponse } from '@/lib/http';
import { getPostureSessionService } from '@/lib/runtime';

export const runtime = 'nodejs';
export const dynamic = 'force-dynamic';

export async function GET() {
  try {
    const statistics = await getPostureSessionService().getOverallStatistics();
    return NextResponse.json({ status: 'success', statistics });
  } catch (error) {
    return errorResponse(error, 'Error getting posture statistics');
  }
}
