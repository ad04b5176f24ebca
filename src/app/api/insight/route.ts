import { NextRequest, NextResponse } from 'next/server';
import { parseAreaRequest } from '@/lib/analysis/request';
import { getAreaAnalyser } from '@/lib/analysis/services';
import type { AreaRequest } from '@/lib/analysis/types';
import { InvalidRequestError, isAppError } from '@/lib/errors';

export const dynamic = 'force-dynamic';

export async function GET(request: NextRequest) {
  let areaRequest: AreaRequest;
  try {
    areaRequest = parseAreaRequest(request.nextUrl.searchParams);
  } catch (error) {
    if (error instanceof InvalidRequestError) {
      return NextResponse.json(
        { error: 'Invalid request', code: error.code, details: error.issues },
        { status: 400 },
      );
    }
    throw error;
  }

  try {
    const analysis = await getAreaAnalyser()(areaRequest);
    return NextResponse.json(analysis, {
      headers: { 'Cache-Control': 'private, max-age=60' },
    });
  } catch (error) {
    console.error('[insight] Analysis failed:', error);
    if (isAppError(error)) {
      return NextResponse.json(
        { error: error.message, code: error.code, details: String(error.cause ?? error) },
        { status: 502 },
      );
    }
    return NextResponse.json(
      { error: 'Failed to analyse area', details: String(error) },
      { status: 500 },
    );
  }
}
