import { NextRequest, NextResponse } from 'next/server';
import { anilistClient } from '@/lib/api/anilist';
import { ValidationError, isAbortError } from '@/lib/errors';
import { handleRouteError, parseIsoDateParam } from '@/lib/api/route-utils';
import type { MediaItem } from '@/types/anilist';

/**
 * GET /api/anilist/releases?from=YYYY-MM-DD&to=YYYY-MM-DD
 * Anime and manga starting inside the range, newest first.
 */
export async function GET(
  request: NextRequest
): Promise<NextResponse<MediaItem[] | { error: string }>> {
  try {
    const { searchParams } = new URL(request.url);
    const from = parseIsoDateParam(searchParams.get('from'));
    const to = parseIsoDateParam(searchParams.get('to'));

    if (!from || !to) {
      throw new ValidationError('Query parameters "from" and "to" must be dates in YYYY-MM-DD form');
    }

    const items = await anilistClient.fetchReleases(
      { from, to },
      { signal: request.signal }
    );
    return NextResponse.json(items);
  } catch (error) {
    // Client went away mid-fetch; nothing to report
    if (isAbortError(error)) {
      return NextResponse.json({ error: 'Request aborted' }, { status: 499 });
    }
    return handleRouteError(error, 'AniList releases', 'Failed to fetch releases');
  }
}
