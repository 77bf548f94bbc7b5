import { NextRequest, NextResponse } from 'next/server';
import { fetchImage, validateImageUrl } from '@/lib/api/images';
import { handleRouteError } from '@/lib/api/route-utils';

/**
 * GET /api/images?url=<cover url>
 * Proxies AniList cover images so the browser can read their bytes.
 */
export async function GET(request: NextRequest): Promise<NextResponse> {
  try {
    const { searchParams } = new URL(request.url);
    const imageUrl = validateImageUrl(searchParams.get('url'));
    const { body, contentType } = await fetchImage(imageUrl, request.signal);

    return new NextResponse(body, {
      headers: {
        'Content-Type': contentType,
        'Cache-Control': 'public, max-age=86400, immutable',
      },
    });
  } catch (error) {
    return handleRouteError(error, 'Image proxy', 'Failed to fetch image');
  }
}
