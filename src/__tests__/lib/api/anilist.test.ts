/**
 * @jest-environment node
 */
import { AniListClient } from '@/lib/api/anilist';
import { APIError, GraphQLError } from '@/lib/errors';

const ENDPOINT = 'https://graphql.example.test/';
const RANGE = { from: '2024-03-01', to: '2024-03-08' };

function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { 'Content-Type': 'application/json' },
  });
}

function pageOf(media: unknown[]): Response {
  return jsonResponse({ data: { Page: { media } } });
}

function sentVariables(call: Parameters<typeof fetch>): unknown {
  const body = call[1]?.body;
  expect(typeof body).toBe('string');
  return JSON.parse(String(body)).variables;
}

function abortableNeverEnding(_input: unknown, init?: RequestInit): Promise<Response> {
  return new Promise((_resolve, reject) => {
    init?.signal?.addEventListener('abort', () => {
      const error = new Error('This operation was aborted');
      error.name = 'AbortError';
      reject(error);
    });
  });
}

describe('AniListClient', () => {
  let fetchMock: jest.Mock<Promise<Response>, Parameters<typeof fetch>>;
  let client: AniListClient;

  beforeEach(() => {
    fetchMock = jest.fn<Promise<Response>, Parameters<typeof fetch>>();
    client = new AniListClient({ endpoint: ENDPOINT, fetchImpl: fetchMock });
  });

  describe('fetchNew', () => {
    it('posts the query with fuzzy date bounds', async () => {
      fetchMock.mockResolvedValueOnce(pageOf([]));

      await client.fetchNew('ANIME', RANGE, 40);

      expect(fetchMock).toHaveBeenCalledTimes(1);
      const [url, init] = fetchMock.mock.calls[0];
      expect(url).toBe(ENDPOINT);
      expect(init?.method).toBe('POST');
      expect(sentVariables(fetchMock.mock.calls[0])).toEqual({
        type: 'ANIME',
        startGreater: 20240301,
        startLesser: 20240308,
        perPage: 40,
      });
    });

    it('maps a complete record', async () => {
      fetchMock.mockResolvedValueOnce(
        pageOf([
          {
            id: 101,
            type: 'ANIME',
            format: 'TV',
            status: 'RELEASING',
            title: { romaji: 'Romaji Title', english: 'English Title', native: 'ネイティブ' },
            startDate: { year: 2024, month: 3, day: 5 },
            countryOfOrigin: 'JPN',
            description: 'Hello<br>World',
            siteUrl: 'https://anilist.co/anime/101',
            coverImage: {
              large: 'https://s4.anilist.co/large.jpg',
              medium: 'https://s4.anilist.co/medium.jpg',
              color: null,
            },
          },
        ])
      );

      const items = await client.fetchNew('ANIME', RANGE);

      expect(items).toEqual([
        {
          id: 101,
          mediaType: 'ANIME',
          title: 'English Title',
          titleNative: 'ネイティブ',
          imageUrl: 'https://s4.anilist.co/large.jpg',
          countryCode: 'JPN',
          country: 'Japan',
          language: 'Japanese',
          startDate: '2024-03-05',
          format: 'TV',
          status: 'RELEASING',
          description: 'Hello\nWorld',
          siteUrl: 'https://anilist.co/anime/101',
        },
      ]);
    });

    it('fills gaps in a sparse record', async () => {
      fetchMock.mockResolvedValueOnce(
        pageOf([
          {
            id: 7,
            title: { romaji: 'Only Romaji', english: null, native: null },
            startDate: { year: 2024, month: 3, day: null },
            countryOfOrigin: 'ZZZ',
            coverImage: { large: null, medium: 'https://s4.anilist.co/medium.jpg' },
          },
          {},
        ])
      );

      const [sparse, empty] = await client.fetchNew('MANGA', RANGE);

      expect(sparse).toEqual({
        id: 7,
        mediaType: 'MANGA',
        title: 'Only Romaji',
        titleNative: '',
        imageUrl: 'https://s4.anilist.co/medium.jpg',
        countryCode: 'ZZZ',
        country: 'ZZZ',
        language: 'Unknown',
        startDate: null,
        format: 'Unknown',
        status: 'Unknown',
        description: '',
        siteUrl: '',
      });
      expect(empty).toMatchObject({
        id: 0,
        title: 'Untitled',
        imageUrl: '',
        countryCode: '',
        country: 'Unknown',
        language: 'Unknown',
      });
    });

    it('returns nothing for a response without a page', async () => {
      fetchMock.mockResolvedValueOnce(jsonResponse({ data: null }));

      await expect(client.fetchNew('ANIME', RANGE)).resolves.toEqual([]);
    });

    it('raises an APIError carrying the status and body', async () => {
      fetchMock.mockResolvedValueOnce(new Response('Too Many Requests', { status: 429 }));

      const promise = client.fetchNew('ANIME', RANGE);

      await expect(promise).rejects.toBeInstanceOf(APIError);
      await expect(promise).rejects.toMatchObject({
        message: 'HTTP 429\n\nToo Many Requests',
        statusCode: 429,
      });
    });

    it('cuts long error bodies', async () => {
      fetchMock.mockResolvedValueOnce(new Response('x'.repeat(2500), { status: 500 }));

      const error = await client.fetchNew('ANIME', RANGE).catch((e: unknown) => e);

      expect(error).toBeInstanceOf(APIError);
      expect(error instanceof Error && error.message).toBe(`HTTP 500\n\n${'x'.repeat(2000)}`);
    });

    it('raises a GraphQLError for an errors array', async () => {
      const errors = [{ message: 'Invalid argument', status: 400 }];
      fetchMock.mockResolvedValueOnce(jsonResponse({ errors, data: null }));

      const promise = client.fetchNew('ANIME', RANGE);

      await expect(promise).rejects.toBeInstanceOf(GraphQLError);
      await expect(promise).rejects.toThrow(
        `AniList GraphQL error:\n${JSON.stringify(errors, null, 2)}`
      );
    });

    it('ignores an empty errors array', async () => {
      fetchMock.mockResolvedValueOnce(jsonResponse({ errors: [], data: { Page: { media: [] } } }));

      await expect(client.fetchNew('ANIME', RANGE)).resolves.toEqual([]);
    });

    it.each(['null', '42', '"text"', '[]'])(
      'raises an APIError for a JSON body of %s',
      async (body) => {
        fetchMock.mockResolvedValueOnce(new Response(body, { status: 200 }));

        const promise = client.fetchNew('ANIME', RANGE);

        await expect(promise).rejects.toBeInstanceOf(APIError);
        await expect(promise).rejects.toThrow('AniList returned an unexpected response');
      }
    );

    it('raises a GraphQLError for an errors value that is not a list', async () => {
      fetchMock.mockResolvedValueOnce(jsonResponse({ errors: 'rate limited', data: null }));

      const promise = client.fetchNew('ANIME', RANGE);

      await expect(promise).rejects.toBeInstanceOf(GraphQLError);
      await expect(promise).rejects.toThrow('AniList GraphQL error:\n"rate limited"');
    });

    it('skips media entries that are not records', async () => {
      fetchMock.mockResolvedValueOnce(
        pageOf([null, 5, { id: 3, type: 'ANIME', title: { english: 'Kept' } }])
      );

      const items = await client.fetchNew('ANIME', RANGE);

      expect(items.map((item) => item.title)).toEqual(['Kept']);
    });

    it('returns nothing when media is not a list', async () => {
      fetchMock.mockResolvedValueOnce(jsonResponse({ data: { Page: { media: 'none' } } }));

      await expect(client.fetchNew('ANIME', RANGE)).resolves.toEqual([]);
    });

    it('raises an APIError for a body that is not JSON', async () => {
      fetchMock.mockResolvedValueOnce(new Response('<html>', { status: 200 }));

      await expect(client.fetchNew('ANIME', RANGE)).rejects.toThrow(
        'AniList returned a response that is not valid JSON'
      );
    });

    it('wraps transport failures', async () => {
      fetchMock.mockRejectedValueOnce(new TypeError('fetch failed'));

      const promise = client.fetchNew('ANIME', RANGE);

      await expect(promise).rejects.toBeInstanceOf(APIError);
      await expect(promise).rejects.toThrow('AniList request failed: fetch failed');
    });

    it('times out a request that never answers', async () => {
      const slowClient = new AniListClient({
        endpoint: ENDPOINT,
        fetchImpl: fetchMock,
        timeoutMs: 10,
      });
      fetchMock.mockImplementation(abortableNeverEnding);

      const promise = slowClient.fetchNew('ANIME', RANGE);

      await expect(promise).rejects.toMatchObject({
        message: 'AniList request timed out after 10 ms',
        statusCode: 504,
      });
    });
  });

  describe('fetchReleases', () => {
    it('queries anime then manga and merges the results', async () => {
      fetchMock
        .mockResolvedValueOnce(
          pageOf([
            { id: 1, type: 'ANIME', title: { english: 'Anime One' }, startDate: { year: 2024, month: 3, day: 2 } },
            { id: 1, type: 'ANIME', title: { english: 'Anime One v2' }, startDate: { year: 2024, month: 3, day: 2 } },
          ])
        )
        .mockResolvedValueOnce(
          pageOf([
            { id: 1, type: 'MANGA', title: { english: 'Manga One' }, startDate: { year: 2024, month: 3, day: 4 } },
          ])
        );

      const items = await client.fetchReleases(RANGE);

      expect(items.map((item) => `${item.mediaType}:${item.title}`)).toEqual([
        'MANGA:Manga One',
        'ANIME:Anime One v2',
      ]);
      expect(fetchMock).toHaveBeenCalledTimes(2);
      expect(sentVariables(fetchMock.mock.calls[0])).toMatchObject({ type: 'ANIME' });
      expect(sentVariables(fetchMock.mock.calls[1])).toMatchObject({ type: 'MANGA' });
    });

    it('swaps an inverted range before querying', async () => {
      fetchMock.mockImplementation(() => Promise.resolve(pageOf([])));

      await client.fetchReleases({ from: '2024-03-08', to: '2024-03-01' });

      expect(sentVariables(fetchMock.mock.calls[0])).toMatchObject({
        startGreater: 20240301,
        startLesser: 20240308,
      });
    });

    it('returns no partial results when the second query fails', async () => {
      fetchMock
        .mockResolvedValueOnce(pageOf([{ id: 1, type: 'ANIME', title: { english: 'Anime One' } }]))
        .mockResolvedValueOnce(new Response('Server Error', { status: 500 }));

      await expect(client.fetchReleases(RANGE)).rejects.toThrow('HTTP 500\n\nServer Error');
    });

    it('does not query once already aborted', async () => {
      const controller = new AbortController();
      controller.abort();

      await expect(
        client.fetchReleases(RANGE, { signal: controller.signal })
      ).rejects.toMatchObject({ name: 'AbortError' });
      expect(fetchMock).not.toHaveBeenCalled();
    });

    it('stops between queries when aborted', async () => {
      const controller = new AbortController();
      fetchMock.mockImplementationOnce(() => {
        controller.abort();
        return Promise.resolve(pageOf([]));
      });

      await expect(
        client.fetchReleases(RANGE, { signal: controller.signal })
      ).rejects.toMatchObject({ name: 'AbortError' });
      expect(fetchMock).toHaveBeenCalledTimes(1);
    });

    it('cancels an in-flight query', async () => {
      const controller = new AbortController();
      fetchMock.mockImplementation(abortableNeverEnding);

      const promise = client.fetchReleases(RANGE, { signal: controller.signal });
      controller.abort();

      await expect(promise).rejects.toMatchObject({ name: 'AbortError' });
    });
  });
});
