import { act, renderHook, waitFor } from '@testing-library/react';
import { buildReleasesUrl, useReleases } from '@/hooks/useReleases';
import { makeItem } from '../fixtures/media';

const RANGE = { from: '2024-03-01', to: '2024-03-08' };

function okResponse(body: unknown) {
  return { ok: true, status: 200, statusText: 'OK', json: () => Promise.resolve(body) };
}

function failedResponse(status: number, statusText: string, json: () => Promise<unknown>) {
  return { ok: false, status, statusText, json };
}

describe('buildReleasesUrl', () => {
  it('puts the bounds in order', () => {
    expect(buildReleasesUrl({ from: '2024-03-08', to: '2024-03-01' })).toBe(
      '/api/anilist/releases?from=2024-03-01&to=2024-03-08'
    );
  });
});

describe('useReleases', () => {
  const fetchMock = jest.fn();

  beforeEach(() => {
    fetchMock.mockReset();
    Object.defineProperty(global, 'fetch', {
      value: fetchMock,
      writable: true,
      configurable: true,
    });
  });

  it('starts idle', () => {
    const { result } = renderHook(() => useReleases());

    expect(result.current.data).toBeNull();
    expect(result.current.isLoading).toBe(false);
    expect(result.current.error).toBeNull();
    expect(fetchMock).not.toHaveBeenCalled();
  });

  it('downloads the range on demand', async () => {
    const items = [makeItem({ id: 1 }), makeItem({ id: 2 })];
    fetchMock.mockResolvedValue(okResponse(items));
    const { result } = renderHook(() => useReleases());

    act(() => {
      result.current.download(RANGE);
    });

    expect(result.current.isLoading).toBe(true);
    await waitFor(() => expect(result.current.isLoading).toBe(false));
    expect(result.current.data).toEqual(items);
    expect(result.current.error).toBeNull();
    expect(fetchMock).toHaveBeenCalledWith(
      '/api/anilist/releases?from=2024-03-01&to=2024-03-08',
      { signal: expect.any(AbortSignal) }
    );
  });

  it('keeps the previous list when a download fails', async () => {
    const items = [makeItem({ id: 1 })];
    fetchMock
      .mockResolvedValueOnce(okResponse(items))
      .mockResolvedValueOnce(
        failedResponse(502, 'Bad Gateway', () => Promise.resolve({ error: 'HTTP 500\n\nboom' }))
      );
    const { result } = renderHook(() => useReleases());

    act(() => {
      result.current.download(RANGE);
    });
    await waitFor(() => expect(result.current.data).toEqual(items));

    act(() => {
      result.current.download(RANGE);
    });
    await waitFor(() => expect(result.current.error).toBe('HTTP 500\n\nboom'));

    expect(result.current.isLoading).toBe(false);
    expect(result.current.data).toEqual(items);
  });

  it('falls back to the status text when the error body is unreadable', async () => {
    fetchMock.mockResolvedValue(
      failedResponse(502, 'Bad Gateway', () => Promise.reject(new SyntaxError('Unexpected token')))
    );
    const { result } = renderHook(() => useReleases());

    act(() => {
      result.current.download(RANGE);
    });

    await waitFor(() => expect(result.current.error).toBe('Request failed: Bad Gateway'));
  });

  it('aborts the previous download when a new one starts', async () => {
    let resolveFirst: (value: unknown) => void = () => {};
    const first = [makeItem({ id: 1, title: 'First' })];
    const second = [makeItem({ id: 2, title: 'Second' })];
    fetchMock
      .mockReturnValueOnce(
        new Promise((resolve) => {
          resolveFirst = resolve;
        })
      )
      .mockResolvedValueOnce(okResponse(second));
    const { result } = renderHook(() => useReleases());

    act(() => {
      result.current.download(RANGE);
    });
    act(() => {
      result.current.download(RANGE);
    });

    const firstSignal: AbortSignal = fetchMock.mock.calls[0][1].signal;
    expect(firstSignal.aborted).toBe(true);
    await waitFor(() => expect(result.current.data).toEqual(second));

    await act(async () => {
      resolveFirst(okResponse(first));
    });

    expect(result.current.data).toEqual(second);
  });

  it('aborts an in-flight download on unmount', () => {
    fetchMock.mockReturnValue(new Promise(() => {}));
    const { result, unmount } = renderHook(() => useReleases());

    act(() => {
      result.current.download(RANGE);
    });
    unmount();

    const signal: AbortSignal = fetchMock.mock.calls[0][1].signal;
    expect(signal.aborted).toBe(true);
  });
});
