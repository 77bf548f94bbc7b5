import { getStatusMessage } from '@/config/ui';

describe('getStatusMessage', () => {
  it('is ready before any download', () => {
    expect(getStatusMessage({ isLoading: false, error: null, itemCount: null })).toBe('Ready.');
  });

  it('reports a running download first', () => {
    expect(getStatusMessage({ isLoading: true, error: 'old failure', itemCount: 3 })).toBe(
      'Fetching from AniList…'
    );
  });

  it('reports a failure over a previous result', () => {
    expect(getStatusMessage({ isLoading: false, error: 'HTTP 500', itemCount: 3 })).toBe(
      'Fetch failed.'
    );
  });

  it('reports the loaded count', () => {
    expect(getStatusMessage({ isLoading: false, error: null, itemCount: 0 })).toBe(
      'Loaded 0 items.'
    );
  });
});
