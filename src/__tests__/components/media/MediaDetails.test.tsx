import { fireEvent, render, screen } from '@testing-library/react';
import { MediaDetails } from '@/components/media/MediaDetails';
import { ImageCacheProvider } from '@/hooks/useCachedImage';
import { ImageCache } from '@/lib/image-cache';
import { makeItem } from '../../fixtures/media';

const cache = new ImageCache(() => new Promise(() => {}));

function renderDetails(item: Parameters<typeof MediaDetails>[0]['item'], onCopyLink = jest.fn()) {
  render(
    <ImageCacheProvider value={cache}>
      <MediaDetails item={item} onCopyLink={onCopyLink} />
    </ImageCacheProvider>
  );
  return onCopyLink;
}

describe('MediaDetails', () => {
  describe('without a selection', () => {
    it('shows the prompt and help text', () => {
      renderDetails(null);

      expect(screen.getByRole('heading', { name: 'Select an item' })).toBeInTheDocument();
      expect(screen.getByRole('region', { name: 'Description' })).toHaveTextContent(
        /^Click Download to fetch the last 7 days of new anime\/manga start dates\./
      );
      expect(screen.getAllByText('—')).toHaveLength(3);
      expect(screen.getByTestId('cover-placeholder')).toHaveTextContent('Cover');
    });

    it('disables both actions', () => {
      renderDetails(null);

      expect(screen.getByRole('button', { name: 'Open page' })).toBeDisabled();
      expect(screen.getByRole('button', { name: 'Copy link' })).toBeDisabled();
    });
  });

  describe('with a selection', () => {
    const item = makeItem({
      title: 'Harbor Lights',
      titleNative: 'ハーバー',
      startDate: '2024-03-05',
      format: 'TV',
      status: 'NOT_YET_RELEASED',
      description: 'A quiet town.\n\nA loud summer.',
      siteUrl: 'https://anilist.co/anime/5',
    });

    it('shows the title and facts', () => {
      renderDetails(item);

      expect(screen.getByRole('heading', { name: 'Harbor Lights' })).toBeInTheDocument();
      expect(screen.getByText('ハーバー')).toBeInTheDocument();
      expect(screen.getByText('Publication day:')).toBeInTheDocument();
      expect(screen.getByText('2024-03-05')).toBeInTheDocument();
      expect(screen.getByText('Japan (JPN)')).toBeInTheDocument();
      expect(screen.getByText('NOT_YET_RELEASED')).toBeInTheDocument();
    });

    it('shows the description', () => {
      renderDetails(item);

      expect(screen.getByRole('region', { name: 'Description' })).toHaveTextContent(
        'A quiet town. A loud summer.'
      );
    });

    it('links to the AniList page in a new tab', () => {
      renderDetails(item);

      const link = screen.getByRole('link', { name: 'Open page' });
      expect(link).toHaveAttribute('href', 'https://anilist.co/anime/5');
      expect(link).toHaveAttribute('target', '_blank');
    });

    it('copies the page link', () => {
      const onCopyLink = renderDetails(item);

      fireEvent.click(screen.getByRole('button', { name: 'Copy link' }));

      expect(onCopyLink).toHaveBeenCalledWith('https://anilist.co/anime/5');
    });

    it('falls back for a missing description and country code', () => {
      renderDetails({
        ...item,
        description: '',
        countryCode: '',
        country: 'Unknown',
        language: 'Unknown',
        startDate: null,
      });

      expect(screen.getByRole('region', { name: 'Description' })).toHaveTextContent(
        'No description provided.'
      );
      expect(screen.getByText('Unknown (Unknown)')).toBeInTheDocument();
      expect(screen.getByText('Publication day:').nextElementSibling).toHaveTextContent('Unknown');
    });

    it('disables the actions when there is no page link', () => {
      renderDetails({ ...item, siteUrl: '' });

      expect(screen.queryByRole('link', { name: 'Open page' })).not.toBeInTheDocument();
      expect(screen.getByRole('button', { name: 'Copy link' })).toBeDisabled();
    });
  });
});
