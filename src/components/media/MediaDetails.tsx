'use client';

import { Button, CopyIcon, ExternalLinkIcon, Pill, pillVariantFor } from '@/components/ui';
import { EMPTY_DETAIL_MESSAGE, NO_DESCRIPTION_MESSAGE } from '@/config/ui';
import type { MediaItem } from '@/types/anilist';
import { UNKNOWN_LABEL, getPublicationDay } from '@/types/anilist';
import { CoverImage } from './CoverImage';

interface MediaDetailsProps {
  item: MediaItem | null;
  onCopyLink: (url: string) => void;
}

function MetaRow({ label, value }: { label: string; value: string }) {
  return (
    <div className="flex gap-1.5">
      <dt className="text-text-muted">{label}:</dt>
      <dd className="text-text-secondary">{value}</dd>
    </div>
  );
}

export function MediaDetails({ item, onCopyLink }: MediaDetailsProps) {
  const hasLink = Boolean(item?.siteUrl);

  return (
    <div className="flex h-full flex-col gap-3">
      {/* Hero */}
      <section className="flex gap-3 rounded-xl border border-border bg-bg-elevated p-3">
        <CoverImage url={item?.imageUrl ?? ''} alt={item?.title ?? 'Cover'} size="detail" />

        <div className="flex min-w-0 flex-1 flex-col gap-2">
          <h2 className="text-xl font-bold text-white break-words">
            {item ? item.title : 'Select an item'}
          </h2>

          {item?.titleNative && (
            <p className="text-sm text-text-secondary break-words">{item.titleNative}</p>
          )}

          <div className="flex flex-wrap gap-1.5">
            <Pill
              label={item ? item.mediaType : '—'}
              variant={item ? pillVariantFor(item.mediaType) : 'neutral'}
            />
            <Pill label={item ? item.country : '—'} />
            <Pill label={item ? item.language : '—'} />
          </div>

          {item && (
            <dl className="space-y-0.5 text-sm">
              <MetaRow label="Publication day" value={getPublicationDay(item)} />
              <MetaRow
                label="Country of release"
                value={`${item.country} (${item.countryCode || UNKNOWN_LABEL})`}
              />
              <MetaRow label="Main language" value={item.language} />
              <MetaRow label="Format" value={item.format} />
              <MetaRow label="Status" value={item.status} />
            </dl>
          )}

          <div className="mt-auto flex flex-wrap gap-2">
            {hasLink && item ? (
              <a
                href={item.siteUrl}
                target="_blank"
                rel="noopener noreferrer"
                className="
                  inline-flex h-9 items-center gap-2 rounded-md border border-border px-3
                  text-sm font-medium text-text-secondary
                  hover:bg-white/10 hover:text-white
                  focus:outline-none focus-visible:ring-2 focus-visible:ring-accent-blue
                "
              >
                <ExternalLinkIcon size={16} />
                Open page
              </a>
            ) : (
              <Button variant="ghost" size="sm" icon={<ExternalLinkIcon size={16} />} disabled>
                Open page
              </Button>
            )}
            <Button
              variant="ghost"
              size="sm"
              icon={<CopyIcon size={16} />}
              disabled={!hasLink}
              onClick={() => {
                if (item?.siteUrl) onCopyLink(item.siteUrl);
              }}
            >
              Copy link
            </Button>
          </div>
        </div>
      </section>

      {/* Description */}
      <section
        aria-label="Description"
        className="flex-1 overflow-y-auto rounded-xl border border-border bg-bg-elevated p-4 text-sm leading-relaxed text-text-secondary whitespace-pre-line"
      >
        {item ? item.description || NO_DESCRIPTION_MESSAGE : EMPTY_DETAIL_MESSAGE}
      </section>
    </div>
  );
}
