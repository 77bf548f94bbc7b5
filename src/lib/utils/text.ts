const HTML_ENTITIES: ReadonlyArray<[string, string]> = [
  ['&amp;', '&'],
  ['&lt;', '<'],
  ['&gt;', '>'],
  ['&quot;', '"'],
  ['&#039;', "'"],
];

/**
 * Turn an AniList description into plain text.
 * Line breaks and paragraphs become newlines; other markup is dropped.
 */
export function cleanDescription(html: string | null | undefined): string {
  if (!html) return '';

  let text = html.replace(/\r/g, '');
  text = text.replace(/<br\s*\/?>/gi, '\n');
  text = text.replace(/<\/p\s*>/gi, '\n\n');
  text = text.replace(/<[^>]+>/g, '');

  for (const [entity, char] of HTML_ENTITIES) {
    text = text.split(entity).join(char);
  }

  return text.replace(/\n{3,}/g, '\n\n').trim();
}

/**
 * Cut a string to a maximum length for error messages.
 */
export function truncate(text: string, maxLength: number): string {
  return text.length > maxLength ? text.slice(0, maxLength) : text;
}
