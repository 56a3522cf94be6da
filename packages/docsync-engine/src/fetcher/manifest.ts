/**
 * @module @docsync/engine/fetcher/manifest
 * Manifest link extraction and filename sanitization
 */

export interface ManifestLink {
  label: string;
  url: string;
}

const LINK_PATTERN = /\[([^\]]+)\]\(([^)]+)\)/g;
// eslint-disable-next-line no-control-regex
const ILLEGAL_FILENAME_CHARS = /[<>:"/\\|?*\x00-\x1f]/g;
const MAX_FILENAME_LENGTH = 100;
const ELLIPSIS = '...';

/**
 * All `[label](url)` links whose target ends in `.md`, in document order
 */
export function extractMarkdownLinks(content: string): ManifestLink[] {
  const links: ManifestLink[] = [];
  for (const match of content.matchAll(LINK_PATTERN)) {
    const label = match[1];
    const url = match[2];
    if (label === undefined || url === undefined) {continue;}
    if (url.endsWith('.md')) {
      links.push({ label, url });
    }
  }
  return links;
}

/**
 * Strip characters illegal in file names, trim spaces and dots, and cap the
 * length: anything of 100 code points or more becomes its first 97 plus "...".
 * A name already carrying that marker at exactly 100 characters is kept as is.
 */
export function sanitizeFilename(label: string): string {
  const clean = label.replace(ILLEGAL_FILENAME_CHARS, '_').replace(/^[. ]+/, '');
  const trimmed = clean.replace(/[. ]+$/, '');

  // Lengths count code points so a surrogate pair is never split
  const chars = Array.from(trimmed);
  if (chars.length >= MAX_FILENAME_LENGTH) {
    return chars.slice(0, MAX_FILENAME_LENGTH - ELLIPSIS.length).join('') + ELLIPSIS;
  }
  if (Array.from(clean).length === MAX_FILENAME_LENGTH && clean.endsWith(ELLIPSIS)) {
    return clean;
  }
  return trimmed;
}
