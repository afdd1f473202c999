import type { NormalizedKey } from '../types/index.js';

// "(feat. X)", "[ft X]", "(featuring X)" anywhere in the title
const BRACKETED_FEAT = /\s*[([]\s*(?:feat\.?|ft\.?|featuring)\s+([^)\]]+)[)\]]/i;
// "Title feat. X" without brackets, up to the end of the title
const TRAILING_FEAT = /\s+(?:feat\.?|ft\.?|featuring)\s+(.+)$/i;

function collapseWhitespace(input: string): string {
  return input.replace(/\s+/g, ' ').trim();
}

export function normalize(artist: string, title: string): NormalizedKey {
  return {
    artistNorm: collapseWhitespace(artist).toLowerCase(),
    titleNorm: collapseWhitespace(title).toLowerCase(),
  };
}

/**
 * URL-safe slug: lower-case, spaces to dashes, anything outside [a-z0-9-] dropped.
 * Diacritics are dropped rather than transliterated, so "Beyoncé" becomes "beyonc".
 */
export function slugify(text: string): string {
  return text
    .toLowerCase()
    .trim()
    .replace(/\s+/g, '-')
    .replace(/[^a-z0-9-]/g, '')
    .replace(/-{2,}/g, '-')
    .replace(/^-+|-+$/g, '');
}

export function stripFeaturing(title: string): { base: string; featured: string | null } {
  const bracketed = title.match(BRACKETED_FEAT);
  if (bracketed && bracketed.index !== undefined) {
    const base = title.slice(0, bracketed.index) + title.slice(bracketed.index + bracketed[0].length);
    return { base: collapseWhitespace(base), featured: collapseWhitespace(bracketed[1] ?? '') || null };
  }
  const trailing = title.match(TRAILING_FEAT);
  if (trailing && trailing.index !== undefined) {
    return { base: collapseWhitespace(title.slice(0, trailing.index)), featured: collapseWhitespace(trailing[1] ?? '') || null };
  }
  return { base: collapseWhitespace(title), featured: null };
}

// The plain song slug: featured-artist credit removed
export function titleSlug(title: string): string {
  return slugify(stripFeaturing(title).base);
}

export function artistSlug(artist: string): string {
  return slugify(artist);
}

/**
 * Song-slug guesses in fixed order: period-joined, double-dash, single-dash, plain.
 * "Work (feat. Drake)" gives work-featdrake, work--feat-drake, work-feat-drake, work.
 * Without a credit every entry equals the plain slug.
 */
export function slugVariants(_artist: string, title: string): string[] {
  const { base, featured } = stripFeaturing(title);
  const plain = slugify(base);
  if (!featured) return [plain, plain, plain, plain];

  const credit = slugify(featured);
  const periodJoined = `${plain}-feat${credit}`;
  const doubleDash = `${plain}--feat-${credit}`;
  const singleDash = `${plain}-feat-${credit}`;
  return [periodJoined, doubleDash, singleDash, plain];
}
