import { JSDOM } from 'jsdom';

export const MIN_PLAUSIBLE_BPM = 40;
export const MAX_PLAUSIBLE_BPM = 240;

const BPM_PATTERN = /(\d+(?:\.\d+)?)\s*BPM/gi;
const BARE_NUMBER = /\d+(?:\.\d+)?/g;
const FIRST_NUMBER = /\d+(?:\.\d+)?/;
const TEMPO_SELECTOR = '[data-tempo], .tempo, #tempo';
const HIDDEN_TAGS = 'script, style, noscript, template';

export function isPlausibleBpm(value: number): boolean {
  return Number.isFinite(value) && value >= MIN_PLAUSIBLE_BPM && value <= MAX_PLAUSIBLE_BPM;
}

function plausibleBpmMentions(text: string): number[] {
  const values: number[] = [];
  for (const match of text.matchAll(BPM_PATTERN)) {
    const value = Number(match[1]);
    if (isPlausibleBpm(value)) values.push(value);
  }
  return values;
}

function firstPlausibleNumber(text: string): number | null {
  for (const match of text.matchAll(BARE_NUMBER)) {
    const value = Number(match[0]);
    if (isPlausibleBpm(value)) return value;
  }
  return null;
}

// Only the first number counts; it is filtered, not skipped past.
function firstNumberIfPlausible(text: string | null): number | null {
  const match = text?.match(FIRST_NUMBER);
  if (!match) return null;
  const value = Number(match[0]);
  return isPlausibleBpm(value) ? value : null;
}

// Strategy 1: "<n> BPM" across the visible text. The first mention is often a genre
// average, so the second plausible one wins when there are several.
function fromFullText(document: Document): number | null {
  const values = plausibleBpmMentions(document.body?.textContent ?? '');
  if (values.length >= 2) return values[1] ?? null;
  return values[0] ?? null;
}

// Strategy 2: the element holding the first "BPM" label, then the value element right after it
function fromBpmLabel(dom: JSDOM): number | null {
  const { document, NodeFilter } = dom.window;
  if (!document.body) return null;
  const walker = document.createTreeWalker(document.body, NodeFilter.SHOW_TEXT);
  let node = walker.nextNode();
  while (node && !/BPM/i.test(node.textContent ?? '')) {
    node = walker.nextNode();
  }
  if (!node) return null;

  const label = node.parentElement;
  if (!label) return null;
  const text = label.textContent ?? '';
  const labelled = plausibleBpmMentions(text)[0];
  if (labelled !== undefined) return labelled;
  const bare = firstPlausibleNumber(text);
  if (bare !== null) return bare;

  // <dt>BPM</dt><dd>128</dd>
  const value = label.nextElementSibling;
  return value ? firstPlausibleNumber(value.textContent ?? '') : null;
}

// Strategy 3: an element marked as the tempo field
function fromTempoField(document: Document): number | null {
  const el = document.querySelector(TEMPO_SELECTOR);
  if (!el) return null;
  return firstNumberIfPlausible(el.textContent) ?? firstNumberIfPlausible(el.getAttribute('data-tempo'));
}

/**
 * Pulls a tempo out of a song page. Returns null rather than a guess when nothing in
 * [MIN_PLAUSIBLE_BPM, MAX_PLAUSIBLE_BPM] is found.
 */
export function extractBpm(html: string): number | null {
  if (!html) return null;
  const dom = new JSDOM(html);
  const { document } = dom.window;
  document.querySelectorAll(HIDDEN_TAGS).forEach((el) => el.remove());

  return fromFullText(document) ?? fromBpmLabel(dom) ?? fromTempoField(document);
}
