/**
 * packages/core/src/layout/textMeasure.ts: Text measurement in terminal cells.
 *
 * Width rules:
 *   - ASCII printable: 1 cell
 *   - ASCII control: 0 cells
 *   - Combining marks: 0 cells (merge with base)
 *   - East Asian wide / fullwidth: 2 cells
 *   - Emoji-presented clusters: 2 cells
 *
 * Grapheme clusters come from `Intl.Segmenter`; tabs are not expanded.
 */

/** Maximum number of cached text measurements before eviction. */
const TEXT_CACHE_MAX_SIZE = 4096;
/** Strings longer than this (UTF-16 code units) are measured but never cached. */
const TEXT_CACHE_MAX_KEY_LENGTH = 96;

const textWidthCache = new Map<string, number>();
const graphemeSegmenter = new Intl.Segmenter(undefined, { granularity: "grapheme" });

const EMOJI_PRESENTATION_RE = /\p{Emoji_Presentation}/u;
const EXTENDED_PICTOGRAPHIC_RE = /\p{Extended_Pictographic}/u;
const ALL_MARKS_RE = /^\p{M}+$/u;
const VARIATION_SELECTOR_16 = "\ufe0f";

/** [start, end] inclusive scalar ranges rendered two cells wide. */
const WIDE_RANGES: readonly (readonly [number, number])[] = [
  [0x1100, 0x115f],
  [0x2e80, 0x303e],
  [0x3041, 0x33ff],
  [0x3400, 0x4dbf],
  [0x4e00, 0x9fff],
  [0xa000, 0xa4cf],
  [0xac00, 0xd7a3],
  [0xf900, 0xfaff],
  [0xfe30, 0xfe4f],
  [0xff00, 0xff60],
  [0xffe0, 0xffe6],
  [0x20000, 0x2fffd],
  [0x30000, 0x3fffd],
];

function isWideScalar(scalar: number): boolean {
  for (const [start, end] of WIDE_RANGES) {
    if (scalar < start) return false;
    if (scalar <= end) return true;
  }
  return false;
}

function isAsciiControl(scalar: number): boolean {
  return scalar < 0x20 || scalar === 0x7f;
}

function clusterWidth(cluster: string): 0 | 1 | 2 {
  const scalar = cluster.codePointAt(0) ?? 0;
  if (isAsciiControl(scalar)) return 0;
  if (ALL_MARKS_RE.test(cluster)) return 0;
  if (EMOJI_PRESENTATION_RE.test(cluster)) return 2;
  if (EXTENDED_PICTOGRAPHIC_RE.test(cluster) && cluster.includes(VARIATION_SELECTOR_16)) return 2;
  return isWideScalar(scalar) ? 2 : 1;
}

function measureAsciiOnly(text: string): number | null {
  let total = 0;
  for (let i = 0; i < text.length; i++) {
    const code = text.charCodeAt(i);
    if (code >= 0x80) return null;
    if (isAsciiControl(code)) continue;
    total++;
  }
  return total;
}

function measureUncached(text: string): number {
  let total = 0;
  for (const { segment } of graphemeSegmenter.segment(text)) {
    total += clusterWidth(segment);
  }
  return total;
}

export type GraphemeCell = Readonly<{ segment: string; width: 0 | 1 | 2 }>;

/** Split `text` into grapheme clusters with their cell widths. */
export function segmentGraphemes(text: string): readonly GraphemeCell[] {
  const out: GraphemeCell[] = [];
  for (const { segment } of graphemeSegmenter.segment(text)) {
    out.push({ segment, width: clusterWidth(segment) });
  }
  return out;
}

/** Clear the text measurement cache. */
export function clearTextMeasureCache(): void {
  textWidthCache.clear();
}

export function getTextMeasureCacheSize(): number {
  return textWidthCache.size;
}

/**
 * Display width of `text` in terminal cells.
 * Short strings are cached; the oldest entry is evicted once the cache is full.
 */
export function measureTextCells(text: string): number {
  if (text.length === 0) return 0;

  const cacheable = text.length <= TEXT_CACHE_MAX_KEY_LENGTH;
  if (cacheable) {
    const cached = textWidthCache.get(text);
    if (cached !== undefined) return cached;
  }

  const width = measureAsciiOnly(text) ?? measureUncached(text);

  if (cacheable) {
    if (textWidthCache.size >= TEXT_CACHE_MAX_SIZE) {
      const oldest = textWidthCache.keys().next();
      if (oldest.done !== true) textWidthCache.delete(oldest.value);
    }
    textWidthCache.set(text, width);
  }

  return width;
}

/**
 * Truncate text to fit within `maxWidth` cells, appending "…" when cut.
 *
 * @example
 * ```ts
 * truncateWithEllipsis("Mark unread", 6) // "Mark …"
 * ```
 */
export function truncateWithEllipsis(text: string, maxWidth: number): string {
  if (measureTextCells(text) <= maxWidth) return text;
  if (maxWidth <= 0) return "";
  if (maxWidth === 1) return "…";

  const targetWidth = maxWidth - 1;
  let used = 0;
  let end = 0;
  for (const { segment, index } of graphemeSegmenter.segment(text)) {
    const w = clusterWidth(segment);
    if (used + w > targetWidth) break;
    used += w;
    end = index + segment.length;
  }
  return `${text.slice(0, end)}…`;
}
