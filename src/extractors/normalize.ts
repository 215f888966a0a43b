export function normalizeRating(text?: string | null): number | null {
  if (!text) return null;
  const m = text.match(/\d+[.,]\d+|\d+/);
  if (!m) return null;
  const n = Number(m[0].replace(',', '.'));
  return Number.isFinite(n) ? n : null;
}

// separators the catalog puts around tag links: middle dot, em dash, hyphen
const CATEGORY_NOISE = /^[ ·—\-\n\t]+|[ ·—\-\n\t]+$/g;

export function cleanCategory(text: string): string {
  return text.replace(CATEGORY_NOISE, '');
}

export function uniqueInOrder(values: Iterable<string>): string[] {
  const seen = new Set<string>();
  const out: string[] = [];
  for (const v of values) {
    if (!v || seen.has(v)) continue;
    seen.add(v);
    out.push(v);
  }
  return out;
}
