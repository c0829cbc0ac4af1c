/**
 * Text primitives shared by the rule strategies.
 *
 * All helpers are total: any string (empty, huge, non-Latin) yields a
 * well-defined result.
 */

const TERM_RE = /[\p{L}\p{N}]+(?:['’][\p{L}\p{N}]+)*/gu;
const SENTENCE_RE = /[^.!?]+[.!?]*/g;

/** Whitespace-separated words, as a reader would count them. */
export function words(text: string): string[] {
  return text.split(/\s+/).filter((w) => w.length > 0);
}

/** Lowercased letter/number runs with punctuation stripped. */
export function terms(text: string): string[] {
  return text.toLowerCase().match(TERM_RE) ?? [];
}

/** Sentences that contain at least one term. */
export function sentences(text: string): string[] {
  const parts = text.match(SENTENCE_RE) ?? [];
  return parts.map((s) => s.trim()).filter((s) => terms(s).length > 0);
}

export function termCounts(tokens: readonly string[]): Map<string, number> {
  const counts = new Map<string, number>();
  for (const t of tokens) counts.set(t, (counts.get(t) ?? 0) + 1);
  return counts;
}

/** Cosine similarity of two term-count vectors; 0 when either is empty. */
export function cosine(a: ReadonlyMap<string, number>, b: ReadonlyMap<string, number>): number {
  let dot = 0;
  let na = 0;
  let nb = 0;
  for (const [term, ca] of a) {
    na += ca * ca;
    const cb = b.get(term);
    if (cb !== undefined) dot += ca * cb;
  }
  for (const cb of b.values()) nb += cb * cb;
  if (na === 0 || nb === 0) return 0;
  return dot / Math.sqrt(na * nb);
}

/** Vowel-group syllable estimate for an English word; at least 1. */
export function countSyllables(word: string): number {
  const w = word.toLowerCase().replace(/[^a-z]/g, "");
  if (w.length === 0) return 1;
  const groups = w.match(/[aeiouy]+/g);
  let count = groups ? groups.length : 0;
  if (w.endsWith("e") && !w.endsWith("le") && count > 1) count--;
  return Math.max(1, count);
}

/** Case-insensitive substring test; `lowerText` must already be lowercased. */
export function containsPhrase(lowerText: string, phrase: string): boolean {
  return lowerText.includes(phrase.toLowerCase());
}

export function clamp01(n: number): number {
  if (!Number.isFinite(n)) return 0;
  return Math.max(0, Math.min(1, n));
}
