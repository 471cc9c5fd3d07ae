/**
 * Boundary tables for the chunking engine.
 *
 * Paragraph and sentence breaks are located once per text and mapped onto
 * token ends, then folded into prefix/suffix tables so every chunk decision
 * is a constant-time lookup.
 */

const PARAGRAPH_BREAK = /\n[ \t]*\n\s*/g;
const SENTENCE_BREAK = /[.!?]["'”’)\]]*(\s+)/g;

export const NO_BREAK = 0;
export const SENTENCE = 1;
export const PARAGRAPH = 2;

export type BreakStrength = typeof NO_BREAK | typeof SENTENCE | typeof PARAGRAPH;

/** Whitespace run after a break, as a character interval [start, end]. */
interface BreakInterval {
  start: number;
  end: number;
  strength: BreakStrength;
}

export interface BoundaryTable {
  /** Token count */
  readonly size: number;
  /** Strength of a break after `e` tokens, for e in 0..size */
  strengthAt(e: number): BreakStrength;
  /** Largest p <= e with a paragraph break, or -1 */
  lastParagraph(e: number): number;
  /** Largest p <= e with any break, or -1 */
  lastBreak(e: number): number;
  /** Smallest p >= e with any break, or -1 */
  nextBreak(e: number): number;
}

function collectIntervals(text: string): BreakInterval[] {
  const intervals: BreakInterval[] = [];
  for (const match of text.matchAll(PARAGRAPH_BREAK)) {
    const at = match.index ?? 0;
    intervals.push({ start: at, end: at + match[0].length, strength: PARAGRAPH });
  }
  for (const match of text.matchAll(SENTENCE_BREAK)) {
    const at = match.index ?? 0;
    const end = at + match[0].length;
    const whitespace = match[1]?.length ?? 0;
    intervals.push({ start: end - whitespace, end, strength: SENTENCE });
  }
  return intervals.sort((a, b) => a.start - b.start || b.strength - a.strength);
}

/**
 * Build the boundary table for `text` tokenized into `ends`.
 * The end of the text itself is not a break.
 */
export function buildBoundaryTable(text: string, ends: readonly number[]): BoundaryTable {
  const n = ends.length;
  const strength = new Uint8Array(n + 1);
  const intervals = collectIntervals(text);

  // A token ending anywhere in [start, end] of a whitespace run closes the
  // sentence or paragraph before it: word tokens carry the whitespace, BPE
  // tokens end on the punctuation. Both lists are ordered, so one pass.
  let k = 0;
  for (let e = 1; e < n; e++) {
    const offset = ends[e - 1] ?? 0;
    while (k < intervals.length && (intervals[k]?.end ?? 0) < offset) k++;
    for (let j = k; j < intervals.length; j++) {
      const interval = intervals[j];
      if (!interval || interval.start > offset) break;
      if (offset <= interval.end && interval.strength > (strength[e] ?? 0)) {
        strength[e] = interval.strength;
      }
    }
  }

  const lastPara = new Int32Array(n + 1);
  const lastAny = new Int32Array(n + 1);
  const nextAny = new Int32Array(n + 2);
  let para = -1;
  let any = -1;
  for (let e = 0; e <= n; e++) {
    const s = strength[e] ?? 0;
    if (s === PARAGRAPH) para = e;
    if (s !== NO_BREAK) any = e;
    lastPara[e] = para;
    lastAny[e] = any;
  }
  let next = -1;
  nextAny[n + 1] = -1;
  for (let e = n; e >= 0; e--) {
    if ((strength[e] ?? 0) !== NO_BREAK) next = e;
    nextAny[e] = next;
  }

  const clamp = (e: number) => Math.max(0, Math.min(e, n));
  const toStrength = (value: number): BreakStrength =>
    value === PARAGRAPH ? PARAGRAPH : value === SENTENCE ? SENTENCE : NO_BREAK;

  return {
    size: n,
    strengthAt: (e) => toStrength(strength[clamp(e)] ?? 0),
    lastParagraph: (e) => lastPara[clamp(e)] ?? -1,
    lastBreak: (e) => lastAny[clamp(e)] ?? -1,
    nextBreak: (e) => (e > n ? -1 : (nextAny[Math.max(0, e)] ?? -1)),
  };
}
