/**
 * Partial-ratio string similarity.
 *
 * The query slides over the text; each window of at most query length is
 * scored by normalized indel similarity `200 * LCS / (|query| + |window|)`
 * and the best window wins. A literal (case-insensitive) occurrence of the
 * query scores exactly 100, anything else strictly less.
 */

export type Scorer = (text: string) => number;

const WORD_BITS = 32;
const FULL_WORD = 0xffffffff;

/**
 * A needle compiled for Hyyrö's bit-vector LCS, split over as many 32-bit
 * words as its length needs.
 */
interface Pattern {
  length: number;
  words: number;
  /** Bits of the needle that live in the last word */
  lastMask: number;
  /** UTF-16 code unit to symbol id, -1 for units the needle lacks */
  symbolOf: Int32Array;
  /** Occurrences of each symbol in the needle */
  counts: Int32Array;
  /** Match vectors, `words` consecutive entries per symbol */
  masks: Uint32Array;
}

function compilePattern(needle: string): Pattern {
  const length = needle.length;
  const words = Math.ceil(length / WORD_BITS);
  const symbolOf = new Int32Array(0x10000).fill(-1);

  let symbolCount = 0;
  for (let i = 0; i < length; i++) {
    const code = needle.charCodeAt(i);
    if (symbolOf[code] < 0) symbolOf[code] = symbolCount++;
  }

  const counts = new Int32Array(symbolCount);
  const masks = new Uint32Array(symbolCount * words);
  for (let i = 0; i < length; i++) {
    const symbol = symbolOf[needle.charCodeAt(i)];
    counts[symbol]++;
    masks[symbol * words + Math.floor(i / WORD_BITS)] |= 1 << i % WORD_BITS;
  }

  const tail = length - (words - 1) * WORD_BITS;
  const lastMask = tail === WORD_BITS ? FULL_WORD : 2 ** tail - 1;
  return { length, words, lastMask, symbolOf, counts, masks };
}

function popcount(x: number): number {
  x -= (x >>> 1) & 0x55555555;
  x = (x & 0x33333333) + ((x >>> 2) & 0x33333333);
  return Math.imul((x + (x >>> 4)) & 0x0f0f0f0f, 0x01010101) >>> 24;
}

/**
 * LCS of the needle and `text[start, end)`, where `text` is already mapped to
 * symbol ids. `row` is scratch space of `pattern.words` entries.
 */
function lcsLength(pattern: Pattern, row: Uint32Array, text: Int32Array, start: number, end: number): number {
  const { words, masks, lastMask } = pattern;
  row.fill(FULL_WORD);
  row[words - 1] = lastMask;

  for (let i = start; i < end; i++) {
    const symbol = text[i];
    if (symbol < 0) continue;
    const base = symbol * words;
    let carry = 0;
    for (let w = 0; w < words; w++) {
      const v = row[w];
      const match = masks[base + w];
      const sum = v + ((v & match) >>> 0) + carry;
      carry = sum > FULL_WORD ? 1 : 0;
      row[w] = (sum >>> 0) | (v & ~match);
    }
    row[words - 1] &= lastMask;
  }

  // Each cleared bit is one matched needle character
  let unmatched = 0;
  for (let w = 0; w < words; w++) unmatched += popcount(row[w]);
  return pattern.length - unmatched;
}

/**
 * Prepare a scorer for one query so that it can be applied to many texts.
 * Both sides are compared lower-cased; the query is plain text, never a pattern.
 */
export function partialRatioScorer(query: string): Scorer {
  const needle = query.toLowerCase();
  const m = needle.length;
  if (m === 0) {
    return () => 0;
  }

  const pattern = compilePattern(needle);
  const row = new Uint32Array(pattern.words);

  return (text) => {
    const haystack = text.toLowerCase();
    const n = haystack.length;
    if (n === 0) return 0;
    if (haystack.includes(needle)) return 100;

    const symbols = new Int32Array(n);
    for (let i = 0; i < n; i++) {
      symbols[i] = pattern.symbolOf[haystack.charCodeAt(i)];
    }

    let best = 0;
    const consider = (start: number, end: number) => {
      const score = (200 * lcsLength(pattern, row, symbols, start, end)) / (m + end - start);
      if (score > best) best = score;
    };

    // A window whose outer edge misses the needle's alphabet is dominated by
    // the window one character shorter, so only edges that can match are tried.
    for (let end = 1; end <= Math.min(m - 1, n); end++) {
      if (symbols[end - 1] >= 0) consider(0, end);
    }

    // Full windows slide a multiset overlap with the needle, which bounds
    // their LCS from above; windows that cannot beat `best` are skipped.
    if (n >= m) {
      const inWindow = new Int32Array(pattern.counts.length);
      let overlap = 0;
      const enter = (symbol: number) => {
        if (symbol < 0) return;
        if (inWindow[symbol] < pattern.counts[symbol]) overlap++;
        inWindow[symbol]++;
      };
      const leave = (symbol: number) => {
        if (symbol < 0) return;
        inWindow[symbol]--;
        if (inWindow[symbol] < pattern.counts[symbol]) overlap--;
      };

      for (let i = 0; i < m - 1; i++) enter(symbols[i]);
      for (let start = 0; start + m <= n; start++) {
        enter(symbols[start + m - 1]);
        if (symbols[start] >= 0 && (100 * overlap) / m > best) {
          consider(start, start + m);
        }
        leave(symbols[start]);
      }
    }

    for (let start = Math.max(1, n - m + 1); start < n; start++) {
      if (symbols[start] >= 0) consider(start, n);
    }
    return best;
  };
}

export function partialRatio(query: string, text: string): number {
  return partialRatioScorer(query)(text);
}
