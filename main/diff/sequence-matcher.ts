/**
 * Ratcliff/Obershelp sequence alignment.
 *
 * Finds the longest contiguous matching block, then recurses on the
 * unmatched pieces to the left and right of it. When several blocks share
 * the longest length, the one starting earliest in `a` wins, then the one
 * starting earliest in `b`.
 */

export interface MatchingBlock {
  /** Start index in `a`. */
  a: number;
  /** Start index in `b`. */
  b: number;
  size: number;
}

export type OpcodeTag = 'equal' | 'replace' | 'delete' | 'insert';

/** Transforms `a[a1..a2)` into `b[b1..b2)`. */
export interface Opcode {
  tag: OpcodeTag;
  a1: number;
  a2: number;
  b1: number;
  b2: number;
}

/** First index in the ascending `values` whose value is at least `target`. */
function lowerBound(values: readonly number[], target: number): number {
  let lo = 0;
  let hi = values.length;
  while (lo < hi) {
    const mid = (lo + hi) >>> 1;
    if (values[mid] < target) {
      lo = mid + 1;
    } else {
      hi = mid;
    }
  }
  return lo;
}

export class SequenceMatcher<T> {
  private readonly b2j = new Map<T, number[]>();
  // Run lengths for the previous and current row of `a`, indexed by j + 1.
  // Both are all zero between calls to findLongestMatch.
  private previousRow: Int32Array;
  private currentRow: Int32Array;
  private matchingBlocks: MatchingBlock[] | null = null;
  private opcodes: Opcode[] | null = null;

  constructor(
    private readonly a: readonly T[],
    private readonly b: readonly T[]
  ) {
    b.forEach((item, j) => {
      const indices = this.b2j.get(item);
      if (indices) {
        indices.push(j);
      } else {
        this.b2j.set(item, [j]);
      }
    });
    this.previousRow = new Int32Array(b.length + 1);
    this.currentRow = new Int32Array(b.length + 1);
  }

  /**
   * Longest block with `a[i..i+size) == b[j..j+size)` inside the given
   * ranges. Size 0 when the ranges share nothing.
   */
  findLongestMatch(alo: number, ahi: number, blo: number, bhi: number): MatchingBlock {
    let bestI = alo;
    let bestJ = blo;
    let bestSize = 0;

    let previous = this.previousRow;
    let current = this.currentRow;
    let previousTouched: number[] = [];

    for (let i = alo; i < ahi; i++) {
      const currentTouched: number[] = [];
      const indices = this.b2j.get(this.a[i]);

      if (indices) {
        for (let k = lowerBound(indices, blo); k < indices.length; k++) {
          const j = indices[k];
          if (j >= bhi) break;

          const size = previous[j] + 1;
          current[j + 1] = size;
          currentTouched.push(j + 1);

          // Strictly longer only: earlier blocks keep ties.
          if (size > bestSize) {
            bestI = i - size + 1;
            bestJ = j - size + 1;
            bestSize = size;
          }
        }
      }

      for (const index of previousTouched) {
        previous[index] = 0;
      }
      const swap = previous;
      previous = current;
      current = swap;
      previousTouched = currentTouched;
    }

    for (const index of previousTouched) {
      previous[index] = 0;
    }
    this.previousRow = previous;
    this.currentRow = current;

    return { a: bestI, b: bestJ, size: bestSize };
  }

  /**
   * Matching blocks in ascending order, adjacent blocks merged, closed by a
   * zero-size sentinel at `(a.length, b.length)`.
   */
  getMatchingBlocks(): MatchingBlock[] {
    if (this.matchingBlocks) {
      return this.matchingBlocks;
    }

    const la = this.a.length;
    const lb = this.b.length;
    const found: MatchingBlock[] = [];
    const queue: Array<[number, number, number, number]> = [[0, la, 0, lb]];

    let range = queue.pop();
    while (range) {
      const [alo, ahi, blo, bhi] = range;
      const match = this.findLongestMatch(alo, ahi, blo, bhi);

      if (match.size > 0) {
        found.push(match);
        if (alo < match.a && blo < match.b) {
          queue.push([alo, match.a, blo, match.b]);
        }
        if (match.a + match.size < ahi && match.b + match.size < bhi) {
          queue.push([match.a + match.size, ahi, match.b + match.size, bhi]);
        }
      }

      range = queue.pop();
    }

    found.sort((x, y) => x.a - y.a || x.b - y.b);

    const merged: MatchingBlock[] = [];
    for (const block of found) {
      const last = merged[merged.length - 1];
      if (last && last.a + last.size === block.a && last.b + last.size === block.b) {
        last.size += block.size;
      } else {
        merged.push({ ...block });
      }
    }
    merged.push({ a: la, b: lb, size: 0 });

    this.matchingBlocks = merged;
    return merged;
  }

  getOpcodes(): Opcode[] {
    if (this.opcodes) {
      return this.opcodes;
    }

    const opcodes: Opcode[] = [];
    let i = 0;
    let j = 0;

    for (const block of this.getMatchingBlocks()) {
      let tag: OpcodeTag | null = null;
      if (i < block.a && j < block.b) {
        tag = 'replace';
      } else if (i < block.a) {
        tag = 'delete';
      } else if (j < block.b) {
        tag = 'insert';
      }
      if (tag) {
        opcodes.push({ tag, a1: i, a2: block.a, b1: j, b2: block.b });
      }

      i = block.a + block.size;
      j = block.b + block.size;
      if (block.size > 0) {
        opcodes.push({ tag: 'equal', a1: block.a, a2: i, b1: block.b, b2: j });
      }
    }

    this.opcodes = opcodes;
    return opcodes;
  }

  /** Total number of matched units across all blocks. */
  matchedCount(): number {
    return this.getMatchingBlocks().reduce((sum, block) => sum + block.size, 0);
  }

  /** `2 * M / T`, or 1 when both sequences are empty. Unrounded. */
  ratio(): number {
    const total = this.a.length + this.b.length;
    if (total === 0) {
      return 1;
    }
    return (2 * this.matchedCount()) / total;
  }
}
