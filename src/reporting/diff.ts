/**
 * Character-level diffs between a reference and a candidate text.
 *
 * Opcodes come from recursive longest-matching-block segmentation: find the
 * longest common run, then recurse on both sides of it.
 */

export type OpcodeTag = 'equal' | 'insert' | 'delete' | 'replace';

/** `[tag, aStart, aEnd, bStart, bEnd]` with half-open ranges into both sequences. */
export type Opcode = [tag: OpcodeTag, a0: number, a1: number, b0: number, b1: number];

type MatchingBlock = [a: number, b: number, size: number];

export interface DiffMarkers {
  insert: { open: string; close: string };
  delete: { open: string; close: string };
}

/** Black text on a green (inserted) or red (deleted) background. */
export const ANSI_MARKERS: DiffMarkers = {
  insert: { open: '\x1b[38;5;16;48;5;2m', close: '\x1b[0m' },
  delete: { open: '\x1b[38;5;16;48;5;1m', close: '\x1b[0m' },
};

export const PLAIN_MARKERS: DiffMarkers = {
  insert: { open: '{+', close: '+}' },
  delete: { open: '[-', close: '-]' },
};

/**
 * Longest common run within `a[alo:ahi]` and `b[blo:bhi]`. Ties go to the run
 * starting earliest in `a`, then earliest in `b`.
 */
function findLongestMatch<T>(
  a: readonly T[],
  b2j: Map<T, number[]>,
  alo: number,
  ahi: number,
  blo: number,
  bhi: number,
): MatchingBlock {
  let besti = alo;
  let bestj = blo;
  let bestsize = 0;
  let j2len = new Map<number, number>();

  for (const [offset, item] of a.slice(alo, ahi).entries()) {
    const i = alo + offset;
    const newj2len = new Map<number, number>();
    for (const j of b2j.get(item) ?? []) {
      if (j < blo) continue;
      if (j >= bhi) break;
      const k = (j2len.get(j - 1) ?? 0) + 1;
      newj2len.set(j, k);
      if (k > bestsize) {
        besti = i - k + 1;
        bestj = j - k + 1;
        bestsize = k;
      }
    }
    j2len = newj2len;
  }

  return [besti, bestj, bestsize];
}

export function getMatchingBlocks<T>(a: readonly T[], b: readonly T[]): MatchingBlock[] {
  const b2j = new Map<T, number[]>();
  b.forEach((item, j) => {
    const positions = b2j.get(item);
    if (positions) {
      positions.push(j);
    } else {
      b2j.set(item, [j]);
    }
  });

  const blocks: MatchingBlock[] = [];
  const queue: [number, number, number, number][] = [[0, a.length, 0, b.length]];
  for (let next = queue.pop(); next !== undefined; next = queue.pop()) {
    const [alo, ahi, blo, bhi] = next;
    const match = findLongestMatch(a, b2j, alo, ahi, blo, bhi);
    const [i, j, k] = match;
    if (k > 0) {
      blocks.push(match);
      if (alo < i && blo < j) queue.push([alo, i, blo, j]);
      if (i + k < ahi && j + k < bhi) queue.push([i + k, ahi, j + k, bhi]);
    }
  }
  blocks.sort((x, y) => x[0] - y[0] || x[1] - y[1]);

  // Merge adjacent blocks
  const merged: MatchingBlock[] = [];
  for (const block of blocks) {
    const last = merged[merged.length - 1];
    if (last && last[0] + last[2] === block[0] && last[1] + last[2] === block[1]) {
      last[2] += block[2];
    } else {
      merged.push([...block]);
    }
  }
  merged.push([a.length, b.length, 0]);
  return merged;
}

/**
 * Opcodes that turn `a` into `b`.
 */
export function getOpcodes<T>(a: readonly T[], b: readonly T[]): Opcode[] {
  const opcodes: Opcode[] = [];
  let i = 0;
  let j = 0;
  for (const [ai, bj, size] of getMatchingBlocks(a, b)) {
    if (i < ai && j < bj) {
      opcodes.push(['replace', i, ai, j, bj]);
    } else if (i < ai) {
      opcodes.push(['delete', i, ai, j, bj]);
    } else if (j < bj) {
      opcodes.push(['insert', i, ai, j, bj]);
    }
    i = ai + size;
    j = bj + size;
    if (size > 0) {
      opcodes.push(['equal', ai, i, bj, j]);
    }
  }
  return opcodes;
}

/**
 * Render `b` against `a`: unchanged text as is, inserted and deleted spans
 * wrapped in markers. A replaced span shows the candidate first, then the reference.
 */
export function diffStrings(a: string, b: string, markers: DiffMarkers = ANSI_MARKERS): string {
  const ac = Array.from(a);
  const bc = Array.from(b);
  const ins = (s: string) => `${markers.insert.open}${s}${markers.insert.close}`;
  const del = (s: string) => `${markers.delete.open}${s}${markers.delete.close}`;

  const out: string[] = [];
  for (const [tag, a0, a1, b0, b1] of getOpcodes(ac, bc)) {
    const aSpan = ac.slice(a0, a1).join('');
    const bSpan = bc.slice(b0, b1).join('');
    switch (tag) {
      case 'equal':
        out.push(aSpan);
        break;
      case 'insert':
        out.push(ins(bSpan));
        break;
      case 'delete':
        out.push(del(aSpan));
        break;
      case 'replace':
        out.push(ins(bSpan), del(aSpan));
        break;
    }
  }
  return out.join('');
}

export interface AlignedDiff {
  reference: string;
  actual: string;
  diff: string;
}

/**
 * Pair up reference and candidate lines and diff each pair. Pairing stops at the
 * shorter side; pairs where both lines are empty are dropped.
 */
export function alignedDiff(
  reference: string,
  actual: string,
  markers: DiffMarkers = ANSI_MARKERS,
): AlignedDiff {
  const refLines = splitLines(reference);
  const actLines = splitLines(actual);
  const out: AlignedDiff = { reference: '', actual: '', diff: '' };

  for (let i = 0; i < Math.min(refLines.length, actLines.length); i++) {
    const l1 = refLines[i] ?? '';
    const l2 = actLines[i] ?? '';
    if (l1 === '' && l2 === '') continue;
    out.reference += `${l1}\n`;
    out.actual += `${l2}\n`;
    out.diff += `${diffStrings(l1, l2, markers)}\n`;
  }
  return out;
}

function splitLines(text: string): string[] {
  if (text === '') return [];
  const lines = text.split(/\r\n|\r|\n/);
  if (lines[lines.length - 1] === '') lines.pop();
  return lines;
}
