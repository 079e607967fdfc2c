import type { DiffSegment, Granularity } from '../../shared/types';
import { SequenceMatcher, type Opcode } from './sequence-matcher';
import { codePointLength, toUnits } from './tokenize';

export interface Alignment {
  granularity: Granularity;
  unitsA: string[];
  unitsB: string[];
  opcodes: Opcode[];
  /** Units covered by `equal` runs. */
  matched: number;
}

export function align(textA: string, textB: string, granularity: Granularity): Alignment {
  const unitsA = toUnits(textA, granularity);
  const unitsB = toUnits(textB, granularity);
  const matcher = new SequenceMatcher(unitsA, unitsB);

  return {
    granularity,
    unitsA,
    unitsB,
    opcodes: matcher.getOpcodes(),
    matched: matcher.matchedCount(),
  };
}

/**
 * Code-point offset of every unit boundary in A. For char granularity this is
 * the unit index itself; for lines it sums the preceding line lengths.
 */
function unitOffsets(alignment: Alignment): number[] {
  const offsets = [0];
  for (const unit of alignment.unitsA) {
    const width = alignment.granularity === 'line' ? codePointLength(unit) : 1;
    offsets.push(offsets[offsets.length - 1] + width);
  }
  return offsets;
}

export function toSegments(alignment: Alignment): DiffSegment[] {
  const offsets = unitOffsets(alignment);

  return alignment.opcodes.map(({ tag, a1, a2, b1, b2 }): DiffSegment => {
    const original = alignment.unitsA.slice(a1, a2).join('');
    const modified = alignment.unitsB.slice(b1, b2).join('');
    const startPos = offsets[a1];
    const endPos = offsets[a2];

    switch (tag) {
      case 'equal':
        return { kind: 'equal', original, modified, startPos, endPos };
      case 'replace':
        return { kind: 'replace', original, modified, startPos, endPos };
      case 'delete':
        return { kind: 'delete', original, modified: '', startPos, endPos };
      case 'insert':
        return { kind: 'insert', original: '', modified, startPos, endPos: startPos };
    }
  });
}

export function diffSegments(
  textA: string,
  textB: string,
  granularity: Granularity = 'char'
): DiffSegment[] {
  return toSegments(align(textA, textB, granularity));
}
