import type { DiffSegment, DiffSummary } from '../../shared/types';
import { codePointLength } from './tokenize';

export function summarize(segments: readonly DiffSegment[]): DiffSummary {
  const summary: DiffSummary = {
    insertions: 0,
    deletions: 0,
    replacements: 0,
    unchangedChars: 0,
    totalChanges: 0,
  };

  for (const segment of segments) {
    switch (segment.kind) {
      case 'insert':
        summary.insertions += codePointLength(segment.modified);
        break;
      case 'delete':
        summary.deletions += codePointLength(segment.original);
        break;
      case 'replace':
        summary.replacements += 1;
        summary.deletions += codePointLength(segment.original);
        summary.insertions += codePointLength(segment.modified);
        break;
      case 'equal':
        summary.unchangedChars += codePointLength(segment.original);
        break;
      default: {
        const unreachable: never = segment;
        throw new Error(`Unknown segment kind: ${JSON.stringify(unreachable)}`);
      }
    }
  }

  summary.totalChanges = summary.insertions + summary.deletions;
  return summary;
}
