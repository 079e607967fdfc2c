// Conversions between engine values and their wire/persisted records.

import type {
  DiffResult,
  DiffResultRecord,
  DiffSegment,
  DiffSegmentRecord,
  TextVersion,
  VersionRecord,
} from './types';

export const PREVIEW_LENGTH = 50;

export function preview(text: string, length = PREVIEW_LENGTH): string {
  const chars = Array.from(text);
  return chars.length > length ? `${chars.slice(0, length).join('')}...` : text;
}

export function toVersionRecord(version: TextVersion): VersionRecord {
  return {
    version_id: version.versionId,
    content: version.content,
    timestamp: version.timestamp,
    label: version.label,
    style: version.style,
  };
}

export function fromVersionRecord(record: VersionRecord): TextVersion {
  return Object.freeze({
    versionId: record.version_id,
    content: record.content,
    timestamp: record.timestamp,
    label: record.label,
    style: record.style,
  });
}

export function toSegmentRecord(segment: DiffSegment): DiffSegmentRecord {
  return {
    type: segment.kind,
    original: segment.original,
    modified: segment.modified,
    position: { start: segment.startPos, end: segment.endPos },
  };
}

export function toDiffResultRecord(result: DiffResult): DiffResultRecord {
  return {
    version_a_preview: result.previewA,
    version_b_preview: result.previewB,
    similarity: result.similarity,
    html_diff: result.html,
    summary: {
      insertions: result.summary.insertions,
      deletions: result.summary.deletions,
      replacements: result.summary.replacements,
      unchanged_chars: result.summary.unchangedChars,
      total_changes: result.summary.totalChanges,
    },
    segments: result.segments.map(toSegmentRecord),
  };
}
