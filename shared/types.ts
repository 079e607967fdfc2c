/**
 * Types shared between the diff engine, the version store and the
 * operation layer.
 */

export type Granularity = 'char' | 'line';

export interface TextVersion {
  readonly versionId: string;
  readonly content: string;
  readonly timestamp: string;
  readonly label: string | null;
  readonly style: string | null;
}

export type DiffKind = 'equal' | 'insert' | 'delete' | 'replace';

interface SegmentSpan {
  /** Offset into the original text, in code points. */
  startPos: number;
  endPos: number;
}

export interface EqualSegment extends SegmentSpan {
  kind: 'equal';
  original: string;
  modified: string;
}

/** `startPos === endPos`: the point in the original where the text goes. */
export interface InsertSegment extends SegmentSpan {
  kind: 'insert';
  original: '';
  modified: string;
}

export interface DeleteSegment extends SegmentSpan {
  kind: 'delete';
  original: string;
  modified: '';
}

export interface ReplaceSegment extends SegmentSpan {
  kind: 'replace';
  original: string;
  modified: string;
}

export type DiffSegment = EqualSegment | InsertSegment | DeleteSegment | ReplaceSegment;

export interface DiffSummary {
  insertions: number;
  deletions: number;
  replacements: number;
  unchangedChars: number;
  totalChanges: number;
}

export interface DiffResult {
  previewA: string;
  previewB: string;
  granularity: Granularity;
  segments: DiffSegment[];
  similarity: number;
  html: string;
  summary: DiffSummary;
}

// Wire records. Field names follow the persisted file layout.

export interface VersionRecord {
  version_id: string;
  content: string;
  timestamp: string;
  label: string | null;
  style: string | null;
}

export interface DiffSegmentRecord {
  type: DiffKind;
  original: string;
  modified: string;
  position: { start: number; end: number };
}

export interface DiffSummaryRecord {
  insertions: number;
  deletions: number;
  replacements: number;
  unchanged_chars: number;
  total_changes: number;
}

export interface DiffResultRecord {
  version_a_preview: string;
  version_b_preview: string;
  similarity: number;
  html_diff: string;
  summary: DiffSummaryRecord;
  segments: DiffSegmentRecord[];
}
