import type { DiffSegment } from '../../shared/types';

const DELETE_OPEN = '<span class="diff-delete" style="background:#ffcccc;text-decoration:line-through;">';
const INSERT_OPEN = '<span class="diff-insert" style="background:#ccffcc;">';
const CLOSE = '</span>';

/** `&` goes first so the entities added afterwards are left alone. */
export function escapeHtml(text: string): string {
  return text
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;')
    .replace(/'/g, '&#39;')
    .replace(/\n/g, '<br>');
}

function removed(text: string): string {
  return `${DELETE_OPEN}${escapeHtml(text)}${CLOSE}`;
}

function added(text: string): string {
  return `${INSERT_OPEN}${escapeHtml(text)}${CLOSE}`;
}

export function renderSegment(segment: DiffSegment): string {
  switch (segment.kind) {
    case 'equal':
      return escapeHtml(segment.original);
    case 'delete':
      return removed(segment.original);
    case 'insert':
      return added(segment.modified);
    case 'replace':
      return removed(segment.original) + added(segment.modified);
    default: {
      const unreachable: never = segment;
      throw new Error(`Unknown segment kind: ${JSON.stringify(unreachable)}`);
    }
  }
}

export function renderHtml(segments: readonly DiffSegment[]): string {
  return segments.map(renderSegment).join('');
}
