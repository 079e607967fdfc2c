import { describe, it, expect, beforeEach, vi } from 'vitest';
import { RevisionApi } from '../api/revision-api';
import { DiffEngine } from '../diff/engine';
import { MemoryHistoryStorage } from '../versions/storage';
import { VersionStore } from '../versions/store';

const DEL = '<span class="diff-delete" style="background:#ffcccc;text-decoration:line-through;">';
const INS = '<span class="diff-insert" style="background:#ccffcc;">';

describe('RevisionApi', () => {
  let storage: MemoryHistoryStorage;
  let diffEngine: DiffEngine;
  let api: RevisionApi;

  beforeEach(() => {
    storage = new MemoryHistoryStorage();
    diffEngine = new DiffEngine({ maxInputLength: 5000 });
    api = new RevisionApi({ store: new VersionStore({ storage, diffEngine }), diffEngine });
  });

  describe('saveVersion / getVersion', () => {
    it('should return the saved record and find it again', async () => {
      const saved = await api.saveVersion({ documentId: 'doc-1', content: 'hello', label: 'v1' });
      if (!saved.ok) throw new Error(saved.error.message);

      expect(saved.data.content).toBe('hello');
      expect(saved.data.label).toBe('v1');
      expect(saved.data.style).toBeNull();
      expect(saved.data.version_id).toMatch(/^[0-9a-f]{12}$/);

      const loaded = await api.getVersion({ documentId: 'doc-1', versionId: saved.data.version_id });
      expect(loaded).toEqual({ ok: true, data: saved.data });
    });

    it('should report an unknown version as not found', async () => {
      const result = await api.getVersion({ documentId: 'doc-1', versionId: 'abc123abc123' });

      expect(result).toEqual({
        ok: false,
        error: {
          code: 'NOT_FOUND',
          message: 'Version abc123abc123 not found',
          details: { documentId: 'doc-1', versionId: 'abc123abc123' },
        },
      });
    });

    it('should reject a document id that could escape the storage directory', async () => {
      const result = await api.saveVersion({ documentId: '../x', content: 'hello' });

      expect(result.ok).toBe(false);
      if (result.ok) return;
      expect(result.error.code).toBe('VALIDATION_ERROR');
      expect(result.error.details).toEqual({
        issues: [
          { path: 'documentId', message: 'documentId may only contain letters, digits, ".", "_" and "-"' },
        ],
      });
      expect(storage.has('../x')).toBe(false);
    });

    it('should accept long free-form labels and styles', async () => {
      const label = 'L'.repeat(300);
      const style = 'S'.repeat(1000);

      const result = await api.saveVersion({ documentId: 'doc-1', content: 'x', label, style });
      if (!result.ok) throw new Error(result.error.message);

      expect(result.data.label).toBe(label);
      expect(result.data.style).toBe(style);
    });

    it('should report a long unknown version id as not found', async () => {
      const versionId = 'f'.repeat(100);

      const result = await api.getVersion({ documentId: 'doc-1', versionId });

      expect(result.ok).toBe(false);
      if (result.ok) return;
      expect(result.error.code).toBe('NOT_FOUND');
    });

    it('should report a failed write as a persistence fault', async () => {
      vi.spyOn(storage, 'store').mockRejectedValueOnce(new Error('disk full'));

      const result = await api.saveVersion({ documentId: 'doc-1', content: 'hello' });

      expect(result).toEqual({
        ok: false,
        error: {
          code: 'PERSISTENCE_FAULT',
          message: 'Failed to persist version for doc-1',
          details: { documentId: 'doc-1' },
        },
      });
    });
  });

  describe('listVersions', () => {
    it('should list records in save order', async () => {
      await api.saveVersion({ documentId: 'doc-1', content: 'A' });
      await api.saveVersion({ documentId: 'doc-1', content: 'B', style: 'Nature-style' });

      const result = await api.listVersions({ documentId: 'doc-1' });
      if (!result.ok) throw new Error(result.error.message);

      expect(result.data.map((record) => [record.content, record.style])).toEqual([
        ['A', null],
        ['B', 'Nature-style'],
      ]);
    });

    it('should return an empty list for an unknown document', async () => {
      await expect(api.listVersions({ documentId: 'nobody' })).resolves.toEqual({ ok: true, data: [] });
    });
  });

  describe('compare', () => {
    it('should return the full result record', async () => {
      const result = await api.compare({ textA: 'kitten', textB: 'sitting' });

      expect(result).toEqual({
        ok: true,
        data: {
          version_a_preview: 'kitten',
          version_b_preview: 'sitting',
          similarity: 0.6154,
          html_diff:
            `${DEL}k</span>${INS}s</span>itt` + `${DEL}e</span>${INS}i</span>n` + `${INS}g</span>`,
          summary: {
            insertions: 3,
            deletions: 2,
            replacements: 2,
            unchanged_chars: 4,
            total_changes: 5,
          },
          segments: [
            { type: 'replace', original: 'k', modified: 's', position: { start: 0, end: 1 } },
            { type: 'equal', original: 'itt', modified: 'itt', position: { start: 1, end: 4 } },
            { type: 'replace', original: 'e', modified: 'i', position: { start: 4, end: 5 } },
            { type: 'equal', original: 'n', modified: 'n', position: { start: 5, end: 6 } },
            { type: 'insert', original: '', modified: 'g', position: { start: 6, end: 6 } },
          ],
        },
      });
    });

    it('should escape markup in the rendered html', async () => {
      const result = await api.compare({ textA: '<b>', textB: '<i>' });
      if (!result.ok) throw new Error(result.error.message);

      expect(result.data.html_diff).toBe(`&lt;${DEL}b</span>${INS}i</span>&gt;`);
      expect(result.data.similarity).toBe(0.6667);
    });

    it('should compare by line when charLevel is false', async () => {
      const result = await api.compare({ textA: 'a\nb\n', textB: 'a\nc\n', charLevel: false });
      if (!result.ok) throw new Error(result.error.message);

      expect(result.data.similarity).toBe(0.5);
      expect(result.data.segments.map((segment) => segment.type)).toEqual(['equal', 'replace']);
    });

    it('should refuse inputs over the configured limit', async () => {
      const limited = new DiffEngine({ maxInputLength: 5 });
      const limitedApi = new RevisionApi({
        store: new VersionStore({ storage, diffEngine: limited }),
        diffEngine: limited,
      });

      const result = await limitedApi.compare({ textA: 'abcdefg', textB: 'abc' });

      expect(result).toEqual({
        ok: false,
        error: {
          code: 'RESOURCE_LIMIT_EXCEEDED',
          message: 'Text A is 7 characters; the limit is 5',
          details: { side: 'a', length: 7, limit: 5 },
        },
      });
    });

    it('should turn unexpected errors into internal errors', async () => {
      vi.spyOn(diffEngine, 'compare').mockImplementation(() => {
        throw new Error('boom');
      });

      const result = await api.compare({ textA: 'a', textB: 'b' });

      expect(result).toEqual({ ok: false, error: { code: 'INTERNAL_ERROR', message: 'boom' } });
    });
  });

  describe('compareVersions', () => {
    it('should compare two saved versions', async () => {
      const a = await api.saveVersion({ documentId: 'doc-1', content: 'kitten' });
      const b = await api.saveVersion({ documentId: 'doc-1', content: 'sitting' });
      if (!a.ok || !b.ok) throw new Error('save failed');

      const result = await api.compareVersions({
        documentId: 'doc-1',
        versionIdA: a.data.version_id,
        versionIdB: b.data.version_id,
      });
      if (!result.ok) throw new Error(result.error.message);

      expect(result.data.similarity).toBe(0.6154);
      expect(result.data.summary.total_changes).toBe(5);
    });

    it('should report a missing version as not found', async () => {
      const a = await api.saveVersion({ documentId: 'doc-1', content: 'kitten' });
      if (!a.ok) throw new Error(a.error.message);

      const result = await api.compareVersions({
        documentId: 'doc-1',
        versionIdA: a.data.version_id,
        versionIdB: 'missing',
      });

      expect(result).toEqual({
        ok: false,
        error: {
          code: 'NOT_FOUND',
          message: 'One or both versions not found',
          details: { documentId: 'doc-1', versionIdA: a.data.version_id, versionIdB: 'missing' },
        },
      });
    });
  });

  describe('clearVersions', () => {
    it('should empty the history', async () => {
      await api.saveVersion({ documentId: 'doc-1', content: 'hello' });

      await expect(api.clearVersions({ documentId: 'doc-1' })).resolves.toEqual({
        ok: true,
        data: { cleared: true },
      });
      await expect(api.listVersions({ documentId: 'doc-1' })).resolves.toEqual({ ok: true, data: [] });
    });
  });

  describe('handler stats', () => {
    it('should count calls and errors per operation', async () => {
      await api.saveVersion({ documentId: 'doc-1', content: 'hello' });
      await api.getVersion({ documentId: 'doc-1', versionId: 'missing' });
      await api.getVersion({ documentId: 'doc-1', versionId: 'missing' });

      const stats = api.handler.getStats();

      expect(stats['version:save']).toMatchObject({ calls: 1, errors: 0 });
      expect(stats['version:get']).toMatchObject({ calls: 2, errors: 2 });
      expect(stats['diff:compare']).toBeUndefined();
    });
  });
});
