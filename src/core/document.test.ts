import { describe, it, expect } from 'vitest';
import { parseDocumentText, readEdgeRecord, readEnvelope, readNodeRecord, serializeDocument } from './document';
import type { GraphDocument } from '../types';

describe('document readers', () => {
  it('reads a canonical node and leaves missing counts to the type', () => {
    const r = readNodeRecord({ id: 'n', x: 1.5, y: 2, type: 'SINK' });
    expect(r).toEqual({ ok: true, value: { id: 'n', x: 1.5, y: 2, type: 'SINK' } });
  });

  it('accepts legacy count names and textual numbers', () => {
    const r = readNodeRecord({ id: 'n', x: '10', y: '-2.5', type: 'MERGE', inputs: '2', outputs: '1' });
    expect(r.ok && r.value).toEqual({ id: 'n', x: 10, y: -2.5, type: 'MERGE', inputCount: 2, outputCount: 1 });
  });

  it('prefers the canonical attribute when both spellings are present', () => {
    const r = readEdgeRecord({
      id: 'e',
      sourceNodeId: 'a',
      fromNode: 'stale',
      sourceSocketIndex: 1,
      toNode: 'b',
      toSocketIndex: '0',
    });
    expect(r.ok && r.value).toEqual({
      id: 'e',
      sourceNodeId: 'a',
      sourceSocketIndex: 1,
      targetNodeId: 'b',
      targetSocketIndex: 0,
    });
  });

  it('rejects negative counts and fractional indices with the record id', () => {
    const node = readNodeRecord({ id: 'n', x: 0, y: 0, type: 'SINK', inputCount: -1 });
    expect(node.ok).toBe(false);
    if (!node.ok) {
      expect(node.error.kind).toBe('MalformedDocumentEntity');
      expect(node.error.details).toEqual({ id: 'n' });
      expect(node.error.message).toContain('inputCount');
    }
    const edge = readEdgeRecord({ id: 'e', from: 'a', 'from-socket': 0.5, to: 'b', 'to-socket': 0 });
    expect(edge.ok).toBe(false);
  });

  it('rejects numbers that overflow and port counts above the cap', () => {
    expect(readNodeRecord({ id: 'n', x: '9'.repeat(400), y: 0, type: 'SINK' }).ok).toBe(false);
    expect(readNodeRecord({ id: 'n', x: 0, y: 0, type: 'SINK', inputCount: 256 }).ok).toBe(true);
    expect(readNodeRecord({ id: 'n', x: 0, y: 0, type: 'SINK', inputCount: '257' }).ok).toBe(false);
    expect(readNodeRecord({ id: 'n', x: 0, y: 0, type: 'SINK', outputs: 1e9 }).ok).toBe(false);
    const edge = readEdgeRecord({
      id: 'e',
      sourceNodeId: 'a',
      sourceSocketIndex: '9'.repeat(20),
      targetNodeId: 'b',
      targetSocketIndex: 0,
    });
    expect(edge.ok).toBe(false);
  });

  it('reads an envelope with missing lists as empty', () => {
    expect(readEnvelope({})).toEqual({ ok: true, value: { nodes: [], edges: [] } });
    expect(readEnvelope({ nodes: 'many' }).ok).toBe(false);
    expect(readEnvelope(null).ok).toBe(false);
  });

  it('parses JSON text into a result', () => {
    expect(parseDocumentText('{"nodes":[]}')).toEqual({ ok: true, value: { nodes: [] } });
    const bad = parseDocumentText('{');
    expect(bad.ok ? null : bad.error.kind).toBe('MalformedDocumentEntity');
  });

  it('serializes with two-space indentation and a trailing newline', () => {
    const doc: GraphDocument = { version: '1.0', nodes: [], edges: [] };
    expect(serializeDocument(doc)).toBe('{\n  "version": "1.0",\n  "nodes": [],\n  "edges": []\n}\n');
  });
});
