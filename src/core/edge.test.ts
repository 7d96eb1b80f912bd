import { describe, it, expect, beforeEach } from 'vitest';
import { TopologyRegistry } from './registry';
import { Edge, validateConnection, type EdgeLink } from './edge';
import { GraphMisuseError, unwrap } from './errors';
import type { GraphNode } from './node';
import { silentLogger } from './logger';

const link = (patch: Partial<EdgeLink> = {}): EdgeLink => ({
  sourceNodeId: 'src',
  sourceSocketIndex: 0,
  targetNodeId: 'dst',
  targetSocketIndex: 0,
  ...patch,
});

describe('Edge resolution', () => {
  let registry: TopologyRegistry;
  let src: GraphNode;
  let dst: GraphNode;

  beforeEach(() => {
    registry = new TopologyRegistry({ logger: silentLogger });
    src = unwrap(registry.createNode('SOURCE', { x: 0, y: 0 }, { id: 'src' }));
    dst = unwrap(registry.createNode('SINK', { x: 200, y: 0 }, { id: 'dst' }));
  });

  it('starts unresolved with readable ids and no handles', () => {
    const edge = new Edge('e', link());
    expect(edge.status).toBe('unresolved');
    expect(edge.source).toBeUndefined();
    expect(edge.path).toBeNull();
    expect(edge.toRecord()).toEqual({ id: 'e', ...link() });
  });

  it.each([
    ['EndpointNotFound', link({ targetNodeId: 'nowhere' })],
    ['PortIndexOutOfRange', link({ sourceSocketIndex: 1 })],
    ['PortIndexOutOfRange', link({ targetSocketIndex: -1 })],
    ['RoleMismatch', link({ sourceNodeId: 'dst', targetNodeId: 'src' })],
  ] as const)('fails with %s and stays unresolved', (kind, bad) => {
    const edge = new Edge('e', bad);
    const r = edge.resolve(registry);
    expect(r.ok ? null : r.error.kind).toBe(kind);
    expect(edge.status).toBe('unresolved');
    expect(src.degree + dst.degree).toBe(0);
  });

  it('checks endpoints before indices and indices before roles', () => {
    const both = validateConnection(registry, link({ sourceNodeId: 'gone', sourceSocketIndex: 9 }));
    expect(both.ok ? null : both.error.kind).toBe('EndpointNotFound');
    const rangeAndRole = validateConnection(registry, link({ sourceNodeId: 'dst', targetSocketIndex: 4 }));
    expect(rangeAndRole.ok ? null : rangeAndRole.error.kind).toBe('PortIndexOutOfRange');
  });

  it('treats a pinned but disposed node as missing', () => {
    registry.deleteNode('dst');
    const r = validateConnection(registry, link(), { target: dst });
    expect(r.ok ? null : r.error.kind).toBe('EndpointNotFound');
  });

  it('binds both ports once resolved and refuses a second resolve', () => {
    const edge = new Edge('e', link());
    unwrap(edge.resolve(registry));
    expect(edge.status).toBe('resolved');
    expect(edge.source?.port).toBe(src.getPort(0));
    expect(edge.target?.node).toBe(dst);
    expect(() => edge.resolve(registry)).toThrow(GraphMisuseError);
  });

  it('invalidate clears only the side of the dead node', () => {
    const edge = new Edge('e', link());
    unwrap(edge.resolve(registry));
    edge.invalidate(src);

    const state = edge.resolution;
    expect(state.status).toBe('invalidated');
    if (state.status === 'invalidated') {
      expect(state.source).toBeNull();
      expect(state.target?.node).toBe(dst);
    }
    expect(edge.path).toBeNull();
    expect(edge.sourceNodeId).toBe('src');
  });

  it('detach unregisters from both endpoints', () => {
    const edge = new Edge('e', link());
    unwrap(edge.resolve(registry));
    edge.detach();
    expect(edge.status).toBe('invalidated');
    expect(src.degree).toBe(0);
    expect(dst.getPort(0).isConnected).toBe(false);
    expect(edge.connectsNode('dst')).toBe(true);
  });
});
