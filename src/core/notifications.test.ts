import { describe, it, expect, beforeEach, vi } from 'vitest';
import { TopologyRegistry } from './registry';
import { GraphMisuseError, unwrap } from './errors';
import { ObserverHub, type GraphObserver } from './notifications';
import { silentLogger, type Logger } from './logger';

function recorder(registry: TopologyRegistry, events: string[]): GraphObserver {
  return {
    onNodeAdded: (n) => events.push(`node+:${n.id}`),
    onNodeRemoved: (n) => events.push(`node-:${n.id}:${registry.hasNode(n.id)}:${n.isDisposed}`),
    onNodeMoved: (id) => events.push(`moved:${id}`),
    onNodeTypeChanged: (n) => events.push(`type:${n.id}:${n.type}`),
    onEdgeAdded: (e) => events.push(`edge+:${e.id}`),
    onEdgeRemoved: (e) => events.push(`edge-:${e.id}:${registry.hasEdge(e.id)}:${e.status}`),
    onGraphCleared: () => events.push('cleared'),
    onBatchBegin: () => events.push('begin'),
    onBatchEnd: () => events.push('end'),
  };
}

describe('change notifications', () => {
  let registry: TopologyRegistry;
  let events: string[];

  beforeEach(() => {
    registry = new TopologyRegistry({ logger: silentLogger });
    events = [];
    registry.attachObserver(recorder(registry, events));
  });

  it('announces edge removals before the node that caused them', () => {
    unwrap(registry.createNode('SOURCE', { x: 0, y: 0 }, { id: 'a' }));
    unwrap(registry.createNode('SINK', { x: 200, y: 0 }, { id: 'b' }));
    unwrap(registry.createEdge('a', 0, 'b', 0, { id: 'e' }));
    events.length = 0;

    registry.deleteNode('a');
    expect(events).toEqual(['edge-:e:false:invalidated', 'node-:a:false:false']);
  });

  it('announces a type change after its edges are gone', () => {
    unwrap(registry.createNode('SOURCE', { x: 0, y: 0 }, { id: 'a' }));
    unwrap(registry.createNode('SINK', { x: 200, y: 0 }, { id: 'b' }));
    unwrap(registry.createEdge('a', 0, 'b', 0, { id: 'e' }));
    events.length = 0;

    unwrap(registry.setNodeType('b', 'MERGE'));
    expect(events).toEqual(['edge-:e:false:invalidated', 'type:b:MERGE']);
  });

  it('sends nothing for rejected operations', () => {
    unwrap(registry.createNode('SINK', { x: 0, y: 0 }, { id: 'a' }));
    events.length = 0;
    registry.createEdge('a', 0, 'a', 0);
    registry.createNode('SINK', { x: 0, y: 0 }, { id: 'a' });
    registry.deleteEdge('nope');
    expect(events).toEqual([]);
  });

  it('only the outermost batch is announced; events inside still arrive', () => {
    registry.beginBatch();
    registry.beginBatch();
    unwrap(registry.createNode('SINK', { x: 0, y: 0 }, { id: 'a' }));
    registry.endBatch();
    expect(registry.isInBatch).toBe(true);
    registry.endBatch();
    expect(events).toEqual(['begin', 'node+:a', 'end']);
  });

  it('batch() closes the batch when the callback throws', () => {
    expect(() =>
      registry.batch(() => {
        throw new Error('boom');
      }),
    ).toThrow('boom');
    expect(registry.isInBatch).toBe(false);
    expect(events).toEqual(['begin', 'end']);
  });

  it('endBatch without beginBatch is a misuse', () => {
    expect(() => registry.endBatch()).toThrow(GraphMisuseError);
  });

  it('detached observers hear nothing further', () => {
    const onNodeAdded = vi.fn();
    const observer: GraphObserver = { onNodeAdded };
    registry.attachObserver(observer);
    registry.attachObserver(observer);
    registry.createNode('SINK', { x: 0, y: 0 });
    expect(onNodeAdded).toHaveBeenCalledTimes(1);

    expect(registry.detachObserver(observer)).toBe(true);
    expect(registry.detachObserver(observer)).toBe(false);
    registry.createNode('SINK', { x: 0, y: 0 });
    expect(onNodeAdded).toHaveBeenCalledTimes(1);
  });
});

describe('ObserverHub', () => {
  it('logs a failing observer and keeps notifying the rest', () => {
    const logger: Logger = { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() };
    const hub = new ObserverHub(logger);
    const after = vi.fn();
    hub.attach({
      onGraphCleared: () => {
        throw new Error('observer broke');
      },
    });
    hub.attach({ onGraphCleared: after });

    hub.notifyGraphCleared();
    expect(after).toHaveBeenCalledTimes(1);
    expect(logger.error).toHaveBeenCalledWith('observer onGraphCleared failed', { error: 'observer broke' });
  });

  it('lets an observer detach itself mid-notification', () => {
    const hub = new ObserverHub(silentLogger);
    const second = vi.fn();
    const first: GraphObserver = { onGraphSaved: () => hub.detach(first) };
    hub.attach(first);
    hub.attach({ onGraphSaved: second });

    hub.notifyGraphSaved();
    expect(second).toHaveBeenCalledTimes(1);
    expect(hub.size).toBe(1);
  });
});
