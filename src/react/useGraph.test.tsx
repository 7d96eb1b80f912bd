/* @vitest-environment jsdom */

import React, { act } from 'react';
import ReactDOM from 'react-dom/client';
import { describe, it, expect, beforeEach } from 'vitest';
import { TopologyRegistry } from '../core/registry';
import { unwrap } from '../core/errors';
import { silentLogger } from '../core/logger';
import { createGraphStore, type GraphStoreApi } from '../state/store';
import { useEdgeView, useGraphActions, useGraphState, useNodeIds, useNodeView } from './useGraph';

async function render(ui: React.ReactElement) {
  const container = document.createElement('div');
  document.body.appendChild(container);
  const root = ReactDOM.createRoot(container);
  await act(async () => {
    root.render(ui);
  });
  return { container, unmount: () => root.unmount() };
}

function NodeList({ store }: { store: GraphStoreApi }) {
  const ids = useNodeIds(store);
  const edgeCount = useGraphState(store, (s) => Object.keys(s.edges).length);
  const { removeNode } = useGraphActions(store);
  return (
    <div>
      <span data-testid="ids">{ids.join(',')}</span>
      <span data-testid="edges">{edgeCount}</span>
      <button onClick={() => removeNode('a')}>remove</button>
    </div>
  );
}

function NodeLabel({ store, id }: { store: GraphStoreApi; id: string }) {
  const node = useNodeView(store, id);
  return <span>{node ? `${node.type}@${node.x},${node.y}` : 'gone'}</span>;
}

function EdgeLabel({ store, id }: { store: GraphStoreApi; id: string }) {
  const edge = useEdgeView(store, id);
  return (
    <span>
      {edge ? `${edge.sourceNodeId}:${edge.sourceSocketIndex}->${edge.targetNodeId}:${edge.targetSocketIndex}` : 'none'}
    </span>
  );
}

const text = (root: HTMLElement, testId: string) => root.querySelector(`[data-testid="${testId}"]`)?.textContent;

describe('graph hooks', () => {
  let registry: TopologyRegistry;
  let store: GraphStoreApi;

  beforeEach(() => {
    registry = new TopologyRegistry({ logger: silentLogger });
    unwrap(registry.createNode('SOURCE', { x: 0, y: 0 }, { id: 'a' }));
    store = createGraphStore(registry);
  });

  it('re-renders when the registry changes', async () => {
    const { container, unmount } = await render(<NodeList store={store} />);
    expect(text(container, 'ids')).toBe('a');
    expect(text(container, 'edges')).toBe('0');

    await act(async () => {
      unwrap(registry.createNode('SINK', { x: 200, y: 0 }, { id: 'b' }));
      unwrap(registry.createEdge('a', 0, 'b', 0));
    });
    expect(text(container, 'ids')).toBe('a,b');
    expect(text(container, 'edges')).toBe('1');
    unmount();
  });

  it('actions go through the registry', async () => {
    const { container, unmount } = await render(<NodeList store={store} />);
    const button = container.querySelector('button');
    await act(async () => {
      button?.dispatchEvent(new MouseEvent('click', { bubbles: true }));
    });
    expect(registry.hasNode('a')).toBe(false);
    expect(text(container, 'ids')).toBe('');
    unmount();
  });

  it('useNodeView tracks a single node', async () => {
    const { container, unmount } = await render(<NodeLabel store={store} id="a" />);
    expect(container.textContent).toBe('SOURCE@0,0');

    await act(async () => {
      registry.moveNode('a', { x: 40, y: 10 });
    });
    expect(container.textContent).toBe('SOURCE@40,10');

    await act(async () => {
      registry.deleteNode('a');
    });
    expect(container.textContent).toBe('gone');
    unmount();
  });

  it('useEdgeView follows an edge from creation to removal', async () => {
    const { container, unmount } = await render(<EdgeLabel store={store} id="e" />);
    expect(container.textContent).toBe('none');

    await act(async () => {
      unwrap(registry.createNode('SINK', { x: 200, y: 0 }, { id: 'b' }));
      unwrap(registry.createEdge('a', 0, 'b', 0, { id: 'e' }));
    });
    expect(container.textContent).toBe('a:0->b:0');
    expect(store.getState().edges.e?.path).not.toBeNull();

    await act(async () => {
      registry.deleteEdge('e');
    });
    expect(container.textContent).toBe('none');
    unmount();
  });
});
