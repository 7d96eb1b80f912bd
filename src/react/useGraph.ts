import { useStore } from 'zustand';
import { useShallow } from 'zustand/react/shallow';
import type { EdgeId, NodeId } from '../types';
import type { EdgeView, GraphActions, GraphState, GraphStore, GraphStoreApi, NodeView } from '../state/store';

/** Subscribe a component to a slice of a graph store. */
export function useGraphState<T>(store: GraphStoreApi, selector: (state: GraphState) => T): T {
  return useStore(store, selector);
}

export function useNodeView(store: GraphStoreApi, id: NodeId): NodeView | undefined {
  return useStore(store, (s) => s.nodes[id]);
}

export function useEdgeView(store: GraphStoreApi, id: EdgeId): EdgeView | undefined {
  return useStore(store, (s) => s.edges[id]);
}

export function useNodeIds(store: GraphStoreApi): NodeId[] {
  return useStore(store, useShallow((s) => Object.keys(s.nodes)));
}

export function useGraphActions(store: GraphStoreApi): GraphActions {
  return useStore(
    store,
    useShallow(
      (s: GraphStore): GraphActions => ({
        addNode: s.addNode,
        moveNode: s.moveNode,
        removeNode: s.removeNode,
        removeNodes: s.removeNodes,
        moveSelectedBy: s.moveSelectedBy,
        connect: s.connect,
        disconnect: s.disconnect,
        clearSelection: s.clearSelection,
        selectOnly: s.selectOnly,
        addToSelection: s.addToSelection,
        removeFromSelection: s.removeFromSelection,
        toggleInSelection: s.toggleInSelection,
        deleteSelected: s.deleteSelected,
        resync: s.resync,
        detach: s.detach,
      }),
    ),
  );
}
