import { createStore, type StoreApi } from 'zustand/vanilla';
import type { EdgeId, EdgeRecord, NodeId, NodeRecord, NodeType, Point } from '../types';
import type { EdgePath } from '../core/coords';
import type { Edge } from '../core/edge';
import type { GraphResult } from '../core/errors';
import type { GraphNode } from '../core/node';
import type { GraphObserver, LoadSummary } from '../core/notifications';
import type { CreateNodeOptions, NodeRef, TopologyRegistry } from '../core/registry';

export type NodeView = NodeRecord & { degree: number };
export type EdgeView = EdgeRecord & { path: EdgePath | null };

export type GraphState = {
  readonly nodes: Record<NodeId, NodeView>;
  readonly edges: Record<EdgeId, EdgeView>;
  /** Map of selected node IDs for O(1) membership checks. */
  readonly selected: Record<NodeId, true>;
  /** True while the registry is inside a batch; the mirror catches up at batch end. */
  readonly batching: boolean;
  /** Bumped on every applied change. */
  readonly revision: number;
  readonly lastLoad: LoadSummary | null;
};

export type GraphActions = {
  // Nodes
  addNode: (type: NodeType, position: Point, options?: CreateNodeOptions) => GraphResult<GraphNode>;
  moveNode: (id: NodeId, position: Point) => void;
  removeNode: (id: NodeId) => void;
  /** Remove multiple nodes in one batch. */
  removeNodes: (ids: NodeId[]) => void;
  /** Move all currently selected nodes by dx,dy in WORLD units. */
  moveSelectedBy: (dx: number, dy: number) => void;
  // Edges
  connect: (source: NodeRef, sourceIndex: number, target: NodeRef, targetIndex: number) => GraphResult<Edge>;
  disconnect: (id: EdgeId) => void;
  // Selection
  clearSelection: () => void;
  /** Select only the given node id (single selection). */
  selectOnly: (id: NodeId) => void;
  addToSelection: (id: NodeId) => void;
  removeFromSelection: (id: NodeId) => void;
  toggleInSelection: (id: NodeId) => void;
  /** Delete all currently selected nodes. */
  deleteSelected: () => void;
  /** Rebuild the mirror from the registry. */
  resync: () => void;
  /** Stop mirroring; the store keeps its last state. */
  detach: () => void;
};

export type GraphStore = GraphState & GraphActions;
export type GraphStoreApi = StoreApi<GraphStore>;

function nodeView(node: GraphNode): NodeView {
  return { ...node.toRecord(), degree: node.degree };
}

function edgeView(edge: Edge): EdgeView {
  return { ...edge.toRecord(), path: edge.path };
}

function without<T>(record: Record<string, T>, key: string): Record<string, T> {
  if (!(key in record)) return record;
  const next = { ...record };
  delete next[key];
  return next;
}

/**
 * Read-model of a registry for UI consumers. The store never writes the
 * graph itself: actions go through the registry, and the mirror is updated
 * from the registry's notifications.
 */
export function createGraphStore(registry: TopologyRegistry): GraphStoreApi {
  const store = createStore<GraphStore>()((set, get) => ({
    nodes: {},
    edges: {},
    selected: {},
    batching: registry.isInBatch,
    revision: 0,
    lastLoad: null,

    addNode: (type, position, options) => registry.createNode(type, position, options),
    moveNode: (id, position) => {
      registry.moveNode(id, position);
    },
    removeNode: (id) => {
      registry.deleteNode(id);
    },
    removeNodes: (ids) =>
      registry.batch(() => {
        for (const id of ids) {
          if (registry.hasNode(id)) registry.deleteNode(id);
        }
      }),
    moveSelectedBy: (dx, dy) =>
      registry.batch(() => {
        for (const id of Object.keys(get().selected)) registry.moveNodeBy(id, dx, dy);
      }),

    connect: (source, sourceIndex, target, targetIndex) =>
      registry.createEdge(source, sourceIndex, target, targetIndex),
    disconnect: (id) => {
      registry.deleteEdge(id);
    },

    clearSelection: () => set({ selected: {} }),
    selectOnly: (id) => {
      if (!get().nodes[id]) return;
      set({ selected: { [id]: true } });
    },
    addToSelection: (id) => {
      if (!get().nodes[id]) return;
      set((s) => ({ selected: { ...s.selected, [id]: true } }));
    },
    removeFromSelection: (id) => set((s) => ({ selected: without(s.selected, id) })),
    toggleInSelection: (id) => {
      const s = get();
      if (s.selected[id]) s.removeFromSelection(id);
      else s.addToSelection(id);
    },
    deleteSelected: () => {
      const ids = Object.keys(get().selected);
      if (ids.length === 0) return;
      get().removeNodes(ids);
      set({ selected: {} });
    },

    resync: () =>
      set((s) => {
        const nodes: Record<NodeId, NodeView> = {};
        for (const node of registry.nodes()) nodes[node.id] = nodeView(node);
        const edges: Record<EdgeId, EdgeView> = {};
        for (const edge of registry.edges()) edges[edge.id] = edgeView(edge);
        const selected: Record<NodeId, true> = {};
        for (const id of Object.keys(s.selected)) {
          if (nodes[id]) selected[id] = true;
        }
        return { nodes, edges, selected, revision: s.revision + 1 };
      }),
    detach: () => {
      registry.detachObserver(observer);
    },
  }));

  // Inside a batch only the flag moves; the whole mirror is rebuilt at batch end.
  const apply = (update: (s: GraphState) => Partial<GraphState>) => {
    if (registry.isInBatch) return;
    store.setState((s) => ({ ...update(s), revision: s.revision + 1 }));
  };

  const touchNodes = (nodes: Record<NodeId, NodeView>, ids: NodeId[]): Record<NodeId, NodeView> => {
    const next = { ...nodes };
    for (const id of ids) {
      const node = registry.getNode(id);
      if (node) next[id] = nodeView(node);
    }
    return next;
  };

  const observer: GraphObserver = {
    onNodeAdded: (node) => apply((s) => ({ nodes: { ...s.nodes, [node.id]: nodeView(node) } })),
    onNodeRemoved: (node) =>
      apply((s) => ({ nodes: without(s.nodes, node.id), selected: without(s.selected, node.id) })),
    onNodeMoved: (nodeId) =>
      apply((s) => {
        const node = registry.getNode(nodeId);
        if (!node) return {};
        const edges = { ...s.edges };
        for (const edge of node.incidentEdges) edges[edge.id] = edgeView(edge);
        return { nodes: { ...s.nodes, [nodeId]: nodeView(node) }, edges };
      }),
    onNodeTypeChanged: (node) => apply((s) => ({ nodes: { ...s.nodes, [node.id]: nodeView(node) } })),
    onEdgeAdded: (edge) =>
      apply((s) => ({
        edges: { ...s.edges, [edge.id]: edgeView(edge) },
        nodes: touchNodes(s.nodes, [edge.sourceNodeId, edge.targetNodeId]),
      })),
    onEdgeRemoved: (edge) =>
      apply((s) => ({
        edges: without(s.edges, edge.id),
        nodes: touchNodes(s.nodes, [edge.sourceNodeId, edge.targetNodeId]),
      })),
    onGraphCleared: () => apply(() => ({ nodes: {}, edges: {}, selected: {} })),
    onGraphLoaded: (summary) => store.setState({ lastLoad: summary }),
    onBatchBegin: () => store.setState({ batching: true }),
    onBatchEnd: () => {
      store.setState({ batching: false });
      store.getState().resync();
    },
  };

  registry.attachObserver(observer);
  store.getState().resync();
  return store;
}
