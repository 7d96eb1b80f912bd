import type {
  EdgeId,
  GraphDocument,
  NodeId,
  NodeType,
  Point,
  PortCounts,
  Size,
} from '../types';
import { distance, nodeSizeFor, translate } from './coords';
import { DOCUMENT_VERSION, MAX_PORT_COUNT, resolveRegistryOptions, type RegistryOptions } from './config';
import { readEdgeRecord, readEnvelope, readNodeRecord } from './document';
import { Edge, validateConnection, type PinnedEndpoints, type ResolvedEndpoints } from './edge';
import { fail, GraphMisuseError, ok, type GraphResult } from './errors';
import { ConnectionGesture } from './gesture';
import { shortId, type Logger } from './logger';
import { GraphNode } from './node';
import { ObserverHub, type GraphObserver, type LoadFailure, type LoadSummary } from './notifications';
import type { NodeTypeCatalog } from './nodeTypes';
import type { Port } from './port';

/** A node handle, or the id to look it up by. */
export type NodeRef = GraphNode | NodeId;

export type CreateNodeOptions = {
  id?: NodeId;
  /** Override the type's default input count. */
  inputCount?: number;
  /** Override the type's default output count. */
  outputCount?: number;
};

export type CreateEdgeOptions = { id?: EdgeId };

export type GraphStats = {
  nodeCount: number;
  edgeCount: number;
  nodesByType: Record<NodeType, number>;
};

function assertPoint(position: Point, op: string): void {
  if (!Number.isFinite(position.x) || !Number.isFinite(position.y)) {
    throw new RangeError(`${op}: position must be finite, got (${position.x}, ${position.y})`);
  }
}

function assertPortCount(n: number, label: string): void {
  if (!Number.isInteger(n) || n < 0 || n > MAX_PORT_COUNT) {
    throw new RangeError(`${label} must be an integer in [0, ${MAX_PORT_COUNT}], got ${n}`);
  }
}

function idOf(ref: NodeRef): NodeId {
  return typeof ref === 'string' ? ref : ref.id;
}

function pinOf(ref: NodeRef): GraphNode | undefined {
  return typeof ref === 'string' ? undefined : ref;
}

/**
 * Sole owner and sole writer of the canonical node and edge maps.
 *
 * Every mutation goes: validate → apply to the maps and to the entities'
 * back-references → notify observers. Failures are returned as
 * {@link GraphResult} and leave the registry untouched.
 */
export class TopologyRegistry {
  readonly options: RegistryOptions;
  private readonly nodeMap = new Map<NodeId, GraphNode>();
  private readonly edgeMap = new Map<EdgeId, Edge>();
  private readonly hub: ObserverHub;
  private gesture: ConnectionGesture | null = null;

  constructor(options: Partial<RegistryOptions> = {}) {
    this.options = resolveRegistryOptions(options);
    this.hub = new ObserverHub(this.options.logger);
  }

  get logger(): Logger {
    return this.options.logger;
  }

  get nodeTypes(): NodeTypeCatalog {
    return this.options.nodeTypes;
  }

  // --- Observers ---

  attachObserver(observer: GraphObserver): void {
    this.hub.attach(observer);
  }

  detachObserver(observer: GraphObserver): boolean {
    return this.hub.detach(observer);
  }

  beginBatch(): void {
    this.hub.beginBatch();
  }

  endBatch(): void {
    this.hub.endBatch();
  }

  get isInBatch(): boolean {
    return this.hub.inBatch;
  }

  /** Run `fn` between beginBatch/endBatch, closing the batch even if it throws. */
  batch<T>(fn: () => T): T {
    this.beginBatch();
    try {
      return fn();
    } finally {
      this.endBatch();
    }
  }

  // --- Queries ---

  getNode(id: NodeId): GraphNode | undefined {
    return this.nodeMap.get(id);
  }

  getEdge(id: EdgeId): Edge | undefined {
    return this.edgeMap.get(id);
  }

  hasNode(id: NodeId): boolean {
    return this.nodeMap.has(id);
  }

  hasEdge(id: EdgeId): boolean {
    return this.edgeMap.has(id);
  }

  nodes(): GraphNode[] {
    return [...this.nodeMap.values()];
  }

  edges(): Edge[] {
    return [...this.edgeMap.values()];
  }

  get nodeCount(): number {
    return this.nodeMap.size;
  }

  get edgeCount(): number {
    return this.edgeMap.size;
  }

  /** Edges touching a node, from its own incident set. Empty for unknown ids. */
  edgesOf(id: NodeId): Edge[] {
    const node = this.nodeMap.get(id);
    return node ? [...node.incidentEdges] : [];
  }

  stats(): GraphStats {
    const nodesByType: Record<NodeType, number> = {};
    for (const node of this.nodeMap.values()) {
      nodesByType[node.type] = (nodesByType[node.type] ?? 0) + 1;
    }
    return { nodeCount: this.nodeMap.size, edgeCount: this.edgeMap.size, nodesByType };
  }

  nodeSize(node: GraphNode): Size {
    return nodeSizeFor({ inputs: node.inputCount, outputs: node.outputCount });
  }

  /** World position of a port anchor, placed by the configured port layout. */
  portPosition(port: Port): Point {
    const node = port.node;
    const offset = this.options.portLayout({
      role: port.role,
      slot: port.slot,
      siblings: port.role === 'input' ? node.inputCount : node.outputCount,
      nodeSize: this.nodeSize(node),
    });
    const origin = node.position;
    return translate(origin, offset.x, offset.y);
  }

  /** Closest unoccupied input within `radius` of `point`, skipping ports of `exclude`. */
  findFreeInputNear(point: Point, radius: number, exclude?: GraphNode): Port | undefined {
    let best: Port | undefined;
    let bestDistance = radius;
    for (const node of this.nodeMap.values()) {
      if (node === exclude) continue;
      for (const port of node.inputs()) {
        if (port.isConnected) continue;
        const d = distance(this.portPosition(port), point);
        if (d < bestDistance) {
          bestDistance = d;
          best = port;
        }
      }
    }
    return best;
  }

  // --- Nodes ---

  createNode(type: NodeType, position: Point, options: CreateNodeOptions = {}): GraphResult<GraphNode> {
    assertPoint(position, 'createNode');
    const defaults = this.nodeTypes.get(type);
    if (!defaults && options.inputCount === undefined && options.outputCount === undefined) {
      return fail('UnknownNodeType', `Unknown node type ${type}`, { type });
    }
    const counts: PortCounts = {
      inputs: options.inputCount ?? defaults?.inputs ?? 0,
      outputs: options.outputCount ?? defaults?.outputs ?? 0,
    };
    assertPortCount(counts.inputs, 'inputCount');
    assertPortCount(counts.outputs, 'outputCount');

    const id = options.id ?? this.options.createId();
    if (this.nodeMap.has(id)) {
      return fail('DuplicateId', `Node id ${id} is already in use`, { nodeId: id });
    }

    const node = new GraphNode(id, this, type, position, counts);
    this.nodeMap.set(node.id, node);
    this.logger.debug('node added', { nodeId: shortId(id), type });
    this.hub.notifyNodeAdded(node);
    return ok(node);
  }

  deleteNode(id: NodeId): boolean {
    const node = this.nodeMap.get(id);
    if (!node) {
      this.logger.warn('deleteNode: node not found', { nodeId: id });
      return false;
    }
    this.cancelConnectionFrom(node);
    for (const edge of [...node.incidentEdges]) {
      this.removeEdge(edge);
    }
    this.nodeMap.delete(id);
    this.hub.notifyNodeRemoved(node);
    node.dispose();
    this.logger.debug('node removed', { nodeId: shortId(id) });
    return true;
  }

  /** Change the type tag. Incident edges are removed before the ports are rebuilt. */
  setNodeType(id: NodeId, type: NodeType): GraphResult<GraphNode> {
    const node = this.nodeMap.get(id);
    if (!node) return fail('EndpointNotFound', `Node ${id} not found`, { nodeId: id });
    const counts = this.nodeTypes.get(type);
    if (!counts) return fail('UnknownNodeType', `Unknown node type ${type}`, { type });
    assertPortCount(counts.inputs, 'inputCount');
    assertPortCount(counts.outputs, 'outputCount');
    this.rebuildPorts(node, type, counts);
    return ok(node);
  }

  /** Change the port counts, keeping the type tag. Same cascade as {@link setNodeType}. */
  setNodePortCounts(id: NodeId, inputCount: number, outputCount: number): GraphResult<GraphNode> {
    const node = this.nodeMap.get(id);
    if (!node) return fail('EndpointNotFound', `Node ${id} not found`, { nodeId: id });
    assertPortCount(inputCount, 'inputCount');
    assertPortCount(outputCount, 'outputCount');
    this.rebuildPorts(node, node.type, { inputs: inputCount, outputs: outputCount });
    return ok(node);
  }

  private rebuildPorts(node: GraphNode, type: NodeType, counts: PortCounts): void {
    this.cancelConnectionFrom(node);
    const doomed = [...node.incidentEdges];
    for (const edge of doomed) {
      this.removeEdge(edge);
    }
    node.rebuildPorts(type, counts);
    this.logger.debug('node ports rebuilt', {
      nodeId: shortId(node.id),
      type,
      inputs: counts.inputs,
      outputs: counts.outputs,
      edgesRemoved: doomed.length,
    });
    this.hub.notifyNodeTypeChanged(node);
  }

  /**
   * The only way positions change. Edge paths are refreshed and a move is
   * announced once the node has travelled past the move threshold.
   */
  moveNode(id: NodeId, position: Point): boolean {
    assertPoint(position, 'moveNode');
    const node = this.nodeMap.get(id);
    if (!node) {
      this.logger.warn('moveNode: node not found', { nodeId: id });
      return false;
    }
    const moved = node.place(position, this.options.moveThreshold);
    if (moved) {
      for (const edge of node.incidentEdges) edge.refreshPath();
      this.hub.notifyNodeMoved(node.id, moved.from, moved.to);
    }
    return true;
  }

  moveNodeBy(id: NodeId, dx: number, dy: number): boolean {
    const node = this.nodeMap.get(id);
    if (!node) {
      this.logger.warn('moveNodeBy: node not found', { nodeId: id });
      return false;
    }
    return this.moveNode(id, translate(node.position, dx, dy));
  }

  // --- Edges ---

  /**
   * Connect an output port to an input port. Both endpoints exist already, so
   * the edge resolves on the spot; any failure leaves the registry unchanged.
   */
  createEdge(
    source: NodeRef,
    sourceIndex: number,
    target: NodeRef,
    targetIndex: number,
    options: CreateEdgeOptions = {},
  ): GraphResult<Edge> {
    const id = options.id ?? this.options.createId();
    if (this.edgeMap.has(id)) {
      return fail('DuplicateId', `Edge id ${id} is already in use`, { edgeId: id });
    }
    const edge = new Edge(id, {
      sourceNodeId: idOf(source),
      sourceSocketIndex: sourceIndex,
      targetNodeId: idOf(target),
      targetSocketIndex: targetIndex,
    });
    const resolved = edge.resolve(this, { source: pinOf(source), target: pinOf(target) });
    if (!resolved.ok) {
      this.logger.debug('createEdge rejected', { kind: resolved.error.kind, message: resolved.error.message });
      return resolved;
    }
    this.insertEdge(edge);
    return ok(edge);
  }

  /** The checks {@link createEdge} would run, without creating anything. */
  checkConnection(
    source: NodeRef,
    sourceIndex: number,
    target: NodeRef,
    targetIndex: number,
  ): GraphResult<ResolvedEndpoints> {
    const pinned: PinnedEndpoints = { source: pinOf(source), target: pinOf(target) };
    return validateConnection(
      this,
      {
        sourceNodeId: idOf(source),
        sourceSocketIndex: sourceIndex,
        targetNodeId: idOf(target),
        targetSocketIndex: targetIndex,
      },
      pinned,
    );
  }

  deleteEdge(id: EdgeId): boolean {
    const edge = this.edgeMap.get(id);
    if (!edge) {
      this.logger.warn('deleteEdge: edge not found', { edgeId: id });
      return false;
    }
    this.removeEdge(edge);
    return true;
  }

  private insertEdge(edge: Edge): void {
    this.edgeMap.set(edge.id, edge);
    this.logger.debug('edge added', {
      edgeId: shortId(edge.id),
      from: `${shortId(edge.sourceNodeId)}:${edge.sourceSocketIndex}`,
      to: `${shortId(edge.targetNodeId)}:${edge.targetSocketIndex}`,
    });
    this.hub.notifyEdgeAdded(edge);
  }

  private removeEdge(edge: Edge): void {
    edge.detach();
    this.edgeMap.delete(edge.id);
    this.hub.notifyEdgeRemoved(edge);
  }

  // --- Interactive connection ---

  /**
   * Start a connection gesture from a concrete port. A gesture already in
   * flight is cancelled first.
   */
  beginConnection(port: Port, pointer: Point): ConnectionGesture {
    if (port.node.owner !== this || !port.isLive) {
      throw new GraphMisuseError(`port ${port.index} of node ${port.node.id} is not a live port of this graph`);
    }
    this.gesture?.cancel();
    const gesture = new ConnectionGesture(this, port, pointer, (settled) => {
      if (this.gesture === settled) this.gesture = null;
    });
    this.gesture = gesture;
    return gesture;
  }

  get activeConnection(): ConnectionGesture | null {
    return this.gesture;
  }

  private cancelConnectionFrom(node: GraphNode): void {
    if (this.gesture && this.gesture.source.node === node) this.gesture.cancel();
  }

  // --- Whole graph ---

  /**
   * Drop everything. The identity maps are emptied before any entity is torn
   * down, so nothing reachable by id is half-destroyed.
   */
  clear(): void {
    const edges = [...this.edgeMap.values()];
    const nodes = [...this.nodeMap.values()];
    this.edgeMap.clear();
    this.nodeMap.clear();
    this.gesture?.cancel();
    for (const edge of edges) edge.detach();
    for (const node of nodes) node.dispose();
    this.logger.debug('graph cleared', { nodes: nodes.length, edges: edges.length });
    this.hub.notifyGraphCleared();
  }

  /**
   * Replace the graph with the content of a document.
   *
   * Phase A reads every node and every edge; nodes are inserted, edges are
   * held unresolved. Phase B resolves the edges once all nodes exist. Each
   * record that fails is skipped and reported; the rest still load.
   */
  loadFromDocument(raw: unknown): LoadSummary {
    const summary: LoadSummary = { nodesLoaded: 0, edgesLoaded: 0, nodesFailed: 0, edgesFailed: 0, failures: [] };
    const envelope = readEnvelope(raw);
    if (!envelope.ok) {
      summary.failures.push({
        entity: 'document',
        position: -1,
        kind: envelope.error.kind,
        message: envelope.error.message,
      });
      this.logger.warn('loadFromDocument: rejected document', { message: envelope.error.message });
      return summary;
    }

    const record = (failure: LoadFailure): void => {
      summary.failures.push(failure);
      if (failure.entity === 'node') summary.nodesFailed += 1;
      else summary.edgesFailed += 1;
    };

    this.batch(() => {
      this.clear();

      // Phase A: nodes
      envelope.value.nodes.forEach((rawNode, position) => {
        const draft = readNodeRecord(rawNode);
        if (!draft.ok) {
          record({ entity: 'node', position, id: idField(draft.error.details), kind: draft.error.kind, message: draft.error.message });
          return;
        }
        const { id, x, y, type, inputCount, outputCount } = draft.value;
        const created = this.tryCreateNode(type, { x, y }, { id, inputCount, outputCount });
        if (!created.ok) {
          record({ entity: 'node', position, id, kind: created.error.kind, message: created.error.message });
          return;
        }
        summary.nodesLoaded += 1;
      });

      // Phase A: edges, unresolved
      const pending: Array<{ position: number; edge: Edge }> = [];
      const seen = new Set<EdgeId>();
      envelope.value.edges.forEach((rawEdge, position) => {
        const read = readEdgeRecord(rawEdge);
        if (!read.ok) {
          record({ entity: 'edge', position, id: idField(read.error.details), kind: read.error.kind, message: read.error.message });
          return;
        }
        const { id, ...link } = read.value;
        if (seen.has(id)) {
          record({ entity: 'edge', position, id, kind: 'DuplicateId', message: `Edge id ${id} appears more than once` });
          return;
        }
        seen.add(id);
        pending.push({ position, edge: new Edge(id, link) });
      });

      // Phase B: resolve against the complete node set
      for (const { position, edge } of pending) {
        const resolved = edge.resolve(this);
        if (!resolved.ok) {
          record({ entity: 'edge', position, id: edge.id, kind: resolved.error.kind, message: resolved.error.message });
          continue;
        }
        this.insertEdge(edge);
        summary.edgesLoaded += 1;
      }

      if (summary.failures.length > 0) {
        this.logger.warn('document loaded with failures', {
          nodesFailed: summary.nodesFailed,
          edgesFailed: summary.edgesFailed,
        });
      }
      this.logger.info('document loaded', { nodes: summary.nodesLoaded, edges: summary.edgesLoaded });
      this.hub.notifyGraphLoaded(summary);
    });
    return summary;
  }

  /** {@link createNode} with argument range errors reported as malformed input. */
  private tryCreateNode(type: NodeType, position: Point, options: CreateNodeOptions): GraphResult<GraphNode> {
    try {
      return this.createNode(type, position, options);
    } catch (err) {
      if (!(err instanceof RangeError)) throw err;
      return fail('MalformedDocumentEntity', err.message, { id: options.id });
    }
  }

  /** Flat document in insertion order; writers only emit current attribute names. */
  saveToDocument(): GraphDocument {
    const doc: GraphDocument = {
      version: DOCUMENT_VERSION,
      nodes: [...this.nodeMap.values()].map((node) => node.toRecord()),
      edges: [...this.edgeMap.values()].map((edge) => edge.toRecord()),
    };
    this.hub.notifyGraphSaved();
    return doc;
  }
}

function idField(details: Readonly<Record<string, unknown>>): string | undefined {
  return typeof details.id === 'string' ? details.id : undefined;
}
