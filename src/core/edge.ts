import type { EdgeId, EdgeRecord, NodeId } from '../types';
import { edgePath, type EdgePath } from './coords';
import { fail, GraphMisuseError, ok, type GraphResult } from './errors';
import type { GraphNode } from './node';
import type { Port } from './port';
import type { TopologyRegistry } from './registry';

/** Stored endpoint identifiers; everything an edge knows before resolution. */
export type EdgeLink = Omit<EdgeRecord, 'id'>;

export type EdgeEndpoint = { node: GraphNode; port: Port };

export type ResolvedEndpoints = { source: EdgeEndpoint; target: EdgeEndpoint };

export type EdgeState =
  | { status: 'unresolved' }
  | ({ status: 'resolved' } & ResolvedEndpoints)
  | { status: 'invalidated'; source: EdgeEndpoint | null; target: EdgeEndpoint | null };

export type EdgeStatus = EdgeState['status'];

/**
 * Concrete node handles to use instead of an id lookup, e.g. when an
 * interactive gesture already holds the nodes.
 */
export type PinnedEndpoints = { source?: GraphNode; target?: GraphNode };

function lookupNode(
  registry: TopologyRegistry,
  id: NodeId,
  pinned: GraphNode | undefined,
): GraphNode | undefined {
  if (pinned) return pinned.isDisposed ? undefined : pinned;
  return registry.getNode(id);
}

/**
 * The five checks of the connection protocol, in order, without mutating
 * anything. The first failing check decides the reported kind.
 */
export function validateConnection(
  registry: TopologyRegistry,
  link: EdgeLink,
  pinned: PinnedEndpoints = {},
): GraphResult<ResolvedEndpoints> {
  const sourceNode = lookupNode(registry, link.sourceNodeId, pinned.source);
  const targetNode = lookupNode(registry, link.targetNodeId, pinned.target);
  if (!sourceNode || !targetNode) {
    const missing = sourceNode ? link.targetNodeId : link.sourceNodeId;
    return fail('EndpointNotFound', `Node ${missing} not found`, { nodeId: missing });
  }

  const sourcePort = sourceNode.findPort(link.sourceSocketIndex);
  if (!sourcePort) {
    return fail(
      'PortIndexOutOfRange',
      `Source port ${link.sourceSocketIndex} out of range on node ${sourceNode.id} (${sourceNode.ports.length} ports)`,
      { nodeId: sourceNode.id, index: link.sourceSocketIndex, portCount: sourceNode.ports.length },
    );
  }
  const targetPort = targetNode.findPort(link.targetSocketIndex);
  if (!targetPort) {
    return fail(
      'PortIndexOutOfRange',
      `Target port ${link.targetSocketIndex} out of range on node ${targetNode.id} (${targetNode.ports.length} ports)`,
      { nodeId: targetNode.id, index: link.targetSocketIndex, portCount: targetNode.ports.length },
    );
  }

  if (sourcePort.role !== 'output' || targetPort.role !== 'input') {
    return fail(
      'RoleMismatch',
      `Edges run from an output to an input; got ${sourcePort.role} → ${targetPort.role}`,
      { sourceRole: sourcePort.role, targetRole: targetPort.role },
    );
  }

  if (sourcePort.isConnected || targetPort.isConnected) {
    const taken = sourcePort.isConnected ? sourcePort : targetPort;
    return fail('PortAlreadyConnected', `Port ${taken.index} of node ${taken.node.id} is already connected`, {
      nodeId: taken.node.id,
      index: taken.index,
      edgeId: taken.edge?.id,
    });
  }

  if (sourceNode.owner !== registry || targetNode.owner !== registry) {
    return fail('CrossGraphEdge', 'Both endpoints must belong to the same graph', {
      sourceNodeId: sourceNode.id,
      targetNodeId: targetNode.id,
    });
  }

  return ok({
    source: { node: sourceNode, port: sourcePort },
    target: { node: targetNode, port: targetPort },
  });
}

function isLive(endpoint: EdgeEndpoint | null): endpoint is EdgeEndpoint {
  return endpoint !== null && !endpoint.node.isDisposed && endpoint.port.isLive;
}

/**
 * Directed link between an output port and an input port.
 *
 * Starts `unresolved` holding only ids and indices; {@link resolve} turns it
 * into live handles registered with both nodes and both ports. An edge never
 * removes itself from a registry: once a node it points at goes away it is
 * `invalidated`, and the registry prunes it.
 */
export class Edge {
  private state: EdgeState = { status: 'unresolved' };
  private _path: EdgePath | null = null;

  constructor(
    readonly id: EdgeId,
    readonly link: Readonly<EdgeLink>,
  ) {}

  get status(): EdgeStatus {
    return this.state.status;
  }

  get resolution(): Readonly<EdgeState> {
    return this.state;
  }

  get sourceNodeId(): NodeId {
    return this.link.sourceNodeId;
  }

  get targetNodeId(): NodeId {
    return this.link.targetNodeId;
  }

  get sourceSocketIndex(): number {
    return this.link.sourceSocketIndex;
  }

  get targetSocketIndex(): number {
    return this.link.targetSocketIndex;
  }

  /** Live source endpoint, or undefined when unresolved or no longer valid. */
  get source(): EdgeEndpoint | undefined {
    if (this.state.status === 'unresolved') return undefined;
    return isLive(this.state.source) ? this.state.source : undefined;
  }

  get target(): EdgeEndpoint | undefined {
    if (this.state.status === 'unresolved') return undefined;
    return isLive(this.state.target) ? this.state.target : undefined;
  }

  get path(): EdgePath | null {
    return this._path;
  }

  connectsNode(id: NodeId): boolean {
    return this.link.sourceNodeId === id || this.link.targetNodeId === id;
  }

  validate(registry: TopologyRegistry, pinned?: PinnedEndpoints): GraphResult<ResolvedEndpoints> {
    return validateConnection(registry, this.link, pinned);
  }

  /**
   * Run the connection protocol and, on success, bind to both nodes and
   * both ports. On failure nothing changes and the edge stays unresolved.
   */
  resolve(registry: TopologyRegistry, pinned?: PinnedEndpoints): GraphResult<Edge> {
    if (this.state.status !== 'unresolved') {
      throw new GraphMisuseError(`edge ${this.id} is already ${this.state.status}`);
    }
    const checked = this.validate(registry, pinned);
    if (!checked.ok) return checked;

    const { source, target } = checked.value;
    this.state = { status: 'resolved', source, target };
    source.node.registerIncidentEdge(this);
    // a loop back onto the same node is registered once
    if (target.node !== source.node) target.node.registerIncidentEdge(this);
    source.port.connect(this);
    target.port.connect(this);
    this.refreshPath();
    return ok(this);
  }

  /** Recompute the path from the live endpoint positions. */
  refreshPath(): void {
    const source = this.source;
    const target = this.target;
    if (this.state.status !== 'resolved' || !source || !target) {
      this._path = null;
      return;
    }
    const registry = source.node.owner;
    if (!registry) {
      this._path = null;
      return;
    }
    this._path = edgePath(registry.portPosition(source.port), registry.portPosition(target.port));
  }

  /** Clear whichever side points at `deadNode`. */
  invalidate(deadNode: GraphNode): void {
    if (this.state.status === 'unresolved') return;
    const source = this.state.source?.node === deadNode ? null : this.state.source;
    const target = this.state.target?.node === deadNode ? null : this.state.target;
    if (source === this.state.source && target === this.state.target) return;
    this.state = { status: 'invalidated', source, target };
    this._path = null;
  }

  /**
   * @internal Unregister from every still-valid endpoint and drop both
   * handles. Ids and indices stay readable.
   */
  detach(): void {
    if (this.state.status === 'unresolved') return;
    const { source, target } = this.state;
    for (const end of [source, target]) {
      if (!isLive(end)) continue;
      if (end.node.incidentEdges.has(this)) end.node.unregisterIncidentEdge(this);
      if (end.port.edge === this) end.port.disconnect();
    }
    this.state = { status: 'invalidated', source: null, target: null };
    this._path = null;
  }

  toRecord(): EdgeRecord {
    return { id: this.id, ...this.link };
  }
}
