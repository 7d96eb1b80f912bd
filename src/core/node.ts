import type { NodeId, NodeRecord, NodeType, Point, PortCounts } from '../types';
import { manhattanLength } from './coords';
import type { Edge } from './edge';
import { GraphError, GraphMisuseError } from './errors';
import { Port } from './port';
import type { TopologyRegistry } from './registry';

export type MoveAnnouncement = { from: Point; to: Point };

/**
 * Graph vertex. Owns its ports and a back-reference set of incident edges.
 *
 * Every mutator here is driven by the owning {@link TopologyRegistry}; holders
 * of a node handle read from it but never write through it.
 */
export class GraphNode {
  private _owner: TopologyRegistry | null;
  private _type: NodeType;
  private _position: Point;
  private _ports: Port[] = [];
  private _inputCount = 0;
  private _outputCount = 0;
  private readonly incident = new Set<Edge>();
  /** Position at the last announced move; jitter accumulates against it. */
  private announced: Point;

  constructor(
    readonly id: NodeId,
    owner: TopologyRegistry,
    type: NodeType,
    position: Point,
    counts: PortCounts,
  ) {
    this._owner = owner;
    this._type = type;
    this._position = { x: position.x, y: position.y };
    this.announced = this._position;
    this.rebuildPorts(type, counts);
  }

  /** The registry this node lives in, or null once disposed. */
  get owner(): TopologyRegistry | null {
    return this._owner;
  }

  get isDisposed(): boolean {
    return this._owner === null;
  }

  get type(): NodeType {
    return this._type;
  }

  get position(): Point {
    return { x: this._position.x, y: this._position.y };
  }

  get ports(): readonly Port[] {
    return this._ports;
  }

  get inputCount(): number {
    return this._inputCount;
  }

  get outputCount(): number {
    return this._outputCount;
  }

  inputs(): Port[] {
    return this._ports.filter((p) => p.role === 'input');
  }

  outputs(): Port[] {
    return this._ports.filter((p) => p.role === 'output');
  }

  get incidentEdges(): ReadonlySet<Edge> {
    return this.incident;
  }

  get degree(): number {
    return this.incident.size;
  }

  findPort(index: number): Port | undefined {
    if (!Number.isInteger(index) || index < 0 || index >= this._ports.length) return undefined;
    const port = this._ports[index];
    return port.isLive ? port : undefined;
  }

  getPort(index: number): Port {
    const port = this.findPort(index);
    if (!port) {
      throw new GraphError(
        'PortIndexOutOfRange',
        `Port index ${index} is out of range [0, ${this._ports.length}) on node ${this.id}`,
        { nodeId: this.id, index, portCount: this._ports.length },
      );
    }
    return port;
  }

  registerIncidentEdge(edge: Edge): void {
    if (this.incident.has(edge)) {
      throw new GraphMisuseError(`edge ${edge.id} is already registered with node ${this.id}`);
    }
    this.incident.add(edge);
  }

  unregisterIncidentEdge(edge: Edge): void {
    if (!this.incident.delete(edge)) {
      throw new GraphMisuseError(`edge ${edge.id} is not registered with node ${this.id}`);
    }
  }

  /**
   * @internal Discard and regenerate the port list. Callers must have removed
   * every incident edge first: the old ports and their indices go away here.
   */
  rebuildPorts(type: NodeType, counts: PortCounts): void {
    if (this.incident.size > 0) {
      throw new GraphMisuseError(
        `node ${this.id} still has ${this.incident.size} incident edge(s); remove them before rebuilding ports`,
      );
    }
    for (const port of this._ports) port.release();
    const ports: Port[] = [];
    for (let i = 0; i < counts.inputs; i++) ports.push(new Port(this, 'input', ports.length, i));
    for (let i = 0; i < counts.outputs; i++) ports.push(new Port(this, 'output', ports.length, i));
    this._ports = ports;
    this._type = type;
    this._inputCount = counts.inputs;
    this._outputCount = counts.outputs;
  }

  /**
   * @internal Take the new position. Returns the announcement to make when the
   * distance from the last announced position exceeds `threshold`, else null.
   */
  place(position: Point, threshold: number): MoveAnnouncement | null {
    this._position = { x: position.x, y: position.y };
    if (manhattanLength(this.announced, this._position) <= threshold) return null;
    const from = this.announced;
    this.announced = this._position;
    return { from: { ...from }, to: this.position };
  }

  toRecord(): NodeRecord {
    return {
      id: this.id,
      x: this._position.x,
      y: this._position.y,
      type: this._type,
      inputCount: this._inputCount,
      outputCount: this._outputCount,
    };
  }

  /**
   * @internal Invalidate every still-valid incident edge, then release the
   * ports. Runs after the registry dropped the node from its map.
   */
  dispose(): void {
    for (const edge of [...this.incident]) {
      edge.invalidate(this);
    }
    this.incident.clear();
    for (const port of this._ports) port.release();
    this._owner = null;
  }
}
