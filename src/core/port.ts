import type { PortRole } from '../types';
import type { Edge } from './edge';
import { GraphMisuseError } from './errors';
import type { GraphNode } from './node';

/**
 * A typed connection point. Owned by exactly one node; identity is
 * (node, index). Occupancy checks belong to the resolution protocol, not here.
 */
export class Port {
  private occupant: Edge | null = null;
  private released = false;

  constructor(
    readonly node: GraphNode,
    readonly role: PortRole,
    /** Node-wide index: inputs first, outputs continue the sequence. */
    readonly index: number,
    /** Index among ports of the same role. */
    readonly slot: number,
  ) {}

  get edge(): Edge | null {
    return this.occupant;
  }

  get isConnected(): boolean {
    return this.occupant !== null;
  }

  /** False once the parent node rebuilt its ports or was disposed. */
  get isLive(): boolean {
    return !this.released;
  }

  connect(edge: Edge): void {
    if (this.released) {
      throw new GraphMisuseError(`connect on released port ${this.index} of node ${this.node.id}`);
    }
    this.occupant = edge;
  }

  disconnect(): void {
    if (!this.occupant) {
      throw new GraphMisuseError(`disconnect on empty port ${this.index} of node ${this.node.id}`);
    }
    this.occupant = null;
  }

  /** @internal Called by the parent node only. */
  release(): void {
    this.occupant = null;
    this.released = true;
  }
}
