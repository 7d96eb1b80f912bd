import type { Point } from '../types';
import { edgePath, type EdgePath } from './coords';
import type { Edge } from './edge';
import type { GraphError } from './errors';
import type { Port } from './port';
import type { TopologyRegistry } from './registry';

export type ConnectionFeedback = 'none' | 'accept' | 'reject';
export type GesturePhase = 'active' | 'committed' | 'cancelled';

export type ConnectionOutcome =
  | { status: 'connected'; edge: Edge }
  | { status: 'rejected'; error: GraphError }
  | { status: 'cancelled' };

/**
 * Cheap live check used while dragging: role, occupancy and distinct nodes.
 * Ownership and index checks are left to the full protocol on release.
 */
export function canPreviewConnect(source: Port, candidate: Port): boolean {
  return (
    source.isLive &&
    candidate.isLive &&
    source.role === 'output' &&
    candidate.role === 'input' &&
    !source.isConnected &&
    !candidate.isConnected &&
    candidate.node !== source.node
  );
}

/**
 * Press → move* → release|cancel. Moving never mutates the graph; releasing
 * runs the full connection protocol exactly once. Created through
 * {@link TopologyRegistry.beginConnection}.
 */
export class ConnectionGesture {
  private _phase: GesturePhase = 'active';
  private _pointer: Point;
  private _hovered: Port | null = null;
  private _feedback: ConnectionFeedback = 'none';

  constructor(
    private readonly registry: TopologyRegistry,
    readonly source: Port,
    pointer: Point,
    private readonly onSettled: (gesture: ConnectionGesture) => void,
  ) {
    this._pointer = { x: pointer.x, y: pointer.y };
  }

  get phase(): GesturePhase {
    return this._phase;
  }

  get pointer(): Point {
    return { x: this._pointer.x, y: this._pointer.y };
  }

  get hovered(): Port | null {
    return this._hovered;
  }

  get feedback(): ConnectionFeedback {
    return this._feedback;
  }

  /** Ghost curve from the source anchor to the pointer. */
  preview(): EdgePath | null {
    if (this._phase !== 'active' || !this.source.isLive) return null;
    return edgePath(this.registry.portPosition(this.source), this._pointer);
  }

  move(pointer: Point, hovered: Port | null = null): ConnectionFeedback {
    if (this._phase !== 'active') return 'none';
    this._pointer = { x: pointer.x, y: pointer.y };
    this._hovered = hovered;
    if (!hovered) this._feedback = 'none';
    else this._feedback = canPreviewConnect(this.source, hovered) ? 'accept' : 'reject';
    return this._feedback;
  }

  /**
   * Commit onto `target`. A missing target, a non-input, or a port on the
   * source node falls back to the nearest free input within the magnet
   * radius of the last pointer; with none in reach the gesture cancels.
   */
  release(target: Port | null = null): ConnectionOutcome {
    if (this._phase !== 'active') return { status: 'cancelled' };

    let resolved: Port | null | undefined = target;
    if (!resolved || resolved.role !== 'input' || resolved.node === this.source.node) {
      resolved = this.registry.findFreeInputNear(this._pointer, this.registry.options.magnetRadius, this.source.node);
    }
    if (!resolved) {
      this.cancel();
      return { status: 'cancelled' };
    }

    const result = this.registry.createEdge(this.source.node, this.source.index, resolved.node, resolved.index);
    this.settle('committed');
    return result.ok ? { status: 'connected', edge: result.value } : { status: 'rejected', error: result.error };
  }

  cancel(): void {
    if (this._phase !== 'active') return;
    this.settle('cancelled');
  }

  private settle(phase: GesturePhase): void {
    this._phase = phase;
    this._hovered = null;
    this._feedback = 'none';
    this.onSettled(this);
  }
}
