import type { NodeId, Point } from '../types';
import type { Edge } from './edge';
import { GraphMisuseError } from './errors';
import type { Logger } from './logger';
import type { GraphNode } from './node';

export type LoadFailure = {
  entity: 'document' | 'node' | 'edge';
  /** Position of the record in its list; -1 for the document itself. */
  position: number;
  id?: string;
  kind: string;
  message: string;
};

export type LoadSummary = {
  nodesLoaded: number;
  edgesLoaded: number;
  nodesFailed: number;
  edgesFailed: number;
  failures: LoadFailure[];
};

/**
 * Every hook is optional. Add/move/type-change hooks run after the canonical
 * maps are updated; remove hooks run while the entity can still be read.
 */
export interface GraphObserver {
  onNodeAdded?(node: GraphNode): void;
  onNodeRemoved?(node: GraphNode): void;
  onNodeMoved?(nodeId: NodeId, from: Point, to: Point): void;
  onNodeTypeChanged?(node: GraphNode): void;
  onEdgeAdded?(edge: Edge): void;
  onEdgeRemoved?(edge: Edge): void;
  onGraphCleared?(): void;
  onGraphLoaded?(summary: LoadSummary): void;
  onGraphSaved?(): void;
  /** Outermost batch opened. Observers may defer their own work until {@link onBatchEnd}. */
  onBatchBegin?(): void;
  onBatchEnd?(): void;
}

/**
 * Per-registry observer list with batch markers. Batching is only a signal
 * to observers; every individual event is still delivered.
 */
export class ObserverHub {
  private readonly observers: GraphObserver[] = [];
  private depth = 0;

  constructor(private readonly logger: Logger) {}

  attach(observer: GraphObserver): void {
    if (this.observers.includes(observer)) return;
    this.observers.push(observer);
  }

  detach(observer: GraphObserver): boolean {
    const i = this.observers.indexOf(observer);
    if (i < 0) return false;
    this.observers.splice(i, 1);
    return true;
  }

  get size(): number {
    return this.observers.length;
  }

  get inBatch(): boolean {
    return this.depth > 0;
  }

  beginBatch(): void {
    this.depth += 1;
    if (this.depth === 1) this.each('onBatchBegin', (o) => o.onBatchBegin?.());
  }

  endBatch(): void {
    if (this.depth === 0) throw new GraphMisuseError('endBatch without a matching beginBatch');
    this.depth -= 1;
    if (this.depth === 0) this.each('onBatchEnd', (o) => o.onBatchEnd?.());
  }

  notifyNodeAdded(node: GraphNode): void {
    this.each('onNodeAdded', (o) => o.onNodeAdded?.(node));
  }

  notifyNodeRemoved(node: GraphNode): void {
    this.each('onNodeRemoved', (o) => o.onNodeRemoved?.(node));
  }

  notifyNodeMoved(nodeId: NodeId, from: Point, to: Point): void {
    this.each('onNodeMoved', (o) => o.onNodeMoved?.(nodeId, from, to));
  }

  notifyNodeTypeChanged(node: GraphNode): void {
    this.each('onNodeTypeChanged', (o) => o.onNodeTypeChanged?.(node));
  }

  notifyEdgeAdded(edge: Edge): void {
    this.each('onEdgeAdded', (o) => o.onEdgeAdded?.(edge));
  }

  notifyEdgeRemoved(edge: Edge): void {
    this.each('onEdgeRemoved', (o) => o.onEdgeRemoved?.(edge));
  }

  notifyGraphCleared(): void {
    this.each('onGraphCleared', (o) => o.onGraphCleared?.());
  }

  notifyGraphLoaded(summary: LoadSummary): void {
    this.each('onGraphLoaded', (o) => o.onGraphLoaded?.(summary));
  }

  notifyGraphSaved(): void {
    this.each('onGraphSaved', (o) => o.onGraphSaved?.());
  }

  private each(hook: keyof GraphObserver, call: (observer: GraphObserver) => void): void {
    // snapshot: observers may detach themselves while being notified
    for (const observer of [...this.observers]) {
      try {
        call(observer);
      } catch (err) {
        this.logger.error(`observer ${hook} failed`, {
          error: err instanceof Error ? err.message : String(err),
        });
      }
    }
  }
}
