import type { GraphDocument } from '../types';
import { AUTOSAVE_DELAY_MS } from '../core/config';
import type { GraphObserver } from '../core/notifications';
import type { TopologyRegistry } from '../core/registry';

export type AutosaveOptions = {
  /** Persist a full document. Failures are logged and the changes stay pending. */
  write: (doc: GraphDocument) => Promise<void> | void;
  /** Quiet period before a save, restarted by every change. */
  delayMs?: number;
  enabled?: boolean;
};

/**
 * Persistence writer driven by the notification stream. Changes restart a
 * debounce timer; inside a batch they are only recorded, and the timer is
 * armed once when the outermost batch ends.
 */
export class AutosaveObserver implements GraphObserver {
  private timer: ReturnType<typeof setTimeout> | null = null;
  private inFlight: Promise<boolean> | null = null;
  private pending = false;
  private enabled: boolean;
  private readonly delayMs: number;

  constructor(
    private readonly registry: TopologyRegistry,
    private readonly options: AutosaveOptions,
  ) {
    this.enabled = options.enabled ?? true;
    this.delayMs = options.delayMs ?? AUTOSAVE_DELAY_MS;
    registry.attachObserver(this);
  }

  get hasPendingChanges(): boolean {
    return this.pending;
  }

  get isScheduled(): boolean {
    return this.timer !== null;
  }

  onNodeAdded(): void {
    this.changed();
  }

  onNodeRemoved(): void {
    this.changed();
  }

  onNodeMoved(): void {
    this.changed();
  }

  onNodeTypeChanged(): void {
    this.changed();
  }

  onEdgeAdded(): void {
    this.changed();
  }

  onEdgeRemoved(): void {
    this.changed();
  }

  onGraphCleared(): void {
    this.changed();
  }

  onBatchEnd(): void {
    if (this.enabled && this.pending) this.arm();
  }

  setEnabled(enabled: boolean): void {
    this.enabled = enabled;
    if (!enabled) this.stop();
  }

  get isWriting(): boolean {
    return this.inFlight !== null;
  }

  /**
   * Save now if anything is pending. Resolves to whether a document was
   * written. Only one write runs at a time; a flush during a write waits for
   * it and then saves whatever is still pending.
   */
  async flush(): Promise<boolean> {
    this.stop();
    if (this.inFlight) {
      const written = await this.inFlight;
      return (await this.flush()) || written;
    }
    if (!this.enabled || !this.pending) return false;
    this.pending = false;
    this.inFlight = this.persist(this.registry.saveToDocument());
    try {
      return await this.inFlight;
    } finally {
      this.inFlight = null;
    }
  }

  private async persist(doc: GraphDocument): Promise<boolean> {
    try {
      await this.options.write(doc);
      this.registry.logger.debug('autosave written', { nodes: doc.nodes.length, edges: doc.edges.length });
      return true;
    } catch (err) {
      this.pending = true;
      this.registry.logger.error('autosave failed', { error: err instanceof Error ? err.message : String(err) });
      return false;
    }
  }

  /** Detach from the registry, writing out whatever is still pending. */
  async dispose(): Promise<boolean> {
    this.registry.detachObserver(this);
    return this.flush();
  }

  private changed(): void {
    if (!this.enabled) return;
    this.pending = true;
    if (this.registry.isInBatch) return;
    this.arm();
  }

  private arm(): void {
    this.stop();
    this.timer = setTimeout(() => {
      this.timer = null;
      void this.flush();
    }, this.delayMs);
  }

  private stop(): void {
    if (this.timer !== null) {
      clearTimeout(this.timer);
      this.timer = null;
    }
  }
}
