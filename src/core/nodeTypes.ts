import type { NodeType, PortCounts } from '../types';

export const BUILTIN_NODE_TYPES: Readonly<Record<NodeType, PortCounts>> = {
  SOURCE: { inputs: 0, outputs: 1 },
  SINK: { inputs: 1, outputs: 0 },
  SPLIT: { inputs: 1, outputs: 2 },
  MERGE: { inputs: 2, outputs: 1 },
  TRANSFORM: { inputs: 1, outputs: 1 },
};

function isPortCount(n: number): boolean {
  return Number.isInteger(n) && n >= 0;
}

/**
 * Type tag → default port counts. Registered types shadow built-ins of the
 * same name; removing a registered type uncovers the built-in again.
 */
export class NodeTypeCatalog {
  private readonly registered = new Map<NodeType, PortCounts>();

  constructor(private readonly builtins: Readonly<Record<NodeType, PortCounts>> = BUILTIN_NODE_TYPES) {}

  register(type: NodeType, counts: PortCounts): void {
    if (!type) throw new RangeError('Node type name must not be empty');
    if (!isPortCount(counts.inputs) || !isPortCount(counts.outputs)) {
      throw new RangeError(`Port counts for ${type} must be non-negative integers`);
    }
    this.registered.set(type, { inputs: counts.inputs, outputs: counts.outputs });
  }

  /** Returns false when the type was not registered at runtime. Built-ins cannot be removed. */
  unregister(type: NodeType): boolean {
    return this.registered.delete(type);
  }

  has(type: NodeType): boolean {
    return this.registered.has(type) || Object.prototype.hasOwnProperty.call(this.builtins, type);
  }

  get(type: NodeType): PortCounts | undefined {
    const counts = this.registered.get(type) ?? (this.has(type) ? this.builtins[type] : undefined);
    return counts ? { ...counts } : undefined;
  }

  /** Sorted, de-duplicated list of every known type. */
  types(): NodeType[] {
    const all = new Set<NodeType>([...Object.keys(this.builtins), ...this.registered.keys()]);
    return [...all].sort();
  }
}
