import type { Point, PortCounts, PortRole, Size } from '../types';

export function translate(p: Point, dx: number, dy: number): Point {
  return { x: p.x + dx, y: p.y + dy };
}

/** |dx| + |dy| between two points. */
export function manhattanLength(a: Point, b: Point): number {
  return Math.abs(b.x - a.x) + Math.abs(b.y - a.y);
}

export function distance(a: Point, b: Point): number {
  return Math.hypot(b.x - a.x, b.y - a.y);
}

export function isFinitePoint(p: Point): boolean {
  return Number.isFinite(p.x) && Number.isFinite(p.y);
}

// Node box metrics (world units)
export const NODE_MIN_WIDTH = 100;
export const NODE_MIN_HEIGHT = 50;
export const PORT_SPACING = 32;
export const PORT_PADDING = 14;
export const PORT_SIZE = 16;
export const PORT_OFFSET = 4;

/**
 * Node box size for the given port counts: tall enough to stack the larger
 * side with fixed spacing, never below the minimum box.
 */
export function nodeSizeFor(counts: PortCounts): Size {
  const most = Math.max(counts.inputs, counts.outputs);
  const height =
    most > 0
      ? Math.max(NODE_MIN_HEIGHT, PORT_PADDING + (most - 1) * PORT_SPACING + PORT_PADDING * 2)
      : NODE_MIN_HEIGHT;
  return { width: NODE_MIN_WIDTH, height };
}

/** What a port layout gets to see: nothing but role, slot and sibling count. */
export type PortSlot = {
  role: PortRole;
  /** Index among the ports of the same role (not the node-wide port index). */
  slot: number;
  siblings: number;
  nodeSize: Size;
};

/** Returns a port anchor relative to the node's top-left corner. */
export type PortLayout = (slot: PortSlot) => Point;

/**
 * Inputs on the left edge, outputs on the right. Each side is centred in a
 * virtual box of (2n + 1) port sizes around 60% of the node height.
 */
export const defaultPortLayout: PortLayout = ({ role, slot, siblings, nodeSize }) => {
  const centerY = nodeSize.height * 0.6;
  const box = (2 * siblings + 1) * PORT_SIZE;
  const startY = centerY - box / 2;
  return {
    x: role === 'input' ? -PORT_OFFSET : nodeSize.width + PORT_OFFSET,
    y: startY + PORT_SIZE * (2 * slot + 1),
  };
};

/** Cubic curve from an output anchor to an input anchor. */
export type EdgePath = {
  start: Point;
  control1: Point;
  control2: Point;
  end: Point;
};

export const EDGE_MAX_CONTROL_OFFSET = 100;

/** Horizontal-tangent cubic between two anchors; null when either anchor is not finite. */
export function edgePath(start: Point, end: Point): EdgePath | null {
  if (!isFinitePoint(start) || !isFinitePoint(end)) return null;
  const offset = Math.min(Math.abs(end.x - start.x) * 0.5, EDGE_MAX_CONTROL_OFFSET);
  return {
    start,
    control1: { x: start.x + offset, y: start.y },
    control2: { x: end.x - offset, y: end.y },
    end,
  };
}
