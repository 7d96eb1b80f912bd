import { v4 as uuid } from 'uuid';
import { defaultPortLayout, type PortLayout } from './coords';
import { consoleLogger, type Logger } from './logger';
import { NodeTypeCatalog } from './nodeTypes';

/** Manhattan distance a node must travel before a move is announced. */
export const DEFAULT_MOVE_THRESHOLD = 5;
/** Release radius within which a dangling connection snaps to the nearest free input. */
export const MAGNET_RADIUS = 24;
export const AUTOSAVE_DELAY_MS = 2000;
export const DOCUMENT_VERSION = '1.0';
/** Upper bound on inputs or outputs of a single node. */
export const MAX_PORT_COUNT = 256;

export type RegistryOptions = {
  logger: Logger;
  nodeTypes: NodeTypeCatalog;
  moveThreshold: number;
  magnetRadius: number;
  portLayout: PortLayout;
  createId: () => string;
};

export function resolveRegistryOptions(options: Partial<RegistryOptions> = {}): RegistryOptions {
  const moveThreshold = options.moveThreshold ?? DEFAULT_MOVE_THRESHOLD;
  if (!Number.isFinite(moveThreshold) || moveThreshold < 0) {
    throw new RangeError(`moveThreshold must be a non-negative number, got ${moveThreshold}`);
  }
  const magnetRadius = options.magnetRadius ?? MAGNET_RADIUS;
  if (!Number.isFinite(magnetRadius) || magnetRadius < 0) {
    throw new RangeError(`magnetRadius must be a non-negative number, got ${magnetRadius}`);
  }
  return {
    logger: options.logger ?? consoleLogger,
    nodeTypes: options.nodeTypes ?? new NodeTypeCatalog(),
    moveThreshold,
    magnetRadius,
    portLayout: options.portLayout ?? defaultPortLayout,
    createId: options.createId ?? (() => uuid()),
  };
}
