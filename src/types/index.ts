export type NodeId = string;
export type EdgeId = string;
export type NodeType = string;

export type Point = { x: number; y: number };
export type Size = { width: number; height: number };

export type PortRole = 'input' | 'output';

/** Default port counts for a node type. */
export type PortCounts = { inputs: number; outputs: number };

/** Flat, persisted description of a node. Ports are rebuilt from the counts. */
export type NodeRecord = {
  id: NodeId;
  x: number;
  y: number;
  type: NodeType;
  inputCount: number;
  outputCount: number;
};

/** Flat, persisted description of an edge. */
export type EdgeRecord = {
  id: EdgeId;
  sourceNodeId: NodeId;
  sourceSocketIndex: number;
  targetNodeId: NodeId;
  targetSocketIndex: number;
};

export type GraphDocument = {
  version: string;
  nodes: NodeRecord[];
  edges: EdgeRecord[];
};
