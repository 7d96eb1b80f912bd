import type { TopologyRegistry } from './registry';

/**
 * Walk a registry and report every broken topology invariant as a readable
 * line. An empty list means the graph is consistent.
 */
export function auditTopology(registry: TopologyRegistry): string[] {
  const problems: string[] = [];
  const edgeIds = new Set(registry.edges().map((e) => e.id));

  for (const edge of registry.edges()) {
    if (registry.getEdge(edge.id) !== edge) problems.push(`edge ${edge.id}: registry key does not match`);
    if (edge.status !== 'resolved') {
      problems.push(`edge ${edge.id}: held by the registry while ${edge.status}`);
      continue;
    }
    const source = edge.source;
    const target = edge.target;
    if (!source || !target) {
      problems.push(`edge ${edge.id}: endpoint no longer live`);
      continue;
    }
    if (source.port.role !== 'output') problems.push(`edge ${edge.id}: source port is ${source.port.role}`);
    if (target.port.role !== 'input') problems.push(`edge ${edge.id}: target port is ${target.port.role}`);
    if (source.port.edge !== edge) problems.push(`edge ${edge.id}: source port does not host it`);
    if (target.port.edge !== edge) problems.push(`edge ${edge.id}: target port does not host it`);
    if (!source.node.incidentEdges.has(edge)) problems.push(`edge ${edge.id}: missing from source node incident set`);
    if (!target.node.incidentEdges.has(edge)) problems.push(`edge ${edge.id}: missing from target node incident set`);
    if (source.node.owner !== registry || target.node.owner !== registry) {
      problems.push(`edge ${edge.id}: endpoint owned by another graph`);
    }
    if (registry.getNode(source.node.id) !== source.node || registry.getNode(target.node.id) !== target.node) {
      problems.push(`edge ${edge.id}: endpoint node not registered`);
    }
    if (source.node.id !== edge.sourceNodeId || source.port.index !== edge.sourceSocketIndex) {
      problems.push(`edge ${edge.id}: source handle disagrees with stored link`);
    }
    if (target.node.id !== edge.targetNodeId || target.port.index !== edge.targetSocketIndex) {
      problems.push(`edge ${edge.id}: target handle disagrees with stored link`);
    }
  }

  for (const node of registry.nodes()) {
    if (registry.getNode(node.id) !== node) problems.push(`node ${node.id}: registry key does not match`);
    if (node.owner !== registry) problems.push(`node ${node.id}: owner is not this registry`);
    for (const edge of node.incidentEdges) {
      if (!edgeIds.has(edge.id)) problems.push(`node ${node.id}: incident edge ${edge.id} is not registered`);
      if (!edge.connectsNode(node.id)) problems.push(`node ${node.id}: incident edge ${edge.id} does not touch it`);
    }
    node.ports.forEach((port, index) => {
      if (port.index !== index) problems.push(`node ${node.id}: port at ${index} reports index ${port.index}`);
      if (!port.isLive) problems.push(`node ${node.id}: port ${index} is released`);
      const hosted = port.edge;
      if (hosted && !edgeIds.has(hosted.id)) {
        problems.push(`node ${node.id}: port ${index} hosts unregistered edge ${hosted.id}`);
      }
    });
  }

  return problems;
}
