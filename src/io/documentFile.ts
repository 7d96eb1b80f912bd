import { mkdir, readFile, rename, writeFile } from 'fs/promises';
import { dirname } from 'path';
import type { GraphDocument } from '../types';
import { parseDocumentText, serializeDocument } from '../core/document';
import type { GraphResult } from '../core/errors';
import type { LoadSummary } from '../core/notifications';
import type { TopologyRegistry } from '../core/registry';

/** Read and JSON-parse a document file. I/O errors reject; bad JSON is a result. */
export async function readDocumentFile(filePath: string): Promise<GraphResult<unknown>> {
  const text = await readFile(filePath, 'utf8');
  return parseDocumentText(text);
}

/** Write through a sibling temp file so a crash never leaves half a document behind. */
export async function writeDocumentFile(filePath: string, doc: GraphDocument): Promise<void> {
  await mkdir(dirname(filePath), { recursive: true });
  const tmp = `${filePath}.tmp`;
  await writeFile(tmp, serializeDocument(doc), 'utf8');
  await rename(tmp, filePath);
}

export async function loadDocumentFile(registry: TopologyRegistry, filePath: string): Promise<LoadSummary> {
  const parsed = await readDocumentFile(filePath);
  if (!parsed.ok) {
    registry.logger.warn('loadDocumentFile: unreadable document', { filePath, message: parsed.error.message });
    return {
      nodesLoaded: 0,
      edgesLoaded: 0,
      nodesFailed: 0,
      edgesFailed: 0,
      failures: [{ entity: 'document', position: -1, kind: parsed.error.kind, message: parsed.error.message }],
    };
  }
  return registry.loadFromDocument(parsed.value);
}

export async function saveDocumentFile(registry: TopologyRegistry, filePath: string): Promise<GraphDocument> {
  const doc = registry.saveToDocument();
  await writeDocumentFile(filePath, doc);
  registry.logger.info('document saved', { filePath, nodes: doc.nodes.length, edges: doc.edges.length });
  return doc;
}
