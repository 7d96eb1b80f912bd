import { z } from 'zod';
import type { EdgeRecord, GraphDocument } from '../types';
import { MAX_PORT_COUNT } from './config';
import { fail, ok, type GraphResult } from './errors';

// Legacy attribute names accepted on read. Writers emit only the canonical key.
const NODE_ALIASES: Record<string, string[]> = {
  inputCount: ['inputs'],
  outputCount: ['outputs'],
};

const EDGE_ALIASES: Record<string, string[]> = {
  sourceNodeId: ['fromNode', 'from'],
  targetNodeId: ['toNode', 'to'],
  sourceSocketIndex: ['fromSocketIndex', 'from-socket'],
  targetSocketIndex: ['toSocketIndex', 'to-socket'],
};

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function withAliases(raw: unknown, aliases: Record<string, string[]>): unknown {
  if (!isRecord(raw)) return raw;
  const out: Record<string, unknown> = { ...raw };
  for (const [canonical, names] of Object.entries(aliases)) {
    if (out[canonical] !== undefined) continue;
    const legacy = names.find((name) => raw[name] !== undefined);
    if (legacy) out[canonical] = raw[legacy];
  }
  return out;
}

// Older documents stored every attribute as text.
const integer = z.union([
  z.number().int().safe(),
  z
    .string()
    .trim()
    .regex(/^-?\d+$/, 'expected an integer')
    .transform(Number)
    .pipe(z.number().int().safe()),
]);

const coordinate = z.union([
  z.number().finite(),
  z
    .string()
    .trim()
    .regex(/^-?\d+(\.\d+)?$/, 'expected a number')
    .transform(Number)
    .pipe(z.number().finite()),
]);

const portCount = integer
  .refine((n) => n >= 0, 'expected a non-negative integer')
  .refine((n) => n <= MAX_PORT_COUNT, `expected at most ${MAX_PORT_COUNT} ports`);
const entityId = z.string().trim().min(1);

export const nodeRecordSchema = z.object({
  id: entityId,
  x: coordinate,
  y: coordinate,
  type: z.string().trim().min(1),
  inputCount: portCount.optional(),
  outputCount: portCount.optional(),
});

export const edgeRecordSchema = z.object({
  id: entityId,
  sourceNodeId: entityId,
  sourceSocketIndex: integer,
  targetNodeId: entityId,
  targetSocketIndex: integer,
});

export const documentEnvelopeSchema = z.object({
  version: z.string().optional(),
  nodes: z.array(z.unknown()).default([]),
  edges: z.array(z.unknown()).default([]),
});

/** Node as read from a document; counts may be left to the type's defaults. */
export type NodeDraft = z.infer<typeof nodeRecordSchema>;
export type DocumentEnvelope = z.infer<typeof documentEnvelopeSchema>;

export function describeIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
    .join('; ');
}

function rawId(raw: unknown): string | undefined {
  return isRecord(raw) && typeof raw.id === 'string' ? raw.id : undefined;
}

export function readNodeRecord(raw: unknown): GraphResult<NodeDraft> {
  const parsed = nodeRecordSchema.safeParse(withAliases(raw, NODE_ALIASES));
  if (!parsed.success) {
    return fail('MalformedDocumentEntity', `Malformed node: ${describeIssues(parsed.error)}`, {
      id: rawId(raw),
    });
  }
  return ok(parsed.data);
}

export function readEdgeRecord(raw: unknown): GraphResult<EdgeRecord> {
  const parsed = edgeRecordSchema.safeParse(withAliases(raw, EDGE_ALIASES));
  if (!parsed.success) {
    return fail('MalformedDocumentEntity', `Malformed edge: ${describeIssues(parsed.error)}`, {
      id: rawId(raw),
    });
  }
  return ok(parsed.data);
}

export function readEnvelope(raw: unknown): GraphResult<DocumentEnvelope> {
  const parsed = documentEnvelopeSchema.safeParse(raw);
  if (!parsed.success) {
    return fail('MalformedDocumentEntity', `Not a graph document: ${describeIssues(parsed.error)}`);
  }
  return ok(parsed.data);
}

export function parseDocumentText(text: string): GraphResult<unknown> {
  try {
    return ok(JSON.parse(text));
  } catch (err) {
    return fail('MalformedDocumentEntity', `Document is not valid JSON: ${err instanceof Error ? err.message : String(err)}`);
  }
}

export function serializeDocument(doc: GraphDocument): string {
  return `${JSON.stringify(doc, null, 2)}\n`;
}
