/**
 * Diagram documents: a JSON description of a diagram, replayed through the
 * construction API
 *
 * @example
 * {
 *   "title": "Ingest",
 *   "direction": "LR",
 *   "children": [
 *     { "node": { "id": "api", "label": "API", "kind": "api-gateway" } },
 *     { "cluster": { "id": "workers", "title": "Workers", "children": [
 *       { "node": { "id": "w1", "kind": "compute" } }
 *     ] } }
 *   ],
 *   "edges": [{ "from": "api", "to": "workers", "label": "jobs" }]
 * }
 */

import { readFile } from 'fs/promises';
import { z } from 'zod';
import { assemble } from './diagram';
import { DocumentError, UnknownEndpointError } from './errors';
import type { ClusterScope, Endpoint, GraphOptions, GraphScope } from './graph';
import {
  DIRECTIONS,
  parseDirection,
  type Direction,
  type EdgeStyle,
  type Graph,
  type NodeHandle,
} from './types';

export interface NodeDocument {
  id: string;
  /** Default: the id */
  label?: string;
  kind?: string;
}

export interface ClusterDocument {
  /** Needed only when edges refer to the cluster */
  id?: string;
  title: string;
  children?: ChildDocument[];
}

export type ChildDocument = { node: NodeDocument } | { cluster: ClusterDocument };

export interface EdgeDocument {
  from: string | string[];
  to: string | string[];
  label?: string;
  bidirectional?: boolean;
  color?: string;
  style?: EdgeStyle;
}

export interface DiagramDocument {
  title: string;
  /** Long name ('left-to-right') or alias ('LR') */
  direction?: string;
  children?: ChildDocument[];
  edges?: EdgeDocument[];
}

const NodeSchema = z
  .object({
    id: z.string().min(1),
    label: z.string().optional(),
    kind: z.string().min(1).optional(),
  })
  .strict();

const ClusterSchema: z.ZodType<ClusterDocument> = z.lazy(() =>
  z
    .object({
      id: z.string().min(1).optional(),
      title: z.string(),
      children: z.array(ChildSchema).optional(),
    })
    .strict(),
);

const ChildSchema: z.ZodType<ChildDocument> = z.union([
  z.object({ node: NodeSchema }).strict(),
  z.object({ cluster: ClusterSchema }).strict(),
]);

const ReferenceSchema = z.union([z.string().min(1), z.array(z.string().min(1)).min(1)]);

/** A missing key would otherwise surface as the union's "Invalid input" */
const RequiredReference = z
  .unknown()
  .refine((value) => value !== undefined, { message: 'Required' })
  .pipe(ReferenceSchema);

const EdgeSchema = z
  .object({
    from: RequiredReference,
    to: RequiredReference,
    label: z.string().optional(),
    bidirectional: z.boolean().optional(),
    color: z.string().optional(),
    style: z.enum(['solid', 'dashed', 'dotted', 'bold']).optional(),
  })
  .strict();

const DocumentSchema = z
  .object({
    title: z.string(),
    direction: z
      .string()
      .refine((value) => parseDirection(value) !== null, {
        message: `Expected one of ${DIRECTIONS.join(', ')} (or TB, LR, BT, RL)`,
      })
      .optional(),
    children: z.array(ChildSchema).optional(),
    edges: z.array(EdgeSchema).optional(),
  })
  .strict();

/**
 * Validate an already-parsed JSON value as a diagram document
 *
 * @throws DocumentError with one issue per problem
 */
export function parseDiagramDocument(raw: unknown): DiagramDocument {
  const result = DocumentSchema.safeParse(raw);
  if (!result.success) {
    throw new DocumentError(
      'Invalid diagram document',
      result.error.issues.map(
        (issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`,
      ),
    );
  }
  return result.data;
}

/**
 * Read and validate a diagram document file
 */
export async function loadDiagramDocument(path: string): Promise<DiagramDocument> {
  const content = await readFile(path, 'utf-8');
  let raw: unknown;
  try {
    raw = JSON.parse(content);
  } catch (e) {
    throw new DocumentError(
      `Invalid JSON in ${path}: ${e instanceof Error ? e.message : String(e)}`,
    );
  }
  return parseDiagramDocument(raw);
}

export function documentDirection(doc: DiagramDocument): Direction | undefined {
  return doc.direction ? (parseDirection(doc.direction) ?? undefined) : undefined;
}

/** What GraphScope and ClusterScope have in common for building */
interface BuildTarget {
  createNode(label: string, kind?: string): NodeHandle;
  cluster<T>(title: string, build: (scope: ClusterScope) => T): T;
}

/**
 * Replay a document's children and edges into an open scope
 *
 * @throws DocumentError on duplicate ids
 * @throws UnknownEndpointError when an edge names an id no child declares
 */
export function buildFromDocument(graph: GraphScope, doc: DiagramDocument): void {
  const handles = new Map<string, Endpoint>();

  const register = (id: string, handle: Endpoint) => {
    if (handles.has(id)) {
      throw new DocumentError(`Duplicate id "${id}"`);
    }
    handles.set(id, handle);
  };

  const addChildren = (scope: BuildTarget, children: ChildDocument[] = []) => {
    for (const child of children) {
      if ('node' in child) {
        const { id, label, kind } = child.node;
        register(id, scope.createNode(label ?? id, kind));
      } else {
        const { id, title, children: nested } = child.cluster;
        scope.cluster(title, (cluster) => {
          if (id) register(id, cluster);
          addChildren(cluster, nested);
        });
      }
    }
  };

  const lookup = (reference: string): Endpoint => {
    const handle = handles.get(reference);
    if (!handle) {
      throw new UnknownEndpointError(
        reference,
        `Edge references unknown id "${reference}"`,
      );
    }
    return handle;
  };

  const resolve = (reference: string | string[]) =>
    Array.isArray(reference) ? reference.map(lookup) : lookup(reference);

  addChildren(graph, doc.children);

  for (const { from, to, ...options } of doc.edges ?? []) {
    graph.connect(resolve(from), resolve(to), options);
  }
}

/**
 * Turn a document into a finished graph. The document's direction wins over
 * the one in `defaults`.
 */
export function assembleDocument(
  doc: DiagramDocument,
  defaults: GraphOptions = {},
): Graph {
  return assemble(
    doc.title,
    { direction: documentDirection(doc) ?? defaults.direction },
    (graph) => buildFromDocument(graph, doc),
  );
}
