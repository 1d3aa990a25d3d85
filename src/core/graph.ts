/**
 * Graph assembly: the construction API for a single diagram
 *
 * A GraphScope owns an explicit stack of open cluster scopes. Nodes and
 * clusters are always added to the innermost open scope, edges are overlaid
 * on the finished tree. Nothing here is shared between GraphScope instances.
 */

import { ScopeError, UnknownEndpointError } from './errors';
import type {
  DiagramChild,
  DiagramEdge,
  Direction,
  EdgeOptions,
  Graph,
  NodeHandle,
} from './types';

export const DEFAULT_KIND = 'generic';

/**
 * Anything an edge can start or end at
 */
export type Endpoint = NodeHandle | ClusterScope;

type Entry = NodeHandle | ClusterScope;

/**
 * Operations a ClusterScope forwards to the graph that created it
 */
interface ScopeOwner {
  createNode(scope: ClusterScope, label: string, kind: string): NodeHandle;
  openCluster(scope: ClusterScope, title: string): ClusterScope;
  close(scope: ClusterScope): void;
  unwind(scope: ClusterScope): void;
  isOpen(scope: ClusterScope): boolean;
}

/**
 * Run `build` inside an open cluster and close it on every exit path. When
 * `build` throws, or returns with a nested cluster still open, the scope and
 * everything opened inside it are force-closed and the error propagates.
 */
function withCluster<T>(
  scope: ClusterScope,
  build: (scope: ClusterScope) => T,
): T {
  try {
    const result = build(scope);
    scope.close();
    return result;
  } catch (error) {
    if (scope.isOpen) scope.abort();
    throw error;
  }
}

/**
 * An open (or closed) cluster. Usable as an edge endpoint from the moment
 * it is opened; the edge then targets the group as a whole.
 */
export class ClusterScope {
  readonly type = 'cluster' as const;
  readonly id: string;
  readonly title: string;
  private owner: ScopeOwner;

  constructor(id: string, title: string, owner: ScopeOwner) {
    this.id = id;
    this.title = title;
    this.owner = owner;
  }

  get isOpen(): boolean {
    return this.owner.isOpen(this);
  }

  /**
   * Create a node inside this cluster. The cluster must be the innermost
   * open scope.
   */
  createNode(label: string, kind: string = DEFAULT_KIND): NodeHandle {
    return this.owner.createNode(this, label, kind);
  }

  openCluster(title: string): ClusterScope {
    return this.owner.openCluster(this, title);
  }

  cluster<T>(title: string, build: (scope: ClusterScope) => T): T {
    return withCluster(this.openCluster(title), build);
  }

  /**
   * Close this cluster. Fails if it is already closed or a cluster opened
   * inside it is still open.
   */
  close(): void {
    this.owner.close(this);
  }

  /**
   * Force-close this cluster and every cluster still open inside it
   */
  abort(): void {
    this.owner.unwind(this);
  }
}

/**
 * Result of a connect call; `to` continues the path from the destination(s)
 */
export class EdgeChain {
  readonly tails: Endpoint[];
  private graph: GraphScope;

  constructor(graph: GraphScope, tails: Endpoint[]) {
    this.graph = graph;
    this.tails = tails;
  }

  to(next: Endpoint | Endpoint[], options: EdgeOptions = {}): EdgeChain {
    return this.graph.connect(this.tails, next, options);
  }
}

export interface GraphOptions {
  /** Default: 'top-to-bottom' */
  direction?: Direction;
}

/**
 * Root scope of one diagram
 */
export class GraphScope {
  readonly title: string;
  readonly direction: Direction;

  private readonly rootEntries: Entry[] = [];
  private readonly clusterEntries = new Map<ClusterScope, Entry[]>();
  /** Open clusters, innermost last */
  private readonly stack: ClusterScope[] = [];
  private readonly endpoints = new Map<string, Endpoint>();
  private readonly edges: DiagramEdge[] = [];
  private readonly owner: ScopeOwner;
  private nodeCount = 0;
  private clusterCount = 0;
  private closed = false;

  constructor(title: string, options: GraphOptions = {}) {
    this.title = title;
    this.direction = options.direction ?? 'top-to-bottom';
    this.owner = {
      createNode: (scope, label, kind) =>
        this.addNode(this.activeEntries(scope), label, kind),
      openCluster: (scope, title) =>
        this.addCluster(this.activeEntries(scope), title),
      close: (scope) => this.closeCluster(scope),
      unwind: (scope) => this.unwindTo(scope),
      isOpen: (scope) => !this.closed && this.stack.includes(scope),
    };
  }

  get isOpen(): boolean {
    return !this.closed;
  }

  /** Number of edge records so far */
  get edgeCount(): number {
    return this.edges.length;
  }

  /**
   * Create a node in the innermost open scope
   */
  createNode(label: string, kind: string = DEFAULT_KIND): NodeHandle {
    return this.addNode(this.activeEntries(), label, kind);
  }

  /**
   * Open a cluster in the innermost open scope. Pair with close(), or use
   * cluster() to have it closed automatically.
   */
  openCluster(title: string): ClusterScope {
    return this.addCluster(this.activeEntries(), title);
  }

  /**
   * Open a cluster, run `build` inside it and close it, also when `build`
   * throws
   */
  cluster<T>(title: string, build: (scope: ClusterScope) => T): T {
    return withCluster(this.openCluster(title), build);
  }

  /**
   * Record one edge per (source, destination) pair, sources in the outer
   * loop. All endpoints are checked before any edge is recorded.
   *
   * @throws UnknownEndpointError if an endpoint was not created by this graph
   */
  connect(
    source: Endpoint | Endpoint[],
    destination: Endpoint | Endpoint[],
    options: EdgeOptions = {},
  ): EdgeChain {
    this.assertOpen();
    const sources = Array.isArray(source) ? source : [source];
    const destinations = Array.isArray(destination)
      ? destination
      : [destination];

    for (const endpoint of [...sources, ...destinations]) {
      this.assertKnown(endpoint);
    }

    for (const from of sources) {
      for (const to of destinations) {
        this.edges.push(
          Object.freeze({
            source: Object.freeze({ type: from.type, id: from.id }),
            destination: Object.freeze({ type: to.type, id: to.id }),
            bidirectional: options.bidirectional ?? false,
            ...(options.label !== undefined && { label: options.label }),
            ...(options.color !== undefined && { color: options.color }),
            ...(options.style !== undefined && { style: options.style }),
          }),
        );
      }
    }

    return new EdgeChain(this, destinations);
  }

  /**
   * Straight-line path: path(a, b, c) is connect(a, b).to(c)
   */
  path(first: Endpoint, second: Endpoint, ...rest: Endpoint[]): EdgeChain {
    let chain = this.connect(first, second);
    for (const next of rest) {
      chain = chain.to(next);
    }
    return chain;
  }

  /**
   * Finish assembly and return the frozen graph
   *
   * @throws ScopeError if a cluster is still open or the graph is closed
   */
  close(): Graph {
    this.assertOpen();
    const innermost = this.stack[this.stack.length - 1];
    if (innermost) {
      throw new ScopeError(
        `Cannot close graph "${this.title}" while cluster "${innermost.title}" is still open`,
      );
    }
    this.closed = true;

    return Object.freeze({
      title: this.title,
      direction: this.direction,
      children: this.snapshot(this.rootEntries),
      edges: Object.freeze([...this.edges]),
    });
  }

  /**
   * Force-close every open cluster (innermost first) and the graph itself.
   * Used when construction fails; the graph is never rendered afterwards.
   */
  abort(): void {
    this.stack.length = 0;
    this.closed = true;
  }

  private assertOpen(): void {
    if (this.closed) {
      throw new ScopeError(`Graph "${this.title}" is closed`);
    }
  }

  private assertKnown(endpoint: Endpoint): void {
    if (this.endpoints.get(endpoint.id) !== endpoint) {
      throw new UnknownEndpointError(
        endpoint.id,
        `Edge endpoint ${endpoint.id} was not created in graph "${this.title}"`,
      );
    }
  }

  /**
   * Children list of the innermost open scope. When `expected` is given it
   * must be that scope.
   */
  private activeEntries(expected?: ClusterScope): Entry[] {
    this.assertOpen();
    const innermost = this.stack[this.stack.length - 1];

    if (expected && expected !== innermost) {
      throw new ScopeError(
        this.stack.includes(expected)
          ? `Cluster "${expected.title}" is not the innermost open scope`
          : `Cluster "${expected.title}" is closed`,
      );
    }

    return innermost ? this.entriesOf(innermost) : this.rootEntries;
  }

  private entriesOf(scope: ClusterScope): Entry[] {
    const entries = this.clusterEntries.get(scope);
    if (!entries) {
      throw new ScopeError(
        `Cluster "${scope.title}" does not belong to graph "${this.title}"`,
      );
    }
    return entries;
  }

  private addNode(entries: Entry[], label: string, kind: string): NodeHandle {
    const node: NodeHandle = Object.freeze({
      type: 'node',
      id: `n${++this.nodeCount}`,
      label,
      kind,
    });
    entries.push(node);
    this.endpoints.set(node.id, node);
    return node;
  }

  private addCluster(entries: Entry[], title: string): ClusterScope {
    const scope = new ClusterScope(
      `cluster_${++this.clusterCount}`,
      title,
      this.owner,
    );
    entries.push(scope);
    this.clusterEntries.set(scope, []);
    this.endpoints.set(scope.id, scope);
    this.stack.push(scope);
    return scope;
  }

  private closeCluster(scope: ClusterScope): void {
    const innermost = this.stack[this.stack.length - 1];
    if (!this.stack.includes(scope)) {
      throw new ScopeError(`Cluster "${scope.title}" is already closed`);
    }
    if (innermost !== scope) {
      throw new ScopeError(
        `Cannot close cluster "${scope.title}" while "${innermost?.title}" is still open`,
      );
    }
    this.stack.pop();
  }

  private unwindTo(scope: ClusterScope): void {
    const depth = this.stack.indexOf(scope);
    if (depth >= 0) this.stack.length = depth;
  }

  private snapshot(entries: Entry[]): readonly DiagramChild[] {
    return Object.freeze(
      entries.map((entry): DiagramChild =>
        entry.type === 'node'
          ? entry
          : Object.freeze({
              type: 'cluster',
              id: entry.id,
              title: entry.title,
              children: this.snapshot(this.entriesOf(entry)),
            }),
      ),
    );
  }
}

/**
 * Open the root scope of a new diagram
 */
export function openGraph(title: string, options: GraphOptions = {}): GraphScope {
  return new GraphScope(title, options);
}
