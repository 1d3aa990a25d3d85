/**
 * Core model types shared between the construction API, the DOT serializer
 * and the CLI
 */

/**
 * Layout flow hint handed to the layout engine
 */
export type Direction =
  | 'top-to-bottom'
  | 'left-to-right'
  | 'bottom-to-top'
  | 'right-to-left';

/** Short forms accepted wherever a direction is parsed from text */
export const DIRECTION_ALIASES: Record<string, Direction> = {
  TB: 'top-to-bottom',
  LR: 'left-to-right',
  BT: 'bottom-to-top',
  RL: 'right-to-left',
};

export const DIRECTIONS: readonly Direction[] = [
  'top-to-bottom',
  'left-to-right',
  'bottom-to-top',
  'right-to-left',
];

/**
 * Parse a direction from its long name or its two-letter alias
 *
 * @returns The direction, or null if the text names none
 */
export function parseDirection(text: string): Direction | null {
  const long = DIRECTIONS.find((direction) => direction === text);
  if (long) return long;
  return DIRECTION_ALIASES[text.toUpperCase()] ?? null;
}

export type EdgeStyle = 'solid' | 'dashed' | 'dotted' | 'bold';

/**
 * Display options for a single edge
 */
export interface EdgeOptions {
  /** Draw arrowheads at both ends. Default: false */
  bidirectional?: boolean;
  label?: string;
  color?: string;
  style?: EdgeStyle;
}

/**
 * Handle to a node, returned by createNode and used as an edge endpoint
 */
export interface NodeHandle {
  readonly type: 'node';
  readonly id: string;
  readonly label: string;
  readonly kind: string;
}

/**
 * Reference to an edge endpoint in a finished graph
 */
export interface EndpointRef {
  type: 'node' | 'cluster';
  id: string;
}

export interface DiagramNode {
  readonly type: 'node';
  readonly id: string;
  readonly label: string;
  readonly kind: string;
}

export interface DiagramCluster {
  readonly type: 'cluster';
  readonly id: string;
  readonly title: string;
  readonly children: readonly DiagramChild[];
}

export type DiagramChild = DiagramNode | DiagramCluster;

export interface DiagramEdge {
  readonly source: Readonly<EndpointRef>;
  readonly destination: Readonly<EndpointRef>;
  readonly bidirectional: boolean;
  readonly label?: string;
  readonly color?: string;
  readonly style?: EdgeStyle;
}

/**
 * A finished diagram: the containment tree plus the edges overlaid on it.
 * Frozen once the graph scope closes.
 */
export interface Graph {
  readonly title: string;
  readonly direction: Direction;
  readonly children: readonly DiagramChild[];
  readonly edges: readonly DiagramEdge[];
}

/**
 * Visual treatment for a node kind
 */
export interface KindGlyph {
  /** Graphviz node shape */
  shape: string;
  fillcolor: string;
  fontcolor: string;
}
