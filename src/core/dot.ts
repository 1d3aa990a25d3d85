/**
 * DOT serialization of a finished graph
 *
 * Clusters become `subgraph cluster_N` blocks nested exactly as modeled.
 * Edges that start or end at a cluster attach to an invisible anchor node
 * inside it and carry ltail/lhead, so they are clipped at the cluster
 * boundary (this needs compound=true on the graph).
 */

import { DEFAULT_CATALOG, glyphFor, type KindCatalog } from './catalog';
import type {
  DiagramChild,
  DiagramCluster,
  DiagramEdge,
  Direction,
  EndpointRef,
  Graph,
} from './types';

export interface DotOptions {
  catalog?: KindCatalog;
  /** Default: 'Sans-Serif' */
  fontName?: string;
  /** Node font size; titles are drawn 2pt larger, edge labels 2pt smaller. Default: 13 */
  fontSize?: number;
}

type DotAttrs = Record<string, string | number | undefined>;

const RANKDIR: Record<Direction, string> = {
  'top-to-bottom': 'TB',
  'left-to-right': 'LR',
  'bottom-to-top': 'BT',
  'right-to-left': 'RL',
};

/** Cluster background by nesting depth, cycling */
const CLUSTER_BACKGROUNDS = ['#E5F5FD', '#EBF3E7', '#ECE8F6', '#FDF7E3'];

const INDENT = '  ';

/**
 * Quote a string as a DOT double-quoted string
 */
export function quoteDot(value: string): string {
  const escaped = value
    .replace(/\\/g, '\\\\')
    .replace(/"/g, '\\"')
    .replace(/\r?\n/g, '\\n');
  return `"${escaped}"`;
}

/**
 * Format an attribute list without brackets. Undefined values are skipped.
 */
export function formatAttrs(attrs: DotAttrs): string {
  const parts: string[] = [];
  for (const [key, value] of Object.entries(attrs)) {
    if (value === undefined) continue;
    parts.push(`${key}=${typeof value === 'number' ? value : quoteDot(value)}`);
  }
  return parts.join(', ');
}

function statement(depth: number, target: string, attrs: DotAttrs): string {
  const list = formatAttrs(attrs);
  return `${INDENT.repeat(depth)}${target}${list ? ` [${list}]` : ''};`;
}

/** Id of the invisible node edges use to reach a cluster */
export function anchorId(clusterId: string): string {
  return `${clusterId}_anchor`;
}

function endpointId(ref: EndpointRef): string {
  return ref.type === 'cluster' ? anchorId(ref.id) : ref.id;
}

function edgeStatement(edge: DiagramEdge): string {
  const { source, destination } = edge;
  return statement(1, `${endpointId(source)} -> ${endpointId(destination)}`, {
    ltail: source.type === 'cluster' ? source.id : undefined,
    lhead: destination.type === 'cluster' ? destination.id : undefined,
    dir: edge.bidirectional ? 'both' : undefined,
    label: edge.label,
    color: edge.color,
    style: edge.style,
  });
}

/**
 * Ids of clusters that at least one edge starts or ends at
 */
function anchoredClusters(edges: readonly DiagramEdge[]): Set<string> {
  const ids = new Set<string>();
  for (const { source, destination } of edges) {
    if (source.type === 'cluster') ids.add(source.id);
    if (destination.type === 'cluster') ids.add(destination.id);
  }
  return ids;
}

/**
 * Serialize a graph to DOT. The output depends only on the graph and the
 * options, so equal graphs produce identical text.
 */
export function toDot(graph: Graph, options: DotOptions = {}): string {
  const catalog = options.catalog ?? DEFAULT_CATALOG;
  const fontName = options.fontName ?? 'Sans-Serif';
  const fontSize = options.fontSize ?? 13;
  const anchored = anchoredClusters(graph.edges);

  const lines: string[] = [`digraph ${quoteDot(graph.title)} {`];

  lines.push(
    statement(1, 'graph', {
      label: graph.title,
      labelloc: 't',
      rankdir: RANKDIR[graph.direction],
      compound: 'true',
      fontname: fontName,
      fontsize: fontSize + 2,
    }),
    statement(1, 'node', {
      style: 'filled',
      fontname: fontName,
      fontsize: fontSize,
    }),
    statement(1, 'edge', {
      color: '#7B8894',
      fontname: fontName,
      fontsize: fontSize - 2,
    }),
  );

  const writeChildren = (children: readonly DiagramChild[], depth: number) => {
    for (const child of children) {
      if (child.type === 'node') {
        const glyph = glyphFor(child.kind, catalog);
        lines.push(
          statement(depth, child.id, {
            label: child.label,
            shape: glyph.shape,
            fillcolor: glyph.fillcolor,
            fontcolor: glyph.fontcolor,
          }),
        );
      } else {
        writeCluster(child, depth);
      }
    }
  };

  const writeCluster = (cluster: DiagramCluster, depth: number) => {
    const indent = INDENT.repeat(depth);
    lines.push(`${indent}subgraph ${cluster.id} {`);
    lines.push(
      statement(depth + 1, 'graph', {
        label: cluster.title,
        labeljust: 'l',
        style: 'rounded',
        bgcolor: CLUSTER_BACKGROUNDS[(depth - 1) % CLUSTER_BACKGROUNDS.length],
        pencolor: '#AEB6BE',
      }),
    );
    if (anchored.has(cluster.id)) {
      lines.push(
        statement(depth + 1, anchorId(cluster.id), {
          label: '',
          shape: 'point',
          style: 'invis',
          width: 0,
          height: 0,
        }),
      );
    }
    writeChildren(cluster.children, depth + 1);
    lines.push(`${indent}}`);
  };

  writeChildren(graph.children, 1);

  for (const edge of graph.edges) {
    lines.push(edgeStatement(edge));
  }

  lines.push('}');
  return `${lines.join('\n')}\n`;
}
