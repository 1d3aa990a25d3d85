/**
 * Scoped diagram construction: build, close, render
 */

import { openGraph, type GraphOptions, type GraphScope } from './graph';
import { renderGraph, type RenderOptions, type RenderResult } from './render';
import type { Graph } from './types';

export interface DiagramOptions extends GraphOptions, RenderOptions {}

/**
 * Run `build` inside a fresh graph scope and return the finished graph.
 *
 * If `build` throws, or leaves a cluster open, every open scope is
 * force-closed and the error propagates unchanged.
 */
export function assemble(
  title: string,
  options: GraphOptions,
  build: (graph: GraphScope) => void,
): Graph {
  const scope = openGraph(title, options);
  try {
    build(scope);
    return scope.close();
  } catch (error) {
    scope.abort();
    throw error;
  }
}

/**
 * Build a diagram and render it. The graph reaches the renderer only when
 * construction completed; a partial graph is never rendered.
 *
 * @example
 * await diagram('Web Service', { direction: 'left-to-right' }, (g) => {
 *   const lb = g.createNode('lb', 'load-balancer');
 *   const web = g.cluster('Web', (c) => {
 *     c.createNode('web1', 'compute');
 *     return c;
 *   });
 *   g.connect(lb, web, { label: 'http' });
 * });
 */
export async function diagram(
  title: string,
  options: DiagramOptions,
  build: (graph: GraphScope) => void,
): Promise<RenderResult> {
  const graph = assemble(title, options, build);
  return renderGraph(graph, options);
}
