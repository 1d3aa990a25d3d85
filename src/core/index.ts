/**
 * Core module exports
 *
 * This is the library surface used by the CLI and by diagram scripts.
 */

// Model types
export {
  type Direction,
  type EdgeStyle,
  type EdgeOptions,
  type NodeHandle,
  type EndpointRef,
  type DiagramNode,
  type DiagramCluster,
  type DiagramChild,
  type DiagramEdge,
  type Graph,
  type KindGlyph,
  DIRECTIONS,
  DIRECTION_ALIASES,
  parseDirection,
} from './types';

// Errors
export {
  TopodrawError,
  ScopeError,
  UnknownEndpointError,
  RenderBackendError,
  DocumentError,
  ConfigError,
  type RenderBackendDetails,
} from './errors';

// Construction API
export {
  openGraph,
  GraphScope,
  ClusterScope,
  EdgeChain,
  DEFAULT_KIND,
  type Endpoint,
  type GraphOptions,
} from './graph';
export { diagram, assemble, type DiagramOptions } from './diagram';

// Kind catalog
export {
  DEFAULT_CATALOG,
  glyphFor,
  extendCatalog,
  isKnownKind,
  unknownKinds,
  type KindCatalog,
} from './catalog';

// DOT serialization
export { toDot, quoteDot, formatAttrs, anchorId, type DotOptions } from './dot';

// Render pipeline
export {
  renderGraph,
  resolveOutput,
  formatFromPath,
  slugify,
  type RenderOptions,
  type RenderResult,
} from './render';

// Render backends
export {
  type GraphRenderer,
  type RenderRequest,
  type OutputFormat,
  OUTPUT_FORMATS,
} from './renderers/types';
export {
  GraphvizRenderer,
  temporaryPathFor,
  type GraphvizRendererOptions,
} from './renderers/graphviz';

// Diagram documents
export {
  parseDiagramDocument,
  loadDiagramDocument,
  buildFromDocument,
  assembleDocument,
  documentDirection,
  type DiagramDocument,
  type ChildDocument,
  type NodeDocument,
  type ClusterDocument,
  type EdgeDocument,
} from './document';

// Configuration
export {
  type TopodrawConfig,
  DEFAULT_CONFIG,
  loadConfig,
  parseConfig,
} from './config';
