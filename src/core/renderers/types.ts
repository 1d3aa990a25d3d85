/**
 * Render backend interface
 *
 * Implementations turn DOT source into an image file. The Graphviz
 * implementation runs `dot` out of process.
 */

export type OutputFormat = 'png' | 'svg' | 'pdf' | 'jpg';

export const OUTPUT_FORMATS: readonly OutputFormat[] = ['png', 'svg', 'pdf', 'jpg'];

export interface RenderRequest {
  format: OutputFormat;
  /** Final location of the image. Nothing may be left here on failure. */
  outputPath: string;
}

export interface GraphRenderer {
  /**
   * Render DOT source to `request.outputPath`
   */
  render(source: string, request: RenderRequest): Promise<void>;
}
