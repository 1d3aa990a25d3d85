/**
 * Render the example diagrams into the working directory
 *
 * Requires Graphviz. Writes `online_marketplace_architecture.png`.
 */

import { diagram } from '../core/diagram';
import { buildOnlineMarketplace, TITLE } from './onlineMarketplace';

diagram(TITLE, { direction: 'top-to-bottom' }, buildOnlineMarketplace)
  .then((result) => console.log(`Rendered: ${result.outputPath}`))
  .catch((err: unknown) => {
    console.error(err instanceof Error ? err.message : err);
    process.exit(1);
  });
