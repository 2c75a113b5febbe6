#!/usr/bin/env node
/**
 * Print the seat mapping for sample clicks on a venue's seatmap.
 *
 * Usage:
 *   npx tsx src/cli/test-mapping.ts [venueId] [x,y ...]
 *   npx tsx src/cli/test-mapping.ts yankee_stadium 0.5,0.75 0.35,0.7
 *   npx tsx src/cli/test-mapping.ts yankee_stadium --pixels 640,720
 *
 * Clicks are normalized unless --pixels is given. With no clicks, a set
 * of reference pixel clicks is used.
 */

import { loadConfig } from '../config.js';
import { loadVenueFile } from '../venue/registry.js';
import { mappingReport, parseClickArg, sampleClicks } from './mapping-report.js';

const DEFAULT_VENUE = 'yankee_stadium';

async function main(argv: string[]): Promise<void> {
  const pixels = argv.includes('--pixels');
  const positional = argv.filter((arg) => arg !== '--pixels');
  const [venueId = DEFAULT_VENUE, ...clickArgs] = positional;

  const config = loadConfig();
  const venue = await loadVenueFile(config.venuesDir, venueId);

  const clicks = clickArgs.length > 0
    ? clickArgs.map((arg) => parseClickArg(arg, pixels ? venue.seatmap : undefined))
    : sampleClicks(venue.seatmap);

  console.log(mappingReport(venue, clicks).join('\n'));
}

main(process.argv.slice(2)).catch((err: unknown) => {
  console.error(`Error: ${err instanceof Error ? err.message : String(err)}`);
  process.exit(1);
});
