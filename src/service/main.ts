/**
 * Seat view server entry point.
 *
 * Loads every venue definition, then serves seat clicks over WebSocket.
 *
 * Usage:
 *   RENDER_BACKEND_URL=http://localhost:8000 npx tsx src/service/main.ts
 *   PORT=9000 VENUES_DIR=./venues RENDER_BACKEND_URL=... npx tsx src/service/main.ts
 */

import { loadConfig } from '../config.js';
import { HttpRenderClient } from '../render/render-client.js';
import { loadVenueDirectory } from '../venue/registry.js';
import { SeatViewService } from './seat-view-service.js';
import { createSeatViewServer } from './ws-server.js';

async function main(): Promise<void> {
  const config = loadConfig();
  if (!config.renderBackendUrl) {
    console.error('RENDER_BACKEND_URL is required.');
    process.exit(1);
  }

  const venues = await loadVenueDirectory(config.venuesDir);
  console.log(`Loaded ${venues.size} venue(s) from ${config.venuesDir}`);

  const service = new SeatViewService({
    venues,
    renderClient: new HttpRenderClient({ baseUrl: config.renderBackendUrl }),
    quality: config.quality,
    cache: config.cache,
  });

  const server = createSeatViewServer({ port: config.port, service });
  const port = await server.ready;

  console.log(`Seat view server listening on ws://localhost:${port}`);
  console.log(`Rendering ${config.quality} quality via ${config.renderBackendUrl}`);
  console.log('Press Ctrl+C to stop.');

  function shutdown() {
    console.log('\nShutting down...');
    server.close().then(
      () => process.exit(0),
      (err: unknown) => {
        console.error('Error during shutdown:', err);
        process.exit(1);
      },
    );
  }

  process.on('SIGINT', shutdown);
  process.on('SIGTERM', shutdown);
}

main().catch((err: unknown) => {
  console.error(err instanceof Error ? err.message : err);
  process.exit(1);
});
